export type * from "./types/api.js";
export type * from "./types/collection.js";
export type * from "./types/document.js";
export type * from "./types/indexing.js";
export type * from "./types/qa.js";
export type * from "./store.js";
