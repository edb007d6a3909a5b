import type { ChunkMetadata } from "./document.js";

export interface CollectionMetadata {
  embeddingModel: string;
  dimension: number;
  createdAt: string;
}

export interface CollectionDescriptor {
  name: string;
  metadata: CollectionMetadata;
}

export type CollectionCompatibility = "absent" | "compatible" | "incompatible" | "recreated";

export interface StoredChunkRecord {
  id: string;
  content: string;
  embedding: number[];
  metadata: ChunkMetadata;
}

export interface VectorQueryMatch {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  distance: number;
}

export interface CollectionStats {
  name: string;
  embeddingModel: string;
  dimension: number;
  documentCount: number;
  chunkCount: number;
}
