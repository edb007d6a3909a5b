import type {
  CollectionDescriptor,
  CollectionMetadata,
  StoredChunkRecord,
  VectorQueryMatch
} from "./types/collection.js";
import type { IndexedDocumentSummary } from "./types/document.js";

export interface CollectionLifecycleStore {
  getCollection(name: string): Promise<CollectionDescriptor | null>;
  createCollection(name: string, metadata: CollectionMetadata): Promise<CollectionDescriptor>;
  deleteCollection(name: string): Promise<void>;
}

export interface ChunkRecordStore {
  addRecords(collection: string, records: StoredChunkRecord[]): Promise<void>;
  listIds(collection: string, filter?: { documentId?: string }): Promise<string[]>;
  deleteByIds(collection: string, ids: string[]): Promise<void>;
  count(collection: string): Promise<number>;
  peekEmbedding(collection: string): Promise<number[] | null>;
  listDocuments(collection: string): Promise<IndexedDocumentSummary[]>;
}

export interface VectorQueryStore {
  query(collection: string, embedding: number[], topK: number): Promise<VectorQueryMatch[]>;
}

export interface VectorStoreBackend
  extends CollectionLifecycleStore,
    ChunkRecordStore,
    VectorQueryStore {
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
