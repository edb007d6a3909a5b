import type {
  CollectionDescriptor,
  CollectionMetadata,
  IndexedDocumentSummary,
  StoredChunkRecord,
  VectorQueryMatch,
  VectorStoreBackend
} from "@ragdesk/shared";
import { rankByDistance, summarizeDocuments } from "./vectorMath.js";

interface MemoryCollection {
  descriptor: CollectionDescriptor;
  records: Map<string, StoredChunkRecord>;
}

export class InMemoryVectorStore implements VectorStoreBackend {
  private readonly collections = new Map<string, MemoryCollection>();

  async getCollection(name: string): Promise<CollectionDescriptor | null> {
    const collection = this.collections.get(name);
    return collection ? { name, metadata: { ...collection.descriptor.metadata } } : null;
  }

  async createCollection(name: string, metadata: CollectionMetadata): Promise<CollectionDescriptor> {
    if (this.collections.has(name)) {
      throw new Error(`Collection already exists: ${name}`);
    }
    const descriptor: CollectionDescriptor = { name, metadata: { ...metadata } };
    this.collections.set(name, { descriptor, records: new Map() });
    return { name, metadata: { ...metadata } };
  }

  async deleteCollection(name: string): Promise<void> {
    this.collections.delete(name);
  }

  async addRecords(collection: string, records: StoredChunkRecord[]): Promise<void> {
    const target = this.require(collection);
    for (const record of records) {
      target.records.set(record.id, {
        ...record,
        embedding: [...record.embedding],
        metadata: { ...record.metadata }
      });
    }
  }

  async listIds(collection: string, filter: { documentId?: string } = {}): Promise<string[]> {
    const target = this.require(collection);
    return [...target.records.values()]
      .filter((record) => filter.documentId === undefined || record.metadata.documentId === filter.documentId)
      .map((record) => record.id);
  }

  async deleteByIds(collection: string, ids: string[]): Promise<void> {
    const target = this.require(collection);
    for (const id of ids) {
      target.records.delete(id);
    }
  }

  async count(collection: string): Promise<number> {
    return this.require(collection).records.size;
  }

  async peekEmbedding(collection: string): Promise<number[] | null> {
    const first = this.require(collection).records.values().next();
    return first.done ? null : [...first.value.embedding];
  }

  async listDocuments(collection: string): Promise<IndexedDocumentSummary[]> {
    const records = this.require(collection).records.values();
    return summarizeDocuments(Array.from(records, (record) => record.metadata));
  }

  async query(collection: string, embedding: number[], topK: number): Promise<VectorQueryMatch[]> {
    return rankByDistance(this.require(collection).records.values(), embedding, topK);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  private require(name: string): MemoryCollection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new Error(`Collection does not exist: ${name}`);
    }
    return collection;
  }
}
