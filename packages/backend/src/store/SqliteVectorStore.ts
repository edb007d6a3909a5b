import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import type {
  ChunkMetadata,
  CollectionDescriptor,
  CollectionMetadata,
  IndexedDocumentSummary,
  StoredChunkRecord,
  VectorQueryMatch,
  VectorStoreBackend
} from "@ragdesk/shared";
import { rankByDistance, summarizeDocuments } from "./vectorMath.js";

export interface SqliteVectorStoreOptions {
  dbPath?: string;
}

interface CollectionRow {
  name: string;
  embedding_model: string;
  dimension: number;
  created_at: string;
}

interface ChunkRow {
  id: string;
  content: string;
  embedding: Buffer;
  metadata_json: string;
}

const chunkMetadataSchema = z.object({
  documentId: z.string(),
  chunkIndex: z.number().int().min(0),
  title: z.string(),
  filename: z.string(),
  filePath: z.string(),
  fileType: z.enum(["pdf", "text", "markdown", "rich-text"]),
  fileSize: z.number().int().min(0),
  createdAt: z.string(),
  embeddingSource: z.enum(["remote", "fallback"]).default("remote")
});

export function encodeEmbedding(embedding: readonly number[]): Buffer {
  const buffer = Buffer.alloc(embedding.length * 4);
  embedding.forEach((value, index) => {
    buffer.writeFloatLE(value, index * 4);
  });
  return buffer;
}

export function decodeEmbedding(buffer: Buffer): number[] {
  const values: number[] = [];
  for (let offset = 0; offset + 4 <= buffer.byteLength; offset += 4) {
    values.push(buffer.readFloatLE(offset));
  }
  return values;
}

/**
 * Collections and their chunk vectors in one SQLite file. Search is a full
 * scan ranked by cosine distance.
 */
export class SqliteVectorStore implements VectorStoreBackend {
  private readonly db: Database.Database;

  constructor(options: SqliteVectorStoreOptions = {}) {
    const dbPath = options.dbPath === ":memory:" ? ":memory:" : resolve(options.dbPath ?? "data/collections/vectors.db");
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("journal_mode = WAL");

    this.initializeSchema();
  }

  async getCollection(name: string): Promise<CollectionDescriptor | null> {
    const row = this.db
      .prepare<[string], CollectionRow>(
        `
        SELECT name, embedding_model, dimension, created_at
        FROM collections
        WHERE name = ?
        LIMIT 1
        `
      )
      .get(name);

    return row ? mapCollectionRow(row) : null;
  }

  async createCollection(name: string, metadata: CollectionMetadata): Promise<CollectionDescriptor> {
    this.db
      .prepare(
        `
        INSERT INTO collections (name, embedding_model, dimension, created_at)
        VALUES (@name, @embedding_model, @dimension, @created_at)
        `
      )
      .run({
        name,
        embedding_model: metadata.embeddingModel,
        dimension: metadata.dimension,
        created_at: metadata.createdAt
      });

    return { name, metadata: { ...metadata } };
  }

  async deleteCollection(name: string): Promise<void> {
    this.db.prepare("DELETE FROM collections WHERE name = ?").run(name);
  }

  async addRecords(collection: string, records: StoredChunkRecord[]): Promise<void> {
    const insert = this.db.prepare(
      `
      INSERT OR REPLACE INTO chunks (collection, id, document_id, chunk_index, content, embedding, metadata_json)
      VALUES (@collection, @id, @document_id, @chunk_index, @content, @embedding, @metadata_json)
      `
    );

    const insertAll = this.db.transaction((items: StoredChunkRecord[]) => {
      for (const record of items) {
        insert.run({
          collection,
          id: record.id,
          document_id: record.metadata.documentId,
          chunk_index: record.metadata.chunkIndex,
          content: record.content,
          embedding: encodeEmbedding(record.embedding),
          metadata_json: JSON.stringify(record.metadata)
        });
      }
    });

    this.requireCollection(collection);
    insertAll(records);
  }

  async listIds(collection: string, filter: { documentId?: string } = {}): Promise<string[]> {
    this.requireCollection(collection);
    const rows =
      filter.documentId === undefined
        ? this.db
            .prepare<[string], { id: string }>("SELECT id FROM chunks WHERE collection = ? ORDER BY id")
            .all(collection)
        : this.db
            .prepare<[string, string], { id: string }>(
              "SELECT id FROM chunks WHERE collection = ? AND document_id = ? ORDER BY chunk_index"
            )
            .all(collection, filter.documentId);

    return rows.map((row) => row.id);
  }

  async deleteByIds(collection: string, ids: string[]): Promise<void> {
    this.requireCollection(collection);
    const remove = this.db.prepare("DELETE FROM chunks WHERE collection = ? AND id = ?");
    const removeAll = this.db.transaction((items: string[]) => {
      for (const id of items) {
        remove.run(collection, id);
      }
    });
    removeAll(ids);
  }

  async count(collection: string): Promise<number> {
    this.requireCollection(collection);
    const row = this.db
      .prepare<[string], { total: number }>("SELECT COUNT(*) AS total FROM chunks WHERE collection = ?")
      .get(collection);
    return row?.total ?? 0;
  }

  async peekEmbedding(collection: string): Promise<number[] | null> {
    this.requireCollection(collection);
    const row = this.db
      .prepare<[string], { embedding: Buffer }>("SELECT embedding FROM chunks WHERE collection = ? LIMIT 1")
      .get(collection);
    return row ? decodeEmbedding(row.embedding) : null;
  }

  async listDocuments(collection: string): Promise<IndexedDocumentSummary[]> {
    this.requireCollection(collection);
    const rows = this.db
      .prepare<[string], { metadata_json: string }>(
        "SELECT metadata_json FROM chunks WHERE collection = ? ORDER BY document_id, chunk_index"
      )
      .all(collection);
    return summarizeDocuments(rows.map((row) => parseMetadata(row.metadata_json)));
  }

  async query(collection: string, embedding: number[], topK: number): Promise<VectorQueryMatch[]> {
    this.requireCollection(collection);
    const rows = this.db
      .prepare<[string], ChunkRow>(
        "SELECT id, content, embedding, metadata_json FROM chunks WHERE collection = ?"
      )
      .all(collection);

    const records = rows.map(
      (row): StoredChunkRecord => ({
        id: row.id,
        content: row.content,
        embedding: decodeEmbedding(row.embedding),
        metadata: parseMetadata(row.metadata_json)
      })
    );
    return rankByDistance(records, embedding, topK);
  }

  async healthCheck(): Promise<boolean> {
    const row = this.db.prepare<[], { ok: number }>("SELECT 1 AS ok").get();
    return row?.ok === 1;
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private requireCollection(name: string): void {
    const row = this.db
      .prepare<[string], { name: string }>("SELECT name FROM collections WHERE name = ? LIMIT 1")
      .get(name);
    if (!row) {
      throw new Error(`Collection does not exist: ${name}`);
    }
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS collections (
        name TEXT PRIMARY KEY,
        embedding_model TEXT NOT NULL,
        dimension INTEGER NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chunks (
        collection TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
        id TEXT NOT NULL,
        document_id TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        content TEXT NOT NULL,
        embedding BLOB NOT NULL,
        metadata_json TEXT NOT NULL,
        PRIMARY KEY (collection, id)
      );

      CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks (collection, document_id);
    `);
  }
}

function mapCollectionRow(row: CollectionRow): CollectionDescriptor {
  return {
    name: row.name,
    metadata: {
      embeddingModel: row.embedding_model,
      dimension: row.dimension,
      createdAt: row.created_at
    }
  };
}

function parseMetadata(json: string): ChunkMetadata {
  return chunkMetadataSchema.parse(JSON.parse(json));
}
