import { basename } from "node:path";
import type {
  ChunkMetadata,
  CollectionCompatibility,
  CollectionDescriptor,
  CollectionMetadata,
  CollectionStats,
  IndexedDocumentSummary,
  KnowledgeDocument,
  StoredChunkRecord,
  VectorQueryMatch,
  VectorStoreBackend
} from "@ragdesk/shared";
import {
  CollectionStoreError,
  DimensionIncompatibleError,
  DocumentNotFoundError,
  KnowledgeBaseError
} from "../errors.js";
import type { Chunker } from "../pipeline/Chunker.js";
import type { CancellationToken } from "../runtime/cancellation.js";
import type {
  DimensionProbe,
  EmbeddingBatch,
  EmbeddingProviderLike
} from "../services/EmbeddingProvider.js";
import { logger } from "../utils/logger.js";

export interface VectorCollectionManagerOptions {
  collectionName: string;
  insertBatchSize: number;
}

const defaultOptions: VectorCollectionManagerOptions = {
  collectionName: "knowledge_base",
  insertBatchSize: 100
};

export interface OperationOptions {
  token?: CancellationToken;
}

export interface InsertResult {
  documentId: string;
  chunkCount: number;
  dimension: number;
  fallbackChunkCount: number;
  recreated: boolean;
}

export interface ClearResult {
  strategy: "bulk-delete" | "recreate";
  removed: number;
}

/**
 * Sole owner of one named collection. Keeps every stored vector at the
 * collection's dimension, recreating the collection when the active
 * embedding model produces vectors of another length.
 */
export class VectorCollectionManager {
  private readonly options: VectorCollectionManagerOptions;
  private descriptor: CollectionDescriptor | null = null;
  private ready: Promise<CollectionDescriptor> | null = null;
  private compatibilityState: CollectionCompatibility = "absent";

  constructor(
    private readonly backend: VectorStoreBackend,
    private readonly embeddings: EmbeddingProviderLike,
    private readonly chunker: Chunker,
    options: Partial<VectorCollectionManagerOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  get collectionName(): string {
    return this.options.collectionName;
  }

  get compatibility(): CollectionCompatibility {
    return this.compatibilityState;
  }

  get embeddingModel(): string {
    return this.embeddings.model;
  }

  async initialize(options: OperationOptions = {}): Promise<CollectionDescriptor> {
    const name = this.options.collectionName;
    const probe = await this.embeddings.probe(options);
    const existing = await this.store("getCollection", () => this.backend.getCollection(name));

    if (!existing) {
      const dimension = await this.creationDimension(probe);
      this.descriptor = await this.store("createCollection", () =>
        this.backend.createCollection(name, this.buildMetadata(dimension))
      );
      this.compatibilityState = "compatible";
      logger.info({ collection: name, model: this.embeddings.model, dimension }, "Created collection");
      return this.descriptor;
    }

    this.descriptor = existing;
    if (probe.source === "fallback") {
      logger.warn(
        { collection: name, model: this.embeddings.model },
        "Embedding model unreachable, collection dimension was not verified"
      );
      this.compatibilityState = "compatible";
      return existing;
    }

    const sample = await this.store("peekEmbedding", () => this.backend.peekEmbedding(name));
    const storedDimension = sample?.length ?? existing.metadata.dimension;
    if (storedDimension === probe.dimension) {
      this.compatibilityState = "compatible";
      return existing;
    }

    this.compatibilityState = "incompatible";
    logger.warn(
      {
        collection: name,
        previousModel: existing.metadata.embeddingModel,
        model: this.embeddings.model,
        expected: storedDimension,
        actual: probe.dimension
      },
      "Embedding dimension changed, recreating collection"
    );
    return this.recreate(probe.dimension);
  }

  async insert(document: KnowledgeDocument, options: OperationOptions = {}): Promise<InsertResult> {
    await this.ensureReady(options);
    options.token?.throwIfCancelled();

    const chunks = await this.chunker.chunkDocument(document.id, document.content);
    const embedded = await this.embeddings.embed(
      chunks.map((chunk) => chunk.content),
      options
    );
    const { dimension, recreated } = await this.reconcileDimension(embedded, document);

    const createdAt = new Date().toISOString();
    const records = chunks.map((chunk, index): StoredChunkRecord => {
      const embedding = embedded.vectors[index];
      const source = embedded.sources[index];
      if (!embedding || !source) {
        throw new CollectionStoreError("embed", this.options.collectionName);
      }
      const metadata: ChunkMetadata = {
        documentId: document.id,
        chunkIndex: chunk.index,
        title: document.title,
        filename: basename(document.filePath),
        filePath: document.filePath,
        fileType: document.fileType,
        fileSize: document.fileSize,
        createdAt,
        embeddingSource: source
      };
      return { id: chunk.id, content: chunk.content, embedding, metadata };
    });

    // Each group is written on its own; a failure or cancellation between
    // groups leaves the earlier ones in place.
    for (let start = 0; start < records.length; start += this.options.insertBatchSize) {
      options.token?.throwIfCancelled();
      const group = records.slice(start, start + this.options.insertBatchSize);
      await this.store("addRecords", () => this.backend.addRecords(this.options.collectionName, group));
    }

    return {
      documentId: document.id,
      chunkCount: records.length,
      dimension,
      fallbackChunkCount: embedded.sources.filter((source) => source === "fallback").length,
      recreated
    };
  }

  async delete(documentId: string): Promise<number> {
    await this.ensureReady();
    const name = this.options.collectionName;
    const ids = await this.store("listIds", () => this.backend.listIds(name, { documentId }));
    if (ids.length === 0) {
      throw new DocumentNotFoundError(documentId);
    }

    await this.store("deleteByIds", () => this.backend.deleteByIds(name, ids));
    return ids.length;
  }

  async update(
    documentId: string,
    document: KnowledgeDocument,
    options: OperationOptions = {}
  ): Promise<InsertResult> {
    await this.delete(documentId);
    return this.insert({ ...document, id: documentId }, options);
  }

  async clear(): Promise<ClearResult> {
    const descriptor = await this.ensureReady();
    const name = this.options.collectionName;

    let ids: string[] = [];
    try {
      ids = await this.backend.listIds(name);
      if (ids.length > 0) {
        await this.backend.deleteByIds(name, ids);
      }
      return { strategy: "bulk-delete", removed: ids.length };
    } catch (error) {
      logger.warn({ err: error, collection: name }, "Bulk delete failed, dropping and recreating collection");
    }

    await this.store("deleteCollection", () => this.backend.deleteCollection(name));
    this.descriptor = await this.store("createCollection", () =>
      this.backend.createCollection(name, { ...descriptor.metadata })
    );
    return { strategy: "recreate", removed: ids.length };
  }

  async search(queryText: string, topK: number, options: OperationOptions = {}): Promise<VectorQueryMatch[]> {
    const descriptor = await this.ensureReady(options);
    const name = this.options.collectionName;
    if (topK <= 0) {
      return [];
    }

    const count = await this.store("count", () => this.backend.count(name));
    if (count === 0) {
      return [];
    }

    const embedded = await this.embeddings.embed([queryText], options);
    const queryVector = embedded.vectors[0];
    if (!queryVector) {
      return [];
    }

    const storedDimension =
      (await this.store("peekEmbedding", () => this.backend.peekEmbedding(name)))?.length ??
      descriptor.metadata.dimension;
    if (queryVector.length !== storedDimension) {
      logger.warn(
        { collection: name, expected: storedDimension, actual: queryVector.length, source: embedded.sources[0] },
        "Query embedding does not match the collection dimension"
      );
      return [];
    }

    const matches = await this.store("query", () => this.backend.query(name, queryVector, topK));
    return [...matches].sort((a, b) => a.distance - b.distance);
  }

  async listDocuments(): Promise<IndexedDocumentSummary[]> {
    await this.ensureReady();
    return this.store("listDocuments", () => this.backend.listDocuments(this.options.collectionName));
  }

  async stats(): Promise<CollectionStats> {
    const descriptor = await this.ensureReady();
    const name = this.options.collectionName;
    const [chunkCount, documents] = await Promise.all([
      this.store("count", () => this.backend.count(name)),
      this.store("listDocuments", () => this.backend.listDocuments(name))
    ]);

    return {
      name,
      embeddingModel: descriptor.metadata.embeddingModel,
      dimension: descriptor.metadata.dimension,
      documentCount: documents.length,
      chunkCount
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      return await this.backend.healthCheck();
    } catch (error) {
      logger.warn({ err: error }, "Vector store health check failed");
      return false;
    }
  }

  private ensureReady(options: OperationOptions = {}): Promise<CollectionDescriptor> {
    if (!this.ready) {
      this.ready = this.initialize(options).catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    return this.ready.then(() => this.requireDescriptor());
  }

  private requireDescriptor(): CollectionDescriptor {
    if (!this.descriptor) {
      throw new CollectionStoreError("describe", this.options.collectionName);
    }
    return this.descriptor;
  }

  private async reconcileDimension(
    embedded: EmbeddingBatch,
    document: KnowledgeDocument
  ): Promise<{ dimension: number; recreated: boolean }> {
    const descriptor = this.requireDescriptor();
    const expected = descriptor.metadata.dimension;
    const lengths = [...new Set(embedded.vectors.map((vector) => vector.length))];
    const [dimension] = lengths;

    if (dimension === undefined || lengths.length > 1) {
      throw new DimensionIncompatibleError({
        collection: this.options.collectionName,
        model: this.embeddings.model,
        expected,
        actual: lengths.find((length) => length !== expected) ?? 0,
        filePath: document.filePath
      });
    }

    if (dimension === expected) {
      return { dimension, recreated: false };
    }

    const name = this.options.collectionName;
    const count = await this.store("count", () => this.backend.count(name));
    const allRemote = embedded.sources.every((source) => source === "remote");
    if (count > 0 && !allRemote) {
      throw new DimensionIncompatibleError({
        collection: name,
        model: this.embeddings.model,
        expected,
        actual: dimension,
        filePath: document.filePath
      });
    }

    if (count > 0) {
      logger.warn(
        { collection: name, model: this.embeddings.model, expected, actual: dimension, discarded: count },
        "Embedding dimension changed, recreating collection"
      );
    }
    await this.recreate(dimension);
    return { dimension, recreated: true };
  }

  private async recreate(dimension: number): Promise<CollectionDescriptor> {
    const name = this.options.collectionName;
    await this.store("deleteCollection", () => this.backend.deleteCollection(name));
    this.descriptor = await this.store("createCollection", () =>
      this.backend.createCollection(name, this.buildMetadata(dimension))
    );
    this.compatibilityState = "recreated";
    return this.descriptor;
  }

  private async creationDimension(probe: DimensionProbe): Promise<number> {
    if (probe.source === "remote") {
      return probe.dimension;
    }
    try {
      return await this.embeddings.expectedDimension();
    } catch (error) {
      logger.warn({ err: error, model: this.embeddings.model }, "Using fallback dimension for new collection");
      return probe.dimension;
    }
  }

  private buildMetadata(dimension: number): CollectionMetadata {
    return {
      embeddingModel: this.embeddings.model,
      dimension,
      createdAt: new Date().toISOString()
    };
  }

  private async store<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof KnowledgeBaseError) {
        throw error;
      }
      throw new CollectionStoreError(operation, this.options.collectionName, error);
    }
  }
}
