import { join } from "node:path";
import type { KnowledgeBaseSettings, VectorStoreBackend } from "@ragdesk/shared";
import type { AppConfig } from "../config.js";
import { DocumentReader } from "../parsers/DocumentReader.js";
import { Chunker } from "../pipeline/Chunker.js";
import { IndexingPipeline } from "../pipeline/IndexingPipeline.js";
import { EmbeddingProvider, type EmbeddingProviderLike } from "../services/EmbeddingProvider.js";
import { OllamaClient, type GenerationClientLike } from "../services/OllamaClient.js";
import { RagOrchestrator } from "../services/RagOrchestrator.js";
import { Retriever } from "../services/Retriever.js";
import { defaultSettings, JsonSettingsStore, type SettingsStoreLike } from "../services/SettingsStore.js";
import { InMemoryVectorStore } from "../store/InMemoryVectorStore.js";
import { SqliteVectorStore } from "../store/SqliteVectorStore.js";
import { VectorCollectionManager } from "../store/VectorCollectionManager.js";
import { logger } from "../utils/logger.js";
import { CancellationRegistry } from "./cancellation.js";

export interface AppContext {
  config: AppConfig;
  settings: SettingsStoreLike;
  registry: CancellationRegistry;
  backend: VectorStoreBackend;
  embeddings: EmbeddingProviderLike;
  collection: VectorCollectionManager;
  retriever: Retriever;
  generation: GenerationClientLike;
  orchestrator: RagOrchestrator;
  pipeline: IndexingPipeline;
  startedAt: number;
  dispose(): Promise<void>;
}

export interface AppContextOverrides {
  settings?: SettingsStoreLike;
  registry?: CancellationRegistry;
  backend?: VectorStoreBackend;
  embeddings?: EmbeddingProviderLike;
  generation?: GenerationClientLike;
  reader?: DocumentReader;
}

function createBackend(config: AppConfig, settings: KnowledgeBaseSettings): VectorStoreBackend {
  if (config.VECTOR_STORE === "memory") {
    return new InMemoryVectorStore();
  }
  return new SqliteVectorStore({ dbPath: join(settings.collectionPath, "vectors.db") });
}

/**
 * Builds every long-lived collaborator once. Model names, endpoint and
 * collection location come from the persisted knowledge-base settings.
 */
export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const settings =
    overrides.settings ?? new JsonSettingsStore({ filePath: config.SETTINGS_PATH, defaults: defaultSettings(config) });
  const current = settings.get();

  const registry =
    overrides.registry ??
    new CancellationRegistry({
      tokenTtlMs: config.CANCELLATION_TOKEN_TTL_MS,
      sweepIntervalMs: config.CANCELLATION_SWEEP_INTERVAL_MS
    });
  registry.start();

  const backend = overrides.backend ?? createBackend(config, current);
  const embeddings =
    overrides.embeddings ??
    new EmbeddingProvider({
      model: current.embeddingModel,
      baseURL: current.ollamaBaseUrl,
      batchSize: config.EMBEDDING_BATCH_SIZE,
      batchThreshold: config.EMBEDDING_BATCH_THRESHOLD,
      timeoutMs: config.EMBEDDING_TIMEOUT_MS,
      fallbackEnabled: config.EMBEDDING_FALLBACK_ENABLED
    });
  const chunker = new Chunker({ chunkSize: config.CHUNK_SIZE, chunkOverlap: config.CHUNK_OVERLAP });
  const collection = new VectorCollectionManager(backend, embeddings, chunker, {
    collectionName: current.collectionName
  });

  const retriever = new Retriever(collection, {
    topK: config.RETRIEVAL_TOP_K,
    minSimilarity: config.RETRIEVAL_MIN_SIMILARITY
  });
  const generation =
    overrides.generation ??
    new OllamaClient({
      baseURL: current.ollamaBaseUrl,
      model: current.generationModel,
      timeoutMs: config.GENERATION_TIMEOUT_MS,
      streamTimeoutMs: config.GENERATION_STREAM_TIMEOUT_MS
    });
  const orchestrator = new RagOrchestrator(retriever, generation, {
    maxContextLength: config.MAX_CONTEXT_LENGTH,
    historyLimit: config.HISTORY_LIMIT,
    responseLanguage: config.RESPONSE_LANGUAGE,
    topK: config.RETRIEVAL_TOP_K,
    minSimilarity: config.RETRIEVAL_MIN_SIMILARITY
  });

  const pipeline = new IndexingPipeline(overrides.reader ?? new DocumentReader(), collection, settings, undefined, {
    progressMinIntervalMs: config.PROGRESS_MIN_INTERVAL_MS,
    progressThresholdSeconds: config.PROGRESS_THRESHOLD_SECONDS
  });

  return {
    config,
    settings,
    registry,
    backend,
    embeddings,
    collection,
    retriever,
    generation,
    orchestrator,
    pipeline,
    startedAt: Date.now(),
    async dispose() {
      const cancelled = registry.cancelAll("shutting down");
      registry.dispose();
      await backend.close();
      logger.info({ cancelled }, "Application context disposed");
    }
  };
}
