import type { CollectionStats } from "./collection.js";
import type { IndexedDocumentSummary } from "./document.js";
import type { IndexingOutcome, IndexStatus, KnowledgeBaseSettings } from "./indexing.js";
import type { AnswerResult, RetrievedChunk } from "./qa.js";

export interface ApiErrorResponse {
  error: string;
  code?: string;
  details?: unknown;
}

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface CollectionHealth {
  status: ServiceConnectionStatus;
  documentCount: number;
  chunkCount: number;
}

export interface GenerationHealth {
  status: ServiceConnectionStatus;
  model: string;
  modelAvailable: boolean;
  embeddingModel: string;
  embeddingModelAvailable: boolean;
}

export interface HealthResponse {
  status: "ok" | "degraded" | "error";
  timestamp: string;
  uptimeSec: number;
  checks: {
    collection: CollectionHealth;
    generation: GenerationHealth;
  };
  memoryUsage: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}

export interface GetConfigResponse {
  settings: KnowledgeBaseSettings;
}

export interface UpdateConfigResponse {
  message: string;
  settings: KnowledgeBaseSettings;
}

export interface ConfigModelsResponse {
  models: string[];
}

export interface IndexingStatusResponse {
  indexStatus: IndexStatus;
  collection: CollectionStats | null;
  lastOutcome: IndexingOutcome | null;
  activeOperations: number;
}

export interface IndexingRunResponse {
  operationId: string;
  outcome: IndexingOutcome;
}

export interface CancelOperationResponse {
  operationId: string;
  cancelled: boolean;
}

export interface ListDocumentsResponse {
  documents: IndexedDocumentSummary[];
}

export interface DocumentMutationResponse {
  documentId: string;
  title: string;
  filePath: string;
  chunkCount: number;
  fallbackChunkCount: number;
}

export interface DeleteDocumentResponse {
  documentId: string;
  removedChunks: number;
}

export interface ClearIndexResponse {
  strategy: "bulk-delete" | "recreate";
  removed: number;
}

export interface AskResponse {
  result: AnswerResult;
}

export interface SearchResponse {
  query: string;
  results: RetrievedChunk[];
}
