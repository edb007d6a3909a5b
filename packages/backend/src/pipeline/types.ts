import type { ProgressInfo } from "@ragdesk/shared";
import type { CancellationToken } from "../runtime/cancellation.js";

export type IndexingPhase = "reading" | "embedding" | "indexed" | "skipped" | "deleted" | "error";

export interface IndexingStatusEvent {
  filePath?: string;
  phase: IndexingPhase;
  documentId?: string;
  message?: string;
}

export interface IndexingPipelineOptions {
  progressMinIntervalMs: number;
  progressThresholdSeconds: number;
  now: () => number;
}

export interface IndexFoldersOptions {
  token?: CancellationToken;
  onProgress?: (info: ProgressInfo) => void;
}

export interface DocumentOperationOptions {
  token?: CancellationToken;
}

export type DocumentUpdateSource = { filePath: string } | { content: string };

export interface DocumentMutationResult {
  documentId: string;
  title: string;
  filePath: string;
  chunkCount: number;
  fallbackChunkCount: number;
}
