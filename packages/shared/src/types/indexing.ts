export type IndexStatus = "not_created" | "creating" | "created" | "error";

export interface ProgressInfo {
  current: number;
  total: number;
  message: string;
  percentage: number;
  progressRate: number;
  elapsedSeconds: number;
  estimatedRemainingSeconds: number | null;
}

export interface SkippedFile {
  filePath: string;
  code: string;
  message: string;
}

export type IndexingOutcome =
  | {
      status: "completed";
      documentCount: number;
      chunkCount: number;
      skipped: SkippedFile[];
      elapsedMs: number;
    }
  | {
      status: "cancelled";
      documentCount: number;
      chunkCount: number;
      reason: string;
      elapsedMs: number;
    }
  | {
      status: "failed";
      documentCount: number;
      chunkCount: number;
      error: { code: string; message: string };
      elapsedMs: number;
    };

export interface KnowledgeBaseSettings {
  embeddingModel: string;
  generationModel: string;
  ollamaBaseUrl: string;
  collectionName: string;
  collectionPath: string;
  folders: string[];
  supportedExtensions: string[];
  indexStatus: IndexStatus;
  updatedAt: string;
}
