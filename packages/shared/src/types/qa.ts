import type { ChunkMetadata } from "./document.js";

export interface ConversationTurn {
  question: string;
  answer: string;
}

export interface GenerationParameters {
  temperature: number;
  top_p: number;
  top_k: number;
  max_tokens: number;
  stop: string[];
}

export interface RetrievedChunk {
  content: string;
  metadata: ChunkMetadata;
  distance: number;
  similarity: number;
}

export interface AnswerSource {
  documentId: string;
  filename: string;
  chunkIndex: number;
  distance: number;
  similarity: number;
  preview: string;
}

export type AnswerMode = "grounded" | "ungrounded";

export type AnswerPhase =
  | "received"
  | "retrieving"
  | "grounded"
  | "ungrounded"
  | "generating"
  | "complete"
  | "failed";

export interface AnswerResult {
  query: string;
  answer: string;
  mode: AnswerMode;
  sources: AnswerSource[];
  processingTimeMs: number;
  confidence: number;
}
