export type ErrorCode =
  | "INGEST_UNSUPPORTED_FORMAT"
  | "INGEST_EMPTY_CONTENT"
  | "INGEST_CORRUPT_FILE"
  | "INGEST_ENCODING"
  | "INGEST_FILE_REJECTED"
  | "INDEX_DIMENSION_INCOMPATIBLE"
  | "INDEX_CHUNK_SPLIT"
  | "INDEX_STORE_FAILURE"
  | "INDEX_DOCUMENT_NOT_FOUND"
  | "INDEX_EMBEDDING_UNAVAILABLE"
  | "QA_NO_RELEVANT_DOCUMENTS"
  | "QA_ENDPOINT_UNREACHABLE"
  | "QA_TIMEOUT"
  | "QA_GENERATION_FAILED"
  | "QA_INVALID_PARAMETER"
  | "QA_MALFORMED_STREAM"
  | "OPERATION_CANCELLED";

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every failure the knowledge base surfaces to its callers.
 * `code` is stable across releases; `details` carries whatever a caller needs
 * to render a precise message (file path, model name, dimensions...).
 */
export class KnowledgeBaseError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;
  readonly occurredAt: Date;

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "KnowledgeBaseError";
    this.code = code;
    this.details = details;
    this.occurredAt = new Date();
  }

  toJSON(): { name: string; code: ErrorCode; message: string; details: ErrorDetails; occurredAt: string } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      occurredAt: this.occurredAt.toISOString()
    };
  }
}

export class UnsupportedFormatError extends KnowledgeBaseError {
  constructor(filePath: string, extension: string) {
    super("INGEST_UNSUPPORTED_FORMAT", `Unsupported file format "${extension}": ${filePath}`, {
      filePath,
      extension
    });
    this.name = "UnsupportedFormatError";
  }
}

export class EmptyContentError extends KnowledgeBaseError {
  constructor(filePath: string) {
    super("INGEST_EMPTY_CONTENT", `No text could be extracted from ${filePath}`, { filePath });
    this.name = "EmptyContentError";
  }
}

export class CorruptFileError extends KnowledgeBaseError {
  constructor(filePath: string, cause?: unknown) {
    super("INGEST_CORRUPT_FILE", `File could not be read: ${filePath}`, { filePath }, cause);
    this.name = "CorruptFileError";
  }
}

export class EncodingError extends KnowledgeBaseError {
  constructor(filePath: string, attemptedEncodings: readonly string[]) {
    super("INGEST_ENCODING", `None of the supported encodings could decode ${filePath}`, {
      filePath,
      attemptedEncodings: [...attemptedEncodings]
    });
    this.name = "EncodingError";
  }
}

export class FileValidationError extends KnowledgeBaseError {
  constructor(message: string, details: ErrorDetails = {}) {
    super("INGEST_FILE_REJECTED", message, details);
    this.name = "FileValidationError";
  }
}

export class DimensionIncompatibleError extends KnowledgeBaseError {
  constructor(details: { collection: string; model: string; expected: number; actual: number; filePath?: string }) {
    super(
      "INDEX_DIMENSION_INCOMPATIBLE",
      `Embedding dimension ${details.actual} does not match collection "${details.collection}" (${details.expected})`,
      details
    );
    this.name = "DimensionIncompatibleError";
  }
}

export class ChunkSplitError extends KnowledgeBaseError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super("INDEX_CHUNK_SPLIT", message, details, cause);
    this.name = "ChunkSplitError";
  }
}

export class CollectionStoreError extends KnowledgeBaseError {
  constructor(operation: string, collection: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super(
      "INDEX_STORE_FAILURE",
      `Vector store operation "${operation}" failed for collection "${collection}"${reason}`,
      { operation, collection },
      cause
    );
    this.name = "CollectionStoreError";
  }
}

export class DocumentNotFoundError extends KnowledgeBaseError {
  constructor(documentId: string) {
    super("INDEX_DOCUMENT_NOT_FOUND", `Document is not indexed: ${documentId}`, { documentId });
    this.name = "DocumentNotFoundError";
  }
}

export class EmbeddingUnavailableError extends KnowledgeBaseError {
  constructor(model: string, cause?: unknown) {
    super("INDEX_EMBEDDING_UNAVAILABLE", `Embedding model "${model}" is unavailable`, { model }, cause);
    this.name = "EmbeddingUnavailableError";
  }
}

export class NoRelevantDocumentsError extends KnowledgeBaseError {
  constructor(query: string, minSimilarity: number) {
    super("QA_NO_RELEVANT_DOCUMENTS", "No indexed passage is relevant to the question", {
      query,
      minSimilarity
    });
    this.name = "NoRelevantDocumentsError";
  }
}

export class GenerationUnreachableError extends KnowledgeBaseError {
  constructor(baseURL: string, cause?: unknown) {
    super("QA_ENDPOINT_UNREACHABLE", `Generation endpoint is unreachable: ${baseURL}`, { baseURL }, cause);
    this.name = "GenerationUnreachableError";
  }
}

export class GenerationTimeoutError extends KnowledgeBaseError {
  constructor(model: string, timeoutMs: number) {
    super("QA_TIMEOUT", `Generation with "${model}" timed out after ${timeoutMs}ms`, { model, timeoutMs });
    this.name = "GenerationTimeoutError";
  }
}

export class GenerationFailedError extends KnowledgeBaseError {
  constructor(model: string, message: string, details: ErrorDetails = {}) {
    super("QA_GENERATION_FAILED", `Generation with "${model}" failed: ${message}`, { model, ...details });
    this.name = "GenerationFailedError";
  }
}

export class InvalidParameterError extends KnowledgeBaseError {
  constructor(message: string, details: ErrorDetails = {}) {
    super("QA_INVALID_PARAMETER", message, details);
    this.name = "InvalidParameterError";
  }
}

export class MalformedStreamError extends KnowledgeBaseError {
  constructor(model: string, message: string) {
    super("QA_MALFORMED_STREAM", `Malformed generation stream from "${model}": ${message}`, { model });
    this.name = "MalformedStreamError";
  }
}

export class CancelledError extends KnowledgeBaseError {
  constructor(operationId: string, reason: string) {
    super("OPERATION_CANCELLED", `Operation ${operationId} was cancelled: ${reason}`, { operationId, reason });
    this.name = "CancelledError";
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

export function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof KnowledgeBaseError) {
    return { code: error.code, message: error.message };
  }
  return {
    code: "UNEXPECTED",
    message: error instanceof Error ? error.message : String(error)
  };
}
