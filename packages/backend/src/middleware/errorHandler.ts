import type { ErrorRequestHandler, RequestHandler, Response } from "express";
import type { ApiErrorResponse } from "@ragdesk/shared";
import { KnowledgeBaseError, type ErrorCode } from "../errors.js";
import { logger } from "../utils/logger.js";

const statusByCode: Record<ErrorCode, number> = {
  INGEST_UNSUPPORTED_FORMAT: 400,
  INGEST_EMPTY_CONTENT: 400,
  INGEST_CORRUPT_FILE: 400,
  INGEST_ENCODING: 400,
  INGEST_FILE_REJECTED: 400,
  QA_INVALID_PARAMETER: 400,
  INDEX_DOCUMENT_NOT_FOUND: 404,
  QA_NO_RELEVANT_DOCUMENTS: 404,
  INDEX_DIMENSION_INCOMPATIBLE: 409,
  OPERATION_CANCELLED: 409,
  INDEX_CHUNK_SPLIT: 400,
  QA_GENERATION_FAILED: 502,
  QA_MALFORMED_STREAM: 502,
  QA_ENDPOINT_UNREACHABLE: 503,
  INDEX_EMBEDDING_UNAVAILABLE: 503,
  INDEX_STORE_FAILURE: 503,
  QA_TIMEOUT: 504
};

export function httpStatusForError(error: unknown): number {
  return error instanceof KnowledgeBaseError ? statusByCode[error.code] : 500;
}

export function toErrorResponse(error: unknown): ApiErrorResponse {
  if (error instanceof KnowledgeBaseError) {
    return { error: error.message, code: error.code, details: error.details };
  }
  return { error: "Internal server error" };
}

export function sendError(res: Response, error: unknown): Response {
  const status = httpStatusForError(error);
  if (status >= 500) {
    logger.error({ err: error }, "Request failed");
  } else {
    logger.warn({ err: error }, "Request rejected");
  }
  return res.status(status).json(toErrorResponse(error));
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ error: "Route not found" });
};

// Body parser failures carry their own 4xx status.
function clientErrorStatus(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 500 ? error.status : null;
  }
  return null;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const status = clientErrorStatus(err);
  if (status !== null) {
    logger.warn({ err }, "Malformed request");
    res.status(status).json({ error: err instanceof Error ? err.message : "Bad request" });
    return;
  }
  sendError(res, err);
};
