import { describe, expect, it } from "vitest";
import {
  CancelledError,
  DocumentNotFoundError,
  EmbeddingUnavailableError,
  GenerationTimeoutError,
  InvalidParameterError
} from "../../../src/errors.js";
import { httpStatusForError, toErrorResponse } from "../../../src/middleware/errorHandler.js";

describe("httpStatusForError", () => {
  it("maps error codes onto HTTP statuses", () => {
    expect(httpStatusForError(new InvalidParameterError("bad"))).toBe(400);
    expect(httpStatusForError(new DocumentNotFoundError("doc-1"))).toBe(404);
    expect(httpStatusForError(new CancelledError("op-1", "user cancelled"))).toBe(409);
    expect(httpStatusForError(new EmbeddingUnavailableError("nomic-embed-text"))).toBe(503);
    expect(httpStatusForError(new GenerationTimeoutError("llama3:8b", 30_000))).toBe(504);
    expect(httpStatusForError(new Error("boom"))).toBe(500);
  });
});

describe("toErrorResponse", () => {
  it("exposes code and details of known errors", () => {
    expect(toErrorResponse(new DocumentNotFoundError("doc-1"))).toEqual({
      error: "Document is not indexed: doc-1",
      code: "INDEX_DOCUMENT_NOT_FOUND",
      details: { documentId: "doc-1" }
    });
  });

  it("hides the message of unexpected errors", () => {
    expect(toErrorResponse(new Error("connection string with password"))).toEqual({ error: "Internal server error" });
  });
});
