import type { ChunkMetadata, StoredChunkRecord } from "@ragdesk/shared";
import { describe, expect, it } from "vitest";
import { cosineDistance, cosineSimilarity, rankByDistance, summarizeDocuments } from "../../../src/store/vectorMath.js";

function metadata(documentId: string, chunkIndex: number, overrides: Partial<ChunkMetadata> = {}): ChunkMetadata {
  return {
    documentId,
    chunkIndex,
    title: documentId,
    filename: `${documentId}.txt`,
    filePath: `/docs/${documentId}.txt`,
    fileType: "text",
    fileSize: 10,
    createdAt: "2026-01-01T00:00:00.000Z",
    embeddingSource: "remote",
    ...overrides
  };
}

function record(id: string, embedding: number[], documentId = "doc"): StoredChunkRecord {
  return { id, content: id, embedding, metadata: metadata(documentId, 0) };
}

describe("vectorMath", () => {
  it("computes cosine similarity and distance", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
    expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it("ranks records by ascending distance with stable ties", () => {
    const ranked = rankByDistance(
      [record("c", [0, 1]), record("b", [1, 0]), record("a", [1, 0]), record("d", [-1, 0])],
      [1, 0],
      3
    );

    expect(ranked.map((match) => [match.id, match.distance])).toEqual([
      ["a", 0],
      ["b", 0],
      ["c", 1]
    ]);
  });

  it("summarizes chunks per document", () => {
    const summaries = summarizeDocuments([
      metadata("beta", 0),
      metadata("alpha", 0, { embeddingSource: "fallback" }),
      metadata("alpha", 1)
    ]);

    expect(summaries).toEqual([
      {
        documentId: "alpha",
        title: "alpha",
        filename: "alpha.txt",
        filePath: "/docs/alpha.txt",
        fileType: "text",
        chunkCount: 2,
        fallbackChunkCount: 1,
        createdAt: "2026-01-01T00:00:00.000Z"
      },
      expect.objectContaining({ documentId: "beta", chunkCount: 1, fallbackChunkCount: 0 })
    ]);
  });
});
