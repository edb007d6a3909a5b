import type { VectorQueryMatch } from "@ragdesk/shared";
import { describe, expect, it, vi } from "vitest";
import { NoRelevantDocumentsError } from "../../../src/errors.js";
import { distanceToSimilarity, Retriever, type ChunkSearcher } from "../../../src/services/Retriever.js";
import { retrievedChunk } from "../../helpers/chunks.js";

function match(content: string, distance: number): VectorQueryMatch {
  const chunk = retrievedChunk(content, `${content}.txt`, 1 - distance);
  return { id: `${content}_0`, content, metadata: chunk.metadata, distance };
}

function searcher(matches: VectorQueryMatch[]) {
  const search = vi.fn<ChunkSearcher["search"]>().mockResolvedValue(matches);
  return { search };
}

describe("distanceToSimilarity", () => {
  it("clamps to the unit interval", () => {
    expect(distanceToSimilarity(0)).toBe(1);
    expect(distanceToSimilarity(0.25)).toBe(0.75);
    expect(distanceToSimilarity(1.5)).toBe(0);
  });
});

describe("Retriever", () => {
  it("over-fetches, filters by similarity and truncates", async () => {
    const collection = searcher([match("a", 0.1), match("b", 0.2), match("c", 0.5), match("d", 0.8)]);
    const retriever = new Retriever(collection, { topK: 2, minSimilarity: 0.3 });

    const results = await retriever.retrieve("question");

    expect(collection.search).toHaveBeenCalledWith("question", 4, { token: undefined });
    expect(results.map((chunk) => [chunk.content, chunk.similarity])).toEqual([
      ["a", 0.9],
      ["b", 0.8]
    ]);
  });

  it("applies per-call overrides", async () => {
    const collection = searcher([match("a", 0.1), match("b", 0.6)]);
    const retriever = new Retriever(collection);

    const results = await retriever.retrieve("question", { topK: 3, minSimilarity: 0.5 });

    expect(collection.search).toHaveBeenCalledWith("question", 6, { token: undefined });
    expect(results.map((chunk) => chunk.content)).toEqual(["a"]);
  });

  it("returns an empty list unless results are required", async () => {
    const retriever = new Retriever(searcher([match("far", 0.95)]));

    await expect(retriever.retrieve("question")).resolves.toEqual([]);
    await expect(retriever.retrieve("question", { requireResults: true })).rejects.toBeInstanceOf(
      NoRelevantDocumentsError
    );
  });
});
