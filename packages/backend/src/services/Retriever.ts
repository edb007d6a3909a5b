import type { RetrievedChunk } from "@ragdesk/shared";
import { NoRelevantDocumentsError } from "../errors.js";
import type { CancellationToken } from "../runtime/cancellation.js";
import type { VectorCollectionManager } from "../store/VectorCollectionManager.js";

export interface RetrieveOptions {
  topK?: number;
  minSimilarity?: number;
  requireResults?: boolean;
  token?: CancellationToken;
}

export interface RetrieverDefaults {
  topK: number;
  minSimilarity: number;
}

const defaultOptions: RetrieverDefaults = {
  topK: 5,
  minSimilarity: 0.3
};

/** Maps a cosine distance (0..2) onto a similarity in [0, 1]. */
export function distanceToSimilarity(distance: number): number {
  return Math.min(1, Math.max(0, 1 - distance));
}

export type ChunkSearcher = Pick<VectorCollectionManager, "search">;

export class Retriever {
  private readonly defaults: RetrieverDefaults;

  constructor(
    private readonly collection: ChunkSearcher,
    defaults: Partial<RetrieverDefaults> = {}
  ) {
    this.defaults = {
      ...defaultOptions,
      ...defaults
    };
  }

  /**
   * Fetches twice the requested count, keeps what clears the similarity
   * threshold and truncates. An empty list is a normal answer unless
   * `requireResults` is set.
   */
  async retrieve(question: string, options: RetrieveOptions = {}): Promise<RetrievedChunk[]> {
    const topK = options.topK ?? this.defaults.topK;
    const minSimilarity = options.minSimilarity ?? this.defaults.minSimilarity;

    const matches = await this.collection.search(question, topK * 2, { token: options.token });
    const relevant = matches
      .map(
        (match): RetrievedChunk => ({
          content: match.content,
          metadata: match.metadata,
          distance: match.distance,
          similarity: distanceToSimilarity(match.distance)
        })
      )
      .filter((chunk) => chunk.similarity >= minSimilarity)
      .slice(0, topK);

    if (relevant.length === 0 && options.requireResults) {
      throw new NoRelevantDocumentsError(question, minSimilarity);
    }
    return relevant;
  }
}
