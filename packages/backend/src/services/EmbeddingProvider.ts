import { createHash } from "node:crypto";
import OpenAI from "openai";
import type { EmbeddingSource } from "@ragdesk/shared";
import { CancelledError, EmbeddingUnavailableError } from "../errors.js";
import { DEFAULT_CANCEL_REASON, type CancellationToken } from "../runtime/cancellation.js";
import { logger } from "../utils/logger.js";
import { err, firstSuccess, ok, toError, type Result, type Strategy } from "../utils/result.js";

export const FALLBACK_DIMENSION = 384;

export const KNOWN_EMBEDDING_DIMENSIONS: Readonly<Record<string, number>> = {
  "nomic-embed-text": 768,
  "mxbai-embed-large": 1024,
  "all-minilm": 384,
  "snowflake-arctic-embed": 1024,
  "bge-m3": 1024
};

/** The slice of the OpenAI client used here; Ollama serves it under /v1. */
export interface EmbeddingClient {
  embeddings: {
    create(
      params: { model: string; input: string[] },
      options?: { signal?: AbortSignal; timeout?: number }
    ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface EmbeddingProviderConfig {
  model: string;
  baseURL: string;
  batchSize?: number;
  batchThreshold?: number;
  timeoutMs?: number;
  fallbackEnabled?: boolean;
  fallbackDimension?: number;
}

type NormalizedEmbeddingConfig = Required<EmbeddingProviderConfig>;

export interface EmbeddingBatch {
  vectors: number[][];
  sources: EmbeddingSource[];
}

export interface EmbedOptions {
  token?: CancellationToken;
}

export interface DimensionProbe {
  dimension: number;
  source: EmbeddingSource;
}

export interface EmbeddingProviderLike {
  readonly model: string;
  embed(texts: string[], options?: EmbedOptions): Promise<EmbeddingBatch>;
  probe(options?: EmbedOptions): Promise<DimensionProbe>;
  expectedDimension(model?: string): Promise<number>;
}

interface BatchInput {
  texts: string[];
  token?: CancellationToken;
}

export function baseModelName(model: string): string {
  return model.split(":")[0] ?? model;
}

export function knownDimension(model: string): number | null {
  return KNOWN_EMBEDDING_DIMENSIONS[baseModelName(model)] ?? null;
}

/**
 * Deterministic stand-in for a real embedding: the text's SHA-256 chain
 * spread over `dimension` values in [-1, 1], normalized to unit length.
 */
export function hashEmbedding(text: string, dimension = FALLBACK_DIMENSION): number[] {
  const values: number[] = [];
  for (let block = 0; values.length < dimension; block += 1) {
    const digest = createHash("sha256").update(`${block}:${text}`).digest();
    for (const byte of digest) {
      if (values.length >= dimension) {
        break;
      }
      values.push(byte / 127.5 - 1);
    }
  }

  const norm = Math.sqrt(values.reduce((sum, value) => sum + value * value, 0));
  return norm === 0 ? values : values.map((value) => value / norm);
}

export class EmbeddingProvider implements EmbeddingProviderLike {
  private readonly client: EmbeddingClient;
  private readonly config: NormalizedEmbeddingConfig;
  private readonly strategies: ReadonlyArray<Strategy<BatchInput, EmbeddingBatch>>;
  private readonly probedDimensions = new Map<string, number>();

  constructor(config: EmbeddingProviderConfig, deps?: { client?: EmbeddingClient }) {
    this.config = {
      ...config,
      batchSize: config.batchSize ?? 50,
      batchThreshold: config.batchThreshold ?? 100,
      timeoutMs: config.timeoutMs ?? 30_000,
      fallbackEnabled: config.fallbackEnabled ?? true,
      fallbackDimension: config.fallbackDimension ?? FALLBACK_DIMENSION
    };

    this.client =
      deps?.client ??
      new OpenAI({
        apiKey: "ollama",
        baseURL: `${this.config.baseURL.replace(/\/+$/, "")}/v1`,
        maxRetries: 0
      });

    const remote: Strategy<BatchInput, EmbeddingBatch> = {
      name: "remote",
      run: (input) => this.embedRemote(input)
    };
    const fallback: Strategy<BatchInput, EmbeddingBatch> = {
      name: "fallback",
      run: async ({ texts }) =>
        ok({
          vectors: texts.map((text) => hashEmbedding(text, this.config.fallbackDimension)),
          sources: texts.map((): EmbeddingSource => "fallback")
        })
    };
    this.strategies = this.config.fallbackEnabled ? [remote, fallback] : [remote];
  }

  get model(): string {
    return this.config.model;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingBatch> {
    if (texts.length === 0) {
      return { vectors: [], sources: [] };
    }

    const batches =
      texts.length > this.config.batchThreshold ? splitIntoBatches(texts, this.config.batchSize) : [texts];

    const combined: EmbeddingBatch = { vectors: [], sources: [] };
    for (const [index, batch] of batches.entries()) {
      options.token?.throwIfCancelled();
      const result = await this.embedBatch({ texts: batch, token: options.token });
      combined.vectors.push(...result.vectors);
      combined.sources.push(...result.sources);

      if (batches.length > 1) {
        logger.debug(
          { model: this.config.model, batch: index + 1, batches: batches.length },
          "Embedded batch"
        );
      }
    }

    return combined;
  }

  async probe(options: EmbedOptions = {}): Promise<DimensionProbe> {
    const result = await this.embed(["dimension probe"], options);
    const vector = result.vectors[0];
    const source = result.sources[0];
    if (!vector || !source) {
      throw new EmbeddingUnavailableError(this.config.model);
    }
    return { dimension: vector.length, source };
  }

  /**
   * Static table first; unknown models are asked for one real embedding.
   * Fails rather than guessing when that probe cannot reach the model.
   */
  async expectedDimension(model: string = this.config.model): Promise<number> {
    const known = knownDimension(model);
    if (known !== null) {
      return known;
    }

    const cached = this.probedDimensions.get(model);
    if (cached !== undefined) {
      return cached;
    }

    const result = await this.requestEmbeddings(model, ["dimension probe"]);
    if (!result.ok) {
      throw new EmbeddingUnavailableError(model, result.error);
    }
    const dimension = result.value[0]?.length ?? 0;
    if (dimension === 0) {
      throw new EmbeddingUnavailableError(model);
    }

    this.probedDimensions.set(model, dimension);
    return dimension;
  }

  private async embedBatch(input: BatchInput): Promise<EmbeddingBatch> {
    const outcome = await firstSuccess(this.strategies, input);
    if (!outcome.ok) {
      throw new EmbeddingUnavailableError(this.config.model, outcome.error);
    }

    for (const failure of outcome.value.failures) {
      logger.warn(
        { err: failure.error, model: this.config.model, texts: input.texts.length },
        "Remote embedding failed, using local fallback vectors"
      );
    }
    return outcome.value.value;
  }

  private async embedRemote(input: BatchInput): Promise<Result<EmbeddingBatch>> {
    const result = await this.requestEmbeddings(this.config.model, input.texts, input.token);
    if (!result.ok) {
      return result;
    }
    return ok({
      vectors: result.value,
      sources: result.value.map((): EmbeddingSource => "remote")
    });
  }

  private async requestEmbeddings(
    model: string,
    texts: string[],
    token?: CancellationToken
  ): Promise<Result<number[][]>> {
    try {
      const response = await this.client.embeddings.create(
        { model, input: texts },
        { signal: token?.signal, timeout: this.config.timeoutMs }
      );

      const vectors = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
      if (vectors.length !== texts.length) {
        return err(new Error(`Expected ${texts.length} embeddings, received ${vectors.length}`));
      }
      const dimension = vectors[0]?.length ?? 0;
      if (dimension === 0 || vectors.some((vector) => vector.length !== dimension)) {
        return err(new Error("Embedding response contained vectors of inconsistent length"));
      }
      return ok(vectors);
    } catch (error) {
      if (token?.isCancelled) {
        throw new CancelledError(token.id, token.reason ?? DEFAULT_CANCEL_REASON);
      }
      return err(toError(error));
    }
  }
}

function splitIntoBatches<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}
