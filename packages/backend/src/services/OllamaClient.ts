import { z } from "zod";
import type { GenerationParameters } from "@ragdesk/shared";
import {
  CancelledError,
  GenerationFailedError,
  GenerationTimeoutError,
  GenerationUnreachableError,
  KnowledgeBaseError,
  MalformedStreamError
} from "../errors.js";
import { DEFAULT_CANCEL_REASON, type CancellationToken } from "../runtime/cancellation.js";
import { logger } from "../utils/logger.js";
import { parseNdjsonLine, readLines } from "../utils/ndjson.js";
import { previewText } from "../utils/text.js";
import { baseModelName } from "./EmbeddingProvider.js";

export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers?: Record<string, string>;
    body?: string;
    signal?: AbortSignal;
  }
) => Promise<Response>;

export interface OllamaClientConfig {
  baseURL: string;
  model: string;
  timeoutMs?: number;
  streamTimeoutMs?: number;
  tagsTimeoutMs?: number;
}

type NormalizedOllamaConfig = Required<OllamaClientConfig>;

export interface GenerateOptions {
  token?: CancellationToken;
  model?: string;
}

export interface GenerationClientLike {
  readonly model: string;
  listModels(): Promise<string[]>;
  isModelAvailable(model: string, models?: string[]): Promise<boolean>;
  generate(prompt: string, params: GenerationParameters, options?: GenerateOptions): Promise<string>;
  generateStream(prompt: string, params: GenerationParameters, options?: GenerateOptions): AsyncGenerator<string>;
}

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()).default([])
});

const generateResponseSchema = z.object({
  response: z.string().default(""),
  done: z.boolean().default(false),
  error: z.string().optional()
});

const errorBodySchema = z.object({ error: z.string() });

/** Exact name, or the same model family before the ":" tag. */
export function modelMatches(model: string, available: readonly string[]): boolean {
  const base = baseModelName(model);
  return available.some((name) => name === model || baseModelName(name) === base);
}

interface RequestScope {
  readonly signal: AbortSignal;
  readonly timedOut: boolean;
  touch(): void;
  close(): void;
}

function createRequestScope(timeoutMs: number, token?: CancellationToken): RequestScope {
  const controller = new AbortController();
  let timedOut = false;
  let timer: ReturnType<typeof setTimeout> | null = null;

  const arm = (): void => {
    if (timer) {
      clearTimeout(timer);
    }
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
  };

  arm();
  const unsubscribe = token?.onCancel(() => controller.abort()) ?? (() => undefined);

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    touch: arm,
    close() {
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      unsubscribe();
      controller.abort();
    }
  };
}

/**
 * Minimal client for Ollama's native API: `/api/tags` for model listing and
 * `/api/generate` in blocking or NDJSON streaming mode.
 */
export class OllamaClient implements GenerationClientLike {
  private readonly config: NormalizedOllamaConfig;
  private readonly fetchImpl: FetchLike;

  constructor(config: OllamaClientConfig, deps?: { fetch?: FetchLike }) {
    this.config = {
      ...config,
      baseURL: config.baseURL.replace(/\/+$/, ""),
      timeoutMs: config.timeoutMs ?? 30_000,
      streamTimeoutMs: config.streamTimeoutMs ?? 60_000,
      tagsTimeoutMs: config.tagsTimeoutMs ?? 5_000
    };
    this.fetchImpl = deps?.fetch ?? ((url, init) => fetch(url, init));
  }

  get model(): string {
    return this.config.model;
  }

  get baseURL(): string {
    return this.config.baseURL;
  }

  async listModels(): Promise<string[]> {
    const scope = createRequestScope(this.config.tagsTimeoutMs);
    try {
      const response = await this.fetchImpl(`${this.config.baseURL}/api/tags`, {
        method: "GET",
        signal: scope.signal
      });
      if (!response.ok) {
        throw new GenerationFailedError(this.config.model, `model listing returned HTTP ${response.status}`, {
          status: response.status
        });
      }

      const parsed = tagsResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new GenerationFailedError(this.config.model, "unexpected model listing body");
      }
      return parsed.data.models.map((entry) => entry.name);
    } catch (error) {
      throw this.translateError(error, scope, this.config.model, this.config.tagsTimeoutMs);
    } finally {
      scope.close();
    }
  }

  async isModelAvailable(model: string, models?: string[]): Promise<boolean> {
    const available = models ?? (await this.listModels());
    return modelMatches(model, available);
  }

  async generate(prompt: string, params: GenerationParameters, options: GenerateOptions = {}): Promise<string> {
    const model = options.model ?? this.config.model;
    const scope = createRequestScope(this.config.timeoutMs, options.token);
    const startedAt = Date.now();

    try {
      const response = await this.postGenerate(model, prompt, params, false, scope.signal);
      const parsed = generateResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new GenerationFailedError(model, "unexpected response body");
      }
      if (parsed.data.error) {
        throw new GenerationFailedError(model, parsed.data.error);
      }

      logger.debug(
        { model, durationMs: Date.now() - startedAt, responseLength: parsed.data.response.length },
        "Generation completed"
      );
      return parsed.data.response;
    } catch (error) {
      throw this.translateError(error, scope, model, this.config.timeoutMs, options.token);
    } finally {
      scope.close();
    }
  }

  /**
   * Yields response fragments as they arrive. The timeout applies to the gap
   * between lines, not to the whole stream.
   */
  async *generateStream(
    prompt: string,
    params: GenerationParameters,
    options: GenerateOptions = {}
  ): AsyncGenerator<string> {
    const model = options.model ?? this.config.model;
    const scope = createRequestScope(this.config.streamTimeoutMs, options.token);

    try {
      const response = await this.postGenerate(model, prompt, params, true, scope.signal);
      if (!response.body) {
        throw new MalformedStreamError(model, "response has no body");
      }

      let finished = false;
      for await (const line of readLines(response.body)) {
        scope.touch();
        const decoded = parseNdjsonLine(line);
        if (!decoded.ok) {
          logger.warn({ model, line: previewText(line, 80) }, "Skipping unparseable stream line");
          continue;
        }
        const chunk = generateResponseSchema.safeParse(decoded.value);
        if (!chunk.success) {
          logger.warn({ model, line: previewText(line, 80) }, "Skipping unexpected stream line");
          continue;
        }
        if (chunk.data.error) {
          throw new GenerationFailedError(model, chunk.data.error);
        }

        options.token?.throwIfCancelled();
        if (chunk.data.response) {
          yield chunk.data.response;
        }
        if (chunk.data.done) {
          finished = true;
          break;
        }
      }

      if (!finished) {
        throw new MalformedStreamError(model, "stream ended without a completion marker");
      }
    } catch (error) {
      throw this.translateError(error, scope, model, this.config.streamTimeoutMs, options.token);
    } finally {
      scope.close();
    }
  }

  private async postGenerate(
    model: string,
    prompt: string,
    params: GenerationParameters,
    stream: boolean,
    signal: AbortSignal
  ): Promise<Response> {
    const response = await this.fetchImpl(`${this.config.baseURL}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model,
        prompt,
        stream,
        options: {
          temperature: params.temperature,
          top_p: params.top_p,
          top_k: params.top_k,
          max_tokens: params.max_tokens,
          stop: params.stop
        }
      }),
      signal
    });

    if (!response.ok) {
      const text = await response.text();
      const body = errorBodySchema.safeParse(safeJson(text));
      throw new GenerationFailedError(model, body.success ? body.data.error : `HTTP ${response.status}`, {
        status: response.status
      });
    }
    return response;
  }

  private translateError(
    error: unknown,
    scope: RequestScope,
    model: string,
    timeoutMs: number,
    token?: CancellationToken
  ): KnowledgeBaseError {
    if (token?.isCancelled) {
      return new CancelledError(token.id, token.reason ?? DEFAULT_CANCEL_REASON);
    }
    if (error instanceof KnowledgeBaseError) {
      return error;
    }
    if (scope.timedOut) {
      return new GenerationTimeoutError(model, timeoutMs);
    }
    return new GenerationUnreachableError(this.config.baseURL, error);
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
