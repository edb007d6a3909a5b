import type {
  AnswerMode,
  AnswerPhase,
  AnswerResult,
  AnswerSource,
  ConversationTurn,
  GenerationParameters,
  RetrievedChunk
} from "@ragdesk/shared";
import type { CancellationToken } from "../runtime/cancellation.js";
import { buildContext, buildGroundedPrompt, buildUngroundedPrompt, HISTORY_EXCHANGE_LIMIT } from "../prompts/qa.js";
import { logger } from "../utils/logger.js";
import { previewText } from "../utils/text.js";
import {
  resolveGenerationParameters,
  validateQuestion,
  type GenerationParametersInput
} from "./generationParameters.js";
import type { GenerationClientLike } from "./OllamaClient.js";
import type { Retriever } from "./Retriever.js";

export interface RagOrchestratorOptions {
  maxContextLength: number;
  historyLimit: number;
  responseLanguage: string;
  topK: number;
  minSimilarity: number;
  emptyAnswer: string;
  now: () => number;
}

const defaultOptions: RagOrchestratorOptions = {
  maxContextLength: 4000,
  historyLimit: HISTORY_EXCHANGE_LIMIT,
  responseLanguage: "",
  topK: 5,
  minSimilarity: 0.3,
  emptyAnswer: "No answer could be generated for this question.",
  now: () => Date.now()
};

export interface AskInput {
  question: string;
  history?: ConversationTurn[];
  parameters?: GenerationParametersInput;
  topK?: number;
  minSimilarity?: number;
  token?: CancellationToken;
}

export type AnswerStreamEvent =
  | {
      type: "status";
      phase: AnswerPhase;
    }
  | {
      type: "delta";
      delta: string;
    }
  | {
      type: "sources";
      mode: AnswerMode;
      sources: AnswerSource[];
    }
  | {
      type: "complete";
      result: AnswerResult;
    };

interface PreparedRequest {
  query: string;
  prompt: string;
  mode: AnswerMode;
  sources: AnswerSource[];
  parameters: GenerationParameters;
}

export type ChunkRetriever = Pick<Retriever, "retrieve">;

/**
 * avg similarity × 0.6 + min(n/3, 1) × 0.25 + min(length/200, 1) × 0.15,
 * clamped to [0, 1]. An answer with no sources scores 0.
 */
export function computeConfidence(sources: AnswerSource[], answer: string): number {
  if (sources.length === 0) {
    return 0;
  }

  const averageSimilarity = sources.reduce((sum, source) => sum + source.similarity, 0) / sources.length;
  const sourceFactor = Math.min(sources.length / 3, 1);
  const lengthFactor = Math.min(answer.trim().length / 200, 1);
  const score = averageSimilarity * 0.6 + sourceFactor * 0.25 + lengthFactor * 0.15;
  return Math.round(Math.min(1, Math.max(0, score)) * 1000) / 1000;
}

export function toAnswerSource(chunk: RetrievedChunk): AnswerSource {
  return {
    documentId: chunk.metadata.documentId,
    filename: chunk.metadata.filename,
    chunkIndex: chunk.metadata.chunkIndex,
    distance: chunk.distance,
    similarity: chunk.similarity,
    preview: previewText(chunk.content, 100)
  };
}

export class RagOrchestrator {
  private readonly options: RagOrchestratorOptions;

  constructor(
    private readonly retriever: ChunkRetriever,
    private readonly client: GenerationClientLike,
    options: Partial<RagOrchestratorOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  get generationModel(): string {
    return this.client.model;
  }

  async ask(input: AskInput): Promise<AnswerResult> {
    const startedAt = this.options.now();
    let phase: AnswerPhase = "received";

    try {
      phase = "retrieving";
      const prepared = await this.prepare(input);
      logger.debug({ mode: prepared.mode, sources: prepared.sources.length }, "Prepared prompt");

      phase = "generating";
      input.token?.throwIfCancelled();
      const answer = await this.client.generate(prepared.prompt, prepared.parameters, { token: input.token });

      const result = this.finalize(prepared, answer, startedAt);
      logger.info(
        { mode: result.mode, sources: result.sources.length, processingTimeMs: result.processingTimeMs },
        "Answered question"
      );
      return result;
    } catch (error) {
      logger.warn({ err: error, phase }, "Question answering failed");
      throw error;
    }
  }

  /**
   * Emits status transitions, answer fragments, then the sources and the
   * final result. Cancellation is checked between fragments.
   */
  async *stream(input: AskInput): AsyncGenerator<AnswerStreamEvent> {
    const startedAt = this.options.now();
    let phase: AnswerPhase = "received";
    yield { type: "status", phase };

    try {
      phase = "retrieving";
      yield { type: "status", phase };
      const prepared = await this.prepare(input);
      phase = prepared.mode;
      yield { type: "status", phase };

      phase = "generating";
      yield { type: "status", phase };

      let answer = "";
      for await (const delta of this.client.generateStream(prepared.prompt, prepared.parameters, {
        token: input.token
      })) {
        input.token?.throwIfCancelled();
        if (delta.length === 0) {
          continue;
        }
        answer += delta;
        yield { type: "delta", delta };
      }

      const result = this.finalize(prepared, answer, startedAt);
      yield { type: "sources", mode: result.mode, sources: result.sources };
      yield { type: "status", phase: "complete" };
      yield { type: "complete", result };
    } catch (error) {
      logger.warn({ err: error, phase }, "Streaming answer failed");
      yield { type: "status", phase: "failed" };
      throw error;
    }
  }

  private async prepare(input: AskInput): Promise<PreparedRequest> {
    const query = validateQuestion(input.question);
    const parameters = resolveGenerationParameters(input.parameters);
    const promptOptions = {
      history: input.history,
      historyLimit: this.options.historyLimit,
      responseLanguage: this.options.responseLanguage
    };

    input.token?.throwIfCancelled();
    const chunks = await this.retriever.retrieve(query, {
      topK: input.topK ?? this.options.topK,
      minSimilarity: input.minSimilarity ?? this.options.minSimilarity,
      token: input.token
    });

    const context = buildContext(chunks, this.options.maxContextLength);
    if (context.included.length === 0) {
      logger.debug({ retrieved: chunks.length }, "No usable context, answering from general knowledge");
      return {
        query,
        prompt: buildUngroundedPrompt(query, promptOptions),
        mode: "ungrounded",
        sources: [],
        parameters
      };
    }

    if (context.included.length < chunks.length) {
      logger.debug(
        { retrieved: chunks.length, included: context.included.length, maxContextLength: this.options.maxContextLength },
        "Context budget reached"
      );
    }
    return {
      query,
      prompt: buildGroundedPrompt(query, context.text, promptOptions),
      mode: "grounded",
      sources: context.included.map(toAnswerSource),
      parameters
    };
  }

  private finalize(prepared: PreparedRequest, answer: string, startedAt: number): AnswerResult {
    const trimmed = answer.trim();
    const finalAnswer = trimmed.length > 0 ? trimmed : this.options.emptyAnswer;

    return {
      query: prepared.query,
      answer: finalAnswer,
      mode: prepared.mode,
      sources: prepared.sources,
      processingTimeMs: Math.max(0, this.options.now() - startedAt),
      confidence: computeConfidence(prepared.sources, finalAnswer)
    };
  }
}
