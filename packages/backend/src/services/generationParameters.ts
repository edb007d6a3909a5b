import { z } from "zod";
import type { GenerationParameters } from "@ragdesk/shared";
import { InvalidParameterError } from "../errors.js";
import { normalizeWhitespace } from "../utils/text.js";

export const MAX_QUESTION_LENGTH = 1000;

export const DEFAULT_GENERATION_PARAMETERS: Readonly<GenerationParameters> = Object.freeze({
  temperature: 0.7,
  top_p: 0.9,
  top_k: 40,
  max_tokens: 2000,
  stop: ["[DONE]", "<|im_end|>"]
});

export const generationParametersSchema = z.object({
  temperature: z.number().min(0).max(2).default(DEFAULT_GENERATION_PARAMETERS.temperature),
  top_p: z.number().min(0).max(1).default(DEFAULT_GENERATION_PARAMETERS.top_p),
  top_k: z.number().int().min(1).max(100).default(DEFAULT_GENERATION_PARAMETERS.top_k),
  max_tokens: z.number().int().min(1).max(10_000).default(DEFAULT_GENERATION_PARAMETERS.max_tokens),
  stop: z.array(z.string()).default([...DEFAULT_GENERATION_PARAMETERS.stop])
});

export type GenerationParametersInput = z.input<typeof generationParametersSchema>;

export function resolveGenerationParameters(input: GenerationParametersInput = {}): GenerationParameters {
  const parsed = generationParametersSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "parameters";
    throw new InvalidParameterError(`Invalid generation parameter "${field}": ${issue?.message ?? "invalid value"}`, {
      field,
      issues: parsed.error.issues
    });
  }
  return parsed.data;
}

/** Collapses whitespace and enforces the question length limits. */
export function validateQuestion(question: string): string {
  const normalized = normalizeWhitespace(question);
  if (!normalized) {
    throw new InvalidParameterError("Question must not be empty", { field: "question" });
  }
  if (normalized.length > MAX_QUESTION_LENGTH) {
    throw new InvalidParameterError(`Question exceeds ${MAX_QUESTION_LENGTH} characters`, {
      field: "question",
      length: normalized.length
    });
  }
  return normalized;
}
