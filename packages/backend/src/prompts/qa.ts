import type { ConversationTurn, RetrievedChunk } from "@ragdesk/shared";

export const HISTORY_EXCHANGE_LIMIT = 5;

export interface PromptOptions {
  history?: ConversationTurn[];
  historyLimit?: number;
  responseLanguage?: string;
}

export interface BuiltContext {
  text: string;
  included: RetrievedChunk[];
}

/**
 * Concatenates chunks in rank order until the next one would exceed
 * `maxLength`. A chunk is either included whole or not at all.
 */
export function buildContext(chunks: RetrievedChunk[], maxLength: number): BuiltContext {
  const parts: string[] = [];
  const included: RetrievedChunk[] = [];
  let total = 0;

  for (const chunk of chunks) {
    const part = `${chunk.content}\n[Source: ${chunk.metadata.filename}]\n`;
    if (total + part.length > maxLength) {
      break;
    }
    parts.push(part);
    included.push(chunk);
    total += part.length;
  }

  return { text: parts.join("\n"), included };
}

export function formatHistory(history: ConversationTurn[] = [], limit = HISTORY_EXCHANGE_LIMIT): string {
  if (limit <= 0) {
    return "";
  }
  const recent = history.slice(-limit);
  if (recent.length === 0) {
    return "";
  }

  const lines = recent.flatMap((turn) => [`User: ${turn.question}`, `Assistant: ${turn.answer}`]);
  return `Conversation so far:\n${lines.join("\n")}`;
}

function languageLine(language: string | undefined): string {
  const trimmed = language?.trim();
  return trimmed ? `\nAnswer in ${trimmed}.` : "";
}

export function buildGroundedPrompt(question: string, context: string, options: PromptOptions = {}): string {
  const history = formatHistory(options.history, options.historyLimit);

  return `
Answer the question using only the context below.

Context:
${context.trim()}
${history ? `\n${history}\n` : ""}
Question:
${question}

Rules:
1. Base the answer strictly on the context. Do not use outside knowledge.
2. If the context does not contain the answer, say "The provided documents do not contain this information."
3. Cite the source file names your answer relies on.
4. Be specific and concise.${languageLine(options.responseLanguage)}

Answer:
`.trim();
}

export function buildUngroundedPrompt(question: string, options: PromptOptions = {}): string {
  const history = formatHistory(options.history, options.historyLimit);

  return `
Answer the question below from your general knowledge.
${history ? `\n${history}\n` : ""}
Question:
${question}

Rules:
1. The knowledge base holds no reference material for this question.
2. If you do not know the answer, say so plainly.
3. Keep the answer helpful and constructive.${languageLine(options.responseLanguage)}

Answer:
`.trim();
}
