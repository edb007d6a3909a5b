import { describe, expect, it } from "vitest";
import { buildContext, buildGroundedPrompt, buildUngroundedPrompt, formatHistory } from "../../../src/prompts/qa.js";
import { retrievedChunk } from "../../helpers/chunks.js";

const alpha = retrievedChunk("Alpha facts.", "a.txt", 0.9);
const beta = retrievedChunk("Beta facts.", "b.md", 0.8);

describe("buildContext", () => {
  it("joins whole chunks with their source names", () => {
    const context = buildContext([alpha, beta], 1_000);

    expect(context.text).toBe("Alpha facts.\n[Source: a.txt]\n\nBeta facts.\n[Source: b.md]\n");
    expect(context.included).toEqual([alpha, beta]);
  });

  it("stops before the chunk that would exceed the budget", () => {
    expect(buildContext([alpha, beta], 40).included).toEqual([alpha]);
    expect(buildContext([alpha, beta], 28)).toEqual({ text: "", included: [] });
  });
});

describe("formatHistory", () => {
  it("keeps only the most recent exchanges", () => {
    const history = Array.from({ length: 7 }, (_, i) => ({ question: `q${i}`, answer: `a${i}` }));

    const formatted = formatHistory(history, 2);

    expect(formatted).toBe("Conversation so far:\nUser: q5\nAssistant: a5\nUser: q6\nAssistant: a6");
    expect(formatHistory(history, 0)).toBe("");
    expect(formatHistory([])).toBe("");
  });
});

describe("answer prompts", () => {
  it("builds the grounded prompt", () => {
    expect(buildGroundedPrompt("What is X?", "  X is a letter.\n")).toBe(
      [
        "Answer the question using only the context below.",
        "",
        "Context:",
        "X is a letter.",
        "",
        "Question:",
        "What is X?",
        "",
        "Rules:",
        "1. Base the answer strictly on the context. Do not use outside knowledge.",
        '2. If the context does not contain the answer, say "The provided documents do not contain this information."',
        "3. Cite the source file names your answer relies on.",
        "4. Be specific and concise.",
        "",
        "Answer:"
      ].join("\n")
    );
  });

  it("adds history and the response language", () => {
    const prompt = buildGroundedPrompt("And Y?", "ctx", {
      history: [{ question: "What is X?", answer: "A letter." }],
      responseLanguage: "French"
    });

    expect(prompt).toContain("ctx\n\nConversation so far:\nUser: What is X?\nAssistant: A letter.\n\nQuestion:\nAnd Y?");
    expect(prompt).toContain("4. Be specific and concise.\nAnswer in French.\n\nAnswer:");
  });

  it("builds the general knowledge prompt", () => {
    const prompt = buildUngroundedPrompt("hello", { history: [{ question: "hi", answer: "hey" }] });

    expect(prompt.startsWith("Answer the question below from your general knowledge.\n\nConversation so far:")).toBe(
      true
    );
    expect(prompt).toContain("Question:\nhello\n");
    expect(prompt).not.toContain("Context:");
    expect(prompt.endsWith("3. Keep the answer helpful and constructive.\n\nAnswer:")).toBe(true);
  });
});
