import { unified } from "unified";
import remarkParse from "remark-parse";
import { CONTINUE, SKIP, visit } from "unist-util-visit";
import { logger } from "../utils/logger.js";
import { attempt, err, firstSuccess, ok, type Result, type Strategy } from "../utils/result.js";
import { countLines, countWords } from "../utils/text.js";
import { TextParser } from "./TextParser.js";
import type { DocumentParser, ParseContext, ParsedDocumentResult } from "./types.js";

interface TextNode {
  type: string;
  value?: unknown;
  children?: unknown;
}

function isTextNode(value: unknown): value is TextNode {
  return typeof value === "object" && value !== null && "type" in value && typeof value.type === "string";
}

function collectText(node: TextNode): string {
  if (typeof node.value === "string") {
    return node.value;
  }
  if (Array.isArray(node.children)) {
    const separator = node.type === "tableRow" ? " | " : "";
    return node.children
      .filter(isTextNode)
      .map((child) => (child.type === "break" ? "\n" : collectText(child)))
      .join(separator);
  }
  return "";
}

const LINE_NODE_TYPES = new Set(["heading", "paragraph", "code", "tableRow"]);

/** Headings, list items, paragraphs and table rows become one plain line each. */
export function extractMarkdownStructure(source: string): string {
  const tree = unified().use(remarkParse).parse(source);
  const lines: string[] = [];

  visit(tree, (node) => {
    if (!LINE_NODE_TYPES.has(node.type)) {
      return CONTINUE;
    }
    const line = collectText(node).trim();
    if (line.length > 0) {
      lines.push(line);
    }
    return SKIP;
  });

  return lines.join("\n");
}

export function stripMarkdownSyntax(source: string): string {
  return source
    .replace(/```[^\n]*\n?/g, "")
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/\[([^\]]+)\]\([^)]*\)/g, "$1")
    .replace(/<[^>\n]+>/g, "")
    .replace(/^\s{0,3}#{1,6}\s+/gm, "")
    .replace(/^\s{0,3}>\s?/gm, "")
    .replace(/^\s*(?:[-*+]|\d+[.)])\s+/gm, "")
    .replace(/^\s*(?:[-*_]\s*){3,}$/gm, "")
    .replace(/(?<!\w)(\*\*|__)(\S(?:.*?\S)?)\1(?!\w)/g, "$2")
    .replace(/(?<!\w)(\*|_)(\S(?:.*?\S)?)\1(?!\w)/g, "$2")
    .replace(/`([^`\n]*)`/g, "$1")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function nonEmpty(source: string, extract: (input: string) => string): Result<string> {
  const result = attempt(() => extract(source));
  if (!result.ok) {
    return result;
  }
  if (result.value.trim().length === 0 && source.trim().length > 0) {
    return err(new Error("Extraction produced no text"));
  }
  return result;
}

export interface MarkdownParserOptions {
  textParser: TextParser;
  extractStructure: (source: string) => string;
}

export class MarkdownParser implements DocumentParser {
  private readonly textParser: TextParser;
  private readonly strategies: ReadonlyArray<Strategy<string, string>>;

  constructor(options: Partial<MarkdownParserOptions> = {}) {
    this.textParser = options.textParser ?? new TextParser();
    const extractStructure = options.extractStructure ?? extractMarkdownStructure;

    this.strategies = [
      { name: "structure", run: async (source) => nonEmpty(source, extractStructure) },
      { name: "strip", run: async (source) => nonEmpty(source, stripMarkdownSyntax) },
      { name: "plain", run: async (source) => ok(source) }
    ];
  }

  async parse(buffer: Buffer, context: ParseContext = {}): Promise<ParsedDocumentResult> {
    const { text: source, encoding } = this.textParser.decode(buffer, context);
    const outcome = await firstSuccess(this.strategies, source);
    if (!outcome.ok) {
      throw outcome.error;
    }

    for (const failure of outcome.value.failures) {
      logger.warn(
        { err: failure.error, strategy: failure.strategy, filePath: context.filePath },
        "Markdown extraction strategy failed, trying the next one"
      );
    }

    const text = outcome.value.value;
    return {
      text,
      metadata: {
        wordCount: countWords(text),
        lineCount: countLines(source),
        encoding,
        strategy: outcome.value.strategy
      }
    };
  }
}
