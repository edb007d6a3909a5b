import type { DocumentFileType } from "@ragdesk/shared";

export type DocumentFormat =
  | { kind: "pdf"; extension: ".pdf" }
  | { kind: "text"; extension: ".txt" }
  | { kind: "markdown"; extension: ".md" | ".markdown" }
  | { kind: "rich-text"; extension: ".docx" };

export interface ParsedDocumentResult {
  text: string;
  metadata: {
    pageCount?: number;
    wordCount: number;
    lineCount?: number;
    encoding?: string;
    strategy?: string;
  };
}

export interface ParseContext {
  filePath?: string;
}

export interface DocumentParser {
  parse(buffer: Buffer, context?: ParseContext): Promise<ParsedDocumentResult>;
}

export type ParserRegistry = Record<DocumentFileType, DocumentParser>;

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
