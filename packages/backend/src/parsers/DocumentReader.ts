import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";
import type { KnowledgeDocument } from "@ragdesk/shared";
import { CorruptFileError, EmptyContentError, KnowledgeBaseError, UnsupportedFormatError } from "../errors.js";
import { resolveDocumentFormat } from "./formats.js";
import { MarkdownParser } from "./MarkdownParser.js";
import { PDFParser } from "./PDFParser.js";
import { RichTextParser } from "./RichTextParser.js";
import { TextParser } from "./TextParser.js";
import {
  assertNever,
  type DocumentFormat,
  type DocumentParser,
  type ParsedDocumentResult,
  type ParserRegistry
} from "./types.js";

export interface ExtractedText {
  filePath: string;
  format: DocumentFormat;
  text: string;
  fileSize: number;
  metadata: ParsedDocumentResult["metadata"];
}

export interface ReadDocumentOptions {
  id?: string;
  title?: string;
}

export function createDefaultParsers(): ParserRegistry {
  const textParser = new TextParser();
  return {
    pdf: new PDFParser(),
    text: textParser,
    markdown: new MarkdownParser({ textParser }),
    "rich-text": new RichTextParser()
  };
}

export function titleFromPath(filePath: string): string {
  return basename(filePath, extname(filePath));
}

export function createKnowledgeDocument(input: {
  filePath: string;
  content: string;
  fileType: KnowledgeDocument["fileType"];
  fileSize?: number;
  id?: string;
  title?: string;
}): KnowledgeDocument {
  const now = new Date();
  return {
    id: input.id ?? randomUUID(),
    title: input.title ?? titleFromPath(input.filePath),
    content: input.content,
    filePath: input.filePath,
    fileType: input.fileType,
    fileSize: input.fileSize ?? Buffer.byteLength(input.content, "utf8"),
    createdAt: now,
    updatedAt: now
  };
}

export function replaceDocumentContent(document: KnowledgeDocument, content: string): KnowledgeDocument {
  return {
    ...document,
    content,
    fileSize: Buffer.byteLength(content, "utf8"),
    updatedAt: new Date()
  };
}

/**
 * Turns a file on disk into plain text. Reading is the only side effect.
 */
export class DocumentReader {
  private readonly parsers: ParserRegistry;

  constructor(parsers: Partial<ParserRegistry> = {}) {
    this.parsers = {
      ...createDefaultParsers(),
      ...parsers
    };
  }

  async read(filePath: string): Promise<ExtractedText> {
    const absolutePath = resolve(filePath);
    const format = resolveDocumentFormat(absolutePath);
    if (!format) {
      throw new UnsupportedFormatError(absolutePath, extname(absolutePath).toLowerCase() || "<none>");
    }

    let buffer: Buffer;
    try {
      buffer = await readFile(absolutePath);
    } catch (error) {
      throw new CorruptFileError(absolutePath, error);
    }

    return this.extract(absolutePath, format, buffer);
  }

  async readDocument(filePath: string, options: ReadDocumentOptions = {}): Promise<KnowledgeDocument> {
    const extracted = await this.read(filePath);
    return createKnowledgeDocument({
      filePath: extracted.filePath,
      content: extracted.text,
      fileType: extracted.format.kind,
      fileSize: extracted.fileSize,
      id: options.id,
      title: options.title
    });
  }

  async extract(filePath: string, format: DocumentFormat, buffer: Buffer): Promise<ExtractedText> {
    let parsed: ParsedDocumentResult;
    try {
      parsed = await this.parserFor(format).parse(buffer, { filePath });
    } catch (error) {
      if (error instanceof KnowledgeBaseError) {
        throw error;
      }
      throw new CorruptFileError(filePath, error);
    }

    const text = parsed.text.trim();
    if (text.length === 0) {
      throw new EmptyContentError(filePath);
    }

    return {
      filePath,
      format,
      text,
      fileSize: buffer.byteLength,
      metadata: parsed.metadata
    };
  }

  private parserFor(format: DocumentFormat): DocumentParser {
    switch (format.kind) {
      case "pdf":
        return this.parsers.pdf;
      case "text":
        return this.parsers.text;
      case "markdown":
        return this.parsers.markdown;
      case "rich-text":
        return this.parsers["rich-text"];
      default:
        return assertNever(format);
    }
  }
}
