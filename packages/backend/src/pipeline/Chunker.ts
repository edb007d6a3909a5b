import { RecursiveCharacterTextSplitter } from "langchain/text_splitter";
import type { DocumentChunk } from "@ragdesk/shared";
import { ChunkSplitError } from "../errors.js";

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
}

const defaultOptions: ChunkerOptions = {
  chunkSize: 1000,
  chunkOverlap: 200
};

// Paragraph, then line, then word, then a hard cut.
export const CHUNK_SEPARATORS = ["\n\n", "\n", " ", ""];

export function chunkId(documentId: string, index: number): string {
  return `${documentId}_${index}`;
}

export class Chunker {
  readonly options: ChunkerOptions;

  constructor(options: Partial<ChunkerOptions> = {}) {
    this.options = {
      ...defaultOptions,
      ...options
    };
    validateChunkOptions(this.options);
  }

  async split(text: string, options: Partial<ChunkerOptions> = {}): Promise<string[]> {
    const effective = { ...this.options, ...options };
    validateChunkOptions(effective);

    if (text.trim().length === 0) {
      return [];
    }

    const splitter = new RecursiveCharacterTextSplitter({
      chunkSize: effective.chunkSize,
      chunkOverlap: effective.chunkOverlap,
      separators: CHUNK_SEPARATORS
    });

    let windows: string[];
    try {
      windows = await splitter.splitText(text);
    } catch (error) {
      throw new ChunkSplitError("Text could not be split into chunks", { ...effective }, error);
    }

    return windows.filter((window) => window.trim().length > 0);
  }

  async chunkDocument(documentId: string, text: string): Promise<DocumentChunk[]> {
    const windows = await this.split(text);
    if (windows.length === 0) {
      throw new ChunkSplitError("Document produced no chunks", { documentId });
    }

    return windows.map((content, index) => ({
      id: chunkId(documentId, index),
      documentId,
      index,
      content
    }));
  }
}

function validateChunkOptions(options: ChunkerOptions): void {
  if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
    throw new ChunkSplitError("Chunk size must be a positive integer", { ...options });
  }
  if (!Number.isInteger(options.chunkOverlap) || options.chunkOverlap < 0) {
    throw new ChunkSplitError("Chunk overlap must be a non-negative integer", { ...options });
  }
  if (options.chunkOverlap >= options.chunkSize) {
    throw new ChunkSplitError("Chunk overlap must be smaller than the chunk size", { ...options });
  }
}
