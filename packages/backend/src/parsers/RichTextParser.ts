import mammoth from "mammoth";
import { CorruptFileError } from "../errors.js";
import { countLines, countWords } from "../utils/text.js";
import type { DocumentParser, ParseContext, ParsedDocumentResult } from "./types.js";

export class RichTextParser implements DocumentParser {
  async parse(buffer: Buffer, context: ParseContext = {}): Promise<ParsedDocumentResult> {
    let raw: string;
    try {
      // Paragraphs and table cells come back in document order, one per block.
      const result = await mammoth.extractRawText({ buffer });
      raw = result.value;
    } catch (error) {
      throw new CorruptFileError(context.filePath ?? "<buffer>", error);
    }

    const text = raw
      .split(/\n+/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .join("\n");

    return {
      text,
      metadata: {
        wordCount: countWords(text),
        lineCount: countLines(text)
      }
    };
  }
}
