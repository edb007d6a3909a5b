import { EncodingError } from "../errors.js";
import { countLines, countWords } from "../utils/text.js";
import type { DocumentParser, ParseContext, ParsedDocumentResult } from "./types.js";

export const DEFAULT_TEXT_ENCODINGS = ["utf-8", "shift_jis", "euc-jp"] as const;

export interface TextParserOptions {
  encodings: readonly string[];
}

export interface DecodedText {
  text: string;
  encoding: string;
}

export class TextParser implements DocumentParser {
  private readonly encodings: readonly string[];

  constructor(options: Partial<TextParserOptions> = {}) {
    this.encodings = options.encodings ?? DEFAULT_TEXT_ENCODINGS;
  }

  /**
   * Returns the text of the first encoding in the list that decodes the
   * buffer without a single invalid sequence.
   */
  decode(buffer: Buffer, context: ParseContext = {}): DecodedText {
    for (const encoding of this.encodings) {
      try {
        const decoder = new TextDecoder(encoding, { fatal: true });
        return { text: decoder.decode(buffer), encoding };
      } catch {
        continue;
      }
    }

    throw new EncodingError(context.filePath ?? "<buffer>", this.encodings);
  }

  async parse(buffer: Buffer, context: ParseContext = {}): Promise<ParsedDocumentResult> {
    const { text, encoding } = this.decode(buffer, context);
    return {
      text,
      metadata: {
        wordCount: countWords(text),
        lineCount: countLines(text),
        encoding
      }
    };
  }
}
