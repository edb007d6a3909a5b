import { createRequire } from "node:module";
import type pdfParseModule from "pdf-parse";
import { CorruptFileError } from "../errors.js";
import { countLines, countWords } from "../utils/text.js";
import type { DocumentParser, ParseContext, ParsedDocumentResult } from "./types.js";

export interface PdfExtraction {
  text: string;
  numpages: number;
}

export type PdfExtractor = (buffer: Buffer) => Promise<PdfExtraction>;

// pdf-parse runs a self-test when it has no parent module, which is the case
// under an ESM import, so it is loaded through require.
const require = createRequire(import.meta.url);

function loadPdfParse(): PdfExtractor {
  const pdfParse: typeof pdfParseModule = require("pdf-parse");
  return async (buffer) => {
    const result = await pdfParse(buffer);
    return { text: result.text, numpages: result.numpages };
  };
}

export class PDFParser implements DocumentParser {
  private extractor: PdfExtractor | null;

  constructor(extractor?: PdfExtractor) {
    this.extractor = extractor ?? null;
  }

  async parse(buffer: Buffer, context: ParseContext = {}): Promise<ParsedDocumentResult> {
    this.extractor ??= loadPdfParse();

    let result: PdfExtraction;
    try {
      result = await this.extractor(buffer);
    } catch (error) {
      throw new CorruptFileError(context.filePath ?? "<buffer>", error);
    }

    const text = result.text ?? "";
    return {
      text,
      metadata: {
        pageCount: result.numpages,
        wordCount: countWords(text),
        lineCount: countLines(text)
      }
    };
  }
}
