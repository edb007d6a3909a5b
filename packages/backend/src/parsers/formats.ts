import { extname } from "node:path";
import type { DocumentFormat } from "./types.js";

export const DEFAULT_SUPPORTED_EXTENSIONS = [".pdf", ".txt", ".md", ".docx"];

export function resolveDocumentFormat(filePath: string): DocumentFormat | null {
  const extension = extname(filePath).toLowerCase();
  switch (extension) {
    case ".pdf":
      return { kind: "pdf", extension: ".pdf" };
    case ".txt":
      return { kind: "text", extension: ".txt" };
    case ".md":
      return { kind: "markdown", extension: ".md" };
    case ".markdown":
      return { kind: "markdown", extension: ".markdown" };
    case ".docx":
      return { kind: "rich-text", extension: ".docx" };
    default:
      return null;
  }
}

export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

export function hasSupportedExtension(filePath: string, supportedExtensions: readonly string[]): boolean {
  const extension = extname(filePath).toLowerCase();
  return (
    resolveDocumentFormat(filePath) !== null &&
    supportedExtensions.some((candidate) => normalizeExtension(candidate) === extension)
  );
}
