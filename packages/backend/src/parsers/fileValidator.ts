import { basename, extname } from "node:path";
import { fileTypeFromBuffer } from "file-type";
import type { DocumentFileType } from "@ragdesk/shared";
import { FileValidationError } from "../errors.js";
import { hasSupportedExtension, resolveDocumentFormat } from "./formats.js";

export interface UploadedFileLike {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

export interface FileValidationOptions {
  maxSizeBytes?: number;
  supportedExtensions?: readonly string[];
}

export interface ValidatedFile {
  fileType: DocumentFileType;
  sanitizedFilename: string;
  mimeType: string;
  size: number;
}

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

const allowedMimeTypes: Record<DocumentFileType, string[]> = {
  pdf: ["application/pdf"],
  text: ["text/plain"],
  markdown: ["text/markdown", "text/x-markdown", "text/plain"],
  "rich-text": [DOCX_MIME, "application/zip"]
};

const extensionFallbackMime: Record<DocumentFileType, string> = {
  pdf: "application/pdf",
  text: "text/plain",
  markdown: "text/markdown",
  "rich-text": DOCX_MIME
};

export async function validateUploadedFile(
  file: UploadedFileLike,
  options: FileValidationOptions = {}
): Promise<ValidatedFile> {
  const extension = extname(file.originalname).toLowerCase();
  const format = resolveDocumentFormat(file.originalname);
  if (!format) {
    throw new FileValidationError(`Unsupported file extension "${extension}".`, { extension });
  }
  if (options.supportedExtensions && !hasSupportedExtension(file.originalname, options.supportedExtensions)) {
    throw new FileValidationError(`File extension "${extension}" is disabled in settings.`, { extension });
  }

  if (options.maxSizeBytes !== undefined && file.size > options.maxSizeBytes) {
    throw new FileValidationError(`File is too large. Maximum size is ${options.maxSizeBytes} bytes.`, {
      size: file.size,
      maxSizeBytes: options.maxSizeBytes
    });
  }

  const fileType = format.kind;
  const allowed = allowedMimeTypes[fileType];
  const declaredMime = (file.mimetype || "").toLowerCase();
  const detected = await fileTypeFromBuffer(file.buffer);
  const detectedMime = detected?.mime.toLowerCase();

  // Browsers often send application/octet-stream for text files.
  const effectiveDeclaredMime = declaredMime === "application/octet-stream" ? "" : declaredMime;

  if (effectiveDeclaredMime && !allowed.includes(effectiveDeclaredMime)) {
    throw new FileValidationError(`MIME type mismatch for ${extension}. Received ${declaredMime}.`, {
      extension,
      declaredMime
    });
  }

  if (detectedMime && !allowed.includes(detectedMime)) {
    throw new FileValidationError(`Binary signature mismatch for ${extension}. Detected ${detectedMime}.`, {
      extension,
      detectedMime
    });
  }

  return {
    fileType,
    sanitizedFilename: sanitizeFilename(file.originalname),
    mimeType: detectedMime ?? (effectiveDeclaredMime || extensionFallbackMime[fileType]),
    size: file.size
  };
}

export function sanitizeFilename(filename: string): string {
  const cleanBase = basename(filename).replace(/[^\w.-]/g, "_").replace(/^\.+/, "");
  return cleanBase.length > 0 ? cleanBase : "file";
}
