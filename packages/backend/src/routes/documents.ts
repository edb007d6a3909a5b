import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { RequestHandler } from "express";
import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import type { DeleteDocumentResponse, DocumentMutationResponse, ListDocumentsResponse } from "@ragdesk/shared";
import { sendError } from "../middleware/errorHandler.js";
import { validate } from "../middleware/validator.js";
import { validateUploadedFile } from "../parsers/fileValidator.js";
import type { IndexingPipeline } from "../pipeline/IndexingPipeline.js";
import type { DocumentMutationResult, DocumentUpdateSource } from "../pipeline/types.js";
import type { SettingsStoreLike } from "../services/SettingsStore.js";
import { logger } from "../utils/logger.js";

const MAX_EDITABLE_CHARS = 200_000;

const documentParamsSchema = z.object({
  id: z.string().min(1)
});

const addDocumentBodySchema = z.object({
  filePath: z.string().trim().min(1)
});

const updateDocumentBodySchema = z.union([
  z.object({ filePath: z.string().trim().min(1) }).strict(),
  z.object({ content: z.string().max(MAX_EDITABLE_CHARS) }).strict()
]);

interface CreateDocumentsRouterOptions {
  pipeline: IndexingPipeline;
  settings: SettingsStoreLike;
  uploadsDir: string;
  maxUploadSize: number;
}

function toMutationResponse(result: DocumentMutationResult): DocumentMutationResponse {
  return {
    documentId: result.documentId,
    title: result.title,
    filePath: result.filePath,
    chunkCount: result.chunkCount,
    fallbackChunkCount: result.fallbackChunkCount
  };
}

export function createDocumentsRouter(options: CreateDocumentsRouterOptions): Router {
  const { pipeline, settings, maxUploadSize } = options;
  const uploadsDir = resolve(options.uploadsDir);

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadSize
    }
  });

  const documentsRouter = Router();

  documentsRouter.get("/", async (_req, res) => {
    try {
      const response: ListDocumentsResponse = { documents: await pipeline.listDocuments() };
      return res.json(response);
    } catch (error) {
      return sendError(res, error);
    }
  });

  documentsRouter.post("/", validate({ body: addDocumentBodySchema }), async (req, res) => {
    const body: z.infer<typeof addDocumentBodySchema> = req.body;
    try {
      const result = await pipeline.addDocument(resolve(body.filePath));
      return res.status(201).json(toMutationResponse(result));
    } catch (error) {
      return sendError(res, error);
    }
  });

  const handleUpload: RequestHandler = (req, res, next) => {
    upload.single("file")(req, res, (err: unknown) => {
      if (err) {
        const message =
          err instanceof multer.MulterError
            ? err.code === "LIMIT_FILE_SIZE"
              ? `File too large. Maximum allowed size is ${Math.round(maxUploadSize / 1024 / 1024)}MB`
              : err.message
            : err instanceof Error
              ? err.message
              : "File upload failed";
        return res.status(400).json({ error: message });
      }
      next();
    });
  };

  documentsRouter.post("/upload", handleUpload, async (req, res) => {
    if (!req.file) {
      return res.status(400).json({ error: "No file uploaded" });
    }

    let validatedFile: Awaited<ReturnType<typeof validateUploadedFile>>;
    try {
      validatedFile = await validateUploadedFile(req.file, {
        maxSizeBytes: maxUploadSize,
        supportedExtensions: settings.get().supportedExtensions
      });
    } catch (error) {
      return sendError(res, error);
    }

    const uploadDir = resolve(uploadsDir, randomUUID());
    const savedFilePath = resolve(uploadDir, validatedFile.sanitizedFilename);

    try {
      await mkdir(uploadDir, { recursive: true });
      await writeFile(savedFilePath, req.file.buffer);
    } catch (error) {
      logger.error({ err: error, savedFilePath }, "Failed to store uploaded file");
      return res.status(500).json({ error: "Failed to store uploaded file" });
    }

    try {
      const result = await pipeline.addDocument(savedFilePath);
      return res.status(201).json(toMutationResponse(result));
    } catch (error) {
      await rm(uploadDir, { recursive: true, force: true });
      return sendError(res, error);
    }
  });

  documentsRouter.put(
    "/:id",
    validate({ params: documentParamsSchema, body: updateDocumentBodySchema }),
    async (req, res) => {
      const documentId = req.params.id ?? "";
      const body: z.infer<typeof updateDocumentBodySchema> = req.body;
      const source: DocumentUpdateSource = "filePath" in body ? { filePath: resolve(body.filePath) } : body;

      try {
        const result = await pipeline.updateDocument(documentId, source);
        return res.json(toMutationResponse(result));
      } catch (error) {
        return sendError(res, error);
      }
    }
  );

  documentsRouter.delete("/:id", validate({ params: documentParamsSchema }), async (req, res) => {
    const documentId = req.params.id ?? "";
    try {
      const response: DeleteDocumentResponse = {
        documentId,
        removedChunks: await pipeline.deleteDocument(documentId)
      };
      return res.json(response);
    } catch (error) {
      return sendError(res, error);
    }
  });

  return documentsRouter;
}
