import { Router } from "express";
import { z } from "zod";
import type {
  CancelOperationResponse,
  ClearIndexResponse,
  IndexingRunResponse,
  IndexingStatusResponse
} from "@ragdesk/shared";
import { InvalidParameterError } from "../errors.js";
import { sendError } from "../middleware/errorHandler.js";
import { validate } from "../middleware/validator.js";
import type { IndexingPipeline } from "../pipeline/IndexingPipeline.js";
import type { CancellationRegistry, CancellationToken } from "../runtime/cancellation.js";
import type { SettingsStoreLike } from "../services/SettingsStore.js";
import type { VectorCollectionManager } from "../store/VectorCollectionManager.js";
import { logger } from "../utils/logger.js";
import { openSseChannel, wantsSse } from "./sse.js";

const runIndexingBodySchema = z.object({
  folders: z.array(z.string().trim().min(1)).min(1).optional(),
  operationId: z.string().trim().min(1).max(128).optional()
});

export const operationParamsSchema = z.object({
  id: z.string().min(1)
});

export const cancelOperationBodySchema = z.object({
  reason: z.string().trim().min(1).max(200).optional()
});

export function createOperationToken(
  registry: CancellationRegistry,
  operationId?: string
): CancellationToken | null {
  if (operationId && registry.get(operationId)) {
    return null;
  }
  return registry.create(operationId);
}

interface CreateIndexingRouterOptions {
  pipeline: IndexingPipeline;
  collection: Pick<VectorCollectionManager, "stats">;
  settings: SettingsStoreLike;
  registry: CancellationRegistry;
}

export function createIndexingRouter(options: CreateIndexingRouterOptions): Router {
  const { pipeline, collection, settings, registry } = options;
  let activeOperationId: string | null = null;

  const indexingRouter = Router();

  indexingRouter.post("/", validate({ body: runIndexingBodySchema }), async (req, res) => {
    const body: z.infer<typeof runIndexingBodySchema> = req.body;

    if (activeOperationId) {
      return res.status(409).json({
        error: "An indexing run is already in progress",
        code: "INDEXING_IN_PROGRESS",
        details: { operationId: activeOperationId }
      });
    }

    let folders: string[];
    try {
      folders = body.folders ? settings.update({ folders: body.folders }).folders : settings.get().folders;
      if (folders.length === 0) {
        throw new InvalidParameterError("No folders to index", { field: "folders" });
      }
    } catch (error) {
      return sendError(res, error);
    }

    const token = createOperationToken(registry, body.operationId);
    if (!token) {
      return res.status(409).json({ error: "Operation id is already in use", code: "OPERATION_EXISTS" });
    }
    const operationId = token.id;
    activeOperationId = operationId;

    if (!wantsSse(req)) {
      try {
        const outcome = await pipeline.indexFolders(folders, { token });
        const response: IndexingRunResponse = { operationId, outcome };
        return res.json(response);
      } catch (error) {
        return sendError(res, error);
      } finally {
        activeOperationId = null;
        registry.release(operationId);
      }
    }

    const channel = openSseChannel(req, res, { operationId }, () => {
      token.cancel("client disconnected");
    });
    const unsubscribe = pipeline.onStatus((event) => {
      channel.send("status", event);
    });

    try {
      const outcome = await pipeline.indexFolders(folders, {
        token,
        onProgress: (info) => channel.send("progress", info)
      });
      const response: IndexingRunResponse = { operationId, outcome };
      channel.send("complete", response);
    } catch (error) {
      logger.error({ err: error, operationId }, "Indexing stream failed");
      channel.send("error", { error: "Indexing failed" });
    } finally {
      unsubscribe();
      activeOperationId = null;
      registry.release(operationId);
      channel.end();
    }
  });

  indexingRouter.get("/status", async (_req, res) => {
    let stats: IndexingStatusResponse["collection"] = null;
    try {
      stats = await collection.stats();
    } catch (error) {
      logger.warn({ err: error }, "Collection stats unavailable");
    }

    const response: IndexingStatusResponse = {
      indexStatus: settings.get().indexStatus,
      collection: stats,
      lastOutcome: pipeline.lastOutcome,
      activeOperations: registry.stats().active
    };
    res.json(response);
  });

  indexingRouter.post(
    "/operations/:id/cancel",
    validate({ params: operationParamsSchema, body: cancelOperationBodySchema }),
    (req, res) => {
      const operationId = req.params.id ?? "";
      const body: z.infer<typeof cancelOperationBodySchema> = req.body;
      if (!registry.get(operationId)) {
        return res.status(404).json({ error: "Operation not found", code: "OPERATION_NOT_FOUND" });
      }

      const response: CancelOperationResponse = {
        operationId,
        cancelled: registry.cancel(operationId, body.reason)
      };
      return res.status(202).json(response);
    }
  );

  indexingRouter.delete("/", async (_req, res) => {
    if (activeOperationId) {
      return res.status(409).json({
        error: "An indexing run is already in progress",
        code: "INDEXING_IN_PROGRESS",
        details: { operationId: activeOperationId }
      });
    }

    try {
      const result = await pipeline.clearIndex();
      const response: ClearIndexResponse = result;
      return res.json(response);
    } catch (error) {
      return sendError(res, error);
    }
  });

  return indexingRouter;
}
