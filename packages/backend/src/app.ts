import cors from "cors";
import express, { type Express } from "express";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.js";
import { requestLogger } from "./middleware/logger.js";
import { createApiRateLimiter } from "./middleware/rateLimiter.js";
import { createConfigRouter } from "./routes/config.js";
import { createDocumentsRouter } from "./routes/documents.js";
import { createHealthRouter } from "./routes/health.js";
import { createIndexingRouter } from "./routes/indexing.js";
import { createQaRouter } from "./routes/qa.js";
import { createSearchRouter } from "./routes/search.js";
import type { AppContext } from "./runtime/appContext.js";
import { checkCollection, checkGeneration } from "./runtime/connectivity.js";

export type { AppContext, AppContextOverrides } from "./runtime/appContext.js";
export { createAppContext } from "./runtime/appContext.js";

export function createApp(context: AppContext): Express {
  const { config, settings, registry, collection, generation, pipeline, retriever, orchestrator } = context;

  const app = express();

  app.use(requestLogger);
  app.use(
    cors({
      origin: config.CORS_ORIGIN,
      exposedHeaders: ["x-request-id"]
    })
  );
  app.use(express.json({ limit: "2mb" }));
  app.use(express.urlencoded({ extended: true }));
  app.use(createApiRateLimiter(config));

  app.use(
    "/api/health",
    createHealthRouter({
      checkCollection: () => checkCollection(collection),
      checkGeneration: () => checkGeneration(generation, context.embeddings.model),
      startTime: context.startedAt
    })
  );
  app.use("/api/config", createConfigRouter({ settings, generation }));
  app.use("/api/indexing", createIndexingRouter({ pipeline, collection, settings, registry }));
  app.use(
    "/api/documents",
    createDocumentsRouter({
      pipeline,
      settings,
      uploadsDir: config.UPLOADS_DIR,
      maxUploadSize: config.MAX_UPLOAD_SIZE
    })
  );
  app.use("/api/qa", createQaRouter({ orchestrator, registry }));
  app.use("/api/search", createSearchRouter({ retriever }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
