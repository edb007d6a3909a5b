import { Router } from "express";
import type { CollectionHealth, GenerationHealth, HealthResponse } from "@ragdesk/shared";

interface CreateHealthRouterOptions {
  checkCollection: () => Promise<CollectionHealth>;
  checkGeneration: () => Promise<GenerationHealth>;
  startTime?: number;
}

export function overallStatus(collection: CollectionHealth, generation: GenerationHealth): HealthResponse["status"] {
  if (collection.status === "failed") {
    return "error";
  }
  if (generation.status === "failed" || !generation.modelAvailable || !generation.embeddingModelAvailable) {
    return "degraded";
  }
  return "ok";
}

export function createHealthRouter(options: CreateHealthRouterOptions): Router {
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const [collection, generation] = await Promise.all([options.checkCollection(), options.checkGeneration()]);

    const mem = process.memoryUsage();
    const response: HealthResponse = {
      status: overallStatus(collection, generation),
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        collection,
        generation
      },
      memoryUsage: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal
      }
    };
    res.status(response.status === "error" ? 503 : 200).json(response);
  });

  return healthRouter;
}
