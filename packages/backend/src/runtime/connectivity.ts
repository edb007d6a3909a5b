import type { CollectionHealth, GenerationHealth } from "@ragdesk/shared";
import type { GenerationClientLike } from "../services/OllamaClient.js";
import type { VectorCollectionManager } from "../store/VectorCollectionManager.js";
import { logger } from "../utils/logger.js";

export async function checkCollection(
  collection: Pick<VectorCollectionManager, "healthCheck" | "stats">
): Promise<CollectionHealth> {
  try {
    if (!(await collection.healthCheck())) {
      return { status: "failed", documentCount: 0, chunkCount: 0 };
    }
    const stats = await collection.stats();
    return { status: "ok", documentCount: stats.documentCount, chunkCount: stats.chunkCount };
  } catch (error) {
    logger.warn({ err: error }, "Collection health check failed");
    return { status: "failed", documentCount: 0, chunkCount: 0 };
  }
}

/**
 * One `/api/tags` round trip: reachability plus whether both configured
 * models are installed.
 */
export async function checkGeneration(
  client: Pick<GenerationClientLike, "model" | "listModels" | "isModelAvailable">,
  embeddingModel: string
): Promise<GenerationHealth> {
  try {
    const models = await client.listModels();
    return {
      status: "ok",
      model: client.model,
      modelAvailable: await client.isModelAvailable(client.model, models),
      embeddingModel,
      embeddingModelAvailable: await client.isModelAvailable(embeddingModel, models)
    };
  } catch (error) {
    logger.warn({ err: error }, "Generation endpoint health check failed");
    return {
      status: "failed",
      model: client.model,
      modelAvailable: false,
      embeddingModel,
      embeddingModelAvailable: false
    };
  }
}
