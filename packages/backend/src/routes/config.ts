import { Router } from "express";
import type { ConfigModelsResponse, GetConfigResponse, UpdateConfigResponse } from "@ragdesk/shared";
import { sendError } from "../middleware/errorHandler.js";
import { validate } from "../middleware/validator.js";
import type { GenerationClientLike } from "../services/OllamaClient.js";
import { settingsPatchSchema, type SettingsPatch, type SettingsStoreLike } from "../services/SettingsStore.js";

// Read once when the app context is built.
const RESTART_FIELDS = ["embeddingModel", "generationModel", "ollamaBaseUrl", "collectionName", "collectionPath"] as const;

interface CreateConfigRouterOptions {
  settings: SettingsStoreLike;
  generation: Pick<GenerationClientLike, "listModels">;
}

export function createConfigRouter(options: CreateConfigRouterOptions): Router {
  const { settings, generation } = options;

  const configRouter = Router();

  configRouter.get("/", (_req, res) => {
    const response: GetConfigResponse = { settings: settings.get() };
    res.json(response);
  });

  configRouter.put("/", validate({ body: settingsPatchSchema }), (req, res) => {
    const patch: SettingsPatch = req.body;
    try {
      const before = settings.get();
      const updated = settings.update(patch);
      const needsRestart = RESTART_FIELDS.some((field) => before[field] !== updated[field]);

      const response: UpdateConfigResponse = {
        message: needsRestart ? "Settings saved, restart to apply model and collection changes" : "Settings saved",
        settings: updated
      };
      return res.json(response);
    } catch (error) {
      return sendError(res, error);
    }
  });

  configRouter.get("/models", async (_req, res) => {
    try {
      const response: ConfigModelsResponse = { models: await generation.listModels() };
      return res.json(response);
    } catch (error) {
      return sendError(res, error);
    }
  });

  return configRouter;
}
