import { Router } from "express";
import { z } from "zod";
import type { SearchResponse } from "@ragdesk/shared";
import { sendError } from "../middleware/errorHandler.js";
import { validationErrorBody } from "../middleware/validator.js";
import type { Retriever } from "../services/Retriever.js";

const searchQuerySchema = z.object({
  q: z.string().trim().min(1).max(1000),
  topK: z.coerce.number().int().min(1).max(50).optional(),
  minSimilarity: z.coerce.number().min(0).max(1).optional(),
  strict: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true")
});

interface CreateSearchRouterOptions {
  retriever: Pick<Retriever, "retrieve">;
}

export function createSearchRouter(options: CreateSearchRouterOptions): Router {
  const searchRouter = Router();

  searchRouter.get("/", async (req, res) => {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json(validationErrorBody(parsed.error));
    }

    const { q, topK, minSimilarity, strict } = parsed.data;
    try {
      const results = await options.retriever.retrieve(q, { topK, minSimilarity, requireResults: strict });
      const response: SearchResponse = { query: q, results };
      return res.json(response);
    } catch (error) {
      return sendError(res, error);
    }
  });

  return searchRouter;
}
