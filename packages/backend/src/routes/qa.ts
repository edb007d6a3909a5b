import { Router } from "express";
import { z } from "zod";
import type { AskResponse, CancelOperationResponse } from "@ragdesk/shared";
import { isCancelledError } from "../errors.js";
import { sendError, toErrorResponse } from "../middleware/errorHandler.js";
import { validate } from "../middleware/validator.js";
import type { CancellationRegistry } from "../runtime/cancellation.js";
import type { RagOrchestrator } from "../services/RagOrchestrator.js";
import { logger } from "../utils/logger.js";
import { cancelOperationBodySchema, createOperationToken, operationParamsSchema } from "./indexing.js";
import { openSseChannel, wantsSse } from "./sse.js";

const conversationTurnSchema = z.object({
  question: z.string(),
  answer: z.string()
});

// Generation parameters are range-checked by the orchestrator.
const askBodySchema = z.object({
  question: z.string(),
  history: z.array(conversationTurnSchema).max(50).optional(),
  parameters: z
    .object({
      temperature: z.number().optional(),
      top_p: z.number().optional(),
      top_k: z.number().optional(),
      max_tokens: z.number().optional(),
      stop: z.array(z.string()).optional()
    })
    .optional(),
  topK: z.number().int().min(1).max(50).optional(),
  minSimilarity: z.number().min(0).max(1).optional(),
  operationId: z.string().trim().min(1).max(128).optional()
});

interface CreateQaRouterOptions {
  orchestrator: Pick<RagOrchestrator, "ask" | "stream">;
  registry: CancellationRegistry;
}

export function createQaRouter(options: CreateQaRouterOptions): Router {
  const { orchestrator, registry } = options;

  const qaRouter = Router();

  qaRouter.post("/", validate({ body: askBodySchema }), async (req, res) => {
    const body: z.infer<typeof askBodySchema> = req.body;

    const token = createOperationToken(registry, body.operationId);
    if (!token) {
      return res.status(409).json({ error: "Operation id is already in use", code: "OPERATION_EXISTS" });
    }
    const operationId = token.id;
    const input = {
      question: body.question,
      history: body.history,
      parameters: body.parameters,
      topK: body.topK,
      minSimilarity: body.minSimilarity,
      token
    };

    if (!wantsSse(req)) {
      try {
        const response: AskResponse = { result: await orchestrator.ask(input) };
        return res.json(response);
      } catch (error) {
        return sendError(res, error);
      } finally {
        registry.release(operationId);
      }
    }

    const channel = openSseChannel(req, res, { operationId }, () => {
      token.cancel("client disconnected");
    });

    try {
      for await (const event of orchestrator.stream(input)) {
        switch (event.type) {
          case "status":
            channel.send("status", { phase: event.phase });
            break;
          case "delta":
            channel.send("delta", { delta: event.delta });
            break;
          case "sources":
            channel.send("sources", { mode: event.mode, sources: event.sources });
            break;
          case "complete":
            channel.send("complete", { result: event.result });
            break;
        }
      }
    } catch (error) {
      if (!isCancelledError(error)) {
        logger.error({ err: error, operationId }, "Answer stream failed");
      }
      channel.send("error", toErrorResponse(error));
    } finally {
      registry.release(operationId);
      channel.end();
    }
  });

  qaRouter.post(
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

  return qaRouter;
}
