import type { Router } from "express";

import express from "express";

import type { DestructionApiContext } from "../server.js";
import { executeDeletion } from "../destruction/executor.js";
import { buildDeletionResponse } from "../destruction/responses.js";
import { validateDeletionRequest } from "../destruction/validation.js";

export function createDataDestructionRouter(ctx: DestructionApiContext): Router {
  const router = express.Router();

  router.post("/run_bq_data_destruction", (req, res, next) => {
    void (async () => {
      const request = validateDeletionRequest(req.body, ctx.registry);
      const outcome = await executeDeletion(ctx, request);
      // Counts only; participant identifiers stay out of the logs.
      ctx.logger.info(
        {
          request_id: req.requestId,
          protocol: request.protocol,
          requested: request.connectIds.length,
          deleted: outcome.deletedIds.length,
          not_found: outcome.notFound.length,
          store_accessed: outcome.kind === "executed"
        },
        "data destruction completed"
      );
      res.status(200).json(buildDeletionResponse(outcome));
    })().catch(next);
  });

  return router;
}
