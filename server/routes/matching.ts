/**
 * Matching Routes
 * Ranking, explanation, weight and cache endpoints over the MatchingService
 *
 * Every matching route is tenant-scoped through the `x-tenant-id` header. An
 * id owned by another tenant answers exactly like an id that does not exist.
 */

import { Router, type NextFunction, type Request, type Response } from "express";
import { logger } from "../config/logger";
import { sendError } from "../middleware/global-error-handler";
import type { MatchingService } from "../services/matching-service";
import { describeWeightDrift } from "../lib/weight-config-store";
import { toWireExplanation, toWireMatch, toWireWeights } from "../lib/match-explainer";
import { AppNotFoundError, AppValidationError } from "@shared/errors";
import { isFailure } from "@shared/result-types";
import { TENANT_HEADER, type ApiResponse } from "@shared/api-contracts";
import { rankQuerySchema, type EntityKind, type RankQuery } from "@shared/schema";

function respond<T>(res: Response, data: T, status = 200): void {
  const body: ApiResponse<T> = { success: true, data, timestamp: new Date().toISOString() };
  res.status(status).json(body);
}

function tenantOf(req: Request): string | null {
  const header = req.get(TENANT_HEADER)?.trim();
  return header ? header : null;
}

function parseRankQuery(req: Request): RankQuery | AppValidationError {
  const parsed = rankQuerySchema.safeParse(req.query);
  return parsed.success ? parsed.data : AppValidationError.fromZodError(parsed.error, "query");
}

export function createMatchingRouter(service: MatchingService): Router {
  const router = Router();

  const rankRoute =
    (anchorKind: EntityKind, param: string) =>
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const anchorId = req.params[param];
        const tenantId = tenantOf(req);
        if (!tenantId) {
          return sendError(res, AppNotFoundError.entity(anchorKind, anchorId));
        }

        const query = parseRankQuery(req);
        if (query instanceof AppValidationError) {
          return sendError(res, query);
        }

        const result = await service.rankForAnchor(tenantId, anchorKind, anchorId, query);
        if (isFailure(result)) {
          return sendError(res, result.error);
        }

        const { results, cached, topK, weightsVersion } = result.data;
        logger.debug({ tenantId, anchorKind, returned: results.length, cached }, "Ranking served");
        respond(res, {
          matches: results.map(toWireMatch),
          k: topK,
          cached,
          weights_version: weightsVersion,
        });
      } catch (error) {
        next(error);
      }
    };

  /**
   * GET /matches/candidates/:candidateId/jobs?k=&cityFilter=&maxDistanceKm=
   * Top K jobs for a candidate
   */
  router.get("/matches/candidates/:candidateId/jobs", rankRoute("candidate", "candidateId"));

  /**
   * GET /matches/jobs/:jobId/candidates?k=&cityFilter=&maxDistanceKm=
   * Top K candidates for a job
   */
  router.get("/matches/jobs/:jobId/candidates", rankRoute("job", "jobId"));

  /**
   * GET /matches/explain/:candidateId/:jobId
   * Component-level breakdown of one pair
   */
  router.get("/matches/explain/:candidateId/:jobId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { candidateId, jobId } = req.params;
      const tenantId = tenantOf(req);
      if (!tenantId) {
        return sendError(res, AppNotFoundError.entity("candidate", candidateId));
      }

      const result = await service.explainPair(tenantId, candidateId, jobId);
      if (isFailure(result)) {
        return sendError(res, result.error);
      }
      respond(res, toWireExplanation(result.data.result, result.data.explanation));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /matches/cache
   */
  router.delete("/matches/cache", (_req: Request, res: Response) => {
    service.clearCache();
    respond(res, { cleared: true });
  });

  /**
   * GET /matches/cache/stats
   */
  router.get("/matches/cache/stats", (_req: Request, res: Response) => {
    respond(res, service.getCacheStats());
  });

  /**
   * GET /weights
   */
  router.get("/weights", (_req: Request, res: Response) => {
    const weights = service.getWeights();
    respond(res, { weights: toWireWeights(weights), warnings: describeWeightDrift(weights) });
  });

  /**
   * PUT /weights
   * Partial update merged over the installed snapshot; rejected atomically
   */
  router.put("/weights", (req: Request, res: Response) => {
    const result = service.updateWeights(req.body);
    if (isFailure(result)) {
      return sendError(res, result.error);
    }
    respond(res, { weights: toWireWeights(result.data), warnings: describeWeightDrift(result.data) });
  });

  return router;
}
