import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import { API_BASE } from "@shared/api-contracts";
import { createMatchingRouter } from "./routes/matching";
import { globalErrorHandler, notFoundHandler } from "./middleware/global-error-handler";
import type { MatchingService } from "./services/matching-service";

/**
 * Build the express application around a matching service.
 * Kept separate from `index.ts` so tests can mount it without listening.
 */
export function createApp(service: MatchingService): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", weightsVersion: service.getWeights().version });
  });

  app.use(API_BASE, createMatchingRouter(service));

  app.use(notFoundHandler);
  app.use(globalErrorHandler);

  return app;
}
