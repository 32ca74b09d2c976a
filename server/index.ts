// Load environment variables first before any other imports
import "dotenv/config";

import { readFile } from "fs/promises";
import { z } from "zod";
import { logger } from "./config/logger";
import { loadConfig, type AppConfig } from "./config/unified-config";
import { MemEntityStorage } from "./storage";
import { createMatchingService } from "./services/matching-service";
import { createApp } from "./app";
import { toAppError } from "@shared/errors";

const seedFileSchema = z.array(z.unknown());

async function loadSeedEntities(config: AppConfig): Promise<MemEntityStorage> {
  const storage = new MemEntityStorage();
  if (!config.seedFile) {
    logger.info("No entity seed file configured; starting with an empty store");
    return storage;
  }

  const records = seedFileSchema.parse(JSON.parse(await readFile(config.seedFile, "utf8")));
  for (const record of records) {
    storage.upsert(record);
  }
  logger.info({ file: config.seedFile, entities: records.length }, "Entity seed file loaded");
  return storage;
}

(async () => {
  try {
    const config = loadConfig();
    const storage = await loadSeedEntities(config);
    // Invalid default weights throw here and stop startup
    const service = createMatchingService(config, storage);
    const app = createApp(service);

    const server = app.listen(config.port, "0.0.0.0", () => {
      logger.info(
        { environment: config.env, port: config.port, weightsVersion: service.getWeights().version },
        "Match engine started"
      );
    });

    const gracefulShutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down`);
      server.close(() => {
        logger.info("HTTP server closed");
        process.exit(0);
      });
    };

    process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => gracefulShutdown("SIGINT"));
  } catch (error) {
    const appError = toAppError(error, "startup");
    logger.fatal({ error: appError, cause: error instanceof Error ? error.message : undefined }, "Failed to start application");
    process.exit(1);
  }
})();
