import pino, { type LoggerOptions } from "pino";
import { Environment } from "../types/environment";

/**
 * Logger Configuration
 *
 * Pino logger shared by the whole engine. Development uses pino-pretty for
 * human-readable output; production emits JSON for log aggregation; tests only
 * surface errors.
 */

const logLevels: Record<Environment, string> = {
  [Environment.Development]: "debug",
  [Environment.Test]: "error",
  [Environment.Production]: "info",
};

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL.toLowerCase();
  }
  const env = Object.values(Environment).find((value) => value === process.env.NODE_ENV);
  return env ? logLevels[env] : "info";
}

// Base configuration for all environments
const baseConfig: LoggerOptions = {
  level: resolveLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "*.password",
      "*.apiKey",
      "*.secret",
    ],
    censor: "[REDACTED]",
  },
};

const developmentConfig: LoggerOptions = {
  ...baseConfig,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  },
};

const productionConfig: LoggerOptions = {
  ...baseConfig,
  base: {
    env: process.env.NODE_ENV,
    version: process.env.npm_package_version,
    nodeVersion: process.version,
  },
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
};

const config =
  process.env.NODE_ENV === Environment.Development
    ? developmentConfig
    : productionConfig;

export const logger = pino(config);
