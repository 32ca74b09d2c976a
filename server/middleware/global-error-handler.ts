/**
 * Global Error Handler Middleware
 *
 * Serializes every error that reaches express into the `ApiError` envelope.
 * `BaseAppError` subclasses keep their own status and code; anything else is
 * reported as a 500 without its internals.
 */

import type { NextFunction, Request, Response } from "express";
import { logger } from "../config/logger";
import { AppRequestBodyError, AppValidationError, isAppError, toAppError } from "@shared/errors";
import type { AppError } from "@shared/result-types";
import type { ApiError } from "@shared/api-contracts";

/** Shape of the errors body-parser passes to `next` */
interface BodyParserError extends Error {
  status: number;
  type: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    "type" in err &&
    typeof err.type === "string"
  );
}

function toRequestError(err: unknown, req: Request): AppError {
  // express.json() reports an unparsable body as a SyntaxError
  if (err instanceof SyntaxError) {
    return new AppValidationError("Request body is not valid JSON", "body", ["json"]);
  }
  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    return new AppRequestBodyError(err.message, err.status, err.type);
  }
  return toAppError(err, `${req.method} ${req.path}`);
}

/**
 * Build the response body for an application error. Details are only
 * exposed for client errors.
 */
export function createErrorResponse(error: AppError): ApiError {
  const response: ApiError = {
    success: false,
    error: {
      code: error.code,
      message: error.statusCode >= 500 ? "An unexpected error occurred" : error.message,
    },
    timestamp: new Date().toISOString(),
  };

  if (error.statusCode < 500 && error.details) {
    response.error.details = error.details;
  }
  return response;
}

/**
 * Send a `Result` failure or thrown application error
 */
export function sendError(res: Response, error: AppError): void {
  res.status(error.statusCode).json(createErrorResponse(error));
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: { code: "ROUTE_NOT_FOUND", message: `Route ${req.method} ${req.path} not found` },
    timestamp: new Date().toISOString(),
  } satisfies ApiError);
}

/**
 * Main global error handler middleware
 */
export function globalErrorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const error = toRequestError(err, req);
  const logContext = {
    error: {
      name: isAppError(err) ? err.name : undefined,
      code: error.code,
      statusCode: error.statusCode,
      message: err instanceof Error ? err.message : error.message,
      stack: error.statusCode >= 500 && err instanceof Error ? err.stack : undefined,
    },
    request: { method: req.method, url: req.originalUrl },
  };

  if (error.statusCode >= 500) {
    logger.error(logContext, `${error.code}: ${error.message}`);
  } else {
    logger.warn(logContext, `${error.code}: ${error.message}`);
  }

  sendError(res, error);
}
