import type { ErrorRequestHandler, RequestHandler } from "express";
import { ZodError } from "zod";
import type { ApiErrorResponse } from "@supplygraph/shared";
import { AnalyticsError, InvalidArgumentError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { formatIssues } from "./validator.js";

interface HttpClientError {
  status: number;
  type?: string;
  message: string;
}

// body-parser and friends attach a 4xx `status` to errors caused by the request itself.
function isHttpClientError(error: unknown): error is HttpClientError {
  if (!(error instanceof Error) || !("status" in error)) {
    return false;
  }
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500;
}

export const notFoundHandler: RequestHandler = (req, res) => {
  const body: ApiErrorResponse = {
    errorCode: "NOT_FOUND",
    message: `Route not found: ${req.method} ${req.path}`
  };
  res.status(404).json(body);
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AnalyticsError) {
    const body: ApiErrorResponse = { errorCode: err.errorCode, message: err.message };
    if (err instanceof InvalidArgumentError && err.details && err.details.length > 0) {
      body.details = err.details;
    }
    if (err.statusCode >= 500) {
      logger.error({ err, method: req.method, url: req.originalUrl }, "Request failed");
    }
    res.status(err.statusCode).json(body);
    return;
  }

  if (err instanceof ZodError) {
    const body: ApiErrorResponse = {
      errorCode: "INVALID_REQUEST",
      message: "Validation failed",
      details: formatIssues(err)
    };
    res.status(400).json(body);
    return;
  }

  if (isHttpClientError(err)) {
    const body: ApiErrorResponse = {
      errorCode: "INVALID_REQUEST",
      message: err.type === "entity.parse.failed" ? "Malformed JSON body" : err.message
    };
    res.status(err.status).json(body);
    return;
  }

  logger.error({ err, method: req.method, url: req.originalUrl }, "Unhandled error");
  const message = err instanceof Error ? err.message : String(err);
  const body: ApiErrorResponse = {
    errorCode: "INTERNAL_ERROR",
    message: `An unexpected error occurred: ${message}`
  };
  res.status(500).json(body);
};
