import type { RequestHandler } from "express";
import { StoreUnavailableError } from "../errors.js";
import { logger } from "../utils/logger.js";

/** Connects the graph store lazily before the request reaches a handler. */
export function requireStore(ensureStoreConnected: () => Promise<void>): RequestHandler {
  return async (_req, _res, next) => {
    try {
      await ensureStoreConnected();
    } catch (error) {
      logger.error({ err: error }, "Graph store connection failed");
      next(new StoreUnavailableError("Graph store unavailable", { cause: error }));
      return;
    }
    next();
  };
}
