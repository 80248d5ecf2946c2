import { Router } from "express";
import type {
  AbstractGraphStore,
  HealthResponse,
  ProjectionSnapshot,
  ServiceConnectionStatus
} from "@supplygraph/shared";
import { checkNeo4jConnection } from "../runtime/connectivity.js";
import { getGraphStoreSingleton } from "../runtime/graphRuntime.js";

interface CreateHealthRouterOptions {
  store?: AbstractGraphStore;
  ensureStoreConnected?: () => Promise<void>;
  checkNeo4j?: () => Promise<ServiceConnectionStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const store = options.store ?? getGraphStoreSingleton();
  const checkNeo4j =
    options.checkNeo4j ??
    (() =>
      checkNeo4jConnection({
        store: options.store,
        ensureStoreConnected: options.ensureStoreConnected
      }));
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const neo4j = await checkNeo4j();
    const projection: ProjectionSnapshot | null = store.currentProjection();
    const response: HealthResponse = {
      status: neo4j === "failed" ? "degraded" : "ok",
      message: "Graph Analytics Service is running",
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        neo4j
      },
      projection
    };
    res.json(response);
  });

  return healthRouter;
}
