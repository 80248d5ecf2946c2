import { Router } from "express";
import type { GraphResetResponse } from "@supplygraph/shared";
import { abortOnDisconnect } from "../middleware/requestSignal.js";
import { logger } from "../utils/logger.js";
import { resolveRouterDependencies, type AnalyticsRouterOptions } from "./options.js";

export function createGraphRouter(options: AnalyticsRouterOptions = {}): Router {
  const { service, storeReady } = resolveRouterDependencies(options);
  const graphRouter = Router();
  graphRouter.use(storeReady);

  graphRouter.post("/refresh", async (req, res) => {
    res.json(await service.refreshGraphProjection({ signal: abortOnDisconnect(req, res) }));
  });

  graphRouter.get("/statistics", async (_req, res) => {
    res.json(await service.getGraphStatistics());
  });

  graphRouter.get("/consistency", async (_req, res) => {
    res.json(await service.validateGraphConsistency());
  });

  graphRouter.get("/projection", (_req, res) => {
    res.json(service.getProjectionSnapshot());
  });

  graphRouter.delete("/", async (_req, res) => {
    const deletedCompanies = await service.resetGraph();
    logger.warn({ deletedCompanies }, "Graph reset requested through the API");
    const response: GraphResetResponse = {
      deletedCompanies,
      message: "Graph reset complete"
    };
    res.json(response);
  });

  return graphRouter;
}
