import { Router } from "express";
import { z } from "zod";
import { parseWith } from "../middleware/validator.js";
import { resolveRouterDependencies, type AnalyticsRouterOptions } from "./options.js";

const vulnerabilityQuerySchema = z.object({
  minDownstreamImpact: z.coerce.number().optional()
});

const acquisitionQuerySchema = z.object({
  minCentrality: z.coerce.number().optional(),
  maxMarketCap: z.coerce.number().optional()
});

export function createAnalyticsRouter(options: AnalyticsRouterOptions = {}): Router {
  const { service, storeReady } = resolveRouterDependencies(options);
  const analyticsRouter = Router();
  analyticsRouter.use(storeReady);

  analyticsRouter.get("/frenemy-relationships", async (_req, res) => {
    res.json(await service.analyzeFrenemyRelationships());
  });

  analyticsRouter.get("/vulnerabilities", async (req, res) => {
    const { minDownstreamImpact } = parseWith(vulnerabilityQuerySchema, req.query);
    res.json(await service.assessSupplyChainVulnerabilities(minDownstreamImpact));
  });

  analyticsRouter.get("/acquisition-targets", async (req, res) => {
    const { minCentrality, maxMarketCap } = parseWith(acquisitionQuerySchema, req.query);
    res.json(await service.identifyAcquisitionTargets(minCentrality, maxMarketCap));
  });

  return analyticsRouter;
}
