import { Router } from "express";
import { z } from "zod";
import { abortOnDisconnect } from "../middleware/requestSignal.js";
import { parseWith } from "../middleware/validator.js";
import { resolveRouterDependencies, type AnalyticsRouterOptions } from "./options.js";

const topNQuerySchema = z.object({
  topN: z.coerce.number().optional()
});

export function createCentralityRouter(options: AnalyticsRouterOptions = {}): Router {
  const { service, storeReady } = resolveRouterDependencies(options);
  const centralityRouter = Router();
  centralityRouter.use(storeReady);

  centralityRouter.get("/critical-nodes", async (req, res) => {
    const { topN } = parseWith(topNQuerySchema, req.query);
    res.json(await service.analyzeCriticalNodes(topN, { signal: abortOnDisconnect(req, res) }));
  });

  centralityRouter.get("/bridge-nodes", async (req, res) => {
    const { topN } = parseWith(topNQuerySchema, req.query);
    res.json(await service.analyzeBridgeNodes(topN, { signal: abortOnDisconnect(req, res) }));
  });

  centralityRouter.get("/comprehensive", async (req, res) => {
    res.json(
      await service.performComprehensiveCentralityAnalysis({ signal: abortOnDisconnect(req, res) })
    );
  });

  return centralityRouter;
}
