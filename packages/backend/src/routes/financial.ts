import { Router } from "express";
import { z } from "zod";
import { abortOnDisconnect } from "../middleware/requestSignal.js";
import { parseWith } from "../middleware/validator.js";
import { resolveRouterDependencies, type AnalyticsRouterOptions } from "./options.js";

const fraudQuerySchema = z.object({
  timeWindow: z.string().optional(),
  minRiskScore: z.coerce.number().optional()
});

const tradingQuerySchema = z.object({
  sector: z.string().optional(),
  analysisDepth: z.coerce.number().optional()
});

export function createFinancialRouter(options: AnalyticsRouterOptions = {}): Router {
  const { service, storeReady } = resolveRouterDependencies(options);
  const financialRouter = Router();
  financialRouter.use(storeReady);

  financialRouter.get("/fraud-patterns", async (req, res) => {
    const { timeWindow, minRiskScore } = parseWith(fraudQuerySchema, req.query);
    res.json(
      await service.detectFraudPatterns(timeWindow, minRiskScore, {
        signal: abortOnDisconnect(req, res)
      })
    );
  });

  financialRouter.get("/trading-intelligence", async (req, res) => {
    const { sector, analysisDepth } = parseWith(tradingQuerySchema, req.query);
    res.json(await service.generateTradingIntelligence(sector, analysisDepth));
  });

  return financialRouter;
}
