import { Router } from "express";
import { z } from "zod";
import { abortOnDisconnect } from "../middleware/requestSignal.js";
import { parseWith } from "../middleware/validator.js";
import { resolveRouterDependencies, type AnalyticsRouterOptions } from "./options.js";

const relatedParamsSchema = z.object({
  targetCompany: z.string().min(1)
});

export function createCommunitiesRouter(options: AnalyticsRouterOptions = {}): Router {
  const { service, storeReady } = resolveRouterDependencies(options);
  const communitiesRouter = Router();
  communitiesRouter.use(storeReady);

  communitiesRouter.get("/detect", async (req, res) => {
    res.json(await service.detectSupplyChainCommunities({ signal: abortOnDisconnect(req, res) }));
  });

  communitiesRouter.get("/related/:targetCompany", async (req, res) => {
    const { targetCompany } = parseWith(relatedParamsSchema, req.params);
    res.json(await service.findRelatedCompanies(targetCompany));
  });

  return communitiesRouter;
}
