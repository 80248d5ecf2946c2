import { Router } from "express";
import { z } from "zod";
import { abortOnDisconnect } from "../middleware/requestSignal.js";
import { parseWith } from "../middleware/validator.js";
import { resolveRouterDependencies, type AnalyticsRouterOptions } from "./options.js";

const endpointsSchema = z.object({
  startCompany: z.string(),
  endCompany: z.string()
});

const constrainedQuerySchema = endpointsSchema.extend({
  maxHops: z.coerce.number().optional(),
  maxResults: z.coerce.number().optional()
});

export function createPathfindingRouter(options: AnalyticsRouterOptions = {}): Router {
  const { service, storeReady } = resolveRouterDependencies(options);
  const pathfindingRouter = Router();
  pathfindingRouter.use(storeReady);

  pathfindingRouter.get("/backup-supplier", async (req, res) => {
    const { startCompany, endCompany } = parseWith(endpointsSchema, req.query);
    const paths = await service.findBackupSupplierRoutes(startCompany, endCompany, {
      signal: abortOnDisconnect(req, res)
    });
    res.json(paths);
  });

  pathfindingRouter.get("/constrained", async (req, res) => {
    const { startCompany, endCompany, maxHops, maxResults } = parseWith(
      constrainedQuerySchema,
      req.query
    );
    res.json(await service.findConstrainedPaths(startCompany, endCompany, maxHops, maxResults));
  });

  return pathfindingRouter;
}
