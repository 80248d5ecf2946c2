import { Router } from "express";
import { z } from "zod";
import { abortOnDisconnect } from "../middleware/requestSignal.js";
import { parseWith } from "../middleware/validator.js";
import { decodeAgentAnalysisRequest } from "../services/agentAnalysis.js";
import { resolveRouterDependencies, type AnalyticsRouterOptions } from "./options.js";

const graphContextBodySchema = z.object({
  query: z.string(),
  entityNames: z.array(z.string()).default([])
});

/** Endpoints consumed by external agents. */
export function createMcpRouter(options: AnalyticsRouterOptions = {}): Router {
  const { service, storeReady } = resolveRouterDependencies(options);
  const mcpRouter = Router();
  mcpRouter.use(storeReady);

  mcpRouter.post("/graph-context", async (req, res) => {
    const { query, entityNames } = parseWith(graphContextBodySchema, req.body, "Invalid context request");
    res.json(
      await service.getGraphContextForAgent(query, entityNames, {
        signal: abortOnDisconnect(req, res)
      })
    );
  });

  mcpRouter.post("/execute-analysis", async (req, res) => {
    const request = decodeAgentAnalysisRequest(req.body);
    res.json(await service.executeAgentAnalysis(request, { signal: abortOnDisconnect(req, res) }));
  });

  return mcpRouter;
}
