import cors from "cors";
import express, { type Express } from "express";
import type { AbstractGraphStore, ServiceConnectionStatus } from "@supplygraph/shared";
import { appConfig } from "./config.js";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.js";
import { requestLogger } from "./middleware/logger.js";
import { createRateLimiter, type RateLimiterOptions } from "./middleware/rateLimiter.js";
import { createAnalyticsRouter } from "./routes/analytics.js";
import { createCentralityRouter } from "./routes/centrality.js";
import { createCommunitiesRouter } from "./routes/communities.js";
import { createCompaniesRouter } from "./routes/companies.js";
import { createFinancialRouter } from "./routes/financial.js";
import { createGraphRouter } from "./routes/graph.js";
import { createHealthRouter } from "./routes/health.js";
import { createMcpRouter } from "./routes/mcp.js";
import type { AnalyticsRouterOptions } from "./routes/options.js";
import { createPathfindingRouter } from "./routes/pathfinding.js";
import { createRelationshipsRouter } from "./routes/relationships.js";

export const API_BASE_PATH = "/api/v1/graph-analytics";

export interface CreateAppOptions extends AnalyticsRouterOptions {
  store?: AbstractGraphStore;
  checkNeo4j?: () => Promise<ServiceConnectionStatus>;
  corsOrigin?: string;
  rateLimit?: RateLimiterOptions;
}

export function createApp(options: CreateAppOptions = {}): Express {
  const app = express();
  const routerOptions: AnalyticsRouterOptions = {
    service: options.service,
    ensureStoreConnected: options.ensureStoreConnected
  };

  app.use(requestLogger);
  app.use(cors({ origin: options.corsOrigin ?? appConfig.CORS_ORIGIN }));
  app.use(express.json({ limit: "2mb" }));
  app.use(createRateLimiter(options.rateLimit));

  app.use(
    `${API_BASE_PATH}/health`,
    createHealthRouter({
      store: options.store,
      ensureStoreConnected: options.ensureStoreConnected,
      checkNeo4j: options.checkNeo4j
    })
  );
  app.use(`${API_BASE_PATH}/graph`, createGraphRouter(routerOptions));
  app.use(`${API_BASE_PATH}/companies`, createCompaniesRouter(routerOptions));
  app.use(`${API_BASE_PATH}/relationships`, createRelationshipsRouter(routerOptions));
  app.use(`${API_BASE_PATH}/pathfinding`, createPathfindingRouter(routerOptions));
  app.use(`${API_BASE_PATH}/centrality`, createCentralityRouter(routerOptions));
  app.use(`${API_BASE_PATH}/communities`, createCommunitiesRouter(routerOptions));
  app.use(`${API_BASE_PATH}/analytics`, createAnalyticsRouter(routerOptions));
  app.use(`${API_BASE_PATH}/mcp`, createMcpRouter(routerOptions));
  app.use(`${API_BASE_PATH}/financial`, createFinancialRouter(routerOptions));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
