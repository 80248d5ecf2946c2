import type { RequestHandler } from "express";
import { requireStore } from "../middleware/storeReady.js";
import { ensureGraphStoreConnected, getAnalyticsServiceSingleton } from "../runtime/graphRuntime.js";
import type { GraphAnalyticsService } from "../services/GraphAnalyticsService.js";

export interface AnalyticsRouterOptions {
  service?: GraphAnalyticsService;
  ensureStoreConnected?: () => Promise<void>;
}

export interface AnalyticsRouterDependencies {
  service: GraphAnalyticsService;
  storeReady: RequestHandler;
}

export function resolveRouterDependencies(
  options: AnalyticsRouterOptions
): AnalyticsRouterDependencies {
  const service = options.service ?? getAnalyticsServiceSingleton();
  const ensureStoreConnected = options.ensureStoreConnected ?? (() => ensureGraphStoreConnected());
  return { service, storeReady: requireStore(ensureStoreConnected) };
}
