import type { AbstractGraphStore, ServiceConnectionStatus } from "@supplygraph/shared";
import { appConfig } from "../config.js";
import { logger } from "../utils/logger.js";
import { ensureGraphStoreConnected, getGraphStoreSingleton } from "./graphRuntime.js";

export function isNeo4jConfigured(): boolean {
  return (
    appConfig.NEO4J_URI.trim().length > 0 &&
    appConfig.NEO4J_USER.trim().length > 0 &&
    appConfig.NEO4J_PASSWORD.trim().length > 0
  );
}

interface Neo4jConnectionOptions {
  store?: AbstractGraphStore;
  ensureStoreConnected?: () => Promise<void>;
}

export async function checkNeo4jConnection(
  options: Neo4jConnectionOptions = {}
): Promise<ServiceConnectionStatus> {
  if (!options.store && !isNeo4jConfigured()) {
    return "not_configured";
  }

  const store = options.store ?? getGraphStoreSingleton();
  const ensureStoreConnected =
    options.ensureStoreConnected ??
    (options.store ? () => store.connect() : () => ensureGraphStoreConnected(store));

  try {
    await ensureStoreConnected();
    const healthy = await store.healthCheck();
    return healthy ? "ok" : "failed";
  } catch (error) {
    logger.warn({ err: error }, "Neo4j connectivity check failed");
    return "failed";
  }
}
