import type { AbstractGraphStore } from "@supplygraph/shared";
import { appConfig } from "../config.js";
import { AnalysisExecutor } from "../services/AnalysisExecutor.js";
import { GraphAnalyticsService } from "../services/GraphAnalyticsService.js";
import { Neo4jGraphStore } from "../store/Neo4jGraphStore.js";

let graphStoreSingleton: AbstractGraphStore | null = null;
let analysisExecutorSingleton: AnalysisExecutor | null = null;
let analyticsServiceSingleton: GraphAnalyticsService | null = null;
let connectPromise: Promise<void> | null = null;

export function getGraphStoreSingleton(): AbstractGraphStore {
  if (!graphStoreSingleton) {
    graphStoreSingleton = Neo4jGraphStore.fromEnv();
  }

  return graphStoreSingleton;
}

export function getAnalysisExecutorSingleton(): AnalysisExecutor {
  if (!analysisExecutorSingleton) {
    analysisExecutorSingleton = new AnalysisExecutor({
      maxConcurrent: appConfig.ANALYSIS_MAX_CONCURRENT,
      timeoutMs: appConfig.ANALYSIS_TIMEOUT_MS,
      maxRetries: appConfig.ANALYSIS_MAX_RETRIES,
      retryDelayMs: appConfig.ANALYSIS_RETRY_DELAY_MS
    });
  }

  return analysisExecutorSingleton;
}

export function getAnalyticsServiceSingleton(): GraphAnalyticsService {
  if (!analyticsServiceSingleton) {
    analyticsServiceSingleton = new GraphAnalyticsService(
      getGraphStoreSingleton(),
      getAnalysisExecutorSingleton(),
      {
        maxPathHops: appConfig.MAX_PATH_HOPS,
        allowGraphReset: appConfig.ALLOW_GRAPH_RESET
      }
    );
  }

  return analyticsServiceSingleton;
}

export async function ensureGraphStoreConnected(
  store: AbstractGraphStore = getGraphStoreSingleton()
): Promise<void> {
  if (connectPromise) {
    return connectPromise;
  }

  connectPromise = store.connect().catch((error: unknown) => {
    connectPromise = null;
    throw error;
  });

  return connectPromise;
}

export async function shutdownGraphRuntime(): Promise<void> {
  const store = graphStoreSingleton;
  connectPromise = null;
  if (store) {
    await store.disconnect();
  }
}
