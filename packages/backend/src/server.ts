import { appConfig } from "./config.js";
import { API_BASE_PATH, createApp } from "./app.js";
import { shutdownGraphRuntime } from "./runtime/graphRuntime.js";
import { logger } from "./utils/logger.js";

const app = createApp();

const server = app.listen(appConfig.PORT, () => {
  logger.info(`Supply chain graph analytics API listening on http://localhost:${appConfig.PORT}${API_BASE_PATH}`);
});

const shutdown = (signal: NodeJS.Signals): void => {
  logger.info({ signal }, "Shutting down");
  server.close();
  shutdownGraphRuntime()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error({ err: error }, "Failed to close graph store");
      process.exit(1);
    });
};

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
