import { createApp } from "./app.js";
import { config } from "./config.js";
import { logger } from "./lib/logger.js";
import { startSchedulers, stopSchedulers } from "./scheduler.js";
import { createScanRunner, createStore, createStoreLock } from "./services/scanService.js";

const start = async (): Promise<void> => {
  const store = createStore(config);
  const lock = createStoreLock();
  const runScan = createScanRunner(config, { store, lock });
  const app = createApp({
    store,
    lock,
    runScan,
    frontendOrigin: config.FRONTEND_ORIGIN,
  });

  const server = app.listen(config.PORT, config.HOST, () => {
    logger.info(`API listening on http://${config.HOST}:${config.PORT}`);
  });

  const shutdown = (): void => {
    stopSchedulers();
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await startSchedulers({
    cronExpression: config.SCAN_CRON,
    runOnStart: config.SCAN_ON_START,
    runScan,
  });
};

start().catch((error: unknown) => {
  logger.error("Failed to start server", error);
  process.exit(1);
});
