// backend/services/scoring/index.ts
/**
 * Why:
 * - Keep start-up boring: load env (bootstrap), read config, init logs,
 *   pick the store, then start HTTP with shared startHttpService.
 */

import { SERVICE_NAME, loadedEnvFiles } from "./src/bootstrap";
import { loadConfig } from "./src/config";
import { createApp } from "./src/app";
import { initLogger, logger } from "../shared/src/logger/logger";
import { startHttpService } from "../shared/src/bootstrap/startHttpService";
import { MemoryStore } from "../shared/src/store/MemoryStore";
import { RedisStore, createRedisClient } from "../shared/src/store/RedisStore";
import type { IStore } from "../shared/src/store/IStore";
import type { ScoringConfig } from "./src/config";

// Top-level guards
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

function createStore(config: ScoringConfig): IStore {
  if (!config.redisUrl) {
    return new MemoryStore({ max: config.memoryCacheMax });
  }
  return new RedisStore(
    createRedisClient(config.redisUrl, config.storeTimeoutMs),
    { attempts: config.storeAttempts }
  );
}

function start(): void {
  const config = loadConfig();
  const log = initLogger(SERVICE_NAME, {
    level: config.logLevel,
    file: config.logFile,
  });
  log.info({ envFiles: loadedEnvFiles }, "env loaded");

  const store = createStore(config);
  log.info(
    { store: config.redisUrl ? "redis" : "memory" },
    "store selected"
  );

  startHttpService({
    app: createApp({ store }),
    port: config.port,
    host: config.host,
    serviceName: SERVICE_NAME,
    logger: log,
    onStop: () => store.close(),
  });
}

try {
  start();
} catch (err) {
  logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
}
