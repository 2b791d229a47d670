// backend/services/scoring/src/app.ts
/**
 * Why:
 * - Assemble the scoring service via the shared builder:
 *   requestId → httpLogger → health → json parser → routes → 404 → error.
 * - The store is injected so tests run against a MemoryStore.
 */

import type express from "express";
import { createServiceApp } from "../../shared/src/app/createServiceApp";
import type { IStore } from "../../shared/src/store/IStore";
import { SERVICE_NAME } from "./constants";
import { methodRoutes } from "./routes/methodRoutes";

export type CreateAppOptions = {
  store: IStore;
};

export function createApp({ store }: CreateAppOptions): express.Express {
  return createServiceApp({
    serviceName: SERVICE_NAME,
    apiPrefix: "/",
    readiness: async () => {
      await store.ping();
      return { store: "ok" };
    },
    mountRoutes: (api) => {
      api.use(methodRoutes(store));
    },
  });
}
