// backend/services/scoring/src/bootstrap.ts
/**
 * Why:
 * - Load envs via the shared cascade (repo → family → service) before
 *   config is read. Later layers win; process.env is never overwritten.
 */

import path from "node:path";
import { loadEnvCascadeForService } from "../../shared/src/env";

export { SERVICE_NAME } from "./constants";

export const loadedEnvFiles = loadEnvCascadeForService(
  path.resolve(__dirname, "..")
);
