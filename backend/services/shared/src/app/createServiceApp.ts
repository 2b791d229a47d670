// backend/services/shared/src/app/createServiceApp.ts
/**
 * Why:
 * - One builder for the service stack so every service answers the same way:
 *   requestId → http logger → health → json parser → routes → 404 → error.
 *
 * Notes:
 * - The JSON parser accepts any content type: callers of the method endpoint
 *   are not required to send `Content-Type: application/json`. It records
 *   the body size so handlers can tell "no body" from `{}`.
 * - Parser failures (invalid JSON, oversized body) surface as 400 through
 *   the error tail.
 */

import express, { type Express } from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { errorEnvelope, notFoundEnvelope } from "../middleware/envelopeErrors";
import { createHealthRouter, type ReadinessFn } from "../health/health";
import { recordBodySize } from "../http/bodySize";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "scoring"). Used in logs. */
  serviceName: string;
  /** Base path the service routes are mounted under (e.g., "/"). */
  apiPrefix: string;
  /** Mounts the service’s routes onto the provided Router. */
  mountRoutes: (router: express.Router) => void;
  /** Health readiness hook (optional). */
  readiness?: ReadinessFn;
  /** Body size limit for the JSON parser. */
  bodyLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix, mountRoutes, readiness, bodyLimit } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  // ── Health (public, no auth) ────────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, readiness }));

  // ── Body parser ─────────────────────────────────────────────────────────────
  app.use(
    express.json({
      limit: bodyLimit ?? "1mb",
      type: () => true,
      verify: (req, _res, buf) => recordBodySize(req, buf),
    })
  );

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix, api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(notFoundEnvelope());
  app.use(errorEnvelope());

  return app;
}
