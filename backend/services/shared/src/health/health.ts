// backend/services/shared/src/health/health.ts
import express from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { SERVICE_UNAVAILABLE } from "../http/envelope";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
};

/**
 * Exposes:
 *   GET /health/live    -> liveness (always ok while the process serves)
 *   GET /health/ready   -> readiness (503 when the readiness hook throws)
 */
export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
    version: opts.version,
  };

  router.get("/health/live", (req, res) => {
    res.json({ ...base, ok: true, instance: req.id });
  });

  router.get(
    "/health/ready",
    asyncHandler(async (req, res) => {
      try {
        const details = opts.readiness ? await opts.readiness() : {};
        res.json({ ...base, ok: true, instance: req.id, ...details });
      } catch (err) {
        res.status(SERVICE_UNAVAILABLE).json({
          ...base,
          ok: false,
          instance: req.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    })
  );

  return router;
}
