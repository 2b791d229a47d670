// backend/services/shared/src/middleware/requestId.ts
/**
 * Why:
 * - Every inbound request carries a stable correlation key so that request
 *   logs, the dispatch context and error reports can be tied together.
 *
 * Notes:
 * - Order matters. This must run **before** the http logger.
 * - Never overwrite a caller-supplied ID; mint one only if the request has
 *   none of `x-request-id`, `x-correlation-id`.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

export function newRequestId(): string {
  return randomUUID().replace(/-/g, "");
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const hdr = req.headers["x-request-id"] || req.headers["x-correlation-id"];
    const id = String((Array.isArray(hdr) ? hdr[0] : hdr) || newRequestId());

    req.id = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
