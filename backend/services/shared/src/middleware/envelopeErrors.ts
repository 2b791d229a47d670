// backend/services/shared/src/middleware/envelopeErrors.ts
/**
 * Why:
 * - Tails of the middleware chain. Unknown routes and anything thrown or
 *   passed to next(err) still answer with the JSON envelope, never with
 *   Express' HTML defaults.
 *
 * Notes:
 * - Body-parser failures carry a 4xx `status` and become 400 Bad Request.
 * - Everything else is a 500 with the standard message; the detail only
 *   goes to the log.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { logger } from "../logger/logger";
import {
  BAD_REQUEST,
  INTERNAL_ERROR,
  NOT_FOUND,
  toEnvelope,
} from "../http/envelope";

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status = "status" in err ? err.status : undefined;
  return typeof status === "number" && status >= 400 && status < 500
    ? status
    : undefined;
}

export function notFoundEnvelope(): RequestHandler {
  return (_req, res) => {
    res.status(NOT_FOUND).json(toEnvelope(NOT_FOUND, null));
  };
}

export function errorEnvelope(): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (clientErrorStatus(err) !== undefined) {
      logger.warn(
        { requestId: req.id, err, path: req.originalUrl },
        "rejected request body"
      );
      res.status(BAD_REQUEST).json(toEnvelope(BAD_REQUEST, null));
      return;
    }

    logger.error(
      { requestId: req.id, err, path: req.originalUrl, method: req.method },
      "Unexpected error"
    );
    res.status(INTERNAL_ERROR).json(toEnvelope(INTERNAL_ERROR, null));
  };
}
