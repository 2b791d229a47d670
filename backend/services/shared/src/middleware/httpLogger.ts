// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Why:
 * - Consistent, structured request logs so ops can aggregate by `service`
 *   and correlate by `reqId`.
 *
 * Order:
 * - Mount immediately after `requestIdMiddleware` so `req.id` is populated.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes are not logged.
 */

import pinoHttp from "pino-http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { logger as rootLogger } from "../logger/logger";
import { newRequestId } from "./requestId";

const QUIET_PATHS = new Set(["/health/live", "/health/ready", "/favicon.ico"]);

export function makeHttpLogger(serviceName: string) {
  const logger = rootLogger.child({ service: serviceName });

  return pinoHttp({
    logger,

    genReqId: (req, res) => {
      if (req.id) return req.id;
      const id = newRequestId();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
