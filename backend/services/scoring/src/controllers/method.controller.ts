// backend/services/scoring/src/controllers/method.controller.ts
/**
 * Why:
 * - HTTP face of method dispatch. Checks the body, hands it to
 *   methodHandler() with a fresh context and writes the envelope.
 *
 * Notes:
 * - The JSON parser runs before us and answers 400 for invalid JSON. A
 *   request without a body still arrives here with `{}`, so emptiness is
 *   read from the recorded body size.
 * - Whatever dispatch throws is logged with its stack and answered as a
 *   bare 500; the detail never reaches the caller.
 */

import type { Request, Response } from "express";
import { asyncHandler } from "../../../shared/src/middleware/asyncHandler";
import { isPlainObject } from "../../../shared/src/dto/fields";
import { logger } from "../../../shared/src/logger/logger";
import { bodySize } from "../../../shared/src/http/bodySize";
import {
  BAD_REQUEST,
  INTERNAL_ERROR,
  toEnvelope,
} from "../../../shared/src/http/envelope";
import { methodHandler } from "../dispatch/methodHandler";
import type { DispatchResult, RequestContext } from "../dispatch/types";
import type { IStore } from "../../../shared/src/store/IStore";

export function makeMethodController(store: IStore) {
  return asyncHandler(async (req: Request, res: Response) => {
    const requestId = String(req.id);
    const body: unknown = req.body;

    if (bodySize(req) === 0 || !isPlainObject(body)) {
      logger.warn({ requestId }, "[method] missing or non-object body");
      res.status(BAD_REQUEST).json(toEnvelope(BAD_REQUEST, null));
      return;
    }

    logger.info({ requestId, body }, "[method] request");

    const ctx: RequestContext = { requestId };
    let result: DispatchResult;
    try {
      result = await methodHandler({ body }, ctx, { store });
    } catch (err) {
      logger.error({ requestId, err }, "[method] unexpected error");
      result = { response: null, code: INTERNAL_ERROR };
    }

    const envelope = toEnvelope(result.code, result.response);
    logger.info({ ...ctx, envelope }, "[method] response");
    res.status(result.code).json(envelope);
  });
}
