// backend/services/scoring/src/dispatch/methodHandler.ts
/**
 * Method dispatch. Stages run in a fixed order; each may end the call:
 *
 *   1. envelope validation      → 422 { code, error }
 *   2. method name present      → 422 "INVALID_REQUEST"
 *   3. authentication           → 403, no payload
 *   4. route lookup             → 422 unknown method
 *   5. handler                  → handler's own result
 *
 * Field validation and business-rule failures become results here. Anything
 * else a handler throws (store outage, corrupt data) propagates to the
 * transport, which answers 500.
 */

import { FORBIDDEN } from "../../../shared/src/http/envelope";
import { isFieldValidationError } from "../../../shared/src/dto/FieldValidationError";
import { MethodRequest } from "../dto/method.request";
import { checkAuth } from "../auth/checkAuth";
import { clientsInterestsHandler } from "./handlers/clientsInterests.handler";
import { onlineScoreHandler } from "./handlers/onlineScore.handler";
import { invalidRequest } from "./invalid";
import type {
  DispatchRequest,
  DispatchResult,
  MethodDeps,
  MethodHandlerFn,
  RequestContext,
} from "./types";

export const METHODS: Readonly<Record<string, MethodHandlerFn>> = Object.freeze({
  clients_interests: clientsInterestsHandler,
  online_score: onlineScoreHandler,
});

function lookupMethod(name: string): MethodHandlerFn | undefined {
  return Object.prototype.hasOwnProperty.call(METHODS, name)
    ? METHODS[name]
    : undefined;
}

export async function methodHandler(
  request: DispatchRequest,
  ctx: RequestContext,
  deps: MethodDeps
): Promise<DispatchResult> {
  const envelope = new MethodRequest(request.body);
  try {
    envelope.validate();
  } catch (err) {
    if (isFieldValidationError(err)) return invalidRequest(err.message);
    throw err;
  }

  const method = envelope.method;
  if (!method) {
    return invalidRequest("INVALID_REQUEST");
  }

  if (!checkAuth(envelope)) {
    return { response: null, code: FORBIDDEN };
  }

  const handler = lookupMethod(method);
  if (!handler) {
    return invalidRequest(`INVALID_REQUEST: unknown method "${method}"`);
  }

  return handler(envelope, ctx, deps);
}
