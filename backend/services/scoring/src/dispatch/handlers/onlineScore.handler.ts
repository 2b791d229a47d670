// backend/services/scoring/src/dispatch/handlers/onlineScore.handler.ts
/**
 * online_score
 * - admin callers get the fixed score 42; their arguments are not validated.
 * - everyone else: validate arguments → record `has` → require enough
 *   fields → getScore().
 */

import { OK } from "../../../../shared/src/http/envelope";
import { isFieldValidationError } from "../../../../shared/src/dto/FieldValidationError";
import { OnlineScoreRequest } from "../../dto/onlineScore.request";
import { getScore } from "../../scoring/scoring";
import { invalidRequest } from "../invalid";
import type { MethodHandlerFn } from "../types";

export const ADMIN_SCORE = 42;

export const onlineScoreHandler: MethodHandlerFn = async (
  request,
  ctx,
  { store }
) => {
  if (request.isAdmin) {
    return { response: { score: ADMIN_SCORE }, code: OK };
  }

  const args = new OnlineScoreRequest(request.args);
  try {
    args.validate();
  } catch (err) {
    if (isFieldValidationError(err)) return invalidRequest(err.message);
    throw err;
  }

  ctx.has = args.presentFields();

  if (!args.enoughFields) {
    return invalidRequest("INVALID_REQUEST: not enough fields");
  }

  const score = await getScore(store, {
    first_name: args.first_name,
    last_name: args.last_name,
    email: args.email,
    phone: args.phone,
    birthday: args.birthday,
    gender: args.gender,
  });
  return { response: { score }, code: OK };
};
