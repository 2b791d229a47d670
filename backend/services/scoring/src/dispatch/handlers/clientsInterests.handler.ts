// backend/services/scoring/src/dispatch/handlers/clientsInterests.handler.ts
import { OK } from "../../../../shared/src/http/envelope";
import { isFieldValidationError } from "../../../../shared/src/dto/FieldValidationError";
import { ClientsInterestsRequest } from "../../dto/clientsInterests.request";
import { getInterests } from "../../scoring/scoring";
import { invalidRequest } from "../invalid";
import type { InterestsPayload, MethodHandlerFn } from "../types";

/** clients_interests: `{ "client_id<id>": [...interests] }` for every id. */
export const clientsInterestsHandler: MethodHandlerFn = async (
  request,
  ctx,
  { store }
) => {
  const args = new ClientsInterestsRequest(request.args);
  try {
    args.validate();
  } catch (err) {
    if (isFieldValidationError(err)) return invalidRequest(err.message);
    throw err;
  }

  ctx.nclients = args.clientsCount;

  const interests: InterestsPayload = {};
  for (const clientId of args.client_ids) {
    interests[`client_id${clientId}`] = await getInterests(store, clientId);
  }
  return { response: interests, code: OK };
};
