// backend/services/shared/src/http/envelope.ts
/**
 * Purpose:
 * - Status taxonomy and the JSON response envelope every route answers with:
 *     success → { "response": <payload>, "code": <status> }
 *     error   → { "error": <payload or standard message>, "code": <status> }
 */

export const OK = 200;
export const BAD_REQUEST = 400;
export const FORBIDDEN = 403;
export const NOT_FOUND = 404;
export const INVALID_REQUEST = 422;
export const INTERNAL_ERROR = 500;
export const SERVICE_UNAVAILABLE = 503;

export type ErrorStatus =
  | typeof BAD_REQUEST
  | typeof FORBIDDEN
  | typeof NOT_FOUND
  | typeof INVALID_REQUEST
  | typeof INTERNAL_ERROR;

export type StatusCode = typeof OK | ErrorStatus;

export const ERRORS: Readonly<Record<ErrorStatus, string>> = {
  [BAD_REQUEST]: "Bad Request",
  [FORBIDDEN]: "Forbidden",
  [NOT_FOUND]: "Not Found",
  [INVALID_REQUEST]: "Invalid Request",
  [INTERNAL_ERROR]: "Internal Server Error",
};

export type Envelope =
  | { response: unknown; code: StatusCode }
  | { error: unknown; code: StatusCode };

export function isErrorStatus(code: StatusCode): code is ErrorStatus {
  return code !== OK;
}

export function toEnvelope(code: StatusCode, payload: unknown): Envelope {
  if (!isErrorStatus(code)) return { response: payload, code };
  return { error: payload ?? ERRORS[code], code };
}
