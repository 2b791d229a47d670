// backend/services/scoring/src/dispatch/invalid.ts
import { INVALID_REQUEST } from "../../../shared/src/http/envelope";
import type { DispatchResult } from "./types";

/** 422 with the `{ code, error }` payload. */
export function invalidRequest(message: string): DispatchResult {
  return {
    response: { code: INVALID_REQUEST, error: message },
    code: INVALID_REQUEST,
  };
}
