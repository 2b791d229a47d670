// backend/services/shared/src/dto/FieldValidationError.ts
/**
 * Purpose:
 * - Single error type thrown by field descriptors and request DTOs.
 * - Carries the offending attribute path and a stable code so the dispatch
 *   boundary can turn it into a 422 without parsing messages.
 */

export type FieldErrorCode =
  | "MissingRequiredField"
  | "EmptyNotAllowed"
  | "InvalidType"
  | "InvalidFormat"
  | "InvalidChoice"
  | "BadDateFormat"
  | "AgeLimitExceeded"
  | "InvalidListElement";

export class FieldValidationError extends Error {
  public readonly code: FieldErrorCode;
  public readonly path: string;

  constructor(code: FieldErrorCode, path: string, reason: string) {
    super(`${path}: ${reason}`);
    this.name = "FieldValidationError";
    this.code = code;
    this.path = path;
  }
}

export function isFieldValidationError(
  err: unknown
): err is FieldValidationError {
  return err instanceof FieldValidationError;
}
