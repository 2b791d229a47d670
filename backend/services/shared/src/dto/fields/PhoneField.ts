// backend/services/shared/src/dto/fields/PhoneField.ts
import { FieldValidationError } from "../FieldValidationError";
import { Field } from "./Field";

export const PHONE_LENGTH = 11;
export const PHONE_PREFIX = "7";

/**
 * Phone number as text ("79161234567") or integer (79161234567).
 * The decimal string form must be 11 characters long and start with "7".
 */
export class PhoneField extends Field<string | number> {
  public override isEmpty(value: unknown): value is string | null {
    return value === null || value === "";
  }

  protected check(value: unknown, path: string): string | number {
    if (
      typeof value !== "string" &&
      !(typeof value === "number" && Number.isInteger(value))
    ) {
      throw new FieldValidationError(
        "InvalidType",
        path,
        "value should be a string or an integer"
      );
    }

    const digits = String(value);
    if (!digits.startsWith(PHONE_PREFIX)) {
      throw new FieldValidationError(
        "InvalidFormat",
        path,
        `phone number should start with ${PHONE_PREFIX}`
      );
    }
    if (digits.length !== PHONE_LENGTH) {
      throw new FieldValidationError(
        "InvalidFormat",
        path,
        `phone number should consist of ${PHONE_LENGTH} characters`
      );
    }
    return value;
  }
}
