// backend/services/shared/src/dto/fields/GenderField.ts
import { FieldValidationError } from "../FieldValidationError";
import { Field } from "./Field";

export const UNKNOWN = 0;
export const MALE = 1;
export const FEMALE = 2;

export type Gender = typeof UNKNOWN | typeof MALE | typeof FEMALE;

export function isGender(value: unknown): value is Gender {
  return value === UNKNOWN || value === MALE || value === FEMALE;
}

/** Enumerated gender: integer 0 (unknown), 1 (male) or 2 (female). */
export class GenderField extends Field<Gender> {
  protected check(value: unknown, path: string): Gender {
    if (!isGender(value)) {
      throw new FieldValidationError(
        "InvalidChoice",
        path,
        "gender takes the values 0, 1 or 2"
      );
    }
    return value;
  }
}
