// backend/services/shared/src/dto/fields/CharField.ts
import { FieldValidationError } from "../FieldValidationError";
import { Field } from "./Field";

/** Text field. Empty string and null are the canonical empty values. */
export class CharField extends Field<string> {
  public override isEmpty(value: unknown): value is string | null {
    return value === null || value === "";
  }

  protected check(value: unknown, path: string): string {
    if (typeof value !== "string") {
      throw new FieldValidationError(
        "InvalidType",
        path,
        "value should be a string"
      );
    }
    return value;
  }
}
