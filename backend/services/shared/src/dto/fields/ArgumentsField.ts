// backend/services/shared/src/dto/fields/ArgumentsField.ts
import { FieldValidationError } from "../FieldValidationError";
import { Field } from "./Field";

export type Arguments = Record<string, unknown>;

export function isPlainObject(value: unknown): value is Arguments {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Structured key-value map (a JSON object). `{}` and null are empty. */
export class ArgumentsField extends Field<Arguments> {
  public override isEmpty(value: unknown): value is Arguments | null {
    return (
      value === null || (isPlainObject(value) && Object.keys(value).length === 0)
    );
  }

  protected check(value: unknown, path: string): Arguments {
    if (!isPlainObject(value)) {
      throw new FieldValidationError(
        "InvalidType",
        path,
        "value should be an object"
      );
    }
    return value;
  }
}
