// backend/services/shared/src/dto/fields/ClientIdsField.ts
import { FieldValidationError } from "../FieldValidationError";
import { Field } from "./Field";

/** List of integer ids. `[]` and null are the canonical empty values. */
export class ClientIdsField extends Field<number[]> {
  public override isEmpty(value: unknown): value is number[] | null {
    return value === null || (Array.isArray(value) && value.length === 0);
  }

  protected check(value: unknown, path: string): number[] {
    if (!Array.isArray(value)) {
      throw new FieldValidationError(
        "InvalidType",
        path,
        "value should be a list"
      );
    }

    const ids: number[] = [];
    value.forEach((item: unknown, i) => {
      if (typeof item !== "number" || !Number.isInteger(item)) {
        throw new FieldValidationError(
          "InvalidListElement",
          `${path}[${i}]`,
          "list elements should be integers"
        );
      }
      ids.push(item);
    });
    return ids;
  }
}
