// backend/services/shared/src/dto/fields/Field.ts
/**
 * Purpose:
 * - Base class for all field descriptors.
 * - A descriptor is immutable configuration: `required` + `nullable` flags plus
 *   a type/format rule supplied by the subclass via `check()`.
 *
 * Semantics of validate(value, path):
 *   1. unset (`undefined`) + required      → MissingRequiredField
 *   2. unset + optional                    → valid-absent, returns undefined
 *   3. canonical empty + !nullable         → EmptyNotAllowed
 *   4. canonical empty + nullable          → valid, returned as is
 *   5. otherwise the subclass rule runs; the value is returned unchanged.
 *
 * Notes:
 * - `undefined` is the unset sentinel. Parsed JSON never yields it, so an
 *   explicit `null` stays distinguishable from an absent key.
 */

import { FieldValidationError } from "../FieldValidationError";

export type FieldOptions = {
  required?: boolean;
  nullable?: boolean;
};

/** Validated value of a field: the typed value, explicit null, or unset. */
export type FieldValue<T> = T | null | undefined;

export abstract class Field<T> {
  public readonly required: boolean;
  public readonly nullable: boolean;

  constructor(opts: FieldOptions = {}) {
    this.required = opts.required ?? false;
    this.nullable = opts.nullable ?? false;
  }

  public validate(value: unknown, path: string): FieldValue<T> {
    if (value === undefined) {
      if (this.required) {
        throw new FieldValidationError(
          "MissingRequiredField",
          path,
          "field is required"
        );
      }
      return undefined;
    }

    if (this.isEmpty(value)) {
      if (!this.nullable) {
        throw new FieldValidationError(
          "EmptyNotAllowed",
          path,
          "value should not be empty"
        );
      }
      return value;
    }

    return this.check(value, path);
  }

  /**
   * Canonical "nothing" for this field kind. Base: explicit null only.
   * Subclasses widen it (empty string, empty list, empty map).
   */
  public isEmpty(value: unknown): value is T | null {
    return value === null;
  }

  /** Type/format rule. Throws FieldValidationError; returns the narrowed value. */
  protected abstract check(value: unknown, path: string): T;
}
