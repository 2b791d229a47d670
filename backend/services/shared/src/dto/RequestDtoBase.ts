// backend/services/shared/src/dto/RequestDtoBase.ts
/**
 * Purpose:
 * - Schema registry + base class for request DTOs that validate themselves
 *   against declared field descriptors.
 *
 * Schemas:
 * - Built once at module load with defineSchema(name, own, parent?). Entries
 *   are the parent's entries followed by the schema's own, in declaration order.
 * - A child may not redeclare an attribute its parent already declares.
 *
 * Instances:
 * - The constructor only copies raw values (own keys of the input). Absent
 *   keys stay `undefined` (unset).
 * - validate() runs descriptors in schema order and throws on the first
 *   failure. It never writes to the instance, so validating twice yields the
 *   same outcome.
 * - Subclasses expose typed getters through read(); a descriptor is a pure
 *   gate, so reading after validate() returns the stored value as is.
 */

import type { Field, FieldValue } from "./fields/Field";

export type FieldMap = Readonly<Record<string, Field<unknown>>>;

export type RawInput = Readonly<Record<string, unknown>>;

export type Schema<F extends FieldMap> = {
  readonly name: string;
  readonly fields: F;
  readonly entries: ReadonlyArray<readonly [string, Field<unknown>]>;
};

export function defineSchema<Own extends FieldMap>(
  name: string,
  own: Own
): Schema<Own>;
export function defineSchema<Own extends FieldMap, Parent extends FieldMap>(
  name: string,
  own: Own,
  parent: Schema<Parent>
): Schema<Parent & Own>;
export function defineSchema(
  name: string,
  own: FieldMap,
  parent?: Schema<FieldMap>
): Schema<FieldMap> {
  const inherited = parent ? parent.entries : [];
  const taken = new Set(inherited.map(([attr]) => attr));

  const entries: Array<readonly [string, Field<unknown>]> = [...inherited];
  for (const [attr, field] of Object.entries(own)) {
    if (taken.has(attr)) {
      throw new Error(
        `${name}: attribute "${attr}" is already declared by ${
          parent ? parent.name : name
        }`
      );
    }
    taken.add(attr);
    entries.push([attr, field]);
  }

  return Object.freeze({
    name,
    fields: Object.freeze(Object.fromEntries(entries)),
    entries: Object.freeze(entries),
  });
}

export abstract class RequestDtoBase<F extends FieldMap> {
  private readonly values: ReadonlyMap<string, unknown>;

  protected constructor(
    protected readonly schema: Schema<F>,
    input: RawInput
  ) {
    const values = new Map<string, unknown>();
    for (const [attr] of schema.entries) {
      values.set(
        attr,
        Object.prototype.hasOwnProperty.call(input, attr)
          ? input[attr]
          : undefined
      );
    }
    this.values = values;
  }

  /** Raw value of an attribute; undefined when unset. */
  public get(attr: keyof F & string): unknown {
    return this.values.get(attr);
  }

  public validate(): this {
    for (const [attr, field] of this.schema.entries) {
      const value = this.values.get(attr);
      if (value !== undefined || field.required) {
        field.validate(value, attr);
      }
    }
    return this;
  }

  /**
   * Attributes holding a real value (neither unset nor canonically empty),
   * in schema order.
   */
  public presentFields(): string[] {
    return this.schema.entries
      .filter(([attr, field]) => {
        const value = this.values.get(attr);
        return value !== undefined && !field.isEmpty(value);
      })
      .map(([attr]) => attr);
  }

  public toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [attr, value] of this.values) {
      if (value !== undefined) out[attr] = value;
    }
    return out;
  }

  protected read<T>(field: Field<T>, attr: keyof F & string): FieldValue<T> {
    return field.validate(this.values.get(attr), attr);
  }
}
