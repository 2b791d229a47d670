// backend/services/shared/test/fields.spec.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ArgumentsField,
  BirthDayField,
  CharField,
  ClientIdsField,
  DateField,
  EmailField,
  GenderField,
  PhoneField,
  ageInYears,
  parseDotDate,
  type Field,
} from "../src/dto/fields";
import {
  FieldValidationError,
  type FieldErrorCode,
} from "../src/dto/FieldValidationError";

function failure(field: Field<unknown>, value: unknown, path = "attr") {
  try {
    field.validate(value, path);
  } catch (err) {
    if (err instanceof FieldValidationError) return err;
    throw err;
  }
  throw new Error("expected validation to fail");
}

function expectCode(
  field: Field<unknown>,
  value: unknown,
  code: FieldErrorCode
) {
  expect(failure(field, value).code).toBe(code);
}

describe("Field – unset / empty / nullable", () => {
  it("required + unset → MissingRequiredField with the path in the message", () => {
    const err = failure(new CharField({ required: true }), undefined, "login");
    expect(err.code).toBe("MissingRequiredField");
    expect(err.path).toBe("login");
    expect(err.message).toBe("login: field is required");
  });

  it("optional + unset → valid-absent", () => {
    expect(new CharField({ required: false }).validate(undefined, "a")).toBe(
      undefined
    );
  });

  it("required + explicit null + nullable → valid", () => {
    const f = new CharField({ required: true, nullable: true });
    expect(f.validate(null, "login")).toBe(null);
  });

  it("empty + not nullable → EmptyNotAllowed", () => {
    const f = new CharField({ required: true, nullable: false });
    expectCode(f, "", "EmptyNotAllowed");
    expectCode(f, null, "EmptyNotAllowed");
  });

  it("per-kind empties", () => {
    const nullable = { nullable: true };
    expect(new CharField(nullable).validate("", "a")).toBe("");
    expect(new ArgumentsField(nullable).validate({}, "a")).toEqual({});
    expect(new ClientIdsField(nullable).validate([], "a")).toEqual([]);
    expect(new PhoneField(nullable).validate("", "a")).toBe("");
  });

  it("gender 0 is a value, not an empty", () => {
    const f = new GenderField({ nullable: false });
    expect(f.isEmpty(0)).toBe(false);
    expect(f.validate(0, "gender")).toBe(0);
    expectCode(f, null, "EmptyNotAllowed");
  });

  it("validated values come back unchanged", () => {
    const args = { a: 1 };
    expect(new ArgumentsField().validate(args, "arguments")).toBe(args);
  });
});

describe("CharField / EmailField / ArgumentsField", () => {
  it("rejects non-strings", () => {
    expectCode(new CharField(), 5, "InvalidType");
    expectCode(new CharField(), ["a"], "InvalidType");
  });

  it("email needs an @", () => {
    expect(new EmailField().validate("a@b", "email")).toBe("a@b");
    expectCode(new EmailField(), "ab", "InvalidFormat");
    expectCode(new EmailField(), 1, "InvalidType");
  });

  it("arguments must be an object, not a list", () => {
    expectCode(new ArgumentsField(), [1], "InvalidType");
    expectCode(new ArgumentsField(), "x", "InvalidType");
  });
});

describe("PhoneField", () => {
  const f = new PhoneField();

  it("accepts 11-char strings and integers starting with 7", () => {
    expect(f.validate("79175002040", "phone")).toBe("79175002040");
    expect(f.validate(79175002040, "phone")).toBe(79175002040);
  });

  it("rejects the wrong prefix, the wrong length and other types", () => {
    expect(failure(f, "89175002040").message).toBe(
      "attr: phone number should start with 7"
    );
    expect(failure(f, "7917500204").message).toBe(
      "attr: phone number should consist of 11 characters"
    );
    expectCode(f, 7.5, "InvalidType");
    expectCode(f, true, "InvalidType");
  });
});

describe("DateField", () => {
  it("parses DD.MM.YYYY real dates", () => {
    expect(parseDotDate("01.02.2000")).toEqual({
      year: 2000,
      month: 2,
      day: 1,
    });
    expect(parseDotDate("29.02.2000")).toEqual({
      year: 2000,
      month: 2,
      day: 29,
    });
  });

  it("rejects impossible dates and other layouts", () => {
    expect(parseDotDate("29.02.2001")).toBe(null);
    expect(parseDotDate("31.04.2020")).toBe(null);
    expect(parseDotDate("00.01.2020")).toBe(null);
    expect(parseDotDate("01.01.0000")).toBe(null);
    expect(parseDotDate("31.12.0001")).toEqual({ year: 1, month: 12, day: 31 });
    expect(parseDotDate("2020-01-01")).toBe(null);
    expectCode(new DateField(), "XXX", "BadDateFormat");
    expectCode(new DateField(), "01.01.0000", "BadDateFormat");
    expectCode(new DateField(), 20200101, "InvalidType");
  });
});

describe("BirthDayField", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 5, 15, 12, 0, 0));
  });
  afterEach(() => {
    vi.useRealTimers();
  });

  it("counts completed years", () => {
    const now = new Date(2024, 5, 15);
    expect(ageInYears({ year: 1954, month: 6, day: 15 }, now)).toBe(70);
    expect(ageInYears({ year: 1954, month: 6, day: 16 }, now)).toBe(69);
    expect(ageInYears({ year: 1953, month: 6, day: 16 }, now)).toBe(70);
  });

  it("accepts ages up to 70", () => {
    const f = new BirthDayField();
    expect(f.validate("15.06.1954", "birthday")).toBe("15.06.1954");
    expect(f.validate("16.06.1953", "birthday")).toBe("16.06.1953");
  });

  it("rejects 71 and over", () => {
    const err = failure(new BirthDayField(), "15.06.1953", "birthday");
    expect(err.code).toBe("AgeLimitExceeded");
    expect(err.message).toBe(
      "birthday: birthday should be no older than 70 years"
    );
  });

  it("format errors come before the age rule", () => {
    expectCode(new BirthDayField(), "1.1.1890x", "BadDateFormat");
  });
});

describe("GenderField", () => {
  it("takes 0, 1 and 2 only", () => {
    const f = new GenderField();
    for (const g of [0, 1, 2]) expect(f.validate(g, "gender")).toBe(g);
    expectCode(f, 3, "InvalidChoice");
    expectCode(f, -1, "InvalidChoice");
    expectCode(f, "1", "InvalidChoice");
  });
});

describe("ClientIdsField", () => {
  const f = new ClientIdsField({ required: true });

  it("accepts integer lists", () => {
    expect(f.validate([1, 2, 3], "client_ids")).toEqual([1, 2, 3]);
  });

  it("reports the offending element", () => {
    const err = failure(f, [1, "2", 3], "client_ids");
    expect(err.code).toBe("InvalidListElement");
    expect(err.path).toBe("client_ids[1]");
    expect(err.message).toBe("client_ids[1]: list elements should be integers");
    expectCode(f, [1.5], "InvalidListElement");
  });

  it("non-lists and empties", () => {
    expectCode(f, { 1: 1 }, "InvalidType");
    expectCode(f, "1,2", "InvalidType");
    expectCode(f, [], "EmptyNotAllowed");
    expectCode(f, undefined, "MissingRequiredField");
  });
});
