// backend/services/shared/src/dto/fields/DateField.ts
import { FieldValidationError } from "../FieldValidationError";
import { CharField } from "./CharField";

export type CalendarDate = {
  year: number;
  month: number; // 1-12
  day: number;
};

const DATE_RE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

/**
 * Parse "DD.MM.YYYY" into a calendar date. Returns null for anything that is
 * not a real date (31.02.2000, 00.01.2000, 01.01.0000, 2000-01-01).
 */
export function parseDotDate(value: string): CalendarDate | null {
  const m = DATE_RE.exec(value);
  if (!m) return null;

  const day = Number(m[1]);
  const month = Number(m[2]);
  const year = Number(m[3]);
  if (year < 1) return null;

  const probe = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC maps 0-99 onto 1900-1999
  probe.setUTCFullYear(year);
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }
  return { year, month, day };
}

/** Date as text in DD.MM.YYYY. */
export class DateField extends CharField {
  protected override check(value: unknown, path: string): string {
    const text = super.check(value, path);
    if (!parseDotDate(text)) {
      throw new FieldValidationError(
        "BadDateFormat",
        path,
        "value should be a date in DD.MM.YYYY format"
      );
    }
    return text;
  }
}
