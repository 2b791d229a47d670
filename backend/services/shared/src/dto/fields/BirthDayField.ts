// backend/services/shared/src/dto/fields/BirthDayField.ts
import { FieldValidationError } from "../FieldValidationError";
import { DateField, parseDotDate, type CalendarDate } from "./DateField";

export const BIRTHDAY_LIMIT_YEARS = 70;

/**
 * Completed years between `birth` and `now` (local calendar): the naive year
 * difference, minus one when this year's birthday has not come yet.
 */
export function ageInYears(birth: CalendarDate, now: Date): number {
  const month = now.getMonth() + 1;
  const day = now.getDate();
  let years = now.getFullYear() - birth.year;
  if (month < birth.month || (month === birth.month && day < birth.day)) {
    years -= 1;
  }
  return years;
}

/** DD.MM.YYYY birth date whose holder is at most 70 years old today. */
export class BirthDayField extends DateField {
  protected override check(value: unknown, path: string): string {
    const text = super.check(value, path);
    const birth = parseDotDate(text);
    if (birth && ageInYears(birth, new Date()) > BIRTHDAY_LIMIT_YEARS) {
      throw new FieldValidationError(
        "AgeLimitExceeded",
        path,
        `birthday should be no older than ${BIRTHDAY_LIMIT_YEARS} years`
      );
    }
    return text;
  }
}
