// backend/services/shared/src/dto/fields/index.ts
export { Field, type FieldOptions, type FieldValue } from "./Field";
export { CharField } from "./CharField";
export { ArgumentsField, isPlainObject, type Arguments } from "./ArgumentsField";
export { EmailField } from "./EmailField";
export { PhoneField, PHONE_LENGTH, PHONE_PREFIX } from "./PhoneField";
export { DateField, parseDotDate, type CalendarDate } from "./DateField";
export {
  BirthDayField,
  BIRTHDAY_LIMIT_YEARS,
  ageInYears,
} from "./BirthDayField";
export {
  GenderField,
  UNKNOWN,
  MALE,
  FEMALE,
  isGender,
  type Gender,
} from "./GenderField";
export { ClientIdsField } from "./ClientIdsField";
