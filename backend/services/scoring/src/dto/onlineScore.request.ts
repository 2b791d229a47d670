// backend/services/scoring/src/dto/onlineScore.request.ts
/**
 * Purpose:
 * - Arguments of the `online_score` method. Every field is optional and
 *   nullable; sufficiency is a separate business rule (enoughFields).
 */

import {
  BirthDayField,
  CharField,
  EmailField,
  GenderField,
  PhoneField,
  isGender,
  type FieldValue,
  type Gender,
} from "../../../shared/src/dto/fields";
import {
  RequestDtoBase,
  defineSchema,
  type RawInput,
} from "../../../shared/src/dto/RequestDtoBase";

const fields = {
  first_name: new CharField({ required: false, nullable: true }),
  last_name: new CharField({ required: false, nullable: true }),
  email: new EmailField({ required: false, nullable: true }),
  phone: new PhoneField({ required: false, nullable: true }),
  birthday: new BirthDayField({ required: false, nullable: true }),
  gender: new GenderField({ required: false, nullable: true }),
};

export const ONLINE_SCORE_SCHEMA = defineSchema("OnlineScoreRequest", fields);

export class OnlineScoreRequest extends RequestDtoBase<typeof fields> {
  public constructor(args: RawInput) {
    super(ONLINE_SCORE_SCHEMA, args);
  }

  public get first_name(): FieldValue<string> {
    return this.read(fields.first_name, "first_name");
  }

  public get last_name(): FieldValue<string> {
    return this.read(fields.last_name, "last_name");
  }

  public get email(): FieldValue<string> {
    return this.read(fields.email, "email");
  }

  public get phone(): FieldValue<string | number> {
    return this.read(fields.phone, "phone");
  }

  public get birthday(): FieldValue<string> {
    return this.read(fields.birthday, "birthday");
  }

  public get gender(): FieldValue<Gender> {
    return this.read(fields.gender, "gender");
  }

  /**
   * At least one informative pair is present:
   * phone+email, first_name+last_name, or birthday+gender.
   * Gender 0 (unknown) counts; empty strings do not.
   */
  public get enoughFields(): boolean {
    const has = (attr: keyof typeof fields) => Boolean(this.get(attr));
    return (
      (has("phone") && has("email")) ||
      (has("first_name") && has("last_name")) ||
      (has("birthday") && isGender(this.get("gender")))
    );
  }
}
