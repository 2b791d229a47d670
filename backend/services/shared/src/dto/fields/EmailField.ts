// backend/services/shared/src/dto/fields/EmailField.ts
import { FieldValidationError } from "../FieldValidationError";
import { CharField } from "./CharField";

/** Email address; the only format rule is the presence of "@". */
export class EmailField extends CharField {
  protected override check(value: unknown, path: string): string {
    const email = super.check(value, path);
    if (!email.includes("@")) {
      throw new FieldValidationError(
        "InvalidFormat",
        path,
        "value should be a valid email address"
      );
    }
    return email;
  }
}
