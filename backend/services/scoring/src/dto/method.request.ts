// backend/services/scoring/src/dto/method.request.ts
/**
 * Purpose:
 * - The method envelope: credentials, the method name and its raw arguments.
 *
 * Fields:
 *   account    text  optional  nullable
 *   login      text  required  nullable
 *   token      text  required  nullable
 *   arguments  map   required  nullable
 *   method     text  required  NOT nullable
 */

import {
  ArgumentsField,
  CharField,
  type Arguments,
  type FieldValue,
} from "../../../shared/src/dto/fields";
import {
  RequestDtoBase,
  defineSchema,
  type RawInput,
} from "../../../shared/src/dto/RequestDtoBase";

export const ADMIN_LOGIN = "admin";

const fields = {
  account: new CharField({ required: false, nullable: true }),
  login: new CharField({ required: true, nullable: true }),
  token: new CharField({ required: true, nullable: true }),
  arguments: new ArgumentsField({ required: true, nullable: true }),
  method: new CharField({ required: true, nullable: false }),
};

export const METHOD_REQUEST_SCHEMA = defineSchema("MethodRequest", fields);

export class MethodRequest extends RequestDtoBase<typeof fields> {
  public constructor(body: RawInput) {
    super(METHOD_REQUEST_SCHEMA, body);
  }

  public get account(): FieldValue<string> {
    return this.read(fields.account, "account");
  }

  public get login(): FieldValue<string> {
    return this.read(fields.login, "login");
  }

  public get token(): FieldValue<string> {
    return this.read(fields.token, "token");
  }

  /** Raw method arguments; `{}` when null was sent. */
  public get args(): Arguments {
    return this.read(fields.arguments, "arguments") ?? {};
  }

  public get method(): string {
    return this.read(fields.method, "method") ?? "";
  }

  public get isAdmin(): boolean {
    return this.get("login") === ADMIN_LOGIN;
  }
}
