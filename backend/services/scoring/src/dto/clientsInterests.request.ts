// backend/services/scoring/src/dto/clientsInterests.request.ts
import {
  ClientIdsField,
  DateField,
  type FieldValue,
} from "../../../shared/src/dto/fields";
import {
  RequestDtoBase,
  defineSchema,
  type RawInput,
} from "../../../shared/src/dto/RequestDtoBase";

const fields = {
  client_ids: new ClientIdsField({ required: true, nullable: false }),
  date: new DateField({ required: false, nullable: true }),
};

export const CLIENTS_INTERESTS_SCHEMA = defineSchema(
  "ClientsInterestsRequest",
  fields
);

/** Arguments of the `clients_interests` method. */
export class ClientsInterestsRequest extends RequestDtoBase<typeof fields> {
  public constructor(args: RawInput) {
    super(CLIENTS_INTERESTS_SCHEMA, args);
  }

  public get client_ids(): number[] {
    return this.read(fields.client_ids, "client_ids") ?? [];
  }

  public get date(): FieldValue<string> {
    return this.read(fields.date, "date");
  }

  public get clientsCount(): number {
    return this.client_ids.length;
  }
}
