// backend/services/shared/src/contracts/envelope.contract.ts
/**
 * Purpose:
 * - Zod contract of the JSON response envelope (see http/envelope.ts).
 * - Used by callers and tests to assert the wire shape instead of poking at
 *   loose objects.
 *
 * Invariants:
 * - exactly one of `response` / `error` is present
 * - `code` is one of the service status codes
 */

import { z } from "zod";

export const ErrorStatusSchema = z.union([
  z.literal(400),
  z.literal(403),
  z.literal(404),
  z.literal(422),
  z.literal(500),
]);

export const SuccessEnvelopeSchema = z
  .object({
    response: z.unknown(),
    code: z.literal(200),
  })
  .strict();

export const ErrorEnvelopeSchema = z
  .object({
    error: z.unknown(),
    code: ErrorStatusSchema,
  })
  .strict();

export const EnvelopeSchema = z.union([
  SuccessEnvelopeSchema,
  ErrorEnvelopeSchema,
]);

/** 422 payload produced by dispatch. */
export const InvalidRequestPayloadSchema = z
  .object({
    code: z.literal(422),
    error: z.string(),
  })
  .strict();

export type SuccessEnvelope = z.infer<typeof SuccessEnvelopeSchema>;
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;
