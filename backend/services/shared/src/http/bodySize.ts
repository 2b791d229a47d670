// backend/services/shared/src/http/bodySize.ts
/**
 * Raw request body size as seen by the JSON parser.
 *
 * body-parser leaves `req.body` as `{}` both for an empty body and for a
 * literal `{}`; the byte count recorded by its `verify` hook tells them apart.
 */

import type { IncomingMessage } from "node:http";

const sizes = new WeakMap<IncomingMessage, number>();

export function recordBodySize(req: IncomingMessage, buf: Buffer): void {
  sizes.set(req, buf.length);
}

/** Bytes of body received; 0 when the parser saw none. */
export function bodySize(req: IncomingMessage): number {
  return sizes.get(req) ?? 0;
}
