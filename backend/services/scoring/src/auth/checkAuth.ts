// backend/services/scoring/src/auth/checkAuth.ts
/**
 * Purpose:
 * - Digest authentication of the method envelope.
 *
 * Tokens (sha512, hex):
 * - admin:   sha512(<local time as YYYYMMDDHH> + ADMIN_SALT)
 *            Valid for the current clock hour only; it stops matching at the
 *            top of the next hour with no grace period.
 * - others:  sha512(account + login + SALT), null/unset parts read as "".
 */

import { createHash, timingSafeEqual } from "node:crypto";
import type { MethodRequest } from "../dto/method.request";

export const SALT = "Otus";
export const ADMIN_SALT = "42";

export function sha512Hex(input: string): string {
  return createHash("sha512").update(input, "utf8").digest("hex");
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

/** Local time "YYYYMMDDHH" */
export function hourStamp(d: Date): string {
  return `${d.getFullYear()}${pad2(d.getMonth() + 1)}${pad2(d.getDate())}${pad2(
    d.getHours()
  )}`;
}

export function adminToken(now: Date = new Date()): string {
  return sha512Hex(hourStamp(now) + ADMIN_SALT);
}

export function userToken(account: string, login: string): string {
  return sha512Hex(account + login + SALT);
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/** Never throws: non-text credentials read as "" and simply fail to match. */
export function checkAuth(
  request: Pick<MethodRequest, "get" | "isAdmin">,
  now: Date = new Date()
): boolean {
  const expected = request.isAdmin
    ? adminToken(now)
    : userToken(text(request.get("account")), text(request.get("login")));
  const supplied = text(request.get("token"));

  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(supplied, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}
