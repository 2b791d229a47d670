// backend/services/scoring/src/scoring/scoring.ts
/**
 * Purpose:
 * - Business collaborators behind the two methods.
 *
 * getScore:
 * - Cached per identity under "uid:" + md5(first_name + last_name + phone +
 *   birthday as YYYYMMDD) for an hour. A cache miss (or a broken cache)
 *   recomputes: phone 1.5, email 1.5, birthday+gender 1.5, full name 0.5.
 *
 * getInterests:
 * - Reads "i:<client id>" from the store: a JSON list of interest strings.
 *   Unknown clients have no interests.
 */

import { createHash } from "node:crypto";
import type { IStore } from "../../../shared/src/store/IStore";
import { parseDotDate } from "../../../shared/src/dto/fields";

export const SCORE_CACHE_TTL_SEC = 60 * 60;

export type ScoreInput = {
  first_name?: string | null;
  last_name?: string | null;
  email?: string | null;
  phone?: string | number | null;
  birthday?: string | null;
  gender?: number | null;
};

/** "DD.MM.YYYY" → "YYYYMMDD"; "" when absent. */
function birthdayKeyPart(birthday: string | null | undefined): string {
  const d = birthday ? parseDotDate(birthday) : null;
  if (!d) return "";
  return `${d.year}${String(d.month).padStart(2, "0")}${String(d.day).padStart(
    2,
    "0"
  )}`;
}

export function scoreCacheKey(input: ScoreInput): string {
  const parts = [
    input.first_name ?? "",
    input.last_name ?? "",
    input.phone == null ? "" : String(input.phone),
    birthdayKeyPart(input.birthday),
  ];
  return "uid:" + createHash("md5").update(parts.join(""), "utf8").digest("hex");
}

export function computeScore(input: ScoreInput): number {
  let score = 0;
  if (input.phone) score += 1.5;
  if (input.email) score += 1.5;
  if (input.birthday && input.gender) score += 1.5;
  if (input.first_name && input.last_name) score += 0.5;
  return score;
}

export async function getScore(store: IStore, input: ScoreInput): Promise<number> {
  const key = scoreCacheKey(input);

  const cached = Number(await store.cacheGet(key));
  if (cached) return cached;

  const score = computeScore(input);
  await store.cacheSet(key, String(score), SCORE_CACHE_TTL_SEC);
  return score;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export async function getInterests(
  store: IStore,
  clientId: number
): Promise<string[]> {
  const raw = await store.get(`i:${clientId}`);
  if (!raw) return [];

  const parsed: unknown = JSON.parse(raw);
  if (!isStringList(parsed)) {
    throw new Error(`interests of client ${clientId} are not a list of strings`);
  }
  return parsed;
}
