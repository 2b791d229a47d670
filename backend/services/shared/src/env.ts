// backend/services/shared/src/env.ts
/**
 * Why:
 * - Deterministic environment loading for every service with strict precedence:
 *   repo root → service family → service root. Later wins.
 * - Per NODE_ENV (default "dev"), try these at each layer:
 *   dev:    env.dev → .env.dev → .env
 *   test:   env.test → .env.test → .env
 *   prod:   .env (optional; prefer injected env)
 *
 * Notes:
 * - Only the env cascade lives here. Service config parsing is
 *   the service's job (see scoring/src/config.ts).
 * - Values already present in process.env are never overwritten.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";

/** Find the repo root by walking up until we see package.json with workspaces or .git. */
function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  let lastHit: string | null = null;
  for (;;) {
    if (
      fs.existsSync(path.join(dir, ".git")) ||
      fs.existsSync(path.join(dir, "package.json"))
    ) {
      lastHit = dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return lastHit ?? path.resolve(start, "..", "..");
}

/** Load a single env file if it exists; expand; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${absPath}: ${String(parsed.error)}`
    );
  }
  expand(parsed);
  return true;
}

export function envFileCandidates(serviceRootAbs: string, mode: string): string[] {
  const serviceRoot = path.resolve(serviceRootAbs);
  const familyDir = path.resolve(serviceRoot, "..");
  const repoRoot = findRepoRoot(serviceRoot);

  const modeFiles =
    mode === "production"
      ? [".env"]
      : [`env.${mode}`, `.env.${mode}`, ".env"];

  // Later layers win, so they are loaded first: dotenv never overrides.
  const layers = [serviceRoot, familyDir, repoRoot].filter(
    (dir, i, all) => all.indexOf(dir) === i
  );
  const out: string[] = [];
  for (const dir of layers)
    for (const name of modeFiles) out.push(path.join(dir, name));
  return out;
}

/**
 * Cascading loader for a service. Returns the files that were loaded.
 * A missing file set is not an error: every setting has a default or comes
 * from the CLI.
 */
export function loadEnvCascadeForService(serviceRootAbs: string): string[] {
  const mode = (process.env.NODE_ENV || "dev").trim();
  return envFileCandidates(serviceRootAbs, mode).filter((p) =>
    loadIfExists(p)
  );
}
