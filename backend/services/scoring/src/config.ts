// backend/services/scoring/src/config.ts
/**
 * Purpose:
 * - Service settings from the environment (already loaded by bootstrap.ts)
 *   overridden by command-line flags, validated with zod.
 *
 * Flags:
 *   -p, --port <n>     SCORING_PORT      default 8080
 *   -H, --host <h>     SCORING_HOST      default localhost
 *   -l, --log <file>   LOG_FILE          default stdout
 *   -r, --redis <url>  REDIS_URL         default none (in-memory store)
 *                      LOG_LEVEL         default info
 *                      STORE_ATTEMPTS    default 3
 *                      STORE_TIMEOUT_MS  default 1000
 *                      MEMORY_CACHE_MAX  default 10000
 *
 * Notes:
 * - No dotenv loading here.
 * - Invalid values fail fast with every issue listed.
 */

import { z } from "zod";

const FLAG_ALIASES: Readonly<Record<string, string>> = {
  "-p": "port",
  "--port": "port",
  "-H": "host",
  "--host": "host",
  "-l": "log",
  "--log": "log",
  "-r": "redis",
  "--redis": "redis",
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** `--port 9000` / `--port=9000` / `-p 9000`. Unknown flags are rejected. */
export function parseCliArgs(args: readonly string[]): Record<string, string> {
  const flags: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.indexOf("=");
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const key = FLAG_ALIASES[flag];
    if (!key) throw new ConfigError(`unknown argument "${arg}"`);

    let value: string | undefined;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value.startsWith("-")) {
      throw new ConfigError(`flag ${flag} expects a value`);
    }
    flags[key] = value;
  }
  return flags;
}

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export const ConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  host: z.string().default("localhost"),
  logFile: z.string().optional(),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  redisUrl: z
    .string()
    .regex(/^rediss?:\/\//, "must be a redis:// or rediss:// URL")
    .optional(),
  storeAttempts: z.coerce.number().int().min(1).default(3),
  storeTimeoutMs: z.coerce.number().int().positive().default(1000),
  memoryCacheMax: z.coerce.number().int().positive().default(10_000),
});

export type ScoringConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(
  args: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): ScoringConfig {
  const flags = parseCliArgs(args);
  // blank env values count as unset
  const pick = (...values: Array<string | undefined>) =>
    values.map((v) => v?.trim()).find((v) => v !== undefined && v !== "");

  const parsed = ConfigSchema.safeParse({
    port: pick(flags.port, env.SCORING_PORT),
    host: pick(flags.host, env.SCORING_HOST),
    logFile: pick(flags.log, env.LOG_FILE),
    logLevel: pick(env.LOG_LEVEL)?.toLowerCase(),
    redisUrl: pick(flags.redis, env.REDIS_URL),
    storeAttempts: pick(env.STORE_ATTEMPTS),
    storeTimeoutMs: pick(env.STORE_TIMEOUT_MS),
    memoryCacheMax: pick(env.MEMORY_CACHE_MAX),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration: ${issues}`);
  }
  return parsed.data;
}
