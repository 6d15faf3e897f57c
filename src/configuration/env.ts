/**
 * Environment configuration.
 *
 * Purpose: read process env once (after `dotenv/config`), validate it with Zod and
 * expose the ratings engine knobs in milliseconds.
 *
 * Gotchas:
 * - `BOT_TOKEN` and `MONGO_URI` are only required by the bootstrap; the engine
 *   tuning has defaults so tests can build a config from `{}`.
 */
import { z } from "zod";
import { ErrResult, OkResult, type Result } from "@/utils/result";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const seconds = (fallback: number) =>
  z.coerce.number().finite().nonnegative().default(fallback);

export const EnvSchema = z.object({
  BOT_TOKEN: z.string().trim().optional(),
  MONGO_URI: z.string().trim().optional(),
  DB_NAME: z.string().trim().min(1).default("reel_ratings"),
  RATING_CACHE_TTL_SECONDS: seconds(300),
  RATING_CACHE_SWEEP_SECONDS: z.coerce.number().finite().positive().default(60),
  RATING_GUARD_COOLDOWN_SECONDS: seconds(5),
  RATING_NOTICE_SECONDS: seconds(5),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface RatingsConfig {
  botToken: string | null;
  mongoUri: string | null;
  dbName: string;
  cacheTtlMs: number;
  cacheSweepMs: number;
  guardCooldownMs: number;
  noticeTtlMs: number;
  logLevel: LogLevelName;
}

const toMs = (value: number): number => Math.round(value * 1000);

/**
 * Valida el env y devuelve la config normalizada.
 * Las variables vacías (`FOO=`) se tratan como ausentes.
 */
export function loadRatingsConfig(
  env: Record<string, string | undefined> = process.env,
): Result<RatingsConfig> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return ErrResult(new Error(`Invalid environment configuration (${issues})`));
  }

  const data = parsed.data;
  return OkResult({
    botToken: data.BOT_TOKEN || null,
    mongoUri: data.MONGO_URI || null,
    dbName: data.DB_NAME,
    cacheTtlMs: toMs(data.RATING_CACHE_TTL_SECONDS),
    cacheSweepMs: toMs(data.RATING_CACHE_SWEEP_SECONDS),
    guardCooldownMs: toMs(data.RATING_GUARD_COOLDOWN_SECONDS),
    noticeTtlMs: toMs(data.RATING_NOTICE_SECONDS),
    logLevel: data.LOG_LEVEL,
  });
}
