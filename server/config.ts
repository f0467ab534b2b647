import "dotenv/config";
import path from "node:path";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.string().optional(),
  // Dataset and checkpoint locations
  DATA_DIR: z.string().optional(),
  DATASET_PATH: z.string().optional(),
  CHECKPOINT_DIR: z.string().optional(),
  // Optional Prometheus textfile written after each run
  METRICS_FILE: z.string().optional(),
  // Range planning
  BOOTSTRAP_SINCE: z
    .string()
    .regex(/^\d{8}$|^\d{4}-\d{2}-\d{2}$/, "expected YYYYMMDD or YYYY-MM-DD")
    .optional(),
  RECHECK_DAYS: z.string().optional(),
  // Source pages
  KBO_SCHEDULE_URL: z.string().url().optional(),
  KBO_REVIEW_URL: z.string().url().optional(),
  // Navigator
  NAV_READY_TIMEOUT_MS: z.string().optional(),
  NAV_PAGE_TIMEOUT_MS: z.string().optional(),
  NAV_SETTLE_MS: z.string().optional(),
  NAV_MAX_RETRIES: z.string().optional(),
  SESSION_MAX_ATTEMPTS: z.string().optional(),
  POLITENESS_DELAY_MS: z.string().optional(),
  SCRAPER_USER_AGENT: z.string().optional(),
  HEADLESS: z.string().optional(),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment variables: ${parsed.error.message}`);
}

const env = parsed.data;

export function parseBoundedInt(
  val: string | undefined,
  {
    defaultValue,
    min,
    max,
    name,
  }: { defaultValue: number; min: number; max: number; name: string }
): number {
  const raw = parseInt(val ?? "", 10);
  if (!Number.isFinite(raw)) return defaultValue;
  if (raw < min) {
    console.warn(`${name} too low (${raw}). Clamping to minimum ${min}.`);
    return min;
  }
  if (raw > max) {
    console.warn(`${name} too high (${raw}). Clamping to maximum ${max}.`);
    return max;
  }
  return raw;
}

function parseFlag(val: string | undefined, fallback: boolean): boolean {
  if (val === undefined || val.trim() === "") return fallback;
  return ["1", "true", "yes"].includes(val.toLowerCase());
}

const dataDir = path.resolve(env.DATA_DIR ?? "data");

export const config = {
  logLevel: env.LOG_LEVEL ?? "info",
  dataDir,
  datasetPath: env.DATASET_PATH ? path.resolve(env.DATASET_PATH) : path.join(dataDir, "kbo_latest.csv"),
  checkpointDir: env.CHECKPOINT_DIR ? path.resolve(env.CHECKPOINT_DIR) : path.join(dataDir, "checkpoints"),
  metricsFile: env.METRICS_FILE ? path.resolve(env.METRICS_FILE) : undefined,
  // First opening day crawled when the dataset is still empty
  bootstrapSince: env.BOOTSTRAP_SINCE ?? "20250322",
  recheckDays: parseBoundedInt(env.RECHECK_DAYS, { defaultValue: 3, min: 0, max: 30, name: "RECHECK_DAYS" }),
  sources: {
    // {date} is replaced by YYYYMMDD, {gameId} by the KBO game id
    scheduleUrl: env.KBO_SCHEDULE_URL ?? "https://www.koreabaseball.com/Schedule/Schedule.aspx?date={date}",
    reviewUrl: env.KBO_REVIEW_URL ?? "https://www.koreabaseball.com/GameCenter/Main.aspx?gameId={gameId}&section=REVIEW",
  },
  navigator: {
    readyTimeoutMs: parseBoundedInt(env.NAV_READY_TIMEOUT_MS, { defaultValue: 12_000, min: 1_000, max: 120_000, name: "NAV_READY_TIMEOUT_MS" }),
    pageTimeoutMs: parseBoundedInt(env.NAV_PAGE_TIMEOUT_MS, { defaultValue: 60_000, min: 5_000, max: 300_000, name: "NAV_PAGE_TIMEOUT_MS" }),
    settleMs: parseBoundedInt(env.NAV_SETTLE_MS, { defaultValue: 1_000, min: 0, max: 10_000, name: "NAV_SETTLE_MS" }),
    maxRetries: parseBoundedInt(env.NAV_MAX_RETRIES, { defaultValue: 3, min: 1, max: 10, name: "NAV_MAX_RETRIES" }),
    sessionMaxAttempts: parseBoundedInt(env.SESSION_MAX_ATTEMPTS, { defaultValue: 3, min: 1, max: 10, name: "SESSION_MAX_ATTEMPTS" }),
    politenessDelayMs: parseBoundedInt(env.POLITENESS_DELAY_MS, { defaultValue: 800, min: 0, max: 60_000, name: "POLITENESS_DELAY_MS" }),
    userAgent:
      env.SCRAPER_USER_AGENT ??
      "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
    headless: parseFlag(env.HEADLESS, true),
  },
} as const;
