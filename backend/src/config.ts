import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

const DEFAULT_PORT = 5002;
const DEFAULT_CROSSING_TIPLOC = "ROYDON";
const DEFAULT_CROSSING_NAME = "Roydon";
const DEFAULT_TIMEZONE = "Europe/London";
const DEFAULT_CALIBRATION_PATH = path.resolve(__dirname, "..", "config", "routeCalibration.json");
const DEFAULT_TIMETABLE_DIR = path.resolve(__dirname, "..", "samples");
const DEFAULT_LEAD_SECONDS = 120;
const DEFAULT_CLEAR_SECONDS = 30;
const DEFAULT_MIN_SAFE_OPENING_SECONDS = 60;
const DEFAULT_BRIEF_OPENING_SECONDS = 300;
const DEFAULT_STOPPING_DWELL_SECONDS = 45;
const DEFAULT_UNCALIBRATED_PADDING_SECONDS = 120;
const DEFAULT_DELAY_TOLERANCE_SECONDS = 60;
const DEFAULT_HORIZON_MINUTES = 90;
const DEFAULT_LOOKBACK_MINUTES = 5;
const DEFAULT_RETENTION_MINUTES = 5;
const DEFAULT_STALE_SERVICE_MINUTES = 180;
const DEFAULT_RECOMPUTE_INTERVAL_MS = 5_000;
const DEFAULT_FEED_STALE_AFTER_MS = 120_000;
const DEFAULT_FEED_QUEUE_CAPACITY = 5_000;
const DEFAULT_TIMETABLE_RELOAD_HOUR = 2.5;
const DEFAULT_TIMETABLE_MAX_RETRIES = 4;
const DEFAULT_TIMETABLE_RETRY_BASE_DELAY_MS = 500;
const DEFAULT_TIMETABLE_RETRY_MAX_DELAY_MS = 7_500;
type LogLevel = "debug" | "info" | "warn" | "error";

/** Numbers the prediction core needs; everything here is tuning, not truth. */
export interface PredictionSettings {
  crossingTiploc: string;
  adjacentTiplocs: string[];
  timezone: string;
  leadSeconds: number;
  clearSeconds: number;
  minSafeOpeningSeconds: number;
  briefOpeningSeconds: number;
  stoppingDwellSeconds: number;
  uncalibratedPaddingSeconds: number;
  delayToleranceSeconds: number;
  horizonMinutes: number;
  lookbackMinutes: number;
  retentionMinutes: number;
  /** How long a service with no confirmed pass is kept past its estimate. */
  staleServiceMinutes: number;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  redisUrl: string | undefined;
  adminToken: string | undefined;
  crossingName: string;
  calibrationPath: string;
  timetableDir: string;
  timetableBaseUrl: string | undefined;
  timetableReloadHour: number;
  timetableMaxRetries: number;
  timetableRetryBaseDelayMs: number;
  timetableRetryMaxDelayMs: number;
  recomputeIntervalMs: number;
  feedStaleAfterMs: number;
  feedQueueCapacity: number;
  prediction: PredictionSettings;
}

type Env = Record<string, string | undefined>;

const normalizeLogLevel = (value?: string): LogLevel => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
};

const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

// Zero is a legitimate value for offsets such as dwell or padding.
const parseNonNegativeNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed >= 0) return parsed;
  return fallback;
};

const parseList = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((entry) => entry.trim().toUpperCase())
    .filter(Boolean);

export const buildPredictionSettings = (env: Env = {}): PredictionSettings => ({
  crossingTiploc: (env.CROSSING_TIPLOC ?? DEFAULT_CROSSING_TIPLOC).toUpperCase(),
  adjacentTiplocs: parseList(env.CROSSING_ADJACENT_TIPLOCS),
  timezone: env.CROSSING_TIMEZONE ?? DEFAULT_TIMEZONE,
  leadSeconds: parseNonNegativeNumber(env.CLOSURE_LEAD_SECONDS, DEFAULT_LEAD_SECONDS),
  clearSeconds: parseNonNegativeNumber(env.CLOSURE_CLEAR_SECONDS, DEFAULT_CLEAR_SECONDS),
  minSafeOpeningSeconds: parseNonNegativeNumber(env.MIN_SAFE_OPENING_SECONDS, DEFAULT_MIN_SAFE_OPENING_SECONDS),
  briefOpeningSeconds: parseNonNegativeNumber(env.BRIEF_OPENING_SECONDS, DEFAULT_BRIEF_OPENING_SECONDS),
  stoppingDwellSeconds: parseNonNegativeNumber(env.STOPPING_DWELL_SECONDS, DEFAULT_STOPPING_DWELL_SECONDS),
  uncalibratedPaddingSeconds: parseNonNegativeNumber(
    env.UNCALIBRATED_PADDING_SECONDS,
    DEFAULT_UNCALIBRATED_PADDING_SECONDS,
  ),
  delayToleranceSeconds: parseNonNegativeNumber(env.DELAY_TOLERANCE_SECONDS, DEFAULT_DELAY_TOLERANCE_SECONDS),
  horizonMinutes: parsePositiveNumber(env.HORIZON_MINUTES, DEFAULT_HORIZON_MINUTES),
  lookbackMinutes: parseNonNegativeNumber(env.LOOKBACK_MINUTES, DEFAULT_LOOKBACK_MINUTES),
  retentionMinutes: parseNonNegativeNumber(env.RETENTION_MINUTES, DEFAULT_RETENTION_MINUTES),
  staleServiceMinutes: parsePositiveNumber(env.STALE_SERVICE_MINUTES, DEFAULT_STALE_SERVICE_MINUTES),
});

export const buildConfig = (env: Env): AppConfig => ({
  port: Number(env.PORT ?? DEFAULT_PORT),
  logLevel: normalizeLogLevel(env.LOG_LEVEL),
  redisUrl: env.REDIS_URL,
  adminToken: env.ADMIN_TOKEN,
  crossingName: env.CROSSING_NAME ?? DEFAULT_CROSSING_NAME,
  calibrationPath: env.CALIBRATION_PATH ?? DEFAULT_CALIBRATION_PATH,
  timetableDir: env.TIMETABLE_DIR ?? DEFAULT_TIMETABLE_DIR,
  timetableBaseUrl: env.TIMETABLE_BASE_URL,
  timetableReloadHour: parseNonNegativeNumber(env.TIMETABLE_RELOAD_HOUR, DEFAULT_TIMETABLE_RELOAD_HOUR),
  timetableMaxRetries: parsePositiveNumber(env.TIMETABLE_MAX_RETRIES, DEFAULT_TIMETABLE_MAX_RETRIES),
  timetableRetryBaseDelayMs: parsePositiveNumber(
    env.TIMETABLE_RETRY_BASE_DELAY_MS,
    DEFAULT_TIMETABLE_RETRY_BASE_DELAY_MS,
  ),
  timetableRetryMaxDelayMs: parsePositiveNumber(
    env.TIMETABLE_RETRY_MAX_DELAY_MS,
    DEFAULT_TIMETABLE_RETRY_MAX_DELAY_MS,
  ),
  recomputeIntervalMs: parsePositiveNumber(env.RECOMPUTE_INTERVAL_MS, DEFAULT_RECOMPUTE_INTERVAL_MS),
  feedStaleAfterMs: parsePositiveNumber(env.FEED_STALE_AFTER_MS, DEFAULT_FEED_STALE_AFTER_MS),
  feedQueueCapacity: parsePositiveNumber(env.FEED_QUEUE_CAPACITY, DEFAULT_FEED_QUEUE_CAPACITY),
  prediction: buildPredictionSettings(env),
});

export const config: AppConfig = buildConfig(process.env);
