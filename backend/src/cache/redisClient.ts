import { createClient } from "redis";
import { safeErrorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child("redis");

export type RedisStatus = "disabled" | "connecting" | "ready" | "error";

export interface MirrorEntry {
  key: string;
  value: unknown;
}

/** Write-only Redis handle: the predictor publishes views, other readers consume them. */
export interface RedisPublisher {
  readonly status: RedisStatus;
  readonly lastError: string | null;
  /** Writes every entry with one TTL in a single transaction; resolves to how many were written. */
  writeAll: (entries: readonly MirrorEntry[], ttlMs: number) => Promise<number>;
  close: () => Promise<void>;
}

const DISABLED_PUBLISHER: RedisPublisher = {
  status: "disabled",
  lastError: null,
  writeAll: async () => 0,
  close: async () => undefined,
};

export const createRedisPublisher = (url: string | undefined): RedisPublisher => {
  if (!url) {
    logger.info("Redis URL not configured; predictions are served from memory only");
    return DISABLED_PUBLISHER;
  }

  const client = createClient({ url });
  let status: RedisStatus = "connecting";
  let lastError: string | null = null;

  const markFailed = (message: string, error: unknown) => {
    status = "error";
    lastError = safeErrorMessage(error);
    logger.error(message, { message: lastError });
  };

  client.on("error", (error) => markFailed("Redis connection error", error));
  client.on("ready", () => {
    status = "ready";
    lastError = null;
  });
  client.on("end", () => {
    status = "disabled";
    logger.info("Redis connection closed");
  });

  client
    .connect()
    .then(() => logger.info("Redis connection established"))
    .catch((error: unknown) => markFailed("Failed to connect to Redis", error));

  const writeAll = async (entries: readonly MirrorEntry[], ttlMs: number) => {
    if (status !== "ready" || entries.length === 0) return 0;
    try {
      const transaction = client.multi();
      entries.forEach((entry) => {
        transaction.set(entry.key, JSON.stringify(entry.value), { PX: ttlMs });
      });
      await transaction.exec();
      return entries.length;
    } catch (error) {
      lastError = safeErrorMessage(error);
      logger.warn("Redis mirror write failed", { keys: entries.map((entry) => entry.key), message: lastError });
      return 0;
    }
  };

  const close = async () => {
    if (status !== "ready") return;
    try {
      await client.quit();
    } catch (error) {
      logger.warn("Failed to close Redis connection", { message: safeErrorMessage(error) });
    }
  };

  return {
    get status() {
      return status;
    },
    get lastError() {
      return lastError;
    },
    writeAll,
    close,
  };
};
