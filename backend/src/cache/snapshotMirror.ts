import type { CrossingContext } from "../context/crossingContext";
import type { EpochMs } from "../models/domain";
import type { RedisPublisher } from "./redisClient";

const KEY_PREFIX = "crossingwatch";
const DEFAULT_TTL_MS = 5 * 60_000;

export const mirrorKey = (crossingTiploc: string, view: "status" | "timeline" | "health") =>
  `${KEY_PREFIX}:${crossingTiploc.toLowerCase()}:${view}`;

export interface SnapshotMirror {
  /** Writes the current published views; false when there is no prediction yet or nothing was written. */
  publish: (now?: EpochMs) => Promise<boolean>;
  lastPublishedAt: () => EpochMs | null;
}

/**
 * Copies the context's published views into Redis with a TTL, so other
 * readers see either a fresh prediction or none at all.
 */
export const createSnapshotMirror = (
  context: CrossingContext,
  redis: RedisPublisher,
  ttlMs: number = DEFAULT_TTL_MS,
): SnapshotMirror => {
  let lastPublished: EpochMs | null = null;
  const tiploc = context.settings.crossingTiploc;

  const publish = async (now: EpochMs = Date.now()) => {
    const snapshot = context.snapshot;
    if (!snapshot) return false;
    const written = await redis.writeAll(
      [
        { key: mirrorKey(tiploc, "status"), value: context.currentStatus(now) },
        { key: mirrorKey(tiploc, "timeline"), value: context.timeline(now) },
        { key: mirrorKey(tiploc, "health"), value: context.health(now) },
      ],
      ttlMs,
    );
    if (written === 0) return false;
    lastPublished = snapshot.generatedAt;
    return true;
  };

  return {
    publish,
    lastPublishedAt: () => lastPublished,
  };
};
