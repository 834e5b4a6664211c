import type { EpochMs } from "../models/domain";
import type { ApplyOutcome, TrainStateTracker } from "../tracking/trainStateTracker";
import { safeErrorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";
import type { FeedNormalizer, IgnoreReason } from "./feedNormalizer";
import { BoundedQueue } from "./messageQueue";

const logger = rootLogger.child("feed");

const DEFAULT_BATCH_SIZE = 250;

interface QueuedMessage {
  raw: unknown;
  receivedAt: EpochMs;
}

export interface IngestStats {
  processed: number;
  failed: number;
  outcomes: Record<ApplyOutcome, number>;
  ignored: Partial<Record<IgnoreReason, number>>;
}

export interface FeedIngestorOptions {
  normalizer: FeedNormalizer;
  tracker: TrainStateTracker;
  capacity: number;
  batchSize?: number;
  /** When false, nothing drains until `drain()` is called. */
  autoDrain?: boolean;
  clock?: () => EpochMs;
}

/**
 * Decouples the transport from the tracker: the transport only ever pushes
 * raw messages, and a drain pass normalizes and applies them in arrival order.
 */
export class FeedIngestor {
  private readonly queue: BoundedQueue<QueuedMessage>;
  private readonly batchSize: number;
  private readonly autoDrain: boolean;
  private readonly clock: () => EpochMs;
  private drainScheduled: NodeJS.Immediate | null = null;
  private lastMessage: EpochMs | null = null;
  private readonly counters: IngestStats = {
    processed: 0,
    failed: 0,
    outcomes: { applied: 0, stale: 0, "unknown-service": 0, ignored: 0 },
    ignored: {},
  };

  constructor(private readonly options: FeedIngestorOptions) {
    this.queue = new BoundedQueue(options.capacity);
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.autoDrain = options.autoDrain ?? true;
    this.clock = options.clock ?? Date.now;
  }

  enqueue(raw: unknown, receivedAt: EpochMs = this.clock()) {
    this.lastMessage = receivedAt;
    const dropped = this.queue.push({ raw, receivedAt });
    if (dropped) {
      logger.warn("Feed queue full; dropped oldest message", {
        capacity: this.queue.capacity,
        dropped: this.queue.stats().dropped,
      });
    }
    this.scheduleDrain();
  }

  private scheduleDrain() {
    if (!this.autoDrain || this.drainScheduled) return;
    this.drainScheduled = setImmediate(() => {
      this.drainScheduled = null;
      const processed = this.drain(this.batchSize);
      if (processed > 0 && this.queue.size > 0) this.scheduleDrain();
    });
  }

  /** Processes up to `max` queued messages; returns how many were taken. */
  drain(max: number = Number.POSITIVE_INFINITY): number {
    const batch = this.queue.drain(max);
    batch.forEach((message) => this.process(message));
    return batch.length;
  }

  private process(message: QueuedMessage) {
    this.counters.processed += 1;
    try {
      const result = this.options.normalizer.normalize(message.raw);
      if (result.kind === "ignored") {
        this.counters.ignored[result.reason] = (this.counters.ignored[result.reason] ?? 0) + 1;
        logger.debug("Ignored feed message", { reason: result.reason, detail: result.detail });
        return;
      }
      logger.debug("Applying train update", { ...result.update });
      const outcome = this.options.tracker.apply(result.update, message.receivedAt);
      this.counters.outcomes[outcome] += 1;
    } catch (error) {
      this.counters.failed += 1;
      logger.error("Failed to process feed message", { message: safeErrorMessage(error) });
    }
  }

  stop() {
    if (this.drainScheduled) {
      clearImmediate(this.drainScheduled);
      this.drainScheduled = null;
    }
  }

  clear() {
    this.stop();
    this.queue.clear();
  }

  stats(): IngestStats {
    return {
      processed: this.counters.processed,
      failed: this.counters.failed,
      outcomes: { ...this.counters.outcomes },
      ignored: { ...this.counters.ignored },
    };
  }

  queueStats() {
    return this.queue.stats();
  }

  get lastMessageAt() {
    return this.lastMessage;
  }
}
