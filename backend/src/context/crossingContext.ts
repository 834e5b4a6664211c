import type { HealthResponse, StatusResponse, TimelineResponse, TrainsResponse } from "@crossingwatch/core";
import type { RouteCalibrationTable } from "../calibration/routeCalibration";
import type { PredictionSettings } from "../config";
import { FeedIngestor } from "../feed/feedIngestor";
import { FeedNormalizer } from "../feed/feedNormalizer";
import type { EpochMs, PublishedSnapshot } from "../models/domain";
import { predictClosures } from "../services/closurePredictor";
import { buildStatusResponse, buildTrainsResponse, toTimelineResponse } from "../services/crossingViews";
import { buildTimeline } from "../services/timelineAssembler";
import { TimetableStore, crossingLocationSet } from "../timetable/timetableStore";
import type { TimetableSource } from "../timetable/timetableSource";
import { TrainStateTracker, type SeedSummary } from "../tracking/trainStateTracker";
import { TimetableUnavailable, safeErrorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";
import { operatingDay, secondsToMs, toIso } from "../utils/time";

const logger = rootLogger.child("crossing");

export interface CrossingContextOptions {
  crossingName: string;
  settings: PredictionSettings;
  calibration: RouteCalibrationTable;
  timetableSource: TimetableSource;
  feedQueueCapacity: number;
  feedStaleAfterMs: number;
  /** Local hour (fractional) at which the railway day rolls over. */
  dayStartHour?: number;
  /** Drain the feed queue on the event loop as messages arrive. */
  autoDrain?: boolean;
  clock?: () => EpochMs;
}

export interface DayLoadResult {
  day: string;
  services: number;
  seeded: SeedSummary;
  dayChanged: boolean;
}

/**
 * Everything one crossing needs for one operating day: timetable, tracker,
 * feed queue and the last published prediction. Nothing here is global, so
 * several contexts can live side by side.
 */
export class CrossingContext {
  readonly store: TimetableStore;
  readonly tracker: TrainStateTracker;
  readonly ingestor: FeedIngestor;
  private readonly clock: () => EpochMs;
  private readonly dayStartHour: number;
  private published: PublishedSnapshot | null = null;
  private lastRecompute: EpochMs | null = null;
  private feedConnected = false;
  private started = false;
  /** Furthest ahead of its crossing time a closure can start. */
  private readonly closureLeadMs: number;

  constructor(private readonly options: CrossingContextOptions) {
    this.clock = options.clock ?? Date.now;
    this.dayStartHour = options.dayStartHour ?? 0;
    this.closureLeadMs = secondsToMs(
      options.calibration.maxLeadSeconds(options.settings.leadSeconds) + options.settings.uncalibratedPaddingSeconds,
    );
    this.store = new TimetableStore(options.settings, options.calibration);
    this.tracker = new TrainStateTracker({
      calibration: options.calibration,
      settings: options.settings,
      lookup: (serviceId) => this.store.lookup(serviceId),
      clock: this.clock,
    });

    const crossingLocations = crossingLocationSet(options.settings);
    const normalizer = new FeedNormalizer({
      timezone: options.settings.timezone,
      isKnownService: (serviceId) => this.tracker.get(serviceId) !== undefined,
      isRelevantLocation: (serviceId, location) =>
        crossingLocations.has(location) ||
        (this.store.lookup(serviceId)?.calls.some((call) => call.location === location) ?? false),
    });
    this.ingestor = new FeedIngestor({
      normalizer,
      tracker: this.tracker,
      capacity: options.feedQueueCapacity,
      autoDrain: options.autoDrain ?? true,
      clock: this.clock,
    });
  }

  get settings() {
    return this.options.settings;
  }

  get crossingName() {
    return this.options.crossingName;
  }

  currentDay(now: EpochMs = this.clock()) {
    return operatingDay(now, this.options.settings.timezone, this.dayStartHour);
  }

  /**
   * Loads the day's timetable and seeds the tracker from it. A new day
   * discards all tracked state first; a same-day reload only adds services.
   * On failure the previous table and tracker stay in service.
   */
  async loadDay(day: string = this.currentDay(), now: EpochMs = this.clock()): Promise<DayLoadResult> {
    const previousDay = this.store.loadedDay;
    await this.store.load(day, this.options.timetableSource, now);
    const dayChanged = previousDay !== day;
    if (dayChanged) {
      this.ingestor.clear();
      this.tracker.reset();
      this.published = null;
    }
    const seeded = this.tracker.seed(this.store.services(), now);
    logger.info("Operating day ready", { day, dayChanged, services: this.store.size, ...seeded });
    return { day, services: this.store.size, seeded, dayChanged };
  }

  async start(now: EpochMs = this.clock()) {
    if (this.started) return;
    this.started = true;
    try {
      await this.loadDay(this.currentDay(now), now);
    } catch (error) {
      if (!(error instanceof TimetableUnavailable)) throw error;
      logger.warn("Starting without a timetable", { message: error.message });
    }
    this.recompute(now);
  }

  stop() {
    this.started = false;
    this.ingestor.stop();
  }

  /** Tears the day down; the context can be started again afterwards. */
  teardown() {
    this.stop();
    this.ingestor.clear();
    this.tracker.reset();
    this.published = null;
    this.lastRecompute = null;
  }

  ingest(raw: unknown, receivedAt: EpochMs = this.clock()) {
    this.ingestor.enqueue(raw, receivedAt);
  }

  setFeedConnected(connected: boolean) {
    if (this.feedConnected !== connected) {
      logger.info(connected ? "Feed connected" : "Feed disconnected");
    }
    this.feedConnected = connected;
  }

  /**
   * Rebuilds the prediction from the tracker and publishes it in one
   * assignment. A failed recompute keeps the previous snapshot.
   */
  recompute(now: EpochMs = this.clock()): PublishedSnapshot | null {
    try {
      const trains = this.tracker.snapshot(now, this.options.settings.horizonMinutes, this.closureLeadMs);
      const plan = predictClosures(trains, this.options.calibration, this.options.settings);
      const snapshot: PublishedSnapshot = Object.freeze({
        generatedAt: now,
        operatingDay: this.store.loadedDay ?? this.currentDay(now),
        trains,
        plan,
      });
      this.published = snapshot;
      this.lastRecompute = now;
      return snapshot;
    } catch (error) {
      logger.error("Recompute failed; keeping previous snapshot", { message: safeErrorMessage(error) });
      return this.published;
    }
  }

  purge(now: EpochMs = this.clock()) {
    return this.tracker.purge(now);
  }

  get snapshot() {
    return this.published;
  }

  currentStatus(now: EpochMs = this.clock()): StatusResponse {
    return buildStatusResponse(this.options.crossingName, this.published, now);
  }

  timeline(now: EpochMs = this.clock(), horizonMinutes: number = this.options.settings.horizonMinutes): TimelineResponse {
    const horizon = Math.min(Math.max(horizonMinutes, 1), this.options.settings.horizonMinutes);
    const plan = this.published?.plan ?? { windows: [], openings: [] };
    return toTimelineResponse(buildTimeline(plan, now, horizon), this.published?.generatedAt ?? now);
  }

  trains(now: EpochMs = this.clock()): TrainsResponse {
    return buildTrainsResponse(this.tracker.all(), now, this.store.loadedAt, this.feedConnected);
  }

  health(now: EpochMs = this.clock()): HealthResponse {
    const timetableDay = this.store.loadedDay;
    const timetableLoadedForDay = timetableDay !== null && timetableDay === this.currentDay(now);
    const lastMessageAt = this.ingestor.lastMessageAt;
    const lastUpdateAgeMs = lastMessageAt === null ? null : Math.max(0, now - lastMessageAt);
    const feedStale = lastUpdateAgeMs === null || lastUpdateAgeMs > this.options.feedStaleAfterMs;
    const queue = this.ingestor.queueStats();
    const degraded = !this.feedConnected || feedStale || !timetableLoadedForDay || this.store.degraded;

    return {
      status: degraded ? "degraded" : "ok",
      feedConnected: this.feedConnected,
      timetableLoadedForDay,
      timetableDay,
      timetableDegraded: this.store.degraded,
      timetableError: this.store.lastError,
      timetableSource: {
        source: this.options.timetableSource.describe(),
        ...this.options.timetableSource.getTelemetry(),
      },
      lastUpdateAgeMs,
      lastRecomputeAgeMs: this.lastRecompute === null ? null : Math.max(0, now - this.lastRecompute),
      trackedServices: this.tracker.size,
      queue: {
        depth: queue.depth,
        capacity: queue.capacity,
        dropped: queue.dropped,
        processed: this.ingestor.stats().processed,
      },
      timestamp: toIso(now),
    };
  }
}
