import type { RouteCalibrationTable } from "../calibration/routeCalibration";
import type { PredictionSettings } from "../config";
import type {
  CrossingObservation,
  EpochMs,
  ServiceId,
  ServiceRecord,
  TrainState,
  TrainStatus,
  TrainUpdate,
} from "../models/domain";
import { crossingLocationSet } from "../timetable/timetableStore";
import { logger as rootLogger } from "../utils/logger";
import { minutesToMs } from "../utils/time";
import { classifyService, estimateCrossingTime } from "./crossingEstimate";

const logger = rootLogger.child("tracker");

export type ApplyOutcome = "applied" | "stale" | "unknown-service" | "ignored";

export interface TrackerDependencies {
  calibration: RouteCalibrationTable;
  settings: PredictionSettings;
  lookup: (serviceId: ServiceId) => ServiceRecord | undefined;
  clock?: () => EpochMs;
}

export interface SeedSummary {
  added: number;
  retained: number;
  untrackable: number;
  expired: number;
}

type MovementEvent = "arrival" | "departure" | "passing";

const isFinished = (state: TrainState) => state.status === "passed" || state.status === "cancelled";

const isMovement = (eventType: TrainUpdate["eventType"]): eventType is MovementEvent =>
  eventType === "arrival" || eventType === "departure" || eventType === "passing";

/**
 * Owns one TrainState per service for the operating day. Every change
 * replaces the service's frozen state object in a single assignment, so
 * snapshot readers only ever hold complete states.
 */
export class TrainStateTracker {
  private readonly states = new Map<ServiceId, TrainState>();
  private readonly crossingLocations: ReadonlySet<string>;
  private readonly clock: () => EpochMs;
  private lastReceived: EpochMs | null = null;

  constructor(private readonly deps: TrackerDependencies) {
    this.crossingLocations = crossingLocationSet(deps.settings);
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Creates baseline states for services not yet tracked. Services already
   * tracked keep their classification and live data across a same-day reload;
   * services already past the stale limit are not brought back.
   */
  seed(records: Iterable<ServiceRecord>, now: EpochMs = this.clock()): SeedSummary {
    const summary: SeedSummary = { added: 0, retained: 0, untrackable: 0, expired: 0 };
    const cutoff = now - minutesToMs(this.deps.settings.staleServiceMinutes);
    for (const record of records) {
      if (this.states.has(record.serviceId)) {
        summary.retained += 1;
        continue;
      }
      const classified = classifyService(record, this.crossingLocations, this.deps.settings, this.deps.calibration);
      if (!classified) {
        summary.untrackable += 1;
        continue;
      }
      if (classified.scheduledCrossingTime < cutoff) {
        summary.expired += 1;
        continue;
      }
      this.states.set(
        record.serviceId,
        Object.freeze({
          serviceId: record.serviceId,
          headcode: record.headcode,
          origin: record.origin,
          destination: record.destination,
          routePattern: record.routePattern,
          classification: Object.freeze(classified.classification),
          scheduledCrossingTime: classified.scheduledCrossingTime,
          observation: Object.freeze({ kind: "timetable", time: classified.scheduledCrossingTime }),
          currentEstimate: classified.scheduledCrossingTime,
          delaySeconds: 0,
          status: "scheduled",
          calibrated: classified.calibrated,
          lastUpdate: null,
          lastReceivedAt: null,
        } satisfies TrainState),
      );
      summary.added += 1;
    }
    return summary;
  }

  apply(update: TrainUpdate, receivedAt: EpochMs = this.clock()): ApplyOutcome {
    const current = this.states.get(update.serviceId);
    const record = this.deps.lookup(update.serviceId);
    if (!current || !record) return "unknown-service";

    if (current.lastUpdate !== null && update.sourceTimestamp < current.lastUpdate) {
      logger.debug("Dropping out-of-order update", {
        serviceId: update.serviceId,
        sourceTimestamp: update.sourceTimestamp,
        storedTimestamp: current.lastUpdate,
      });
      return "stale";
    }

    const next = this.reduce(current, record, update);
    if (!next) return "ignored";

    this.states.set(
      update.serviceId,
      Object.freeze({ ...next, lastUpdate: update.sourceTimestamp, lastReceivedAt: receivedAt }),
    );
    this.lastReceived = receivedAt;
    return "applied";
  }

  private reduce(current: TrainState, record: ServiceRecord, update: TrainUpdate): TrainState | null {
    switch (update.eventType) {
      case "cancellation":
        return { ...current, status: "cancelled" };
      case "reinstatement":
        if (current.status !== "cancelled") return { ...current };
        return { ...current, status: this.statusForDelay(current.delaySeconds) };
      case "arrival":
      case "departure":
      case "passing":
        return this.reduceMovement(current, record, update);
      default:
        return null;
    }
  }

  private reduceMovement(current: TrainState, record: ServiceRecord, update: TrainUpdate): TrainState | null {
    const { location, reportedTime } = update;
    if (location === null || reportedTime === null || !isMovement(update.eventType)) return null;

    const observation = this.observe(current, record, update.eventType, location, reportedTime);
    if (!observation) return null;

    const estimate = estimateCrossingTime(
      current.classification,
      current.scheduledCrossingTime,
      observation,
      this.deps.calibration,
    );
    // A sighting the calibration could not project is recorded as a fallback so closures pad it.
    const recorded: CrossingObservation =
      estimate.fallback && observation.kind === "reference-sighting"
        ? { kind: "fallback", location: observation.location, time: observation.time }
        : observation;
    const delaySeconds = Math.round((estimate.time - current.scheduledCrossingTime) / 1000);
    const passedNow = update.timeKind === "actual" && this.showsPassed(current, record, update.eventType, location);

    let status: TrainStatus;
    if (current.status === "cancelled" || current.status === "passed") {
      status = current.status;
    } else if (passedNow) {
      status = "passed";
    } else {
      status = this.statusForDelay(delaySeconds);
    }

    return {
      ...current,
      observation: Object.freeze(recorded),
      currentEstimate: estimate.time,
      delaySeconds,
      status,
    };
  }

  private observe(
    current: TrainState,
    record: ServiceRecord,
    event: MovementEvent,
    location: string,
    time: EpochMs,
  ): CrossingObservation | null {
    if (this.crossingLocations.has(location)) {
      return { kind: "at-crossing", event, time };
    }

    const call = record.calls.find((candidate) => candidate.location === location);
    const propagated: CrossingObservation | null = call
      ? { kind: "propagated", location, delaySeconds: Math.round((time - call.scheduledTime) / 1000) }
      : null;

    const { classification } = current;
    switch (classification.kind) {
      case "stopping":
        return propagated;
      case "passing": {
        const entry = this.deps.calibration.entryFor(classification.calibrationKey);
        if (entry) {
          return entry.referenceLocation === location ? { kind: "reference-sighting", location, time } : propagated;
        }
        if (call && call.scheduledTime <= current.scheduledCrossingTime) {
          return { kind: "fallback", location, time };
        }
        return propagated;
      }
      default:
        return null;
    }
  }

  private showsPassed(current: TrainState, record: ServiceRecord, event: MovementEvent, location: string) {
    if (this.crossingLocations.has(location)) {
      // A stopping train that has only arrived is still standing at the crossing.
      return current.classification.kind === "passing" || event !== "arrival";
    }
    const call = record.calls.find((candidate) => candidate.location === location);
    return call !== undefined && call.scheduledTime > current.scheduledCrossingTime;
  }

  private statusForDelay(delaySeconds: number): TrainStatus {
    const tolerance = this.deps.settings.delayToleranceSeconds;
    if (delaySeconds > tolerance) return "running-late";
    if (delaySeconds < -tolerance) return "running-early";
    return "scheduled";
  }

  get(serviceId: ServiceId): TrainState | undefined {
    return this.states.get(serviceId);
  }

  all(): readonly TrainState[] {
    return Array.from(this.states.values());
  }

  /**
   * States due in `[now - lookback, now + horizon + leadMs]`, soonest first.
   * The lookback only cuts services that are done: one still to cross stays
   * however late it is. `leadMs` reaches past the horizon for trains whose
   * closure starts inside it.
   */
  snapshot(
    now: EpochMs,
    horizonMinutes: number = this.deps.settings.horizonMinutes,
    leadMs = 0,
  ): readonly TrainState[] {
    const from = now - minutesToMs(this.deps.settings.lookbackMinutes);
    const to = now + minutesToMs(horizonMinutes) + leadMs;
    return Array.from(this.states.values())
      .filter((state) => state.currentEstimate <= to && (state.currentEstimate >= from || !isFinished(state)))
      .sort((a, b) => a.currentEstimate - b.currentEstimate || a.serviceId.localeCompare(b.serviceId));
  }

  /**
   * Drops passed services past the retention horizon, and services never
   * confirmed past the crossing once they exceed the stale limit. Cancelled
   * services stay listed until the day is reset.
   */
  purge(now: EpochMs): number {
    const retentionCutoff = now - minutesToMs(this.deps.settings.retentionMinutes);
    const staleCutoff = now - minutesToMs(this.deps.settings.staleServiceMinutes);
    let removed = 0;
    this.states.forEach((state, serviceId) => {
      const expired =
        state.status === "passed"
          ? state.currentEstimate < retentionCutoff
          : state.status !== "cancelled" && state.currentEstimate < staleCutoff;
      if (expired) {
        this.states.delete(serviceId);
        removed += 1;
      }
    });
    if (removed > 0) {
      logger.debug("Purged finished services", { removed, remaining: this.states.size });
    }
    return removed;
  }

  reset() {
    this.states.clear();
    this.lastReceived = null;
  }

  get size() {
    return this.states.size;
  }

  get lastUpdateReceivedAt() {
    return this.lastReceived;
  }
}
