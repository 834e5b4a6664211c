import type {
  ClosureWindowView,
  StatusResponse,
  TimelineResponse,
  TimelineSegment,
  TrainSummary,
  TrainsResponse,
} from "@crossingwatch/core";
import type { ClosureWindow, EpochMs, PublishedSnapshot, TrainState } from "../models/domain";
import { toIso, toIsoOrNull } from "../utils/time";
import type { Timeline } from "./timelineAssembler";

const durationSeconds = (start: EpochMs, end: EpochMs) => Math.round((end - start) / 1000);

export const toTrainSummary = (state: TrainState): TrainSummary => ({
  serviceId: state.serviceId,
  headcode: state.headcode,
  origin: state.origin,
  destination: state.destination,
  routePattern: state.routePattern,
  kind: state.classification.kind,
  status: state.status,
  scheduledCrossingTime: toIso(state.scheduledCrossingTime),
  estimatedCrossingTime: toIso(state.currentEstimate),
  delaySeconds: state.delaySeconds,
  estimateSource: state.observation.kind,
  calibrated: state.calibrated,
  lastUpdate: toIsoOrNull(state.lastUpdate),
});

export const toClosureWindowView = (window: ClosureWindow): ClosureWindowView => ({
  start: toIso(window.start),
  end: toIso(window.end),
  durationSeconds: durationSeconds(window.start, window.end),
  kind: window.kind,
  serviceIds: [...window.serviceIds],
  trains: window.trains.map((train) => ({
    serviceId: train.serviceId,
    headcode: train.headcode,
    crossingTime: toIso(train.crossingTime),
    fallback: train.fallback,
  })),
});

export const toTimelineResponse = (timeline: Timeline, generatedAt: EpochMs): TimelineResponse => ({
  generatedAt: toIso(generatedAt),
  from: toIso(timeline.from),
  to: toIso(timeline.to),
  horizonMinutes: timeline.horizonMinutes,
  segments: timeline.entries.map(
    (entry): TimelineSegment => ({
      type: entry.type,
      start: toIso(entry.start),
      end: toIso(entry.end),
      durationSeconds: durationSeconds(entry.start, entry.end),
      trains: [...entry.trains],
      brief: entry.brief,
    }),
  ),
});

/** The window covering `now`, or failing that the next one to start. */
export const findCurrentOrNextClosure = (
  windows: readonly ClosureWindow[],
  now: EpochMs,
): { window: ClosureWindow | null; active: boolean } => {
  const active = windows.find((window) => window.start <= now && now < window.end);
  if (active) return { window: active, active: true };
  return { window: windows.find((window) => window.start > now) ?? null, active: false };
};

export const buildStatusResponse = (
  crossing: string,
  snapshot: PublishedSnapshot | null,
  now: EpochMs,
): StatusResponse => {
  if (!snapshot) {
    return {
      crossing,
      crossingOpen: true,
      nextClosure: null,
      activeTrains: [],
      generatedAt: null,
      timestamp: toIso(now),
    };
  }
  const { window, active } = findCurrentOrNextClosure(snapshot.plan.windows, now);
  return {
    crossing,
    crossingOpen: !active,
    nextClosure: window ? toClosureWindowView(window) : null,
    activeTrains: snapshot.trains.map(toTrainSummary),
    generatedAt: toIso(snapshot.generatedAt),
    timestamp: toIso(now),
  };
};

export const buildTrainsResponse = (
  trains: readonly TrainState[],
  now: EpochMs,
  timetableLoadedAt: EpochMs | null,
  feedConnected: boolean,
): TrainsResponse => ({
  trains: trains.map(toTrainSummary),
  count: trains.length,
  timestamp: toIso(now),
  timetableLoadedAt: toIsoOrNull(timetableLoadedAt),
  feedConnected,
});
