import type { RouteCalibrationTable } from "../calibration/routeCalibration";
import type { PredictionSettings } from "../config";
import type { ClosureInterval, ClosurePlan, ClosureWindow, OpeningGap, TrainState } from "../models/domain";
import { secondsToMs } from "../utils/time";

export type ClosureSettings = Pick<
  PredictionSettings,
  "leadSeconds" | "clearSeconds" | "minSafeOpeningSeconds" | "briefOpeningSeconds" | "uncalibratedPaddingSeconds"
>;

const isActive = (state: TrainState) => state.status !== "passed" && state.status !== "cancelled";

/**
 * A passing train on a route with no calibration gets a wider interval:
 * a closure drawn too wide is preferable to one that is missed.
 */
export const usesFallback = (state: TrainState): boolean => {
  switch (state.classification.kind) {
    case "stopping":
      return false;
    case "passing":
      return state.observation.kind === "fallback" || !state.calibrated;
    default:
      return false;
  }
};

export const buildClosureInterval = (
  state: TrainState,
  calibration: RouteCalibrationTable,
  settings: ClosureSettings,
): ClosureInterval => {
  const entry = calibration.entryFor(state.routePattern);
  const fallback = usesFallback(state);
  const padding = fallback ? settings.uncalibratedPaddingSeconds : 0;
  const leadSeconds = (entry?.leadSeconds ?? settings.leadSeconds) + padding;
  const clearSeconds = (entry?.clearSeconds ?? settings.clearSeconds) + padding;
  return {
    serviceId: state.serviceId,
    headcode: state.headcode,
    crossingTime: state.currentEstimate,
    start: state.currentEstimate - secondsToMs(leadSeconds),
    end: state.currentEstimate + secondsToMs(clearSeconds),
    fallback,
  };
};

const compareIntervals = (a: ClosureInterval, b: ClosureInterval) =>
  a.start - b.start || a.crossingTime - b.crossingTime || a.serviceId.localeCompare(b.serviceId);

const byCrossingTime = (a: ClosureInterval, b: ClosureInterval) =>
  a.crossingTime - b.crossingTime || a.serviceId.localeCompare(b.serviceId);

const toWindow = (trains: ClosureInterval[]): ClosureWindow => {
  const ordered = [...trains].sort(byCrossingTime);
  return {
    start: Math.min(...ordered.map((train) => train.start)),
    end: Math.max(...ordered.map((train) => train.end)),
    serviceIds: ordered.map((train) => train.serviceId),
    trains: ordered,
    kind: ordered.length > 1 ? "merged" : "single",
  };
};

/**
 * Merges sorted intervals into barrier-down windows. A gap strictly shorter
 * than the minimum safe opening is absorbed; a gap of exactly that length
 * stays open.
 */
export const mergeIntervals = (intervals: readonly ClosureInterval[], minSafeOpeningSeconds: number): ClosureWindow[] => {
  const threshold = secondsToMs(minSafeOpeningSeconds);
  const sorted = [...intervals].sort(compareIntervals);
  const groups: ClosureInterval[][] = [];
  let current: ClosureInterval[] = [];
  let currentEnd = Number.NEGATIVE_INFINITY;

  for (const interval of sorted) {
    if (current.length > 0 && interval.start - currentEnd < threshold) {
      current.push(interval);
      currentEnd = Math.max(currentEnd, interval.end);
      continue;
    }
    if (current.length > 0) groups.push(current);
    current = [interval];
    currentEnd = interval.end;
  }
  if (current.length > 0) groups.push(current);

  return groups.map(toWindow);
};

export const findOpenings = (windows: readonly ClosureWindow[], briefOpeningSeconds: number): OpeningGap[] => {
  const openings: OpeningGap[] = [];
  for (let index = 1; index < windows.length; index += 1) {
    const previous = windows[index - 1];
    const next = windows[index];
    if (!previous || !next) continue;
    const durationSeconds = (next.start - previous.end) / 1000;
    openings.push({
      start: previous.end,
      end: next.start,
      durationSeconds,
      brief: durationSeconds < briefOpeningSeconds,
    });
  }
  return openings;
};

/** Pure: the same states and calibration always produce the same plan. */
export const predictClosures = (
  states: readonly TrainState[],
  calibration: RouteCalibrationTable,
  settings: ClosureSettings,
): ClosurePlan => {
  const intervals = states.filter(isActive).map((state) => buildClosureInterval(state, calibration, settings));
  if (intervals.length === 0) return { windows: [], openings: [] };
  const windows = mergeIntervals(intervals, settings.minSafeOpeningSeconds);
  return { windows, openings: findOpenings(windows, settings.briefOpeningSeconds) };
};
