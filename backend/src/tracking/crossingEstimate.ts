import type { RouteCalibrationTable } from "../calibration/routeCalibration";
import type { PredictionSettings } from "../config";
import type {
  Classification,
  CrossingObservation,
  EpochMs,
  EstimateSource,
  ServiceRecord,
} from "../models/domain";
import { UncalibratedRoute } from "../utils/errors";
import { secondsToMs } from "../utils/time";

export interface CrossingEstimate {
  time: EpochMs;
  source: EstimateSource;
  /** True when the default offset stood in for a route calibration. */
  fallback: boolean;
}

export interface ClassifiedService {
  classification: Classification;
  scheduledCrossingTime: EpochMs;
  calibrated: boolean;
}

const assertNever = (value: never): never => {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
};

/**
 * Classifies a service once, from its scheduled calls: a booked stop at (or
 * beside) the crossing makes it stopping, anything else passing. Passing
 * services without a timetable call at the crossing get their scheduled
 * crossing time from the route calibration; returns null when that is
 * impossible.
 */
export const classifyService = (
  record: ServiceRecord,
  crossingLocations: ReadonlySet<string>,
  settings: Pick<PredictionSettings, "crossingTiploc" | "stoppingDwellSeconds">,
  calibration: RouteCalibrationTable,
): ClassifiedService | null => {
  const crossingCall =
    record.calls.find((call) => call.location === settings.crossingTiploc) ??
    record.calls.find((call) => crossingLocations.has(call.location));
  const stopCall = record.calls.find((call) => call.callType === "stop" && crossingLocations.has(call.location));

  if (stopCall) {
    return {
      classification: { kind: "stopping", location: stopCall.location, dwellSeconds: settings.stoppingDwellSeconds },
      scheduledCrossingTime: crossingCall?.scheduledTime ?? stopCall.scheduledTime,
      calibrated: true,
    };
  }

  const calibrated = calibration.has(record.routePattern);
  const classification: Classification = { kind: "passing", calibrationKey: record.routePattern };
  if (crossingCall) {
    return { classification, scheduledCrossingTime: crossingCall.scheduledTime, calibrated };
  }

  const entry = calibration.entryFor(record.routePattern);
  const referenceCall = entry ? record.calls.find((call) => call.location === entry.referenceLocation) : undefined;
  if (!referenceCall) return null;
  return {
    classification,
    scheduledCrossingTime: calibration.estimateCrossingTime(record.routePattern, referenceCall.scheduledTime),
    calibrated,
  };
};

const estimateStopping = (
  classification: Extract<Classification, { kind: "stopping" }>,
  scheduledCrossingTime: EpochMs,
  observation: CrossingObservation,
): CrossingEstimate => {
  switch (observation.kind) {
    case "timetable":
      return { time: observation.time, source: "timetable", fallback: false };
    case "at-crossing":
      // Barriers stay down while the train stands; an arrival means departure is a dwell away.
      return {
        time:
          observation.event === "arrival"
            ? observation.time + secondsToMs(classification.dwellSeconds)
            : observation.time,
        source: "at-crossing",
        fallback: false,
      };
    case "propagated":
      return {
        time: scheduledCrossingTime + secondsToMs(observation.delaySeconds),
        source: "propagated",
        fallback: false,
      };
    case "reference-sighting":
    case "fallback":
      return { time: observation.time, source: observation.kind, fallback: false };
    default:
      return assertNever(observation);
  }
};

const estimatePassing = (
  classification: Extract<Classification, { kind: "passing" }>,
  scheduledCrossingTime: EpochMs,
  observation: CrossingObservation,
  calibration: RouteCalibrationTable,
): CrossingEstimate => {
  switch (observation.kind) {
    case "timetable":
      return { time: observation.time, source: "timetable", fallback: false };
    case "at-crossing":
      return { time: observation.time, source: "at-crossing", fallback: false };
    case "reference-sighting":
      try {
        return {
          time: calibration.estimateCrossingTime(classification.calibrationKey, observation.time),
          source: "reference-sighting",
          fallback: false,
        };
      } catch (error) {
        if (!(error instanceof UncalibratedRoute)) throw error;
        return { time: observation.time + calibration.defaultOffsetMs, source: "fallback", fallback: true };
      }
    case "propagated":
      return {
        time: scheduledCrossingTime + secondsToMs(observation.delaySeconds),
        source: "propagated",
        fallback: false,
      };
    case "fallback":
      return { time: observation.time + calibration.defaultOffsetMs, source: "fallback", fallback: true };
    default:
      return assertNever(observation);
  }
};

export const estimateCrossingTime = (
  classification: Classification,
  scheduledCrossingTime: EpochMs,
  observation: CrossingObservation,
  calibration: RouteCalibrationTable,
): CrossingEstimate => {
  switch (classification.kind) {
    case "stopping":
      return estimateStopping(classification, scheduledCrossingTime, observation);
    case "passing":
      return estimatePassing(classification, scheduledCrossingTime, observation, calibration);
    default:
      return assertNever(classification);
  }
};
