import type { RouteCalibrationTable } from "../calibration/routeCalibration";
import type { PredictionSettings } from "../config";
import {
  timetableJourneySchema,
  timetableSnapshotSchema,
  type TimetableJourney,
  type TimetableLocation,
  type TimetableSnapshot,
} from "../models/darwin";
import type { CallType, ScheduledCall, ServiceId, ServiceRecord } from "../models/domain";
import { TimetableUnavailable, safeErrorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";
import { parseClockTime, resolveScheduledTime } from "../utils/time";
import { inferRoutePattern } from "./routePatterns";
import type { TimetableSource } from "./timetableSource";

const logger = rootLogger.child("timetable");

export type TimetableSettings = Pick<PredictionSettings, "crossingTiploc" | "adjacentTiplocs" | "timezone">;

export interface TimetableBuildSummary {
  journeys: number;
  invalid: number;
  otherDays: number;
  duplicates: number;
  irrelevant: number;
  relevant: number;
}

export interface TimetableBuildResult {
  records: Map<ServiceId, ServiceRecord>;
  summary: TimetableBuildSummary;
}

// Public times mean the train calls for passengers; anything else only has
// working times and runs through.
const readCallTiming = (location: TimetableLocation): { callType: CallType; time: string } | null => {
  if (location.pta || location.ptd) {
    const time = location.ptd || location.pta;
    return time ? { callType: "stop", time } : null;
  }
  const time = location.wtp || location.wtd || location.wta;
  return time ? { callType: "pass", time } : null;
};

const buildCalls = (journey: TimetableJourney, day: string, timezone: string): ScheduledCall[] => {
  const calls: ScheduledCall[] = [];
  let previousMs: number | null = null;
  for (const location of journey.locations) {
    const timing = readCallTiming(location);
    const clock = parseClockTime(timing?.time);
    if (!timing || !clock) continue;
    const scheduledTime = resolveScheduledTime(clock, day, timezone, previousMs);
    previousMs = scheduledTime;
    const call: ScheduledCall = {
      location: location.tpl.toUpperCase(),
      scheduledTime,
      callType: timing.callType,
    };
    if (location.plat) call.platform = location.plat;
    calls.push(Object.freeze(call));
  }
  return calls;
};

const isRelevantJourney = (
  calls: readonly ScheduledCall[],
  routePattern: string,
  crossingLocations: ReadonlySet<string>,
  calibration: RouteCalibrationTable,
) => {
  if (calls.some((call) => crossingLocations.has(call.location))) return true;
  const entry = calibration.entryFor(routePattern);
  if (!entry) return false;
  return calls.some((call) => call.location === entry.referenceLocation);
};

export const crossingLocationSet = (settings: TimetableSettings): ReadonlySet<string> =>
  new Set([settings.crossingTiploc, ...settings.adjacentTiplocs]);

/**
 * Turns a validated snapshot into the day's service records: only journeys
 * starting on `day` that either call at the crossing or run a calibrated
 * pattern through it.
 */
export const buildServiceRecords = (
  snapshot: TimetableSnapshot,
  day: string,
  settings: TimetableSettings,
  calibration: RouteCalibrationTable,
): TimetableBuildResult => {
  const records = new Map<ServiceId, ServiceRecord>();
  const crossingLocations = crossingLocationSet(settings);
  const summary: TimetableBuildSummary = {
    journeys: snapshot.journeys.length,
    invalid: 0,
    otherDays: 0,
    duplicates: 0,
    irrelevant: 0,
    relevant: 0,
  };

  for (const candidate of snapshot.journeys) {
    const parsed = timetableJourneySchema.safeParse(candidate);
    if (!parsed.success) {
      summary.invalid += 1;
      continue;
    }
    const journey = parsed.data;
    if (journey.ssd !== day) {
      summary.otherDays += 1;
      continue;
    }
    if (records.has(journey.rid)) {
      summary.duplicates += 1;
      continue;
    }

    const tiplocs = journey.locations.map((location) => location.tpl.toUpperCase());
    const calls = buildCalls(journey, day, settings.timezone);
    const routePattern = inferRoutePattern(tiplocs, calibration);
    if (!isRelevantJourney(calls, routePattern, crossingLocations, calibration)) {
      summary.irrelevant += 1;
      continue;
    }

    records.set(
      journey.rid,
      Object.freeze({
        serviceId: journey.rid,
        uid: journey.uid,
        headcode: journey.trainId,
        operator: journey.toc,
        startDate: journey.ssd,
        origin: tiplocs[0] ?? "",
        destination: tiplocs[tiplocs.length - 1] ?? "",
        calls: Object.freeze(calls),
        routePattern,
      }),
    );
    summary.relevant += 1;
  }

  return { records, summary };
};

/** Holds the day's service records. Replaced wholesale on reload, never edited. */
export class TimetableStore {
  private table: ReadonlyMap<ServiceId, ServiceRecord> = new Map();
  private day: string | null = null;
  private loadedAtMs: number | null = null;
  private degradedFlag = false;
  private lastErrorMessage: string | null = null;

  constructor(
    private readonly settings: TimetableSettings,
    private readonly calibration: RouteCalibrationTable,
  ) {}

  async load(day: string, source: TimetableSource, now: number = Date.now()) {
    let raw: unknown;
    try {
      raw = await source.fetchSnapshot(day);
    } catch (error) {
      throw this.fail(new TimetableUnavailable(day, safeErrorMessage(error), { cause: error }));
    }

    const parsed = timetableSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.fail(new TimetableUnavailable(day, `snapshot failed validation: ${parsed.error.message}`));
    }
    if (parsed.data.date && parsed.data.date !== day) {
      throw this.fail(new TimetableUnavailable(day, `snapshot is for ${parsed.data.date}`));
    }

    const { records, summary } = buildServiceRecords(parsed.data, day, this.settings, this.calibration);
    this.table = records;
    this.day = day;
    this.loadedAtMs = now;
    this.degradedFlag = false;
    this.lastErrorMessage = null;
    logger.info("Timetable loaded", { day, source: source.describe(), ...summary });
    return this.table;
  }

  private fail(error: TimetableUnavailable) {
    this.degradedFlag = true;
    this.lastErrorMessage = error.message;
    logger.warn("Timetable load failed; keeping previous table", {
      day: error.day,
      retainedDay: this.day,
      message: error.message,
    });
    return error;
  }

  lookup(serviceId: ServiceId): ServiceRecord | undefined {
    return this.table.get(serviceId);
  }

  services(): ServiceRecord[] {
    return Array.from(this.table.values());
  }

  get size() {
    return this.table.size;
  }

  get loadedDay() {
    return this.day;
  }

  get loadedAt() {
    return this.loadedAtMs;
  }

  get degraded() {
    return this.degradedFlag;
  }

  get lastError() {
    return this.lastErrorMessage;
  }
}
