import { RouteCalibrationTable } from "../calibration/routeCalibration";
import { buildPredictionSettings, type PredictionSettings } from "../config";
import type { ServiceRecord } from "../models/domain";
import { buildServiceRecords } from "../timetable/timetableStore";
import { TelemetryRecorder, type TimetableSource } from "../timetable/timetableSource";

export const DAY = "2025-03-14";

/** Instant of a wall-clock time on the fixture day; fixtures run in UTC. */
export const at = (clock: string, day: string = DAY) => Date.parse(`${day}T${clock.length === 5 ? `${clock}:00` : clock}Z`);

export const makeSettings = (overrides: Partial<PredictionSettings> = {}): PredictionSettings => ({
  ...buildPredictionSettings({ CROSSING_TIMEZONE: "UTC" }),
  ...overrides,
});

export const makeCalibration = () =>
  RouteCalibrationTable.fromJson({
    defaultOffsetSeconds: 300,
    uncalibratedPattern: "unclassified",
    routes: [
      {
        route: "stansted",
        label: "Stansted Express",
        endpoints: ["STANAIR"],
        viaAny: ["CHESHNT", "BROXBRN"],
        directions: {
          down: { referenceLocation: "CHESHNT", runningTimeSeconds: 300, speedClass: "express" },
          up: { referenceLocation: "BSHPSFD", runningTimeSeconds: 540, speedClass: "express" },
        },
      },
      {
        route: "stratford",
        label: "Stratford local",
        origins: ["STFD"],
        destinations: ["BSHPSFD"],
        direction: "down",
        directions: {
          down: { referenceLocation: "CHESHNT", runningTimeSeconds: 420, speedClass: "stopping", clearSeconds: 40 },
        },
      },
      {
        route: "cambridge",
        label: "Cambridge service",
        endpoints: ["CAMBDGE"],
        viaAll: ["BSHPSFD"],
        directions: {
          down: { referenceLocation: "LIVST", runningTimeSeconds: 1380, speedClass: "express" },
          up: { referenceLocation: "BSHPSFD", runningTimeSeconds: 600, speedClass: "express" },
        },
      },
    ],
  });

export const STOPPER = "202503140000001";
export const EXPRESS = "202503140000002";
export const UP_EXPRESS = "202503140000003";
export const FREIGHT = "202503140000004";

// Calls at Roydon for passengers: stopping, Cambridge pattern.
export const stopperJourney = {
  rid: STOPPER,
  uid: "C10001",
  trainId: "2C10",
  toc: "LE",
  ssd: DAY,
  locations: [
    { tpl: "LIVST", ptd: "09:28" },
    { tpl: "CHESHNT", pta: "09:52", ptd: "09:53" },
    { tpl: "ROYDON", pta: "10:02", ptd: "10:03", plat: "1" },
    { tpl: "BSHPSFD", pta: "10:20", ptd: "10:21" },
    { tpl: "CAMBDGE", pta: "10:58" },
  ],
};

// Runs through Roydon without calling: passing, calibrated from Cheshunt.
export const expressJourney = {
  rid: EXPRESS,
  uid: "C10002",
  trainId: "1S32",
  toc: "SX",
  ssd: DAY,
  locations: [
    { tpl: "LIVST", ptd: "09:55" },
    { tpl: "CHESHNT", wtp: "10:14" },
    { tpl: "ROYDON", wtp: "10:19" },
    { tpl: "HARLOWT", pta: "10:23", ptd: "10:24" },
    { tpl: "STANAIR", pta: "10:45" },
  ],
};

// No Roydon location at all; the crossing time comes from calibration at Bishops Stortford.
export const upExpressJourney = {
  rid: UP_EXPRESS,
  uid: "C10003",
  trainId: "1S41",
  toc: "SX",
  ssd: DAY,
  locations: [
    { tpl: "STANAIR", ptd: "10:30" },
    { tpl: "BSHPSFD", pta: "10:38", ptd: "10:39" },
    { tpl: "CHESHNT", wtp: "10:56" },
    { tpl: "LIVST", pta: "11:17" },
  ],
};

// Matches no route rule.
export const freightJourney = {
  rid: FREIGHT,
  uid: "C10004",
  trainId: "6L45",
  toc: "FL",
  ssd: DAY,
  locations: [
    { tpl: "HARLOWM", wtd: "11:02" },
    { tpl: "ROYDON", wtp: "11:09" },
    { tpl: "TEMPLEM", wta: "11:48" },
  ],
};

export const fixtureSnapshot = (day: string = DAY) => ({
  date: day,
  journeys: [stopperJourney, expressJourney, upExpressJourney, freightJourney].map((journey) => ({
    ...journey,
    ssd: day,
  })),
});

export const buildFixtureRecords = (settings: PredictionSettings = makeSettings()) =>
  buildServiceRecords(fixtureSnapshot(), DAY, settings, makeCalibration()).records;

export const requireRecord = (records: ReadonlyMap<string, ServiceRecord>, serviceId: string) => {
  const record = records.get(serviceId);
  if (!record) throw new Error(`fixture record ${serviceId} missing`);
  return record;
};

/** Serves snapshots from memory; flip `failing` to simulate an unreachable source. */
export class InMemoryTimetableSource implements TimetableSource {
  failing = false;
  requests: string[] = [];
  private readonly telemetry = new TelemetryRecorder();

  constructor(private readonly snapshots: Record<string, unknown>) {}

  describe() {
    return "memory";
  }

  getTelemetry() {
    return this.telemetry.snapshot();
  }

  async fetchSnapshot(day: string): Promise<unknown> {
    this.requests.push(day);
    const error = this.failing
      ? new Error("source offline")
      : day in this.snapshots
        ? null
        : new Error(`no snapshot for ${day}`);
    if (error) {
      this.telemetry.failure(error);
      throw error;
    }
    this.telemetry.success();
    return this.snapshots[day];
  }
}
