import test from "node:test";
import assert from "node:assert/strict";
import type { ClosureInterval, TrainState } from "../models/domain";
import { mergeIntervals, predictClosures, type ClosureSettings } from "../services/closurePredictor";
import { at, makeCalibration } from "./fixtures";

const settings: ClosureSettings = {
  leadSeconds: 90,
  clearSeconds: 30,
  minSafeOpeningSeconds: 60,
  briefOpeningSeconds: 300,
  uncalibratedPaddingSeconds: 120,
};

const stoppingState = (serviceId: string, crossing: string, overrides: Partial<TrainState> = {}): TrainState => ({
  serviceId,
  headcode: "2C10",
  origin: "LIVST",
  destination: "CAMBDGE",
  routePattern: "cambridge-down",
  classification: { kind: "stopping", location: "ROYDON", dwellSeconds: 45 },
  scheduledCrossingTime: at(crossing),
  observation: { kind: "timetable", time: at(crossing) },
  currentEstimate: at(crossing),
  delaySeconds: 0,
  status: "scheduled",
  calibrated: true,
  lastUpdate: null,
  lastReceivedAt: null,
  ...overrides,
});

const interval = (serviceId: string, start: string, end: string): ClosureInterval => ({
  serviceId,
  headcode: "0000",
  crossingTime: at(start) + (at(end) - at(start)) / 2,
  start: at(start),
  end: at(end),
  fallback: false,
});

test("two close stopping trains merge into one barrier-down window", () => {
  const plan = predictClosures(
    [stoppingState("A", "10:00:00"), stoppingState("B", "10:01:30")],
    makeCalibration(),
    settings,
  );

  assert.equal(plan.windows.length, 1);
  const [window] = plan.windows;
  // [09:58:30, 10:00:30] and [10:00:00, 10:02:00] overlap.
  assert.equal(window?.start, at("09:58:30"));
  assert.equal(window?.end, at("10:02:00"));
  assert.deepEqual(window?.serviceIds, ["A", "B"]);
  assert.equal(window?.kind, "merged");
  assert.deepEqual(plan.openings, []);
});

test("a gap of exactly the minimum safe opening stays open", () => {
  const plan = predictClosures(
    [stoppingState("A", "10:00:00"), stoppingState("B", "10:03:00")],
    makeCalibration(),
    settings,
  );

  assert.deepEqual(
    plan.windows.map((window) => [window.start, window.end, window.kind]),
    [
      [at("09:58:30"), at("10:00:30"), "single"],
      [at("10:01:30"), at("10:03:30"), "single"],
    ],
  );
  assert.deepEqual(plan.openings, [{ start: at("10:00:30"), end: at("10:01:30"), durationSeconds: 60, brief: true }]);
});

test("a gap one second short of the threshold merges", () => {
  const plan = predictClosures(
    [stoppingState("A", "10:00:00"), stoppingState("B", "10:02:59")],
    makeCalibration(),
    settings,
  );
  assert.equal(plan.windows.length, 1);
  assert.equal(plan.windows[0]?.end, at("10:03:29"));
});

test("openings at or beyond the brief threshold are ordinary openings", () => {
  const plan = predictClosures(
    [stoppingState("A", "10:00:00"), stoppingState("B", "10:07:00")],
    makeCalibration(),
    settings,
  );
  assert.deepEqual(plan.openings, [{ start: at("10:00:30"), end: at("10:05:30"), durationSeconds: 300, brief: false }]);
});

test("merging is independent of grouping and input order", () => {
  const a = interval("A", "10:00:00", "10:02:00");
  const b = interval("B", "10:02:30", "10:04:00");
  const c = interval("C", "10:04:40", "10:06:00");

  const direct = mergeIntervals([a, b, c], 60);
  const shuffled = mergeIntervals([c, a, b], 60);
  const [ab] = mergeIntervals([a, b], 60);
  assert.ok(ab);
  const stepwise = mergeIntervals(
    [{ ...a, start: ab.start, end: ab.end }, c],
    60,
  );

  assert.deepEqual(shuffled, direct);
  assert.equal(direct.length, 1);
  assert.equal(direct[0]?.start, stepwise[0]?.start);
  assert.equal(direct[0]?.end, stepwise[0]?.end);
  assert.equal(direct[0]?.end, at("10:06:00"));
});

test("coinciding estimates list contributing services by id", () => {
  const plan = predictClosures(
    [stoppingState("B-2", "10:00:00"), stoppingState("A-1", "10:00:00")],
    makeCalibration(),
    settings,
  );
  assert.deepEqual(plan.windows[0]?.serviceIds, ["A-1", "B-2"]);
});

test("passed and cancelled trains do not close the crossing", () => {
  const plan = predictClosures(
    [
      stoppingState("A", "10:00:00", { status: "passed" }),
      stoppingState("B", "10:10:00", { status: "cancelled" }),
    ],
    makeCalibration(),
    settings,
  );
  assert.deepEqual(plan, { windows: [], openings: [] });
  assert.deepEqual(predictClosures([], makeCalibration(), settings), { windows: [], openings: [] });
});

test("a passing train on an uncalibrated route still closes, padded both sides", () => {
  const freight = stoppingState("F", "11:10:00", {
    headcode: "6L45",
    routePattern: "unclassified",
    classification: { kind: "passing", calibrationKey: "unclassified" },
    observation: { kind: "fallback", location: "HARLOWM", time: at("11:05:00") },
    calibrated: false,
  });

  const plan = predictClosures([freight], makeCalibration(), settings);

  assert.equal(plan.windows.length, 1);
  assert.deepEqual(plan.windows[0]?.trains, [
    {
      serviceId: "F",
      headcode: "6L45",
      crossingTime: at("11:10:00"),
      start: at("11:06:30"),
      end: at("11:12:30"),
      fallback: true,
    },
  ]);
});

test("route calibration overrides the default clearance", () => {
  const local = stoppingState("S", "10:00:00", { routePattern: "stratford-down" });
  const plan = predictClosures([local], makeCalibration(), settings);
  assert.equal(plan.windows[0]?.start, at("09:58:30"));
  assert.equal(plan.windows[0]?.end, at("10:00:40"));
});

test("recomputing an unchanged snapshot is byte-identical", () => {
  const states = [
    stoppingState("A", "10:00:00"),
    stoppingState("B", "10:01:30"),
    stoppingState("C", "10:20:00"),
    stoppingState("D", "10:20:00"),
  ];
  const first = JSON.stringify(predictClosures(states, makeCalibration(), settings));
  const second = JSON.stringify(predictClosures(states, makeCalibration(), settings));
  const reversed = JSON.stringify(predictClosures([...states].reverse(), makeCalibration(), settings));

  assert.equal(second, first);
  assert.equal(reversed, first);
});
