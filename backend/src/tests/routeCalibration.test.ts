import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { RouteCalibrationTable } from "../calibration/routeCalibration";
import { inferRoutePattern } from "../timetable/routePatterns";
import { UncalibratedRoute } from "../utils/errors";
import { at, makeCalibration } from "./fixtures";

test("estimateCrossingTime adds the route's running time to the sighting", () => {
  const calibration = makeCalibration();
  assert.equal(calibration.estimateCrossingTime("stansted-down", at("10:14")), at("10:19"));
  assert.equal(calibration.estimateCrossingTime("stansted-up", at("10:39")), at("10:48"));
});

test("unknown route patterns raise UncalibratedRoute", () => {
  const calibration = makeCalibration();
  assert.throws(
    () => calibration.estimateCrossingTime("unclassified", at("11:00")),
    (error: unknown) => error instanceof UncalibratedRoute && error.routePattern === "unclassified",
  );
  assert.equal(calibration.has("stratford-up"), false);
  assert.equal(calibration.defaultOffsetMs, 300_000);
});

test("entries keep route-specific closure overrides", () => {
  const entry = makeCalibration().entryFor("stratford-down");
  assert.equal(entry?.referenceLocation, "CHESHNT");
  assert.equal(entry?.clearSeconds, 40);
  assert.equal(entry?.leadSeconds, undefined);
  assert.equal(entry?.speedClass, "stopping");
});

test("inferRoutePattern tags journeys by endpoints, direction and via points", () => {
  const calibration = makeCalibration();
  assert.equal(inferRoutePattern(["LIVST", "CHESHNT", "ROYDON", "STANAIR"], calibration), "stansted-down");
  assert.equal(inferRoutePattern(["STANAIR", "BSHPSFD", "CHESHNT", "LIVST"], calibration), "stansted-up");
  assert.equal(inferRoutePattern(["STFD", "CHESHNT", "BSHPSFD"], calibration), "stratford-down");
  assert.equal(inferRoutePattern(["LIVST", "BSHPSFD", "CAMBDGE"], calibration), "cambridge-down");
  // Required via point missing.
  assert.equal(inferRoutePattern(["LIVST", "ROYDON", "CAMBDGE"], calibration), "unclassified");
  assert.equal(inferRoutePattern(["STANAIR", "BSHPSFD", "LIVST"], calibration), "unclassified");
  assert.equal(inferRoutePattern([], calibration), "unclassified");
});

test("the shipped calibration file loads and covers both directions of each route", () => {
  const calibration = RouteCalibrationTable.fromFile(path.resolve(__dirname, "../../config/routeCalibration.json"));
  assert.deepEqual(calibration.patterns().sort(), [
    "cambridge-down",
    "cambridge-up",
    "ely-down",
    "ely-up",
    "stansted-down",
    "stansted-up",
    "stratford-down",
  ]);
  assert.equal(calibration.entryFor("stratford-down")?.clearSeconds, 40);
});

test("the longest lead covers route overrides and the default", () => {
  const calibration = RouteCalibrationTable.fromJson({
    defaultOffsetSeconds: 300,
    routes: [
      {
        route: "slow",
        label: "Slow approach",
        endpoints: ["BSHPSFD"],
        directions: {
          down: { referenceLocation: "CHESHNT", runningTimeSeconds: 600, speedClass: "freight", leadSeconds: 240 },
          up: { referenceLocation: "BSHPSFD", runningTimeSeconds: 600, speedClass: "freight" },
        },
      },
    ],
  });

  assert.equal(calibration.maxLeadSeconds(120), 240);
  assert.equal(calibration.maxLeadSeconds(300), 300);
  assert.equal(makeCalibration().maxLeadSeconds(120), 120);
});

test("malformed calibration is rejected at load", () => {
  assert.throws(() => RouteCalibrationTable.fromJson({ routes: [] }));
  assert.throws(() =>
    RouteCalibrationTable.fromJson({
      defaultOffsetSeconds: 300,
      routes: [{ route: "x", label: "X", directions: { down: { referenceLocation: "A", runningTimeSeconds: -5, speedClass: "express" } } }],
    }),
  );
});
