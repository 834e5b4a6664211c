import fs from "node:fs";
import { z } from "zod";
import { UncalibratedRoute } from "../utils/errors";
import { secondsToMs } from "../utils/time";
import type { EpochMs, Tiploc } from "../models/domain";

const tiplocList = z.array(z.string().trim().min(1)).default([]);

const directionCalibrationSchema = z.object({
  referenceLocation: z.string().trim().min(1),
  runningTimeSeconds: z.number().nonnegative(),
  speedClass: z.enum(["express", "stopping", "freight"]),
  leadSeconds: z.number().nonnegative().optional(),
  clearSeconds: z.number().nonnegative().optional(),
});

const routeRuleSchema = z.object({
  route: z.string().trim().min(1),
  label: z.string(),
  endpoints: tiplocList,
  origins: tiplocList,
  destinations: tiplocList,
  direction: z.enum(["up", "down"]).optional(),
  viaAny: tiplocList,
  viaAll: tiplocList,
  directions: z.object({
    up: directionCalibrationSchema.optional(),
    down: directionCalibrationSchema.optional(),
  }),
});

export const calibrationFileSchema = z.object({
  defaultOffsetSeconds: z.number().nonnegative(),
  uncalibratedPattern: z.string().default("unclassified"),
  routes: z.array(routeRuleSchema),
});

export type CalibrationFile = z.infer<typeof calibrationFileSchema>;
export type RouteRule = z.infer<typeof routeRuleSchema>;
export type RouteDirection = "up" | "down";
export type SpeedClass = z.infer<typeof directionCalibrationSchema>["speedClass"];

export interface CalibrationEntry {
  pattern: string;
  route: string;
  label: string;
  direction: RouteDirection;
  referenceLocation: Tiploc;
  runningTimeSeconds: number;
  speedClass: SpeedClass;
  leadSeconds?: number;
  clearSeconds?: number;
}

export const buildPatternKey = (route: string, direction: RouteDirection) => `${route}-${direction}`;

/**
 * Maps a route pattern to the reference point a passing train is sighted at
 * and the running time from there to the crossing.
 */
export class RouteCalibrationTable {
  private readonly entries = new Map<string, CalibrationEntry>();
  readonly rules: readonly RouteRule[];
  readonly defaultOffsetSeconds: number;
  readonly uncalibratedPattern: string;

  constructor(file: CalibrationFile) {
    this.rules = file.routes;
    this.defaultOffsetSeconds = file.defaultOffsetSeconds;
    this.uncalibratedPattern = file.uncalibratedPattern;

    file.routes.forEach((rule) => {
      (["up", "down"] as const).forEach((direction) => {
        const calibration = rule.directions[direction];
        if (!calibration) return;
        const pattern = buildPatternKey(rule.route, direction);
        const entry: CalibrationEntry = {
          pattern,
          route: rule.route,
          label: rule.label,
          direction,
          referenceLocation: calibration.referenceLocation.toUpperCase(),
          runningTimeSeconds: calibration.runningTimeSeconds,
          speedClass: calibration.speedClass,
        };
        if (calibration.leadSeconds !== undefined) entry.leadSeconds = calibration.leadSeconds;
        if (calibration.clearSeconds !== undefined) entry.clearSeconds = calibration.clearSeconds;
        this.entries.set(pattern, entry);
      });
    });
  }

  static fromJson(value: unknown) {
    return new RouteCalibrationTable(calibrationFileSchema.parse(value));
  }

  static fromFile(filePath: string) {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    return RouteCalibrationTable.fromJson(raw);
  }

  entryFor(pattern: string): CalibrationEntry | undefined {
    return this.entries.get(pattern);
  }

  has(pattern: string) {
    return this.entries.has(pattern);
  }

  patterns() {
    return Array.from(this.entries.keys());
  }

  /** Longest lead any pattern can apply, given the default for patterns without one. */
  maxLeadSeconds(defaultLeadSeconds: number) {
    return Array.from(this.entries.values()).reduce(
      (longest, entry) => Math.max(longest, entry.leadSeconds ?? defaultLeadSeconds),
      defaultLeadSeconds,
    );
  }

  estimateCrossingTime(pattern: string, referenceSightingTime: EpochMs): EpochMs {
    const entry = this.entries.get(pattern);
    if (!entry) {
      throw new UncalibratedRoute(pattern);
    }
    return referenceSightingTime + secondsToMs(entry.runningTimeSeconds);
  }

  get defaultOffsetMs() {
    return secondsToMs(this.defaultOffsetSeconds);
  }
}
