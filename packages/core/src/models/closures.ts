import type { IsoTimestamp } from "./common";

export interface ClosureTrain {
  serviceId: string;
  headcode: string;
  crossingTime: IsoTimestamp;
  fallback: boolean;
}

export interface ClosureWindowView {
  start: IsoTimestamp;
  end: IsoTimestamp;
  durationSeconds: number;
  kind: "single" | "merged";
  serviceIds: string[];
  trains: ClosureTrain[];
}

export type TimelineSegmentType = "closure" | "opening";

export interface TimelineSegment {
  type: TimelineSegmentType;
  start: IsoTimestamp;
  end: IsoTimestamp;
  durationSeconds: number;
  trains: string[];
  /** Only set on openings squeezed between two closures. */
  brief: boolean;
}

export interface TimelineResponse {
  generatedAt: IsoTimestamp;
  from: IsoTimestamp;
  to: IsoTimestamp;
  horizonMinutes: number;
  segments: TimelineSegment[];
}
