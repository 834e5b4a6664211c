import type { EstimateSource, TrainStatus } from "@crossingwatch/core";

export type EpochMs = number;
export type ServiceId = string;
export type Tiploc = string;

export type CallType = "stop" | "pass";

export interface ScheduledCall {
  location: Tiploc;
  scheduledTime: EpochMs;
  callType: CallType;
  platform?: string;
}

export interface ServiceRecord {
  serviceId: ServiceId;
  uid: string;
  headcode: string;
  operator: string;
  startDate: string;
  origin: Tiploc;
  destination: Tiploc;
  calls: readonly ScheduledCall[];
  routePattern: string;
}

export type TrainEventType = "departure" | "arrival" | "passing" | "cancellation" | "reinstatement";

export type TimeKind = "estimated" | "actual";

export interface TrainUpdate {
  serviceId: ServiceId;
  location: Tiploc | null;
  eventType: TrainEventType;
  reportedTime: EpochMs | null;
  timeKind: TimeKind;
  sourceTimestamp: EpochMs;
}

export type Classification =
  | { kind: "stopping"; location: Tiploc; dwellSeconds: number }
  | { kind: "passing"; calibrationKey: string };

export type CrossingObservation =
  | { kind: "timetable"; time: EpochMs }
  | { kind: "at-crossing"; event: "arrival" | "departure" | "passing"; time: EpochMs }
  | { kind: "reference-sighting"; location: Tiploc; time: EpochMs }
  | { kind: "propagated"; location: Tiploc; delaySeconds: number }
  | { kind: "fallback"; location: Tiploc; time: EpochMs };

export type { EstimateSource, TrainStatus };

export interface TrainState {
  serviceId: ServiceId;
  headcode: string;
  origin: Tiploc;
  destination: Tiploc;
  routePattern: string;
  classification: Classification;
  scheduledCrossingTime: EpochMs;
  observation: CrossingObservation;
  currentEstimate: EpochMs;
  delaySeconds: number;
  status: TrainStatus;
  calibrated: boolean;
  /** Source timestamp of the newest update applied. */
  lastUpdate: EpochMs | null;
  /** Wall-clock time that update reached the tracker. */
  lastReceivedAt: EpochMs | null;
}

export interface ClosureInterval {
  serviceId: ServiceId;
  headcode: string;
  crossingTime: EpochMs;
  start: EpochMs;
  end: EpochMs;
  fallback: boolean;
}

export type ClosureKind = "single" | "merged";

export interface ClosureWindow {
  start: EpochMs;
  end: EpochMs;
  serviceIds: ServiceId[];
  trains: ClosureInterval[];
  kind: ClosureKind;
}

export interface OpeningGap {
  start: EpochMs;
  end: EpochMs;
  durationSeconds: number;
  brief: boolean;
}

export interface ClosurePlan {
  windows: ClosureWindow[];
  openings: OpeningGap[];
}

export interface PublishedSnapshot {
  generatedAt: EpochMs;
  operatingDay: string;
  trains: readonly TrainState[];
  plan: ClosurePlan;
}
