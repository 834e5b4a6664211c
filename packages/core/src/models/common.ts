export type IsoTimestamp = string;

export type TrainStatus = "scheduled" | "running-early" | "running-late" | "passed" | "cancelled";

export type TrainKind = "stopping" | "passing";

export type EstimateSource = "timetable" | "at-crossing" | "reference-sighting" | "propagated" | "fallback";

export interface CrossingErrorResponse {
  error: string;
  message?: string;
}
