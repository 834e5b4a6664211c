import type { IsoTimestamp } from "./common";
import type { ClosureWindowView } from "./closures";
import type { TrainSummary } from "./trains";

export interface StatusResponse {
  crossing: string;
  crossingOpen: boolean;
  nextClosure: ClosureWindowView | null;
  activeTrains: TrainSummary[];
  generatedAt: IsoTimestamp | null;
  timestamp: IsoTimestamp;
}

export interface QueueHealth {
  depth: number;
  capacity: number;
  dropped: number;
  processed: number;
}

export interface TimetableSourceHealth {
  source: string;
  totalRequests: number;
  retryableResponses: number;
  failedRequests: number;
  lastFailureAt: IsoTimestamp | null;
  lastFailureMessage: string | null;
  lastSuccessAt: IsoTimestamp | null;
}

export interface HealthResponse {
  status: "ok" | "degraded";
  feedConnected: boolean;
  timetableLoadedForDay: boolean;
  timetableDay: string | null;
  timetableDegraded: boolean;
  timetableError: string | null;
  timetableSource: TimetableSourceHealth;
  lastUpdateAgeMs: number | null;
  lastRecomputeAgeMs: number | null;
  trackedServices: number;
  queue: QueueHealth;
  timestamp: IsoTimestamp;
}
