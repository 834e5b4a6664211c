import type { EstimateSource, IsoTimestamp, TrainKind, TrainStatus } from "./common";

export interface TrainSummary {
  serviceId: string;
  headcode: string;
  origin: string;
  destination: string;
  routePattern: string;
  kind: TrainKind;
  status: TrainStatus;
  scheduledCrossingTime: IsoTimestamp | null;
  estimatedCrossingTime: IsoTimestamp;
  delaySeconds: number;
  estimateSource: EstimateSource;
  calibrated: boolean;
  lastUpdate: IsoTimestamp | null;
}

export interface TrainsResponse {
  trains: TrainSummary[];
  count: number;
  timestamp: IsoTimestamp;
  timetableLoadedAt: IsoTimestamp | null;
  feedConnected: boolean;
}
