import { rawMovementMessageSchema, type RawMovementMessage } from "../models/darwin";
import type { ServiceId, TimeKind, Tiploc, TrainEventType, TrainUpdate } from "../models/domain";
import { safeErrorMessage } from "../utils/errors";
import { parseClockTime, parseIsoTimestamp, resolveClockNear } from "../utils/time";

export type IgnoreReason =
  | "malformed"
  | "unrecognized-event"
  | "unknown-service"
  | "irrelevant-location"
  | "missing-time";

export type NormalizeResult =
  | { kind: "update"; update: TrainUpdate }
  | { kind: "ignored"; reason: IgnoreReason; detail?: string };

export interface FeedNormalizerOptions {
  timezone: string;
  isKnownService: (serviceId: ServiceId) => boolean;
  /** Whether a report for this service at this location can move its crossing estimate. */
  isRelevantLocation: (serviceId: ServiceId, location: Tiploc) => boolean;
}

const MOVEMENT_EVENTS: Record<string, TrainEventType> = {
  ARR: "arrival",
  ARRIVAL: "arrival",
  DEP: "departure",
  DEPARTURE: "departure",
  PASS: "passing",
  PASSING: "passing",
};

const SERVICE_EVENTS: Record<string, TrainEventType> = {
  CAN: "cancellation",
  CANCEL: "cancellation",
  CANCELLATION: "cancellation",
  REINST: "reinstatement",
  REINSTATE: "reinstatement",
  REINSTATEMENT: "reinstatement",
};

/**
 * Maps the transport's `type`/`event` vocabulary onto the canonical event
 * set. Anything not listed comes back as null and is ignored, never guessed.
 */
export const mapRawEvent = (type: string, event: string | undefined): TrainEventType | null => {
  const normalizedType = type.trim().toUpperCase();
  if (normalizedType === "MOVEMENT") {
    const normalizedEvent = (event ?? "").trim().toUpperCase();
    return MOVEMENT_EVENTS[normalizedEvent] ?? null;
  }
  return SERVICE_EVENTS[normalizedType] ?? null;
};

const ignored = (reason: IgnoreReason, detail?: string): NormalizeResult =>
  detail === undefined ? { kind: "ignored", reason } : { kind: "ignored", reason, detail };

const resolveReportedTime = (value: string, sourceTimestamp: number, timezone: string): number | null => {
  if (value.includes("T")) return parseIsoTimestamp(value);
  const clock = parseClockTime(value);
  return clock ? resolveClockNear(clock, sourceTimestamp, timezone) : null;
};

const normalizeMessage = (message: RawMovementMessage, options: FeedNormalizerOptions): NormalizeResult => {
  const eventType = mapRawEvent(message.type, message.event);
  if (!eventType) return ignored("unrecognized-event", `${message.type}/${message.event ?? "-"}`);

  const sourceTimestamp = parseIsoTimestamp(message.ts);
  if (sourceTimestamp === null) return ignored("malformed", "invalid ts");

  if (!options.isKnownService(message.rid)) return ignored("unknown-service", message.rid);

  const location = message.tpl ? message.tpl.toUpperCase() : null;
  if (location !== null && !options.isRelevantLocation(message.rid, location)) {
    return ignored("irrelevant-location", location);
  }

  if (eventType === "cancellation" || eventType === "reinstatement") {
    return {
      kind: "update",
      update: { serviceId: message.rid, location, eventType, reportedTime: null, timeKind: "actual", sourceTimestamp },
    };
  }

  if (location === null) return ignored("malformed", "movement without location");
  const rawTime = message.at || message.et;
  if (!rawTime) return ignored("missing-time");
  const reportedTime = resolveReportedTime(rawTime, sourceTimestamp, options.timezone);
  if (reportedTime === null) return ignored("malformed", `unparseable time ${rawTime}`);
  const timeKind: TimeKind = message.at ? "actual" : "estimated";

  return {
    kind: "update",
    update: { serviceId: message.rid, location, eventType, reportedTime, timeKind, sourceTimestamp },
  };
};

/** Never throws: a bad message becomes an ignored result and the stream moves on. */
export class FeedNormalizer {
  constructor(private readonly options: FeedNormalizerOptions) {}

  normalize(raw: unknown): NormalizeResult {
    const parsed = rawMovementMessageSchema.safeParse(raw);
    if (!parsed.success) {
      return ignored("malformed", parsed.error.issues[0]?.message);
    }
    try {
      return normalizeMessage(parsed.data, this.options);
    } catch (error) {
      return ignored("malformed", safeErrorMessage(error));
    }
  }
}
