import type { ClosurePlan, EpochMs, ServiceId } from "../models/domain";
import { minutesToMs } from "../utils/time";

export const DEFAULT_TIMELINE_HORIZON_MINUTES = 90;

export interface TimelineEntry {
  type: "closure" | "opening";
  start: EpochMs;
  end: EpochMs;
  trains: ServiceId[];
  brief: boolean;
}

export interface Timeline {
  from: EpochMs;
  to: EpochMs;
  horizonMinutes: number;
  entries: TimelineEntry[];
}

/**
 * Lays the plan out over `[now, now + horizon]` as alternating, contiguous
 * closure and opening entries. Closures are clipped to the range; an opening
 * is brief only when the full gap it belongs to is.
 */
export const buildTimeline = (
  plan: ClosurePlan,
  now: EpochMs,
  horizonMinutes: number = DEFAULT_TIMELINE_HORIZON_MINUTES,
): Timeline => {
  const from = now;
  const to = now + minutesToMs(horizonMinutes);
  const entries: TimelineEntry[] = [];

  const pushOpening = (start: EpochMs, end: EpochMs) => {
    if (end <= start) return;
    const gap = plan.openings.find((opening) => opening.start <= start && opening.end >= end);
    entries.push({ type: "opening", start, end, trains: [], brief: gap?.brief ?? false });
  };

  let cursor = from;
  for (const window of plan.windows) {
    if (window.end <= from || window.start >= to) continue;
    const start = Math.max(window.start, from);
    const end = Math.min(window.end, to);
    pushOpening(cursor, start);
    entries.push({ type: "closure", start, end, trains: [...window.serviceIds], brief: false });
    cursor = end;
  }
  pushOpening(cursor, to);

  return { from, to, horizonMinutes, entries };
};
