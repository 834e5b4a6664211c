const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export interface ClockTime {
  hours: number;
  minutes: number;
  seconds: number;
}

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string) => {
  const cached = formatterCache.get(timeZone);
  if (cached) return cached;
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  });
  formatterCache.set(timeZone, formatter);
  return formatter;
};

interface LocalParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const toLocalParts = (epochMs: number, timeZone: string): LocalParts => {
  const parts = getFormatter(timeZone).formatToParts(new Date(epochMs));
  const read = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((part) => part.type === type)?.value ?? 0);
  return {
    year: read("year"),
    month: read("month"),
    day: read("day"),
    hour: read("hour"),
    minute: read("minute"),
    second: read("second"),
  };
};

const pad = (value: number) => String(value).padStart(2, "0");

/** Milliseconds to add to UTC to get wall-clock time in `timeZone` at that instant. */
export const timeZoneOffsetMs = (epochMs: number, timeZone: string): number => {
  const local = toLocalParts(epochMs, timeZone);
  const asUtc = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second);
  const truncated = Math.floor(epochMs / 1000) * 1000;
  return asUtc - truncated;
};

export const parseClockTime = (value: string | null | undefined): ClockTime | null => {
  if (!value) return null;
  const match = CLOCK_PATTERN.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] ? Number(match[3]) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return { hours, minutes, seconds };
};

export const isOperatingDay = (value: string): boolean => {
  const match = DAY_PATTERN.exec(value);
  if (!match) return false;
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return date.toISOString().startsWith(value);
};

export const addDays = (day: string, count: number): string => {
  const match = DAY_PATTERN.exec(day);
  if (!match) throw new Error(`Invalid operating day "${day}"`);
  const shifted = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])) + count * DAY_MS;
  return new Date(shifted).toISOString().slice(0, 10);
};

/** Wall-clock `clock` on `day` in `timeZone`, as epoch milliseconds. */
export const zonedTimeToEpoch = (day: string, clock: ClockTime, timeZone: string): number => {
  const match = DAY_PATTERN.exec(day);
  if (!match) throw new Error(`Invalid operating day "${day}"`);
  const wallAsUtc = Date.UTC(
    Number(match[1]),
    Number(match[2]) - 1,
    Number(match[3]),
    clock.hours,
    clock.minutes,
    clock.seconds,
  );
  const firstGuess = wallAsUtc - timeZoneOffsetMs(wallAsUtc, timeZone);
  const secondOffset = timeZoneOffsetMs(firstGuess, timeZone);
  return wallAsUtc - secondOffset;
};

export const localDate = (epochMs: number, timeZone: string): string => {
  const local = toLocalParts(epochMs, timeZone);
  return `${local.year}-${pad(local.month)}-${pad(local.day)}`;
};

/**
 * The railway day `epochMs` belongs to. Times before `dayStartHour` (local)
 * still count towards the previous calendar day.
 */
export const operatingDay = (epochMs: number, timeZone: string, dayStartHour = 0): string => {
  const local = toLocalParts(epochMs, timeZone);
  const today = `${local.year}-${pad(local.month)}-${pad(local.day)}`;
  const localHours = local.hour + local.minute / 60;
  return localHours < dayStartHour ? addDays(today, -1) : today;
};

/** Resolves an `HH:MM[:SS]` report to the instant nearest `referenceMs`. */
export const resolveClockNear = (clock: ClockTime, referenceMs: number, timeZone: string): number => {
  const today = localDate(referenceMs, timeZone);
  const candidates = [-1, 0, 1].map((offset) => zonedTimeToEpoch(addDays(today, offset), clock, timeZone));
  return candidates.reduce((best, candidate) =>
    Math.abs(candidate - referenceMs) < Math.abs(best - referenceMs) ? candidate : best,
  );
};

/**
 * Resolves a timetable time on `day`, rolling past midnight when the journey
 * has gone backwards by more than six hours relative to its previous call.
 */
export const resolveScheduledTime = (
  clock: ClockTime,
  day: string,
  timeZone: string,
  previousMs: number | null,
): number => {
  const sameDay = zonedTimeToEpoch(day, clock, timeZone);
  if (previousMs !== null && sameDay < previousMs - 6 * HOUR_MS) {
    return zonedTimeToEpoch(addDays(day, 1), clock, timeZone);
  }
  return sameDay;
};

export const parseIsoTimestamp = (value: string | null | undefined): number | null => {
  if (!value) return null;
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : null;
};

export const toIso = (epochMs: number): string => new Date(epochMs).toISOString();

export const toIsoOrNull = (epochMs: number | null): string | null => (epochMs === null ? null : toIso(epochMs));

export const minutesToMs = (minutes: number) => minutes * MINUTE_MS;

export const secondsToMs = (seconds: number) => seconds * 1000;
