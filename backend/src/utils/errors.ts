export type CrossingErrorCode = "timetable_unavailable" | "uncalibrated_route";

export class CrossingError extends Error {
  readonly code: CrossingErrorCode;

  constructor(code: CrossingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The day's snapshot could not be fetched or parsed; the previous table stays in service. */
export class TimetableUnavailable extends CrossingError {
  readonly day: string;

  constructor(day: string, reason: string, options?: { cause?: unknown }) {
    super("timetable_unavailable", `Timetable for ${day} unavailable: ${reason}`, options);
    this.day = day;
  }
}

export class UncalibratedRoute extends CrossingError {
  readonly routePattern: string;

  constructor(routePattern: string) {
    super("uncalibrated_route", `No calibration for route pattern "${routePattern}"`);
    this.routePattern = routePattern;
  }
}

export const safeErrorMessage = (error: unknown) => {
  if (error instanceof Error) return error.message;
  return JSON.stringify(error);
};
