import fs from "node:fs/promises";
import path from "node:path";
import type { TimetableSourceHealth } from "@crossingwatch/core";
import { logger as rootLogger } from "../utils/logger";
import { safeErrorMessage } from "../utils/errors";

const logger = rootLogger.child("timetable-source");

export type TimetableFetchTelemetry = Omit<TimetableSourceHealth, "source">;

/** Where the day's timetable snapshot comes from; returns unvalidated JSON. */
export interface TimetableSource {
  describe(): string;
  fetchSnapshot(day: string): Promise<unknown>;
  getTelemetry(): TimetableFetchTelemetry;
}

export class TelemetryRecorder {
  private readonly telemetry = new TelemetryRecorder();

  success() {
    this.telemetry.totalRequests += 1;
    this.telemetry.lastSuccessAt = new Date().toISOString();
  }

  retry() {
    this.telemetry.retry();
  }

  failure(error: unknown) {
    this.telemetry.failedRequests += 1;
    this.telemetry.lastFailureAt = new Date().toISOString();
    this.telemetry.lastFailureMessage = safeErrorMessage(error);
  }

  snapshot(): TimetableFetchTelemetry {
    return { ...this.telemetry };
  }
}

export class FileTimetableSource implements TimetableSource {
  private readonly telemetry = new TelemetryRecorder();

  constructor(private readonly directory: string) {}

  describe() {
    return `file:${this.directory}`;
  }

  getTelemetry() {
    return this.telemetry.snapshot();
  }

  async fetchSnapshot(day: string): Promise<unknown> {
    const filePath = path.join(this.directory, `${day}.json`);
    try {
      const contents = await fs.readFile(filePath, "utf-8");
      const snapshot = JSON.parse(contents) as unknown;
      this.telemetry.success();
      return snapshot;
    } catch (error) {
      this.telemetry.failure(error);
      throw error;
    }
  }
}

const RETRYABLE_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export interface HttpTimetableSourceOptions {
  baseUrl: string;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

class TimetableHttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "TimetableHttpError";
  }
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class HttpTimetableSource implements TimetableSource {
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly telemetry = new TelemetryRecorder();

  constructor(options: HttpTimetableSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.maxRetries = options.maxRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs;
    this.retryMaxDelayMs = options.retryMaxDelayMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? delay;
  }

  describe() {
    return this.baseUrl;
  }

  getTelemetry() {
    return this.telemetry.snapshot();
  }

  async fetchSnapshot(day: string): Promise<unknown> {
    const url = `${this.baseUrl}/${day}.json`;
    const response = await this.fetchWithRetry(url);
    return (await response.json()) as unknown;
  }

  private computeBackoff(attempt: number) {
    const cappedAttempt = Math.min(attempt, 10);
    const delayMs = Math.min(this.retryMaxDelayMs, this.retryBaseDelayMs * 2 ** cappedAttempt);
    const jitter = Math.floor(Math.random() * 0.3 * delayMs);
    return delayMs + jitter;
  }

  private async fetchWithRetry(url: string) {
    let attempt = 0;
    let lastError: unknown;

    while (attempt <= this.maxRetries) {
      try {
        const response = await this.fetchImpl(url, { headers: { Accept: "application/json" } });
        if (response.ok) {
          this.telemetry.success();
          return response;
        }

        const body = await response.text().catch(() => "");
        if (!RETRYABLE_STATUSES.has(response.status) || attempt === this.maxRetries) {
          const terminalError = new TimetableHttpError(
            response.status,
            `Timetable request failed (${response.status} ${response.statusText}) for ${url}${body ? ` - ${body.slice(0, 180)}` : ""}`,
          );
          this.telemetry.failure(terminalError);
          throw terminalError;
        }

        this.telemetry.retry();
        lastError = new Error(`Retryable status ${response.status} for ${url}`);
        const waitMs = this.computeBackoff(attempt);
        logger.warn("Timetable request hit retryable status, backing off", {
          url,
          status: response.status,
          attempt,
          waitMs,
        });
        await this.sleep(waitMs);
      } catch (error) {
        if (error instanceof TimetableHttpError) {
          throw error;
        }
        this.telemetry.retry();
        lastError = error;
        if (attempt === this.maxRetries) {
          break;
        }
        const waitMs = this.computeBackoff(attempt);
        logger.warn("Timetable request failed, retrying", {
          url,
          attempt,
          waitMs,
          message: safeErrorMessage(error),
        });
        await this.sleep(waitMs);
      }
      attempt += 1;
    }

    this.telemetry.failure(lastError);
    throw new Error(`Timetable request exhausted retries for ${url}: ${safeErrorMessage(lastError)}`);
  }
}
