import type { RequestInitWithSignal } from "./types";
import type { TimelineResponse } from "../models/closures";
import type { HealthResponse, StatusResponse } from "../models/status";
import type { TrainsResponse } from "../models/trains";

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

export const buildUrl = (baseUrl: string, path: string, query?: Record<string, string | number | undefined>) => {
  const url = new URL(`${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`);
  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value === undefined || value === null) return;
      url.searchParams.set(key, String(value));
    });
  }
  return url.toString();
};

const handleJson = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    throw new Error(`Crossing API request failed (${response.status})`);
  }
  return (await response.json()) as T;
};

export const fetchStatus = async (baseUrl: string, init?: RequestInitWithSignal): Promise<StatusResponse> => {
  const response = await fetch(buildUrl(baseUrl, "/api/status"), { ...init });
  return handleJson<StatusResponse>(response);
};

export const fetchTimeline = async (
  baseUrl: string,
  horizonMinutes?: number,
  init?: RequestInitWithSignal,
): Promise<TimelineResponse> => {
  const url = buildUrl(baseUrl, "/api/timeline", { horizon: horizonMinutes });
  const response = await fetch(url, { ...init });
  return handleJson<TimelineResponse>(response);
};

export const fetchTrains = async (baseUrl: string, init?: RequestInitWithSignal): Promise<TrainsResponse> => {
  const response = await fetch(buildUrl(baseUrl, "/api/trains"), { ...init });
  return handleJson<TrainsResponse>(response);
};

// Health answers 503 while degraded but still carries a body worth reading.
export const fetchHealth = async (baseUrl: string, init?: RequestInitWithSignal): Promise<HealthResponse> => {
  const response = await fetch(buildUrl(baseUrl, "/api/health"), { ...init });
  if (response.status === 503) {
    return (await response.json()) as HealthResponse;
  }
  return handleJson<HealthResponse>(response);
};
