import type { SnapshotMirror } from "../cache/snapshotMirror";
import type { CrossingContext } from "../context/crossingContext";
import { safeErrorMessage } from "../utils/errors";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child("jobs");

export interface PollingJob {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  initialDelayMs?: number;
  /** Log completions at debug; high-frequency jobs would flood info. */
  quiet?: boolean;
  timer?: NodeJS.Timeout;
}

export interface CrossingJobOptions {
  recomputeIntervalMs: number;
  purgeIntervalMs?: number;
  dayCheckIntervalMs?: number;
  mirror?: SnapshotMirror;
}

export const createCrossingJobs = (context: CrossingContext, options: CrossingJobOptions): PollingJob[] => {
  const jobs: PollingJob[] = [
    {
      name: "recompute",
      intervalMs: options.recomputeIntervalMs,
      quiet: true,
      run: async () => {
        context.recompute();
        if (options.mirror) await options.mirror.publish();
      },
    },
    {
      name: "purge",
      intervalMs: options.purgeIntervalMs ?? 60_000,
      initialDelayMs: 30_000,
      quiet: true,
      run: async () => {
        context.purge();
      },
    },
    {
      // Reloads once the railway day rolls over, and keeps retrying while the
      // table for the current day is missing or degraded.
      name: "timetable-reload",
      intervalMs: options.dayCheckIntervalMs ?? 60_000,
      initialDelayMs: options.dayCheckIntervalMs ?? 60_000,
      run: async () => {
        const day = context.currentDay();
        if (context.store.loadedDay === day && !context.store.degraded) return;
        await context.loadDay(day);
        context.recompute();
      },
    },
  ];
  return jobs;
};

export const startJob = (job: PollingJob, isRunning: () => boolean) => {
  const scheduleNext = (delayMs: number) => {
    job.timer = setTimeout(async () => {
      const start = Date.now();
      try {
        await job.run();
        const meta = { job: job.name, durationMs: Date.now() - start };
        if (job.quiet) logger.debug("Job completed", meta);
        else logger.info("Job completed", meta);
      } catch (error) {
        logger.error("Job failed", { job: job.name, message: safeErrorMessage(error) });
      } finally {
        if (isRunning()) scheduleNext(job.intervalMs);
      }
    }, Math.max(0, delayMs));
  };

  scheduleNext(job.initialDelayMs ?? job.intervalMs);
};

export interface JobBundle {
  jobs: PollingJob[];
  stop: () => void;
}

export const startCrossingJobs = (context: CrossingContext, options: CrossingJobOptions): JobBundle => {
  let running = true;
  const jobs = createCrossingJobs(context, options);
  jobs.forEach((job) => startJob(job, () => running));
  return {
    jobs,
    stop: () => {
      running = false;
      jobs.forEach((job) => {
        if (job.timer) clearTimeout(job.timer);
      });
    },
  };
};
