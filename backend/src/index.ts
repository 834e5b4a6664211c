import { createApp } from "./app";
import { createRedisPublisher } from "./cache/redisClient";
import { createSnapshotMirror } from "./cache/snapshotMirror";
import { RouteCalibrationTable } from "./calibration/routeCalibration";
import { config } from "./config";
import { CrossingContext } from "./context/crossingContext";
import { startCrossingJobs } from "./polling/crossingJobs";
import { FileTimetableSource, HttpTimetableSource, type TimetableSource } from "./timetable/timetableSource";
import { safeErrorMessage } from "./utils/errors";
import { logger } from "./utils/logger";

const createTimetableSource = (): TimetableSource =>
  config.timetableBaseUrl
    ? new HttpTimetableSource({
        baseUrl: config.timetableBaseUrl,
        maxRetries: config.timetableMaxRetries,
        retryBaseDelayMs: config.timetableRetryBaseDelayMs,
        retryMaxDelayMs: config.timetableRetryMaxDelayMs,
      })
    : new FileTimetableSource(config.timetableDir);

const main = async () => {
  const calibration = RouteCalibrationTable.fromFile(config.calibrationPath);
  logger.info("Route calibration loaded", { patterns: calibration.patterns() });

  const context = new CrossingContext({
    crossingName: config.crossingName,
    settings: config.prediction,
    calibration,
    timetableSource: createTimetableSource(),
    feedQueueCapacity: config.feedQueueCapacity,
    feedStaleAfterMs: config.feedStaleAfterMs,
    dayStartHour: config.timetableReloadHour,
  });
  await context.start();

  const redis = createRedisPublisher(config.redisUrl);
  const mirror = createSnapshotMirror(context, redis);
  const jobs = startCrossingJobs(context, { recomputeIntervalMs: config.recomputeIntervalMs, mirror });

  const app = createApp(context, {
    adminToken: config.adminToken,
    healthExtras: () => ({
      redis: { status: redis.status, error: redis.lastError },
    }),
  });

  const server = app.listen(config.port, () => {
    logger.info(`Crossing predictor listening on http://localhost:${config.port}`, {
      crossing: config.prediction.crossingTiploc,
    });
  });

  const shutdown = () => {
    logger.info("Shutting down server...");
    jobs.stop();
    context.stop();
    void redis.close();
    server.close(() => {
      process.exit(0);
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
};

main().catch((error) => {
  logger.error("Failed to start crossing predictor", { message: safeErrorMessage(error) });
  process.exit(1);
});
