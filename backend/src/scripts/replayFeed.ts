import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { parseArgs } from "node:util";
import { RouteCalibrationTable } from "../calibration/routeCalibration";
import { config } from "../config";
import { CrossingContext } from "../context/crossingContext";
import { FileTimetableSource } from "../timetable/timetableSource";
import { safeErrorMessage } from "../utils/errors";
import { setLogLevel } from "../utils/logger";
import { isOperatingDay, parseIsoTimestamp } from "../utils/time";

const SAMPLE_DAY = "2025-03-14";

const usage = `Usage: npm run replay -- [--day YYYY-MM-DD] [--timetable-dir DIR] [--feed FILE.jsonl] [--at ISO] [--horizon MIN]

Replays a recorded feed against a timetable snapshot and prints the status and
timeline the predictor would have served at --at (default: last message).`;

const readTimestamp = (message: unknown): number | null => {
  if (typeof message !== "object" || message === null || !("ts" in message)) return null;
  return typeof message.ts === "string" ? parseIsoTimestamp(message.ts) : null;
};

const main = async () => {
  const { values } = parseArgs({
    options: {
      day: { type: "string", default: SAMPLE_DAY },
      "timetable-dir": { type: "string", default: config.timetableDir },
      feed: { type: "string" },
      at: { type: "string" },
      horizon: { type: "string" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", default: false },
    },
  });

  if (values.help) {
    console.log(usage);
    return;
  }
  const day = values.day ?? SAMPLE_DAY;
  if (!isOperatingDay(day)) throw new Error(`Invalid --day "${day}"`);
  setLogLevel(values.verbose ? "debug" : "warn");

  const timetableDir = values["timetable-dir"] ?? config.timetableDir;
  const feedPath = values.feed ?? path.join(timetableDir, `feed-${day}.jsonl`);
  let now = parseIsoTimestamp(`${day}T00:00:00Z`) ?? Date.now();

  const context = new CrossingContext({
    crossingName: config.crossingName,
    settings: config.prediction,
    calibration: RouteCalibrationTable.fromFile(config.calibrationPath),
    timetableSource: new FileTimetableSource(timetableDir),
    feedQueueCapacity: config.feedQueueCapacity,
    feedStaleAfterMs: config.feedStaleAfterMs,
    autoDrain: false,
    clock: () => now,
  });
  const loaded = await context.loadDay(day, now);
  context.setFeedConnected(true);

  const lines = readline.createInterface({ input: fs.createReadStream(feedPath, "utf-8"), crlfDelay: Infinity });
  let lineNumber = 0;
  let skipped = 0;
  for await (const line of lines) {
    lineNumber += 1;
    if (!line.trim()) continue;
    let message: unknown;
    try {
      message = JSON.parse(line) as unknown;
    } catch (error) {
      skipped += 1;
      console.warn(`line ${lineNumber}: ${safeErrorMessage(error)}`);
      continue;
    }
    now = readTimestamp(message) ?? now;
    context.ingest(message, now);
    context.ingestor.drain();
  }

  if (values.at) {
    const at = parseIsoTimestamp(values.at);
    if (at === null) throw new Error(`Invalid --at "${values.at}"`);
    now = at;
  }
  const horizon = values.horizon ? Number(values.horizon) : config.prediction.horizonMinutes;

  context.recompute(now);
  const output = {
    day,
    services: loaded.services,
    seeded: loaded.seeded,
    feed: { path: feedPath, lines: lineNumber, unparseable: skipped, ...context.ingestor.stats() },
    status: context.currentStatus(now),
    timeline: context.timeline(now, horizon),
  };
  console.log(JSON.stringify(output, null, 2));
};

main().catch((error) => {
  console.error("Replay failed", safeErrorMessage(error));
  process.exitCode = 1;
});
