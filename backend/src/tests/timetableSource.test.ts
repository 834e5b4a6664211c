import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { FileTimetableSource, HttpTimetableSource } from "../timetable/timetableSource";

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

const createSource = (responses: Array<Response | Error>) => {
  const requested: string[] = [];
  const waits: number[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    requested.push(String(input));
    const next = responses.shift();
    if (!next) throw new Error("no more responses");
    if (next instanceof Error) throw next;
    return next;
  };
  const source = new HttpTimetableSource({
    baseUrl: "https://timetables.example.test/snapshots/",
    maxRetries: 2,
    retryBaseDelayMs: 100,
    retryMaxDelayMs: 1_000,
    fetchImpl,
    sleep: async (ms) => {
      waits.push(ms);
    },
  });
  return { source, requested, waits };
};

test("HttpTimetableSource fetches the day's snapshot", async () => {
  const { source, requested, waits } = createSource([jsonResponse({ date: "2025-03-14", journeys: [] })]);

  const snapshot = await source.fetchSnapshot("2025-03-14");

  assert.deepEqual(snapshot, { date: "2025-03-14", journeys: [] });
  assert.deepEqual(requested, ["https://timetables.example.test/snapshots/2025-03-14.json"]);
  assert.equal(waits.length, 0);
  assert.equal(source.getTelemetry().totalRequests, 1);
});

test("retryable statuses back off and retry", async () => {
  const { source, requested, waits } = createSource([
    jsonResponse({ error: "busy" }, 503),
    jsonResponse({ journeys: [] }),
  ]);

  assert.deepEqual(await source.fetchSnapshot("2025-03-14"), { journeys: [] });
  assert.equal(requested.length, 2);
  assert.equal(waits.length, 1);
  // First backoff is the base delay plus up to 30% jitter.
  assert.ok((waits[0] ?? 0) >= 100 && (waits[0] ?? 0) < 130);
  assert.equal(source.getTelemetry().retryableResponses, 1);
});

test("terminal statuses fail without retrying", async () => {
  const { source, requested } = createSource([jsonResponse({ error: "missing" }, 404)]);

  await assert.rejects(() => source.fetchSnapshot("2025-03-14"), /Timetable request failed \(404/);
  assert.equal(requested.length, 1);
  assert.equal(source.getTelemetry().failedRequests, 1);
});

test("network errors are retried until the budget runs out", async () => {
  const { source, requested, waits } = createSource([
    new Error("ECONNRESET"),
    new Error("ECONNRESET"),
    new Error("ECONNRESET"),
  ]);

  await assert.rejects(() => source.fetchSnapshot("2025-03-14"), /exhausted retries.*ECONNRESET/);
  assert.equal(requested.length, 3);
  assert.equal(waits.length, 2);
  assert.equal(source.getTelemetry().lastFailureMessage, "ECONNRESET");
});

test("FileTimetableSource reads <day>.json from its directory", async () => {
  const source = new FileTimetableSource(path.resolve(__dirname, "../../samples"));
  const snapshot = await source.fetchSnapshot("2025-03-14");

  assert.ok(typeof snapshot === "object" && snapshot !== null && "date" in snapshot);
  assert.equal(snapshot.date, "2025-03-14");
  await assert.rejects(() => source.fetchSnapshot("1999-01-01"));

  const telemetry = source.getTelemetry();
  assert.equal(telemetry.totalRequests, 1);
  assert.equal(telemetry.failedRequests, 1);
  assert.match(telemetry.lastFailureMessage ?? "", /ENOENT/);
});
