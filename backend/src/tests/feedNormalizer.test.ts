import test from "node:test";
import assert from "node:assert/strict";
import { FeedNormalizer, mapRawEvent, type FeedNormalizerOptions } from "../feed/feedNormalizer";
import { EXPRESS, at } from "./fixtures";

const createNormalizer = (overrides: Partial<FeedNormalizerOptions> = {}) =>
  new FeedNormalizer({
    timezone: "UTC",
    isKnownService: (serviceId) => serviceId === EXPRESS,
    isRelevantLocation: (_serviceId, location) => ["CHESHNT", "ROYDON", "HARLOWT"].includes(location),
    ...overrides,
  });

const movement = (fields: Record<string, string>) => ({
  type: "movement",
  rid: EXPRESS,
  tpl: "CHESHNT",
  event: "PASS",
  ts: "2025-03-14T10:15:05Z",
  ...fields,
});

test("mapRawEvent is total over the feed vocabulary", () => {
  assert.equal(mapRawEvent("movement", "ARR"), "arrival");
  assert.equal(mapRawEvent("movement", "departure"), "departure");
  assert.equal(mapRawEvent("MOVEMENT", " pass "), "passing");
  assert.equal(mapRawEvent("CAN", undefined), "cancellation");
  assert.equal(mapRawEvent("reinstatement", undefined), "reinstatement");
  assert.equal(mapRawEvent("movement", "TERMINATE"), null);
  assert.equal(mapRawEvent("movement", undefined), null);
  assert.equal(mapRawEvent("heartbeat", "PASS"), null);
});

test("an actual movement becomes a canonical update", () => {
  const result = createNormalizer().normalize(movement({ tpl: "cheshnt", at: "10:15:00" }));

  assert.deepEqual(result, {
    kind: "update",
    update: {
      serviceId: EXPRESS,
      location: "CHESHNT",
      eventType: "passing",
      reportedTime: at("10:15:00"),
      timeKind: "actual",
      sourceTimestamp: at("10:15:05"),
    },
  });
});

test("estimated times are flagged and actual times win when both are present", () => {
  const normalizer = createNormalizer();

  const estimated = normalizer.normalize(movement({ et: "10:16" }));
  assert.equal(estimated.kind, "update");
  if (estimated.kind === "update") {
    assert.equal(estimated.update.timeKind, "estimated");
    assert.equal(estimated.update.reportedTime, at("10:16"));
  }

  const both = normalizer.normalize(movement({ et: "10:16", at: "10:15:30" }));
  assert.equal(both.kind === "update" ? both.update.reportedTime : null, at("10:15:30"));

  const iso = normalizer.normalize(movement({ at: "2025-03-14T10:15:10Z" }));
  assert.equal(iso.kind === "update" ? iso.update.reportedTime : null, at("10:15:10"));
});

test("a blank actual time falls through to the estimate", () => {
  const result = createNormalizer().normalize(movement({ at: " ", et: "10:16" }));

  assert.equal(result.kind, "update");
  if (result.kind === "update") {
    assert.equal(result.update.timeKind, "estimated");
    assert.equal(result.update.reportedTime, at("10:16"));
  }
});

test("clock times resolve to the date nearest the message timestamp", () => {
  const result = createNormalizer().normalize(movement({ at: "23:59:30", ts: "2025-03-15T00:00:10Z" }));
  assert.equal(result.kind === "update" ? result.update.reportedTime : null, Date.parse("2025-03-14T23:59:30Z"));
});

test("service-level events carry no reported time", () => {
  const result = createNormalizer().normalize({ type: "CAN", rid: EXPRESS, ts: "2025-03-14T10:00:00Z" });

  assert.deepEqual(result, {
    kind: "update",
    update: {
      serviceId: EXPRESS,
      location: null,
      eventType: "cancellation",
      reportedTime: null,
      timeKind: "actual",
      sourceTimestamp: at("10:00"),
    },
  });
});

test("bad and irrelevant messages are ignored with a reason", () => {
  const normalizer = createNormalizer();
  const reasonOf = (raw: unknown) => {
    const result = normalizer.normalize(raw);
    return result.kind === "ignored" ? result.reason : result.kind;
  };

  assert.equal(reasonOf("not json at all"), "malformed");
  assert.equal(reasonOf({ type: "movement", tpl: "ROYDON" }), "malformed");
  assert.equal(reasonOf(movement({ ts: "yesterday", at: "10:15" })), "malformed");
  assert.equal(reasonOf(movement({ at: "quarter past" })), "malformed");
  assert.equal(reasonOf(movement({ event: "TERMINATE", at: "10:15" })), "unrecognized-event");
  assert.equal(reasonOf(movement({ rid: "202503149999999", at: "10:15" })), "unknown-service");
  assert.equal(reasonOf(movement({ tpl: "ENFLDTN", at: "10:15" })), "irrelevant-location");
  assert.equal(reasonOf(movement({})), "missing-time");
  assert.equal(reasonOf({ type: "movement", rid: EXPRESS, event: "ARR", at: "10:15", ts: "2025-03-14T10:15:05Z" }), "malformed");
});

test("a failing lookup never escapes normalize", () => {
  const normalizer = createNormalizer({
    isKnownService: () => {
      throw new Error("lookup exploded");
    },
  });

  assert.deepEqual(normalizer.normalize(movement({ at: "10:15" })), {
    kind: "ignored",
    reason: "malformed",
    detail: "lookup exploded",
  });
});
