import { test } from "node:test";
import { strict as assert } from "node:assert";

import { ConsoleLogger, LogFormat, LogLevel, LoggerEvents } from "../common/logger";
import { DeviceTable } from "../store/deviceTable";
import { RECENT_ERRORS_LIMIT, TelemetryIngestor } from "./ingestion";

function setup() {
  let clock = 1_000;
  const table = new DeviceTable({ historyCapacity: 100, now: () => clock });
  const logger = new ConsoleLogger(LogLevel.INFO, {}, LogFormat.JSON);
  const ingestor = new TelemetryIngestor({ table, logger, now: () => clock });
  return {
    table,
    ingestor,
    advance(ms: number) {
      clock += ms;
    },
  };
}

function captureLogs() {
  const lines: Array<Record<string, unknown>> = [];
  const listener = (json: string) => lines.push(JSON.parse(json));
  LoggerEvents.on("log", listener);
  return { lines, stop: () => LoggerEvents.off("log", listener) };
}

const payload = (fields: Record<string, number | boolean>) =>
  Buffer.from(JSON.stringify(fields));

test("the first message creates the device with no previous sample", async (t) => {
  t.mock.method(console, "info", () => undefined);
  const { table, ingestor } = setup();

  const result = await ingestor.onMessage("sensor/jadwiga", payload({ temperature: 21.5 }));

  assert.deepEqual(result, { status: "applied", deviceId: "jadwiga" });
  const snapshot = await table.snapshot("jadwiga");
  assert.deepEqual(snapshot?.latest?.toJSON(), { temperature: 21.5 });
  assert.equal(snapshot?.previous, undefined);
  assert.deepEqual(
    snapshot?.history.map((s) => s.toJSON()),
    [{ temperature: 21.5 }]
  );
});

test("the next message rotates latest into previous", async (t) => {
  t.mock.method(console, "info", () => undefined);
  const { table, ingestor, advance } = setup();

  await ingestor.onMessage("sensor/jadwiga", payload({ temperature: 21.5 }));
  advance(500);
  await ingestor.onMessage("sensor/jadwiga", payload({ temperature: 22.0 }));

  const snapshot = await table.snapshot("jadwiga");
  assert.deepEqual(snapshot?.previous?.toJSON(), { temperature: 21.5 });
  assert.deepEqual(snapshot?.latest?.toJSON(), { temperature: 22 });
  assert.equal(snapshot?.history.length, 2);
  assert.equal(snapshot?.lastUpdate, 1_500);
});

test("messages on a topic without a device segment go to the unknown device", async (t) => {
  t.mock.method(console, "info", () => undefined);
  const { table, ingestor } = setup();

  await ingestor.onMessage("sensor", payload({ temperature: 20 }));

  assert.deepEqual([...table.listDeviceIds()], ["unknown"]);
});

test("a new device is announced once", async (t) => {
  t.mock.method(console, "info", () => undefined);
  const { ingestor } = setup();
  const capture = captureLogs();
  try {
    await ingestor.onMessage("sensor/garaz", payload({ smoke: 1 }));
    await ingestor.onMessage("sensor/garaz", payload({ smoke: 2 }));

    assert.deepEqual(capture.lines, [
      { message: "New device detected: garaz", level: "info" },
    ]);
  } finally {
    capture.stop();
  }
});

test("a malformed payload is reported and leaves the record unchanged", async (t) => {
  t.mock.method(console, "info", () => undefined);
  t.mock.method(console, "error", () => undefined);
  const { table, ingestor, advance } = setup();
  await ingestor.onMessage("sensor/jadwiga", payload({ temperature: 21.5 }));
  const before = await table.snapshot("jadwiga");

  const capture = captureLogs();
  advance(100);
  const result = await ingestor
    .onMessage("sensor/jadwiga", Buffer.from("not-json-garbage"))
    .finally(() => capture.stop());

  assert.equal(result.status, "rejected");
  assert.deepEqual(await table.snapshot("jadwiga"), before);
  assert.equal(capture.lines.length, 1);
  assert.equal(capture.lines[0].message, "Invalid JSON received");
  assert.equal(capture.lines[0].level, "error");
  assert.equal(capture.lines[0].topic, "sensor/jadwiga");
  assert.equal(capture.lines[0].payload, "not-json-garbage");
  assert.deepEqual(ingestor.stats(), { applied: 1, rejected: 1 });
});

test("a malformed first message creates no device", async (t) => {
  t.mock.method(console, "error", () => undefined);
  const { table, ingestor } = setup();

  await ingestor.onMessage("sensor/jadwiga", "not-json-garbage");

  assert.equal(await table.snapshot("jadwiga"), undefined);
  assert.equal(table.size, 0);
});

test("simultaneous first messages for one device land in one record", async (t) => {
  t.mock.method(console, "info", () => undefined);
  const { table, ingestor } = setup();

  await Promise.all([
    ingestor.onMessage("sensor/garaz", payload({ temperature: 18 })),
    ingestor.onMessage("sensor/garaz", payload({ temperature: 19 })),
  ]);

  const snapshot = await table.snapshot("garaz");
  assert.equal(table.size, 1);
  const temps = snapshot?.history.map((s) => s.number("temperature")) ?? [];
  assert.deepEqual([...temps].sort(), [18, 19]);
  assert.deepEqual(ingestor.stats(), { applied: 2, rejected: 0 });
});

test("keeps only the latest rejected messages", async (t) => {
  t.mock.method(console, "error", () => undefined);
  const { ingestor, advance } = setup();

  for (let i = 0; i < 7; i++) {
    advance(100);
    await ingestor.onMessage(`sensor/d${i}`, `bad-${i}`);
  }

  const errors = ingestor.recentErrors();
  assert.equal(errors.length, RECENT_ERRORS_LIMIT);
  assert.deepEqual(
    errors.map((e) => e.topic),
    ["sensor/d2", "sensor/d3", "sensor/d4", "sensor/d5", "sensor/d6"]
  );
  assert.deepEqual(errors[0], {
    at: 1_300,
    topic: "sensor/d2",
    message: "Invalid JSON received",
    payload: "bad-2",
  });
  assert.deepEqual(ingestor.stats(), { applied: 0, rejected: 7 });
});
