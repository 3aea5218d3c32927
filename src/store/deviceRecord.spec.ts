import { test } from "node:test";
import { strict as assert } from "node:assert";

import { Sample } from "../types";
import { DeviceRecord } from "./deviceRecord";

const seq = (n: number) => Sample.fromObject({ seq: n });

test("a new record has no samples and its creation time as last update", () => {
  const snapshot = new DeviceRecord("jadwiga", 100, 1_000).toSnapshot();

  assert.equal(snapshot.latest, undefined);
  assert.equal(snapshot.previous, undefined);
  assert.deepEqual(snapshot.history, []);
  assert.equal(snapshot.lastUpdate, 1_000);
  assert.equal(snapshot.createdAt, 1_000);
  assert.equal(snapshot.updateCount, 0);
});

test("the first update leaves previous absent", () => {
  const record = new DeviceRecord("jadwiga", 100, 0);
  record.apply(seq(1), 10);

  const snapshot = record.toSnapshot();
  assert.equal(snapshot.previous, undefined);
  assert.equal(snapshot.latest?.number("seq"), 1);
  assert.equal(snapshot.lastUpdate, 10);
});

test("latest rotates into previous", () => {
  const record = new DeviceRecord("jadwiga", 100, 0);
  const u1 = seq(1);
  const u2 = seq(2);
  record.apply(u1, 10);
  record.apply(u2, 20);

  const snapshot = record.toSnapshot();
  assert.equal(snapshot.previous, u1);
  assert.equal(snapshot.latest, u2);
  assert.equal(snapshot.history.length, 2);
  assert.equal(snapshot.history[snapshot.history.length - 1], snapshot.latest);
});

test("history keeps the last N samples in arrival order", () => {
  const record = new DeviceRecord("jadwiga", 100, 0);
  for (let i = 1; i <= 101; i++) {
    record.apply(seq(i), i);
  }

  const snapshot = record.toSnapshot();
  assert.equal(snapshot.history.length, 100);
  assert.equal(snapshot.history[0].number("seq"), 2);
  assert.equal(snapshot.history[99].number("seq"), 101);
  assert.equal(snapshot.latest?.number("seq"), 101);
  assert.equal(snapshot.previous?.number("seq"), 100);
  assert.equal(snapshot.updateCount, 101);
});

test("snapshots are frozen copies", () => {
  const record = new DeviceRecord("jadwiga", 3, 0);
  record.apply(seq(1), 1);
  const before = record.toSnapshot();

  record.apply(seq(2), 2);
  record.apply(seq(3), 3);
  record.apply(seq(4), 4);

  assert.ok(Object.isFrozen(before));
  assert.ok(Object.isFrozen(before.history));
  assert.deepEqual(
    before.history.map((s) => s.number("seq")),
    [1]
  );
  assert.equal(before.latest?.number("seq"), 1);
  assert.deepEqual(
    record.toSnapshot().history.map((s) => s.number("seq")),
    [2, 3, 4]
  );
});
