import { test } from "node:test";
import { strict as assert } from "node:assert";

import { ConnectionLifecycle } from "../ingest/connection";
import { Sample } from "../types";
import { DeviceTable } from "./deviceTable";
import { SnapshotReader } from "./snapshotReader";

function setup() {
  const table = new DeviceTable();
  const lifecycle = new ConnectionLifecycle("broker.local");
  return { table, lifecycle, reader: new SnapshotReader(table, lifecycle) };
}

test("snapshotAll returns one snapshot per known device, ordered by id", async () => {
  const { table, reader } = setup();
  await table.applyUpdate("jadwiga", Sample.fromObject({ temperature: 21 }), 1);
  await table.applyUpdate("garaz", Sample.fromObject({ smoke: 3 }), 2);

  const all = await reader.snapshotAll();

  assert.deepEqual([...all.keys()], ["garaz", "jadwiga"]);
  assert.equal(all.get("garaz")?.latest?.number("smoke"), 3);
  assert.equal(reader.deviceCount(), 2);
  assert.deepEqual([...reader.listDeviceIds()].sort(), ["garaz", "jadwiga"]);
});

test("snapshot delegates to the table", async () => {
  const { table, reader } = setup();
  await table.applyUpdate("jadwiga", Sample.fromObject({ temperature: 21 }), 1);

  assert.deepEqual(await reader.snapshot("jadwiga"), await table.snapshot("jadwiga"));
  assert.equal(await reader.snapshot("ghost"), undefined);
});

test("a disconnect keeps the last known data", async () => {
  const { table, lifecycle, reader } = setup();
  lifecycle.connected();
  await table.applyUpdate("jadwiga", Sample.fromObject({ temperature: 21 }), 1);
  assert.equal(reader.isConnected(), true);

  lifecycle.disconnected("offline");

  assert.equal(reader.isConnected(), false);
  assert.equal(reader.brokerAddress(), "broker.local");
  const all = await reader.snapshotAll();
  assert.equal(all.get("jadwiga")?.latest?.number("temperature"), 21);
});
