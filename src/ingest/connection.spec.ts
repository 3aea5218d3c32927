import { test } from "node:test";
import { strict as assert } from "node:assert";

import { ConnectionLifecycle, ConnectionState } from "./connection";

function record(lifecycle: ConnectionLifecycle) {
  const events: string[] = [];
  lifecycle.on("change", (next, previous) => events.push(`${previous}->${next}`));
  lifecycle.on("connected", () => events.push("connected"));
  lifecycle.on("disconnected", (reason) => events.push(`disconnected:${reason}`));
  return events;
}

test("starts disconnected and remembers the broker", () => {
  const lifecycle = new ConnectionLifecycle("broker.local");

  assert.equal(lifecycle.state, ConnectionState.Disconnected);
  assert.equal(lifecycle.isConnected(), false);
  assert.equal(lifecycle.broker, "broker.local");
});

test("walks through connect, drop and reconnect", () => {
  const lifecycle = new ConnectionLifecycle("broker.local");
  const events = record(lifecycle);

  lifecycle.connecting();
  lifecycle.connected();
  lifecycle.disconnected("offline");
  lifecycle.connecting();
  lifecycle.connected();

  assert.deepEqual(events, [
    "disconnected->connecting",
    "connecting->connected",
    "connected",
    "connected->disconnected",
    "disconnected:offline",
    "disconnected->connecting",
    "connecting->connected",
    "connected",
  ]);
  assert.equal(lifecycle.isConnected(), true);
});

test("repeating the current state emits nothing", () => {
  const lifecycle = new ConnectionLifecycle("broker.local");
  lifecycle.connected();
  const events = record(lifecycle);

  lifecycle.connected();
  lifecycle.disconnected("close");
  lifecycle.disconnected("offline");

  assert.deepEqual(events, ["connected->disconnected", "disconnected:close"]);
});
