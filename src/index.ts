#!/usr/bin/env node
/**
 * index.ts
 *
 * MQTT telemetry observer:
 *  - subscribes to the configured topic pattern (default `sensor/+`)
 *  - keeps a bounded, per-device state (latest, previous, rolling history)
 *  - renders a console dashboard from periodic snapshots
 *
 * All state lives in one DeviceTable created here and passed explicitly to
 * the ingestion side and the reader side.
 */
import "dotenv/config";
import { loadConfig } from "./config";
import { getLogger } from "./common/logger";
import { newClient } from "./clients/mqtt";
import { ConnectionLifecycle } from "./ingest/connection";
import { TelemetryIngestor } from "./ingest/ingestion";
import { DeviceTable } from "./store/deviceTable";
import { SnapshotReader } from "./store/snapshotReader";
import { createDashboard } from "./dashboard/poller";

// -------------------- Initialization --------------------
const logger = getLogger();

// -------------------- Main Flow --------------------
async function main() {
  const config = loadConfig(process.env, process.argv.slice(2));
  logger
    .with()
    .str("url", config.mqtt.url)
    .str("topic", config.mqtt.topic)
    .num("historyCapacity", config.store.historyCapacity)
    .logger()
    .info("Loaded configuration");

  const table = new DeviceTable({
    historyCapacity: config.store.historyCapacity,
  });
  const lifecycle = new ConnectionLifecycle(config.mqtt.host);
  const ingestor = new TelemetryIngestor({ table, logger });
  const reader = new SnapshotReader(table, lifecycle);

  lifecycle.on("disconnected", (reason) =>
    logger
      .with()
      .str("reason", reason)
      .logger()
      .warn("Disconnected from MQTT broker")
  );

  const client = newClient({
    serverUrl: config.mqtt.url,
    topic: config.mqtt.topic,
    clientId: config.mqtt.clientId,
    username: config.mqtt.username,
    password: config.mqtt.password,
    keepalive: config.mqtt.keepaliveSec,
    reconnectPeriod: config.mqtt.reconnectPeriodMs,
    logger,
    lifecycle,
  });

  client.on("reconnect", () => logger.info("Reconnecting"));
  // Already logged by the client; a listener keeps the emitter from throwing
  client.on("error", () => undefined);

  client.on("message", (topic, payload) => {
    ingestor.onMessage(topic, payload).catch((err: unknown) => {
      logger
        .with()
        .str("topic", topic)
        .error(err)
        .logger()
        .error("Error processing message");
    });
  });

  const dashboard = createDashboard({
    reader,
    topic: config.mqtt.topic,
    intervalMs: config.dashboard.pollIntervalMs,
    logger,
    stats: () => ingestor.stats(),
    errors: () => ingestor.recentErrors(),
  });
  if (config.dashboard.enabled) {
    dashboard.start();
  }

  // Graceful shutdown; in-memory state is discarded
  function shutdown(sig: string) {
    logger.info(`Received ${sig}, shutting down...`);
    dashboard.stop();
    client.stop();
    process.exit(0);
  }
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.with().error(err).logger().error("Fatal startup error");
  process.exit(1);
});
