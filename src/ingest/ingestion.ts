import { ParseError } from "../common/errors";
import { Logger } from "../common/logger";
import { DeviceTable } from "../store/deviceTable";
import { route } from "./router";

export type IngestResult =
  | { status: "applied"; deviceId: string }
  | { status: "rejected"; error: ParseError };

export type IngestionStats = {
  applied: number;
  rejected: number;
};

/** A rejected message, kept for display after the log line scrolls away */
export type RecentError = {
  at: number;
  topic: string;
  message: string;
  payload: string;
};

export const RECENT_ERRORS_LIMIT = 5;

export type TelemetryIngestorOptions = {
  table: DeviceTable;
  logger: Logger;
  /** @default Date.now */
  now?: () => number;
};

/**
 * Entry point for inbound messages. Decoding runs before the device's lock
 * is taken; only the in-memory update runs under it.
 */
export class TelemetryIngestor {
  private readonly table: DeviceTable;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly counters: IngestionStats = { applied: 0, rejected: 0 };
  private readonly errors: RecentError[] = [];

  constructor(options: TelemetryIngestorOptions) {
    this.table = options.table;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;

    this.table.on("deviceCreated", (deviceId) =>
      this.logger.info(`New device detected: ${deviceId}`)
    );
  }

  async onMessage(
    topic: string,
    rawPayload: Buffer | string
  ): Promise<IngestResult> {
    const routed = route(topic, rawPayload);
    if (!routed.ok) {
      this.counters.rejected++;
      this.logger
        .with()
        .str("topic", topic)
        .str("payload", routed.error.raw)
        .error(routed.error.cause ?? routed.error)
        .logger()
        .error(routed.error.message);
      this.remember(topic, routed.error);
      return { status: "rejected", error: routed.error };
    }

    const { deviceId, sample } = routed;
    this.table.getOrCreate(deviceId);
    await this.table.applyUpdate(deviceId, sample, this.now());
    this.counters.applied++;

    if (this.logger.isTraceEnabled()) {
      this.logger
        .with()
        .str("topic", topic)
        .any("sample", sample)
        .logger()
        .trace(`Applied sample for ${deviceId}`);
    }
    return { status: "applied", deviceId };
  }

  stats(): IngestionStats {
    return { ...this.counters };
  }

  /** Latest rejected messages, oldest first */
  recentErrors(): RecentError[] {
    return [...this.errors];
  }

  private remember(topic: string, error: ParseError) {
    this.errors.push({
      at: this.now(),
      topic,
      message: error.message,
      payload: error.raw,
    });
    if (this.errors.length > RECENT_ERRORS_LIMIT) {
      this.errors.shift();
    }
  }
}
