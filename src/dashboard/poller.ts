import { Logger } from "../common/logger";
import type { IngestionStats, RecentError } from "../ingest/ingestion";
import { SnapshotReader } from "../store/snapshotReader";
import { renderDashboard } from "./format";

const CLEAR_SCREEN = "\x1b[2J\x1b[H";

export type DashboardOptions = {
  reader: SnapshotReader;
  topic: string;
  intervalMs: number;
  logger: Logger;
  /** Receives each rendered frame. @default clears the terminal and prints */
  write?: (frame: string) => void;
  stats?: () => IngestionStats;
  errors?: () => readonly RecentError[];
};

export interface Dashboard {
  /** Renders one frame; resolves false while the previous one is running */
  tick(): Promise<boolean>;
  start(): void;
  stop(): void;
}

export function createDashboard(options: DashboardOptions): Dashboard {
  const { reader, topic, intervalMs, logger, stats, errors } = options;
  const write =
    options.write ??
    ((frame: string) => {
      process.stdout.write(CLEAR_SCREEN + frame + "\n");
    });

  let timer: NodeJS.Timeout | null = null;
  let rendering = false;

  async function tick(): Promise<boolean> {
    if (rendering) return false; // prevent overlapping frames
    rendering = true;
    try {
      const devices = await reader.snapshotAll();
      write(
        renderDashboard({
          connected: reader.isConnected(),
          broker: reader.brokerAddress(),
          topic,
          devices,
          stats: stats?.(),
          errors: errors?.(),
        })
      );
      return true;
    } finally {
      rendering = false;
    }
  }

  return {
    tick,
    start() {
      if (timer) return;
      logger.debug(`Dashboard polling every ${intervalMs}ms`);
      timer = setInterval(() => {
        tick().catch((err: unknown) => {
          logger.with().error(err).logger().error("Dashboard render failed");
        });
      }, intervalMs);
    },
    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },
  };
}
