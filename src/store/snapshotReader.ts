import { ConnectionLifecycle } from "../ingest/connection";
import { DeviceSnapshot } from "../types";
import { DeviceTable } from "./deviceTable";

/**
 * Read-only view for polling consumers.
 *
 * `snapshotAll` takes one independent snapshot per device. Each snapshot is
 * consistent on its own, but the map as a whole may mix points in time.
 * A disconnect never clears state: while `isConnected()` is false the
 * snapshots are simply stale.
 */
export class SnapshotReader {
  constructor(
    private readonly table: DeviceTable,
    private readonly connection: ConnectionLifecycle
  ) {}

  snapshot(deviceId: string): Promise<DeviceSnapshot | undefined> {
    return this.table.snapshot(deviceId);
  }

  listDeviceIds(): Set<string> {
    return this.table.listDeviceIds();
  }

  async snapshotAll(): Promise<Map<string, DeviceSnapshot>> {
    const ids = [...this.table.listDeviceIds()].sort();
    const snapshots = await Promise.all(
      ids.map((id) => this.table.snapshot(id))
    );

    const result = new Map<string, DeviceSnapshot>();
    snapshots.forEach((snapshot, i) => {
      if (snapshot) {
        result.set(ids[i], snapshot);
      }
    });
    return result;
  }

  deviceCount(): number {
    return this.table.size;
  }

  isConnected(): boolean {
    return this.connection.isConnected();
  }

  brokerAddress(): string {
    return this.connection.broker;
  }
}
