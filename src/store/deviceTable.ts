import events from "events";
import { Mutex } from "async-mutex";
import { ConfigError } from "../common/errors";
import { DeviceSnapshot, Sample } from "../types";
import { DEFAULT_HISTORY_CAPACITY, DeviceRecord } from "./deviceRecord";

export type DeviceTableOptions = {
  /** @default 100 */
  historyCapacity?: number;
  /** Clock used for record creation times. @default Date.now */
  now?: () => number;
};

type Entry = {
  record: DeviceRecord;
  mutex: Mutex;
};

export interface DeviceTable extends events.EventEmitter {
  /** emitted once, synchronously, the first time a device id is seen */
  on(event: "deviceCreated", listener: (deviceId: string) => void): this;
  emit(event: "deviceCreated", deviceId: string): boolean;
}

/*
 * Device Table
 *
 * Every record has its own mutex: an update to one device never waits on
 * another device, and a snapshot only waits on an in-flight update of the
 * same device. Nothing awaits I/O while a mutex is held.
 */
export class DeviceTable extends events.EventEmitter {
  private readonly entries = new Map<string, Entry>();
  private readonly historyCapacity: number;
  private readonly now: () => number;

  constructor(options: DeviceTableOptions = {}) {
    super();
    const capacity = options.historyCapacity ?? DEFAULT_HISTORY_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigError(
        `History capacity must be a positive integer, got ${capacity}`
      );
    }
    this.historyCapacity = capacity;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  // Lookup and insert happen in one synchronous step, so concurrent first
  // sightings of the same id always resolve to the same record.
  private entry(deviceId: string): Entry {
    let entry = this.entries.get(deviceId);
    if (!entry) {
      entry = {
        record: new DeviceRecord(deviceId, this.historyCapacity, this.now()),
        mutex: new Mutex(),
      };
      this.entries.set(deviceId, entry);
      this.emit("deviceCreated", deviceId);
    }
    return entry;
  }

  getOrCreate(deviceId: string): DeviceRecord {
    return this.entry(deviceId).record;
  }

  async applyUpdate(
    deviceId: string,
    sample: Sample,
    observedAt: number
  ): Promise<void> {
    const { record, mutex } = this.entry(deviceId);
    await mutex.runExclusive(() => record.apply(sample, observedAt));
  }

  async snapshot(deviceId: string): Promise<DeviceSnapshot | undefined> {
    const entry = this.entries.get(deviceId);
    if (!entry) {
      return undefined;
    }
    return entry.mutex.runExclusive(() => entry.record.toSnapshot());
  }

  listDeviceIds(): Set<string> {
    return new Set(this.entries.keys());
  }
}
