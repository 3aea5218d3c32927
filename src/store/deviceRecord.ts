import { DeviceSnapshot, Sample } from "../types";

export const DEFAULT_HISTORY_CAPACITY = 100;

/**
 * Bounded state for one device. Holds no lock of its own: callers go
 * through {@link DeviceTable}, which serializes access per record.
 */
export class DeviceRecord {
  readonly deviceId: string;
  readonly capacity: number;
  readonly createdAt: number;

  private latest: Sample | undefined;
  private previous: Sample | undefined;
  private history: Sample[] = [];
  private lastUpdate: number;
  private updateCount = 0;

  constructor(deviceId: string, capacity: number, createdAt: number) {
    this.deviceId = deviceId;
    this.capacity = capacity;
    this.createdAt = createdAt;
    this.lastUpdate = createdAt;
  }

  apply(sample: Sample, observedAt: number): void {
    if (this.latest !== undefined) {
      this.previous = this.latest;
    }
    this.latest = sample;
    this.history.push(sample);
    while (this.history.length > this.capacity) {
      this.history.shift();
    }
    this.lastUpdate = observedAt;
    this.updateCount++;
  }

  toSnapshot(): DeviceSnapshot {
    // Samples are frozen, so sharing them between copies is safe
    return Object.freeze({
      deviceId: this.deviceId,
      latest: this.latest,
      previous: this.previous,
      history: Object.freeze([...this.history]),
      lastUpdate: this.lastUpdate,
      createdAt: this.createdAt,
      updateCount: this.updateCount,
    });
  }
}
