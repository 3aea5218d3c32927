export type FieldValue = number | boolean;

/**
 * One decoded payload: an ordered, immutable mapping from field name to a
 * numeric or boolean reading. The field set is whatever the sender emitted,
 * so every accessor answers `undefined` for a field that is not there.
 */
export class Sample {
  private readonly values: ReadonlyMap<string, FieldValue>;

  private constructor(values: Map<string, FieldValue>) {
    this.values = values;
    Object.freeze(this);
  }

  static fromEntries(entries: Iterable<readonly [string, FieldValue]>): Sample {
    return new Sample(new Map(entries));
  }

  static fromObject(fields: Record<string, FieldValue>): Sample {
    return Sample.fromEntries(Object.entries(fields));
  }

  get size(): number {
    return this.values.size;
  }

  has(field: string): boolean {
    return this.values.has(field);
  }

  get(field: string): FieldValue | undefined {
    return this.values.get(field);
  }

  number(field: string): number | undefined {
    const value = this.values.get(field);
    return typeof value === "number" ? value : undefined;
  }

  boolean(field: string): boolean | undefined {
    const value = this.values.get(field);
    return typeof value === "boolean" ? value : undefined;
  }

  fields(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, FieldValue]> {
    return [...this.values.entries()];
  }

  toJSON(): Record<string, FieldValue> {
    return Object.fromEntries(this.values);
  }
}

/** Point-in-time, frozen copy of one device's record. */
export interface DeviceSnapshot {
  readonly deviceId: string;
  readonly latest: Sample | undefined;
  readonly previous: Sample | undefined;
  readonly history: readonly Sample[];
  readonly lastUpdate: number; // epoch ms
  readonly createdAt: number; // epoch ms
  readonly updateCount: number;
}
