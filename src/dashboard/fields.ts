export type FieldKind = "numeric" | "gas" | "flame";

export interface FieldSpec {
  name: string;
  label: string;
  unit?: string;
  kind: FieldKind;
}

// Display order follows the catalogue; unknown fields come after it.
export const KNOWN_FIELDS: readonly FieldSpec[] = [
  { name: "temperature", label: "Temp (In)", unit: "°C", kind: "numeric" },
  {
    name: "temperature_out",
    label: "Temp (Out)",
    unit: "°C",
    kind: "numeric",
  },
  { name: "humidity_out", label: "Humidity", unit: "%", kind: "numeric" },
  { name: "gas_level", label: "Gas Sensor", kind: "gas" },
  { name: "motor_adc", label: "Motor ADC", kind: "numeric" },
  { name: "flame_status", label: "Flame", kind: "flame" },
  { name: "acceleration_x", label: "Acc X", kind: "numeric" },
  { name: "acceleration_y", label: "Acc Y", kind: "numeric" },
  { name: "acceleration_z", label: "Acc Z", kind: "numeric" },
  { name: "gyro_x", label: "Gyro X", kind: "numeric" },
  { name: "gyro_y", label: "Gyro Y", kind: "numeric" },
  { name: "gyro_z", label: "Gyro Z", kind: "numeric" },
  { name: "smoke", label: "Smoke Level", unit: "%", kind: "numeric" },
  { name: "sound", label: "Sound", unit: "dB", kind: "numeric" },
  { name: "vibration", label: "Vibration", unit: "Hz", kind: "numeric" },
];

const byName = new Map(KNOWN_FIELDS.map((f) => [f.name, f]));

export function fieldSpec(name: string): FieldSpec {
  return byName.get(name) ?? { name, label: name, kind: "numeric" };
}

export function isKnownField(name: string): boolean {
  return byName.has(name);
}
