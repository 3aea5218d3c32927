import type { IngestionStats, RecentError } from "../ingest/ingestion";
import { DeviceSnapshot, FieldValue, Sample } from "../types";
import { FieldSpec, KNOWN_FIELDS, fieldSpec, isKnownField } from "./fields";

export const DASHBOARD_TITLE = "🏭 Industrial IoT Monitor";

export interface DashboardView {
  connected: boolean;
  broker: string;
  topic: string;
  devices: ReadonlyMap<string, DeviceSnapshot>;
  stats?: IngestionStats;
  /** rejected messages, oldest first */
  errors?: readonly RecentError[];
}

const SPARK_BARS = "▁▂▃▄▅▆▇█";
/** Most recent history values drawn in a trend line */
export const TREND_WIDTH = 20;
const PAYLOAD_PREVIEW = 40;

/** Change since the previous sample, rounded to two decimals. */
export function calculateDelta(
  current: number,
  previous: number | undefined
): number | undefined {
  if (previous === undefined) {
    return undefined;
  }
  return Math.round((current - previous) * 100) / 100;
}

export function formatDelta(delta: number): string {
  return delta > 0 ? `+${delta}` : `${delta}`;
}

export function gasStatus(level: number): string {
  if (level > 1000) return "⚠️ DANGER";
  if (level > 700) return "⚠️ WARNING";
  return "✅ SAFE";
}

// Digital flame sensors report 1 (or true) when a flame is detected
export function flameLabel(value: FieldValue): string {
  return value === 1 || value === true ? "🔥 FIRE!" : "✅ Safe";
}

export function formatClock(epochMs: number): string {
  return new Date(epochMs).toTimeString().slice(0, 8);
}

/** One bar per value, scaled between the series' min and max */
export function sparkline(values: readonly number[]): string {
  const min = Math.min(...values);
  const range = Math.max(...values) - min;
  const top = SPARK_BARS.length - 1;
  return values
    .map((v) => (range === 0 ? 0 : Math.round(((v - min) / range) * top)))
    .map((i) => SPARK_BARS[i])
    .join("");
}

/**
 * Min, max and sparkline of a numeric field over the retained history.
 * Needs more than two samples carrying the field.
 */
export function renderTrend(
  field: FieldSpec,
  history: readonly Sample[]
): string | undefined {
  if (field.kind === "flame" || history.length <= 2) {
    return undefined;
  }
  const values = history
    .map((sample) => sample.number(field.name))
    .filter((v): v is number => v !== undefined);
  if (values.length <= 2) {
    return undefined;
  }
  const unit = field.unit ? ` ${field.unit}` : "";
  const min = Math.min(...values);
  const max = Math.max(...values);
  return (
    `    trend ${sparkline(values.slice(-TREND_WIDTH))} ` +
    `(min ${min}${unit}, max ${max}${unit})`
  );
}

export function renderField(
  field: FieldSpec,
  latest: Sample,
  previous: Sample | undefined
): string | undefined {
  const value = latest.get(field.name);
  if (value === undefined) {
    return undefined;
  }
  if (field.kind === "flame") {
    return `  ${field.label}: ${flameLabel(value)}`;
  }
  if (typeof value === "boolean") {
    return `  ${field.label}: ${value}`;
  }

  let text = field.unit ? `${value} ${field.unit}` : `${value}`;
  if (field.kind === "gas") {
    text += ` (${gasStatus(value)})`;
  }
  const delta = calculateDelta(value, previous?.number(field.name));
  return delta === undefined
    ? `  ${field.label}: ${text}`
    : `  ${field.label}: ${text} (Δ ${formatDelta(delta)})`;
}

export function renderDevice(snapshot: DeviceSnapshot): string[] {
  const lines = [
    `📍 ${snapshot.deviceId.toUpperCase()}  ` +
      `last update ${formatClock(snapshot.lastUpdate)}`,
  ];
  const { latest, previous } = snapshot;
  if (!latest) {
    lines.push("  Waiting for first sample");
    return lines;
  }

  const fields = [
    ...KNOWN_FIELDS,
    ...latest.fields().filter((name) => !isKnownField(name)).map(fieldSpec),
  ];
  for (const field of fields) {
    const line = renderField(field, latest, previous);
    if (line === undefined) {
      continue;
    }
    lines.push(line);
    const trend = renderTrend(field, snapshot.history);
    if (trend !== undefined) {
      lines.push(trend);
    }
  }
  lines.push(`  History: ${snapshot.history.length} samples`);
  return lines;
}

export function renderDashboard(view: DashboardView): string {
  const lines = [
    DASHBOARD_TITLE,
    view.connected
      ? `🟢 Connected: ${view.broker}`
      : "🔴 Disconnected (showing last known data)",
    `Devices connected: ${view.devices.size}`,
    `Topic: ${view.topic}`,
  ];
  if (view.stats) {
    lines.push(
      `Messages: ${view.stats.applied} applied, ${view.stats.rejected} rejected`
    );
  }
  lines.push("");

  if (view.devices.size === 0) {
    lines.push(`📡 Waiting for devices on ${view.topic}...`, "");
  }
  for (const snapshot of view.devices.values()) {
    lines.push(...renderDevice(snapshot), "");
  }
  lines.push(...renderErrors(view.errors ?? []));
  return lines.join("\n").trimEnd();
}

// The frame is redrawn on every tick, so rejected payloads are listed here
export function renderErrors(errors: readonly RecentError[]): string[] {
  if (errors.length === 0) {
    return [];
  }
  return [
    "Recent errors:",
    ...errors.map(
      (e) =>
        `  ${formatClock(e.at)} ${e.topic}: ${e.message} ` +
        `(${preview(e.payload)})`
    ),
  ];
}

function preview(payload: string): string {
  const flat = payload.replace(/\s+/g, " ");
  return flat.length > PAYLOAD_PREVIEW
    ? flat.slice(0, PAYLOAD_PREVIEW - 1) + "…"
    : flat;
}
