import { readFileSync } from "node:fs";
import { ConfigError } from "./common/errors";
import { DEFAULT_HISTORY_CAPACITY } from "./store/deviceRecord";

// -------------------- Config Types --------------------
export interface Config {
  mqtt: {
    host: string;
    port: number;
    url: string;
    topic: string; // e.g. sensor/+
    keepaliveSec: number;
    reconnectPeriodMs: number;
    clientId: string;
    username?: string;
    password?: string;
  };
  store: {
    historyCapacity: number;
  };
  dashboard: {
    enabled: boolean;
    pollIntervalMs: number;
  };
}

type Env = Record<string, string | undefined>;

// JSON config file keys and the environment variables they stand in for
const FILE_KEYS: Record<string, Record<string, string>> = {
  mqtt: {
    host: "MQTT_BROKER",
    port: "MQTT_PORT",
    url: "MQTT_URL",
    topic: "MQTT_TOPIC",
    keepaliveSec: "MQTT_KEEPALIVE",
    reconnectPeriodMs: "MQTT_RECONNECT_MS",
    clientId: "MQTT_CLIENT_ID",
    username: "MQTT_USERNAME",
    password: "MQTT_PASSWORD",
  },
  store: {
    historyCapacity: "HISTORY_CAPACITY",
  },
  dashboard: {
    enabled: "DASHBOARD",
    pollIntervalMs: "POLL_INTERVAL_MS",
  },
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readInt(
  env: Env,
  name: string,
  fallback: number,
  min: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") {
    return fallback;
  }
  return !["0", "false", "no", "off"].includes(raw);
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

// Credentials are taken verbatim; surrounding spaces may be significant
function readSecret(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw ? raw : undefined;
}

/**
 * Reads a JSON config file and flattens it into the environment variable
 * names it overrides, so file and environment share one validation path.
 */
export function readConfigFile(path: string): Env {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Could not read config file ${path}: ${reason}`);
  }
  if (!isObject(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }

  const env: Env = {};
  for (const [section, keys] of Object.entries(FILE_KEYS)) {
    const values = parsed[section];
    if (values === undefined) continue;
    if (!isObject(values)) {
      throw new ConfigError(`'${section}' in ${path} must be an object`);
    }
    for (const [key, envName] of Object.entries(keys)) {
      const value = values[key];
      if (value === undefined || value === null) continue;
      if (
        typeof value !== "string" &&
        typeof value !== "number" &&
        typeof value !== "boolean"
      ) {
        throw new ConfigError(
          `'${section}.${key}' in ${path} must be a scalar`
        );
      }
      env[envName] = String(value);
    }
  }
  return env;
}

/**
 * Resolves configuration from an optional JSON file (`CONFIG_PATH` or the
 * first CLI argument); environment variables take precedence over it.
 */
export function loadConfig(
  env: Env = process.env,
  argv: string[] = []
): Config {
  const configPath = env.CONFIG_PATH || argv[0];
  const merged: Env = configPath ? readConfigFile(configPath) : {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      merged[name] = value;
    }
  }

  const host = readString(merged, "MQTT_BROKER") ?? "localhost";
  const port = readInt(merged, "MQTT_PORT", 1883, 1);

  return {
    mqtt: {
      host,
      port,
      url: readString(merged, "MQTT_URL") ?? `mqtt://${host}:${port}`,
      topic: readString(merged, "MQTT_TOPIC") ?? "sensor/+",
      keepaliveSec: readInt(merged, "MQTT_KEEPALIVE", 60, 0),
      reconnectPeriodMs: readInt(merged, "MQTT_RECONNECT_MS", 1000, 0),
      clientId:
        readString(merged, "MQTT_CLIENT_ID") ??
        `telemetry-${Math.random().toString(16).slice(2, 10)}`,
      username: readSecret(merged, "MQTT_USERNAME"),
      password: readSecret(merged, "MQTT_PASSWORD"),
    },
    store: {
      historyCapacity: readInt(
        merged,
        "HISTORY_CAPACITY",
        DEFAULT_HISTORY_CAPACITY,
        1
      ),
    },
    dashboard: {
      enabled: readFlag(merged, "DASHBOARD", true),
      pollIntervalMs: readInt(merged, "POLL_INTERVAL_MS", 500, 50),
    },
  };
}
