import * as mqtt from "mqtt";
import type { IClientOptions } from "mqtt";
import events from "events";
import { Logger } from "../../common/logger";
import { ConnectionLifecycle } from "../../ingest/connection";

function getRequiredProperty<
  C extends Record<string, unknown>,
  P extends keyof C & string
>(config: C, propName: P): NonNullable<C[P]> {
  const value = config[propName];
  if (value !== undefined && value !== null) {
    return value;
  }
  throw new Error(
    "Missing required configuration property '" + propName + "'"
  );
}

function getProperty<C, P extends keyof C, DEFAULT extends C[P]>(
  config: C,
  propName: P,
  defaultValue: DEFAULT
): Exclude<C[P], undefined> | DEFAULT {
  const value = config[propName];
  if (value !== undefined) {
    return value as Exclude<C[P], undefined>;
  } else {
    return defaultValue;
  }
}

type LifecycleEvent = "connect" | "close" | "reconnect" | "offline" | "end";

/** The part of `MqttClient` the subscriber drives */
export interface TelemetryTransport {
  on(event: LifecycleEvent, listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(
    event: "message",
    listener: (topic: string, payload: Buffer) => void
  ): unknown;
  subscribe(
    topic: string,
    options: { qos: 0 },
    callback: (err: Error | null) => void
  ): unknown;
  end(): unknown;
}

export type ConnectFn = (
  brokerUrl: string,
  options: IClientOptions
) => TelemetryTransport;

export type TelemetryClientOptions = {
  serverUrl: string;
  /** Subscription pattern, e.g. `sensor/+` */
  topic: string;
  clientId: string;
  username?: string;
  password?: string;
  /** seconds */
  keepalive?: number;
  /** milliseconds between reconnect attempts, handled by mqtt */
  reconnectPeriod?: number;
  logger: Logger;
  lifecycle: ConnectionLifecycle;
  /** defaults to `mqtt.connect` */
  connect?: ConnectFn;
};

export interface TelemetryClient extends events.EventEmitter {
  /** MQTT client event */
  on(event: LifecycleEvent, listener: () => void): this;
  /** MQTT client event */
  on(event: "error", listener: (error: Error) => void): this;
  on(
    event: "message",
    listener: (topic: string, payload: Buffer) => void
  ): this;

  emit(event: LifecycleEvent): boolean;
  emit(event: "error", error: Error): boolean;
  emit(event: "message", topic: string, payload: Buffer): boolean;
}

/*
 * Telemetry subscriber
 *
 * Connection state is reported to the lifecycle; the topic subscription is
 * (re)issued on every entry into Connected.
 */
export class TelemetryClient extends events.EventEmitter {
  private readonly serverUrl: string;
  private readonly topic: string;
  private readonly mqttOptions: IClientOptions;
  private readonly lifecycle: ConnectionLifecycle;
  private readonly logger: Logger;
  private readonly connect: ConnectFn;

  private client: null | TelemetryTransport = null;

  constructor(config: TelemetryClientOptions) {
    super();
    this.logger = getRequiredProperty(config, "logger");
    this.lifecycle = getRequiredProperty(config, "lifecycle");

    this.serverUrl = getRequiredProperty(config, "serverUrl");
    this.topic = getRequiredProperty(config, "topic");

    this.mqttOptions = {
      clientId: getRequiredProperty(config, "clientId"),
      clean: true,
      keepalive: getProperty(config, "keepalive", 60),
      reconnectPeriod: getProperty(config, "reconnectPeriod", 1000),
      connectTimeout: 30000,
      username: getProperty(config, "username", undefined),
      password: getProperty(config, "password", undefined),
    };

    this.connect = getProperty(config, "connect", mqtt.connect);

    this.lifecycle.on("connected", () => this.subscribe());

    this.init();
  }

  private subscribe() {
    if (!this.client) {
      return;
    }
    this.logger.info(`Subscribing to topic: ${this.topic}`);
    this.client.subscribe(this.topic, { qos: 0 }, (err) => {
      if (err) {
        this.logger.with().error(err).logger().error("Subscribe failed");
        return;
      }
      this.logger.info(`Subscribed to topic: ${this.topic}`);
    });
  }

  stop() {
    this.client?.end();
  }

  // Configures and connects the client
  private init() {
    this.lifecycle.connecting();
    this.logger.info("Attempting to connect: " + this.serverUrl);
    const client = this.connect(this.serverUrl, this.mqttOptions);
    this.client = client;

    client.on("connect", () => {
      this.logger.info(`Connected to MQTT broker: ${this.serverUrl}`);
      this.lifecycle.connected();
      this.emit("connect");
    });

    client.on("reconnect", () => {
      this.lifecycle.connecting();
      this.emit("reconnect");
    });

    client.on("close", () => {
      this.lifecycle.disconnected("close");
      this.emit("close");
    });

    client.on("offline", () => {
      this.lifecycle.disconnected("offline");
      this.emit("offline");
    });

    client.on("end", () => {
      this.lifecycle.disconnected("end");
      this.emit("end");
    });

    client.on("error", (error) => {
      this.logger.with().error(error).logger().error("MQTT error");
      this.emit("error", error);
    });

    client.on("message", (topic, message) => {
      if (this.logger.isTraceEnabled()) {
        this.logger
          .with()
          .str("topic", topic)
          .num("bytes", message.length)
          .logger()
          .trace(`Received message on topic ${topic}`);
      }
      this.emit("message", topic, message);
    });
  }
}

export function newClient(config: TelemetryClientOptions): TelemetryClient {
  return new TelemetryClient(config);
}
