import EventEmitter from "events";

export enum LogLevel {
  TRACE = "trace",
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

export enum LogFormat {
  JSON = "json",
  SIMPLE = "simple",
}

export type LogContext = Record<string, unknown>;

type LogFormatter = (message: LogMessage) => string;

export interface Logger {
  trace: (message: string) => void;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;

  with: () => LoggerContext;

  isTraceEnabled: () => boolean;
  isDebugEnabled: () => boolean;
}

export interface LogMessage extends LogContext {
  level: LogLevel;
  message: string;
}

export interface SerializedError {
  stack?: string;
  message: string;
  toString: string;
}

export interface LoggerContext {
  str: (key: string, value?: string) => LoggerContext;
  num: (key: string, value?: number) => LoggerContext;
  any: (key: string, value?: unknown) => LoggerContext;
  error: (e: unknown) => LoggerContext;
  logger: () => Logger;
}

const LEVEL_ORDER: LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

const contextLevels = resolveContextLevels();

function resolveContextLevels(): string[] {
  const contextLevelsEnv = process.env.LOG_CONTEXT_FOR_LEVELS;
  if (contextLevelsEnv) {
    return contextLevelsEnv.split(",").map((l) => l.trim().toLowerCase());
  }
  return ["trace", "debug", "info", "warn", "error"];
}

const logTimestamp: boolean = Boolean(process.env.LOG_TIMESTAMP);

export function parseLogLevel(
  value: string | undefined
): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized);
}

export function parseLogFormat(value: string | undefined): LogFormat {
  return value?.trim().toLowerCase() === LogFormat.SIMPLE
    ? LogFormat.SIMPLE
    : LogFormat.JSON;
}

/** Every formatted line is re-emitted here as `"log"`, whatever the format. */
export const LoggerEvents = new EventEmitter();

export class ConsoleLogger implements Logger {
  protected _loglevel: LogLevel;
  protected _ctx: LogContext;
  private readonly format: LogFormat;
  private readonly formatter: LogFormatter;

  public trace: (message: string) => void;
  public debug: (message: string) => void;
  public info: (message: string) => void;
  public warn: (message: string) => void;
  public error: (message: string) => void;

  constructor(level?: LogLevel, ctx?: LogContext, format?: LogFormat) {
    this.format = format ?? parseLogFormat(process.env.LOG_FORMAT);
    this.formatter =
      this.format === LogFormat.SIMPLE
        ? (m) => this.formatSimple(m)
        : (m) => this.formatJson(m);

    this._loglevel = level ?? LogLevel.INFO;
    this._ctx = ctx ?? {};

    this.trace = (message) => this.write(LogLevel.TRACE, message);
    this.debug = (message) => this.write(LogLevel.DEBUG, message);
    this.info = (message) => this.write(LogLevel.INFO, message);
    this.warn = (message) => this.write(LogLevel.WARN, message);
    this.error = (message) => this.write(LogLevel.ERROR, message);

    // Methods below the configured level become no-ops
    const threshold = LEVEL_ORDER.indexOf(this._loglevel);
    const noop = (_message: string): void => {};
    if (threshold > 0) this.trace = noop;
    if (threshold > 1) this.debug = noop;
    if (threshold > 2) this.info = noop;
    if (threshold > 3) this.warn = noop;
  }

  isTraceEnabled() {
    return this._loglevel === LogLevel.TRACE;
  }

  isDebugEnabled() {
    return this._loglevel === LogLevel.DEBUG || this.isTraceEnabled();
  }

  // console.trace is not used: it prints a stack trace for every message.
  private write(level: LogLevel, message: string) {
    const entry: LogMessage = contextLevels.includes(level)
      ? { ...this._ctx, message, level }
      : { message, level };
    const line = this.formatter(entry);

    switch (level) {
      case LogLevel.TRACE:
        console.log(line);
        break;
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.ERROR:
        console.error(line);
        break;
    }
  }

  setCtx(key: string, value?: unknown) {
    this._ctx[key] = value;
  }

  newLogger(level: LogLevel, ctx: LogContext) {
    return new ConsoleLogger(level, { ...ctx }, this.format);
  }

  with(): LoggerContext {
    return new ConsoleLogContext(this.newLogger(this._loglevel, this._ctx));
  }

  formatJson(message: LogMessage): string {
    if (logTimestamp) {
      message.ts = new Date().toISOString();
    }
    const json = safeStringify(message);
    LoggerEvents.emit("log", json);
    return json;
  }

  formatSimple(message: LogMessage): string {
    LoggerEvents.emit("log", safeStringify(message));

    const { message: text, level, ts: _ts, error, ...rest } = message;
    const ts = logTimestamp ? ` [${new Date().toISOString()}] ` : "";

    let errorStack = "";
    if (isSerializedError(error)) {
      if (error.stack) {
        errorStack = "\n" + prettyFormatStack(error.stack);
      } else {
        rest.error = error.message;
      }
    } else if (error !== undefined) {
      rest.error = error;
    }

    const context =
      Object.keys(rest).length > 0 ? "\n" + safeStringify(rest) + "\n" : "";
    const label = `${LEVEL_COLOURS[level]} ${level.toUpperCase()} \x1b[0m`;
    return `${label} ${ts} ${text}${context}${errorStack}`;
  }
}

const LEVEL_COLOURS: Record<LogLevel, string> = {
  [LogLevel.TRACE]: "\x1b[37m",
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

export class ConsoleLogContext implements LoggerContext {
  private _logger: ConsoleLogger;

  constructor(logger: ConsoleLogger) {
    this._logger = logger;
  }

  str(key: string, value?: string) {
    return this.any(key, value);
  }

  num(key: string, value?: number) {
    return this.any(key, value);
  }

  error(e: unknown) {
    if (e instanceof Error) {
      const serialized: SerializedError = {
        message: e.message,
        stack: e.stack,
        toString: e.toString(),
      };
      return this.any("error", serialized);
    } else if (typeof e === "string") {
      return this.str("error", e);
    } else {
      return this.any("error", e);
    }
  }

  any(key: string, value?: unknown) {
    this._logger.setCtx(key, value);
    return this;
  }

  logger() {
    return this._logger;
  }
}

export function getLogger(): ConsoleLogger {
  return new ConsoleLogger(
    parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO
  );
}

function isSerializedError(value: unknown): value is SerializedError {
  return (
    typeof value === "object" &&
    value !== null &&
    "message" in value &&
    typeof value.message === "string"
  );
}

function prettyFormatStack(stack: string) {
  return stack
    .split("\n")
    .map((line) => line.replace(/^\s+at\s+/, "  at "))
    .join("\n");
}

function safeStringify(obj: unknown) {
  return JSON.stringify(obj, (_k, v: unknown) =>
    typeof v === "bigint" ? Number(v) : v
  );
}
