/**
 * A payload that could not be decoded into a sample. The message is dropped
 * as a whole; `raw` keeps the undecoded text for diagnosis.
 */
export class ParseError extends Error {
  readonly raw: string;
  readonly topic?: string;

  constructor(message: string, raw: string, topic?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ParseError";
    this.raw = raw;
    this.topic = topic;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
