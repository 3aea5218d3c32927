import { ParseError } from "../common/errors";
import { FieldValue, Sample } from "../types";

export const UNKNOWN_DEVICE = "unknown";

const TOPIC_DELIMITER = "/";

export type RouteResult =
  | { ok: true; deviceId: string; sample: Sample }
  | { ok: false; error: ParseError };

// sensor/jadwiga -> jadwiga
export function deviceIdFromTopic(topic: string): string {
  const parts = topic.split(TOPIC_DELIMITER);
  const last = parts[parts.length - 1];
  if (parts.length < 2 || !last) {
    return UNKNOWN_DEVICE;
  }
  return last;
}

function payloadText(rawPayload: Buffer | string): string {
  return typeof rawPayload === "string"
    ? rawPayload
    : rawPayload.toString("utf8");
}

function isFieldValue(value: unknown): value is FieldValue {
  return (
    (typeof value === "number" && Number.isFinite(value)) ||
    typeof value === "boolean"
  );
}

/**
 * Decodes a JSON object payload into a sample, keeping only numeric and
 * boolean fields. Throws {@link ParseError} when the payload is not a JSON
 * object; nothing is decoded in that case.
 */
export function decodeSample(
  rawPayload: Buffer | string,
  topic?: string
): Sample {
  const text = payloadText(rawPayload);

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (e) {
    throw new ParseError("Invalid JSON received", text, topic, e);
  }

  if (
    typeof document !== "object" ||
    document === null ||
    Array.isArray(document)
  ) {
    throw new ParseError("Payload is not a JSON object", text, topic);
  }

  const fields: Array<[string, FieldValue]> = [];
  for (const [name, value] of Object.entries(document)) {
    if (isFieldValue(value)) {
      fields.push([name, value]);
    }
  }
  return Sample.fromEntries(fields);
}

export function route(topic: string, rawPayload: Buffer | string): RouteResult {
  try {
    return {
      ok: true,
      deviceId: deviceIdFromTopic(topic),
      sample: decodeSample(rawPayload, topic),
    };
  } catch (e) {
    if (e instanceof ParseError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}
