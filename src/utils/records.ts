/**
 * JSON record decoding shared by the local link and the offline queue.
 */

import type { TelemetryRecord } from "../types/index.ts";

/** Error thrown when an inbound payload is not a JSON object */
export class DecodeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "DecodeError";
  }
}

/** JSON.parse output is always JSON; only the top-level shape needs checking */
export function isTelemetryRecord(value: unknown): value is TelemetryRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode a structured payload into a record.
 * Throws DecodeError for invalid JSON or a non-object top level.
 */
export function decodeRecord(raw: string | Buffer): TelemetryRecord {
  const text = typeof raw === "string" ? raw : raw.toString("utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`, err);
  }

  if (!isTelemetryRecord(parsed)) {
    const kind = Array.isArray(parsed) ? "array" : parsed === null ? "null" : typeof parsed;
    throw new DecodeError(`Expected a JSON object, got ${kind}`);
  }

  return parsed;
}
