import type { AuditRecord, RawEvent } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Walk `path` through nested objects; any missing or non-object hop yields undefined. */
function pick(source: unknown, path: readonly string[]): unknown {
  let current: unknown = source;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function asText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

/**
 * Flatten one upstream event into the persisted record shape.
 * Total over every input: each field resolves independently to a string or null.
 */
export function normalizeEvent(raw: RawEvent): AuditRecord {
  return {
    time: asText(pick(raw, ["attributes", "time"])),
    action: asText(pick(raw, ["attributes", "action"])),
    actor_name: asText(pick(raw, ["attributes", "actor", "name"])),
    actor_email: asText(pick(raw, ["attributes", "actor", "email"])),
    ip: asText(pick(raw, ["attributes", "location", "ip"])),
    event_id: asText(pick(raw, ["id"])),
  };
}
