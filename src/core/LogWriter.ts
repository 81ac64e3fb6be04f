import { closeSync, fsyncSync, mkdirSync, openSync, writeSync } from "node:fs";
import { dirname, join } from "node:path";
import { AUDIT_RECORD_FIELDS, type AuditRecord } from "./types.js";

/** `{logsDir}/{sessionName}.log` */
export function sessionLogPath(logsDir: string, sessionName: string): string {
  return join(logsDir, `${sessionName}.log`);
}

/** One self-contained JSON line, keys in the fixed column order, absent fields as null. */
export function serializeRecord(record: AuditRecord): string {
  const ordered: Record<string, string | null> = {};
  for (const field of AUDIT_RECORD_FIELDS) {
    ordered[field] = record[field] ?? null;
  }
  return `${JSON.stringify(ordered)}\n`;
}

/** Create the log (and its directory) if absent, without writing to it. */
export function ensureLog(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  closeSync(openSync(path, "a"));
}

/**
 * Append one record and flush it to disk before returning. A crash loses at most
 * the record being written.
 */
export function appendRecord(path: string, record: AuditRecord): void {
  const fd = openSync(path, "a");
  try {
    writeSync(fd, serializeRecord(record), null, "utf8");
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}
