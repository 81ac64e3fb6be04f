import { open, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { createInterface } from "node:readline";
import { z } from "zod";
import { CorruptLogError } from "../errors.js";
import { logger } from "../logger.js";
import { AUDIT_RECORD_FIELDS, type AuditRecord } from "./types.js";

const CSV_EOL = "\r\n";

const recordLineSchema = z.record(z.unknown());

function cellText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/**
 * Decode one log line into an AuditRecord; missing keys become null and extra keys are ignored.
 * Returns null when the line is not a JSON object.
 */
export function decodeRecordLine(line: string): AuditRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  const result = recordLineSchema.safeParse(parsed);
  if (!result.success) return null;
  const obj = result.data;
  return {
    time: cellText(obj.time),
    action: cellText(obj.action),
    actor_name: cellText(obj.actor_name),
    actor_email: cellText(obj.actor_email),
    ip: cellText(obj.ip),
    event_id: cellText(obj.event_id),
  };
}

/** Quote a cell when it contains a comma, double quote or line break. */
function escapeCsvCell(value: string | null): string {
  if (value === null) return "";
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function csvRow(cells: ReadonlyArray<string | null>): string {
  return cells.map(escapeCsvCell).join(",") + CSV_EOL;
}

/** `{dir}/{name}.csv` beside a `{dir}/{name}.log`. */
export function defaultCsvPath(logPath: string): string {
  const name = basename(logPath, extname(logPath));
  return join(dirname(logPath), `${name}.csv`);
}

/**
 * Convert a session log to CSV with a header row and the fixed six columns.
 * The table is written to `{csvPath}.tmp` and renamed into place only after every
 * line decoded; a malformed line throws CorruptLogError and leaves no table behind.
 * Returns the number of data rows.
 */
export async function exportLogToCsv(logPath: string, csvPath: string): Promise<number> {
  const tmpPath = `${csvPath}.tmp`;
  const chunks: string[] = [csvRow(AUDIT_RECORD_FIELDS)];
  let count = 0;

  // Opening first surfaces a missing log as ENOENT before any line is read.
  const handle = await open(logPath, "r");
  const lines = createInterface({
    input: handle.createReadStream({ encoding: "utf8", autoClose: false }),
    crlfDelay: Infinity,
  });
  let lineNo = 0;
  try {
    for await (const line of lines) {
      lineNo += 1;
      const record = decodeRecordLine(line);
      if (record === null) {
        throw new CorruptLogError(logPath, lineNo);
      }
      chunks.push(csvRow(AUDIT_RECORD_FIELDS.map((field) => record[field])));
      count += 1;
    }
  } finally {
    lines.close();
    await handle.close();
  }

  try {
    await writeFile(tmpPath, chunks.join(""), "utf8");
    await rename(tmpPath, csvPath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
  logger.info({ logPath, csvPath, count }, "Exported session log to CSV");
  return count;
}
