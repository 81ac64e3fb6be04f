import { InvalidDateError } from "../errors.js";

/** Calendar dates are read in a fixed UTC+9 offset. */
export const WINDOW_OFFSET_MINUTES = 9 * 60;

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const OFFSET_MS = WINDOW_OFFSET_MINUTES * 60_000;
const DAY_MS = 24 * 60 * 60_000;

export interface CollectionWindow {
  windowStartMs: number;
  windowEndMs: number;
}

/** Epoch ms of 00:00:00.000 at UTC+9 on `date`; throws InvalidDateError for anything but a real YYYY-MM-DD date. */
export function startOfDayMs(date: string): number {
  const m = DATE_RE.exec(date.trim());
  if (!m) throw new InvalidDateError(date);
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const utc = new Date(Date.UTC(year, month - 1, day));
  if (
    utc.getUTCFullYear() !== year ||
    utc.getUTCMonth() !== month - 1 ||
    utc.getUTCDate() !== day
  ) {
    throw new InvalidDateError(date);
  }
  return utc.getTime() - OFFSET_MS;
}

/** [dateFrom 00:00:00.000, dateTo 23:59:59.999] at UTC+9, in epoch ms. */
export function collectionWindow(dateFrom: string, dateTo: string): CollectionWindow {
  return {
    windowStartMs: startOfDayMs(dateFrom),
    windowEndMs: startOfDayMs(dateTo) + DAY_MS - 1,
  };
}

/**
 * Session name from user input: trimmed, a trailing ".log" removed.
 * Returns null when nothing usable is left or the name would escape the logs directory.
 */
export function sessionNameFrom(input: string): string | null {
  let name = input.trim();
  if (name.endsWith(".log")) name = name.slice(0, -".log".length);
  if (name === "" || name === "." || name === "..") return null;
  if (/[\\/\0]/.test(name)) return null;
  return name;
}
