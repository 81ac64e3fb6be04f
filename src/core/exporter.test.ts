import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { CorruptLogError } from "../errors.js";
import { decodeRecordLine, defaultCsvPath, exportLogToCsv } from "./exporter.js";
import { appendRecord } from "./LogWriter.js";

const HEADER = "time,action,actor_name,actor_email,ip,event_id\r\n";

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe("decodeRecordLine", () => {
  it("fills missing keys with null and ignores extra ones", () => {
    expect(decodeRecordLine('{"event_id":"e2","extra":1}')).toEqual({
      time: null,
      action: null,
      actor_name: null,
      actor_email: null,
      ip: null,
      event_id: "e2",
    });
  });

  it("rejects lines that are not JSON objects", () => {
    expect(decodeRecordLine("not json")).toBeNull();
    expect(decodeRecordLine("[1,2]")).toBeNull();
    expect(decodeRecordLine("null")).toBeNull();
  });
});

describe("defaultCsvPath", () => {
  it("swaps the .log extension for .csv", () => {
    expect(defaultCsvPath("/data/logs/s1.log")).toBe("/data/logs/s1.csv");
  });
});

describe("exportLogToCsv", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "audit-export-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes a header and one quoted-as-needed row per record", async () => {
    const logPath = join(dir, "s1.log");
    appendRecord(logPath, {
      time: "2024-01-01T00:00:00Z",
      action: "user_login",
      actor_name: "Kim, Minsu",
      actor_email: "kim@example.com",
      ip: null,
      event_id: "e1",
    });
    appendRecord(logPath, {
      time: null,
      action: 'said "hi"',
      actor_name: "line\nbreak",
      actor_email: null,
      ip: null,
      event_id: "e2",
    });
    const csvPath = join(dir, "s1.csv");

    const count = await exportLogToCsv(logPath, csvPath);

    expect(count).toBe(2);
    expect(await readFile(csvPath, "utf8")).toBe(
      HEADER +
        '2024-01-01T00:00:00Z,user_login,"Kim, Minsu",kim@example.com,,e1\r\n' +
        ',"said ""hi""","line\nbreak",,,e2\r\n',
    );
  });

  it("produces a header-only table for an empty log", async () => {
    const logPath = join(dir, "empty.log");
    await writeFile(logPath, "");
    const csvPath = join(dir, "empty.csv");

    expect(await exportLogToCsv(logPath, csvPath)).toBe(0);
    expect(await readFile(csvPath, "utf8")).toBe(HEADER);
  });

  it("is byte-identical across repeated exports of the same log", async () => {
    const logPath = join(dir, "s2.log");
    await writeFile(logPath, '{"event_id":"e1","ip":"10.0.0.1"}\n{"event_id":"e2"}\n');

    await exportLogToCsv(logPath, join(dir, "a.csv"));
    await exportLogToCsv(logPath, join(dir, "b.csv"));

    const a = await readFile(join(dir, "a.csv"));
    const b = await readFile(join(dir, "b.csv"));
    expect(a.equals(b)).toBe(true);
  });

  it("fails on a malformed line and leaves no table behind", async () => {
    const logPath = join(dir, "bad.log");
    await writeFile(logPath, '{"event_id":"e1"}\nnot json\n');
    const csvPath = join(dir, "bad.csv");

    const failure = exportLogToCsv(logPath, csvPath);

    await expect(failure).rejects.toBeInstanceOf(CorruptLogError);
    await expect(failure).rejects.toMatchObject({ code: "CORRUPT_LOG", line: 2 });
    expect(await exists(csvPath)).toBe(false);
    expect(await exists(`${csvPath}.tmp`)).toBe(false);
  });

  it("rejects with ENOENT when the log does not exist", async () => {
    await expect(
      exportLogToCsv(join(dir, "missing.log"), join(dir, "missing.csv")),
    ).rejects.toMatchObject({ code: "ENOENT" });
  });
});
