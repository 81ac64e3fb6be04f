import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { CollectorSettings } from "../config/types.js";
import type { FetchResult, PageFetcher } from "./RetryClient.js";
import { SessionManager } from "./SessionManager.js";
import type { CollectionRequest } from "./types.js";

function makeSettings(logsDir: string): CollectorSettings {
  return {
    orgId: "org-1",
    apiToken: "test-token",
    apiBaseUrl: "https://api.example.com/orgs",
    pageSize: 50,
    maxRetries: 1,
    retryBaseSeconds: 1,
    requestTimeoutSeconds: 30,
    logsDir,
  };
}

/** Fetcher that holds its single page until release() is called. */
function gatedFetcher(): { fetcher: PageFetcher; release: () => void } {
  let release!: () => void;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const fetcher: PageFetcher = {
    async fetchPage(): Promise<FetchResult> {
      await gate;
      return {
        ok: true,
        response: {
          events: [{ id: "e1", attributes: { action: "user_login" } }],
          nextCursor: null,
        },
      };
    },
  };
  return { fetcher, release };
}

function request(sessionName: string): CollectionRequest {
  return { sessionName, windowStartMs: 0, windowEndMs: 1 };
}

describe("SessionManager", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "audit-sessions-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("refuses a second session while one is running", async () => {
    const { fetcher, release } = gatedFetcher();
    const manager = new SessionManager({ settings: makeSettings(dir), createFetcher: () => fetcher });

    const first = manager.start(request("s1"));
    expect(first.ok).toBe(true);
    if (!first.ok) return;
    expect(manager.isBusy()).toBe(true);

    const second = manager.start(request("s2"));
    expect(second.ok).toBe(false);
    if (second.ok) return;
    expect(second.active.id).toBe(first.session.id);

    release();
    const outcome = await first.session.completion;
    expect(outcome).toMatchObject({ state: "done", total: 1 });
    expect(manager.isBusy()).toBe(false);
    expect(first.session.status).toBe("done");
    const third = manager.start(request("s3"));
    expect(third.ok).toBe(true);
    if (third.ok) await third.session.completion;
  });

  it("summarizes a finished session", async () => {
    const { fetcher, release } = gatedFetcher();
    const manager = new SessionManager({ settings: makeSettings(dir), createFetcher: () => fetcher });
    const started = manager.start(request("weekly"));
    if (!started.ok) throw new Error("expected the session to start");
    release();
    await started.session.completion;

    const summary = manager.summarize(started.session);

    expect(summary).toMatchObject({
      id: started.session.id,
      sessionName: "weekly",
      logPath: join(dir, "weekly.log"),
      status: "done",
      total: 1,
      error: null,
    });
    expect(summary.finishedAt).not.toBeNull();
    expect(manager.current()).toBe(started.session);
    expect(manager.get(started.session.id)).toBe(started.session);
  });

  it("records a failed outcome with the error message", async () => {
    const manager = new SessionManager({
      settings: makeSettings(dir),
      createFetcher: () => ({
        async fetchPage(): Promise<FetchResult> {
          throw new Error("disk on fire");
        },
      }),
    });
    const started = manager.start(request("s1"));
    if (!started.ok) throw new Error("expected the session to start");

    const outcome = await started.session.completion;

    expect(outcome.state).toBe("failed");
    expect(manager.summarize(started.session).error).toBe("disk on fire");
    expect(manager.isBusy()).toBe(false);
  });

  it("exports only finished sessions", async () => {
    const { fetcher, release } = gatedFetcher();
    const manager = new SessionManager({ settings: makeSettings(dir), createFetcher: () => fetcher });
    const started = manager.start(request("s1"));
    if (!started.ok) throw new Error("expected the session to start");
    const { session } = started;

    expect(await manager.exportSession(session.id)).toEqual({ ok: false, reason: "running" });
    expect(await manager.exportSession("unknown")).toEqual({ ok: false, reason: "not-found" });

    release();
    await session.completion;
    const result = await manager.exportSession(session.id);

    expect(result).toEqual({ ok: true, csvPath: join(dir, "s1.csv"), count: 1 });
    expect(await readFile(join(dir, "s1.csv"), "utf8")).toBe(
      "time,action,actor_name,actor_email,ip,event_id\r\n,user_login,,,,e1\r\n",
    );
    expect(session.progress.since(0).at(-1)?.message).toBe(
      `Exported CSV: ${join(dir, "s1.csv")} (1 records)`,
    );
  });

  it("reports a corrupt log as an export error", async () => {
    const { fetcher, release } = gatedFetcher();
    const manager = new SessionManager({ settings: makeSettings(dir), createFetcher: () => fetcher });
    const started = manager.start(request("s1"));
    if (!started.ok) throw new Error("expected the session to start");
    release();
    await started.session.completion;
    await writeFile(join(dir, "s1.log"), "garbage\n", { flag: "a" });

    const result = await manager.exportSession(started.session.id);

    expect(result.ok).toBe(false);
    if (result.ok || result.reason !== "error") return;
    expect(result.error).toMatchObject({ code: "CORRUPT_LOG", line: 2 });
    expect(started.session.progress.since(0).at(-1)?.type).toBe("export.failed");
  });

  it("refuses to export a log another running session is appending to", async () => {
    const first = gatedFetcher();
    const second = gatedFetcher();
    const fetchers = [first.fetcher, second.fetcher];
    const manager = new SessionManager({
      settings: makeSettings(dir),
      createFetcher: () => fetchers.shift() ?? second.fetcher,
    });
    const earlier = manager.start(request("x"));
    if (!earlier.ok) throw new Error("expected the session to start");
    first.release();
    await earlier.session.completion;

    const later = manager.start(request("x"));
    if (!later.ok) throw new Error("expected the session to start");
    expect(later.session.logPath).toBe(earlier.session.logPath);

    expect(await manager.exportSession(earlier.session.id)).toEqual({
      ok: false,
      reason: "running",
    });

    second.release();
    await later.session.completion;
    expect(await manager.exportSession(earlier.session.id)).toEqual({
      ok: true,
      csvPath: join(dir, "x.csv"),
      count: 2,
    });
  });
});
