import { v4 as uuidv4 } from "uuid";
import type { CollectorSettings } from "../config/types.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { Collector, type RecordSink } from "./Collector.js";
import { defaultCsvPath, exportLogToCsv } from "./exporter.js";
import { sessionLogPath } from "./LogWriter.js";
import { ProgressChannel } from "./ProgressChannel.js";
import { HttpRetryClient, type PageFetcher } from "./RetryClient.js";
import type { CollectionOutcome, CollectionRequest } from "./types.js";

export type SessionStatus = "running" | "done" | "failed";

export interface CollectionSession {
  readonly id: string;
  readonly request: CollectionRequest;
  readonly logPath: string;
  readonly startedAt: string;
  readonly progress: ProgressChannel;
  /** Settles with the outcome; never rejects. */
  readonly completion: Promise<CollectionOutcome>;
  status: SessionStatus;
  finishedAt: string | null;
  outcome: CollectionOutcome | null;
  /** Live record count, read from the collector while running. */
  readonly recordCount: () => number;
}

/** JSON-friendly view of a session for the HTTP surface and the CLI. */
export interface SessionSummary {
  id: string;
  sessionName: string;
  windowStartMs: number;
  windowEndMs: number;
  logPath: string;
  status: SessionStatus;
  total: number;
  startedAt: string;
  finishedAt: string | null;
  error: string | null;
  progressCount: number;
}

export type StartResult =
  | { ok: true; session: CollectionSession }
  | { ok: false; reason: "busy"; active: CollectionSession };

export type ExportResult =
  | { ok: true; csvPath: string; count: number }
  | { ok: false; reason: "not-found" }
  | { ok: false; reason: "running" }
  | { ok: false; reason: "error"; error: Error };

export interface SessionManagerOptions {
  settings: CollectorSettings;
  /** Builds the page fetcher for a session; defaults to HttpRetryClient over the session's channel. */
  createFetcher?: (progress: ProgressChannel) => PageFetcher;
  sink?: RecordSink;
}

/**
 * Owns collection sessions and enforces a single session in flight. Each session
 * gets its own progress channel; the collector runs in the background and the
 * caller observes it through the channel and the completion promise.
 */
export class SessionManager {
  private readonly settings: CollectorSettings;
  private readonly createFetcher: (progress: ProgressChannel) => PageFetcher;
  private readonly sink: RecordSink | undefined;
  private readonly sessions = new Map<string, CollectionSession>();
  private active: CollectionSession | null = null;
  private latest: CollectionSession | null = null;

  constructor(options: SessionManagerOptions) {
    this.settings = options.settings;
    this.createFetcher =
      options.createFetcher ??
      ((progress) => new HttpRetryClient({ settings: this.settings, progress }));
    this.sink = options.sink;
  }

  start(request: CollectionRequest): StartResult {
    if (this.active) {
      logger.warn(
        { activeId: this.active.id, requested: request.sessionName },
        "Refusing to start: a session is already running",
      );
      return { ok: false, reason: "busy", active: this.active };
    }

    const progress = new ProgressChannel();
    const collector = new Collector({
      settings: this.settings,
      fetcher: this.createFetcher(progress),
      progress,
      sink: this.sink,
    });
    const id = uuidv4();

    const completion = collector.run(request).catch((err: unknown): CollectionOutcome => {
      const error = err instanceof Error ? err : new Error(errorMessage(err));
      logger.error({ err: error, sessionId: id }, "Collector crashed");
      return {
        state: "failed",
        total: collector.recordCount,
        logPath: sessionLogPath(this.settings.logsDir, request.sessionName),
        error,
      };
    });

    const session: CollectionSession = {
      id,
      request,
      logPath: sessionLogPath(this.settings.logsDir, request.sessionName),
      startedAt: new Date().toISOString(),
      progress,
      completion: completion.then((outcome) => {
        session.status = outcome.state;
        session.outcome = outcome;
        session.finishedAt = new Date().toISOString();
        if (this.active === session) this.active = null;
        return outcome;
      }),
      status: "running",
      finishedAt: null,
      outcome: null,
      recordCount: () => collector.recordCount,
    };

    this.sessions.set(id, session);
    this.active = session;
    this.latest = session;
    logger.info({ sessionId: id, sessionName: request.sessionName }, "Session started");
    return { ok: true, session };
  }

  get(id: string): CollectionSession | undefined {
    return this.sessions.get(id);
  }

  /** The running session, else the most recently started one. */
  current(): CollectionSession | null {
    return this.active ?? this.latest;
  }

  isBusy(): boolean {
    return this.active !== null;
  }

  /**
   * Convert a finished session's log to CSV (default: beside the log). Refused
   * while the collector still owns the log.
   */
  async exportSession(id: string, csvPath?: string): Promise<ExportResult> {
    const session = this.sessions.get(id);
    if (!session) return { ok: false, reason: "not-found" };
    if (session.status === "running") return { ok: false, reason: "running" };
    // A later session under the same name appends to this log.
    if (this.active?.logPath === session.logPath) return { ok: false, reason: "running" };

    const target = csvPath ?? defaultCsvPath(session.logPath);
    try {
      const count = await exportLogToCsv(session.logPath, target);
      session.progress.publish({ type: "export.completed", csvPath: target, count });
      return { ok: true, csvPath: target, count };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(errorMessage(err));
      session.progress.publish({ type: "export.failed", error: error.message });
      logger.warn({ err: error, sessionId: id, csvPath: target }, "CSV export failed");
      return { ok: false, reason: "error", error };
    }
  }

  summarize(session: CollectionSession): SessionSummary {
    const outcome = session.outcome;
    return {
      id: session.id,
      sessionName: session.request.sessionName,
      windowStartMs: session.request.windowStartMs,
      windowEndMs: session.request.windowEndMs,
      logPath: session.logPath,
      status: session.status,
      total: outcome ? outcome.total : session.recordCount(),
      startedAt: session.startedAt,
      finishedAt: session.finishedAt,
      error: outcome?.state === "failed" ? outcome.error.message : null,
      progressCount: session.progress.size,
    };
  }
}
