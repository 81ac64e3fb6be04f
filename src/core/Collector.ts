import type { CollectorSettings } from "../config/types.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { initialPageRequest, nextPageRequest, pageRequestUrl, resolveNext } from "./cursor.js";
import { appendRecord, ensureLog, sessionLogPath } from "./LogWriter.js";
import { normalizeEvent } from "./normalize.js";
import type { ProgressChannel } from "./ProgressChannel.js";
import type { PageFetcher } from "./RetryClient.js";
import type {
  AuditRecord,
  CollectionOutcome,
  CollectionRequest,
  CollectorState,
  PageRequest,
} from "./types.js";

/** Log sink seam; defaults to the append-only file writer. */
export interface RecordSink {
  ensure(path: string): void;
  append(path: string, record: AuditRecord): void;
}

export const fileRecordSink: RecordSink = {
  ensure: ensureLog,
  append: appendRecord,
};

export interface CollectorOptions {
  settings: CollectorSettings;
  fetcher: PageFetcher;
  progress: ProgressChannel;
  sink?: RecordSink;
}

/**
 * Drives one session: fetch a page, normalize and append its events in order,
 * follow the cursor, until upstream reports no next page or the retry client
 * gives up. Pages are fetched strictly one after another. There is no retry at
 * this level; records already appended survive a failure.
 */
export class Collector {
  private readonly settings: CollectorSettings;
  private readonly fetcher: PageFetcher;
  private readonly progress: ProgressChannel;
  private readonly sink: RecordSink;
  private currentState: CollectorState = "idle";
  private total = 0;

  constructor(options: CollectorOptions) {
    this.settings = options.settings;
    this.fetcher = options.fetcher;
    this.progress = options.progress;
    this.sink = options.sink ?? fileRecordSink;
  }

  get state(): CollectorState {
    return this.currentState;
  }

  /** Records appended so far. */
  get recordCount(): number {
    return this.total;
  }

  async run(request: CollectionRequest): Promise<CollectionOutcome> {
    if (this.currentState !== "idle") {
      throw new Error(`Collector already used (state: ${this.currentState})`);
    }
    const logPath = sessionLogPath(this.settings.logsDir, request.sessionName);
    const initial = initialPageRequest(this.settings, request);
    let pageRequest: PageRequest = initial;
    let logReady = false;

    this.progress.publish({
      type: "session.started",
      sessionName: request.sessionName,
      logPath,
      limit: this.settings.pageSize,
    });
    logger.info(
      {
        sessionName: request.sessionName,
        logPath,
        from: request.windowStartMs,
        to: request.windowEndMs,
      },
      "Collection started",
    );

    try {
      for (;;) {
        this.currentState = "requesting";
        const url = pageRequestUrl(pageRequest);
        this.progress.publish({ type: "request.issued", url });
        const result = await this.fetcher.fetchPage(pageRequest);
        if (!result.ok) {
          return this.fail(logPath, result.error);
        }

        this.currentState = "persisting";
        const { events } = result.response;
        this.progress.publish({ type: "page.received", count: events.length });
        if (!logReady) {
          this.sink.ensure(logPath);
          logReady = true;
        }
        for (const event of events) {
          this.sink.append(logPath, normalizeEvent(event));
          this.total += 1;
        }
        logger.debug({ url, count: events.length, total: this.total }, "Page persisted");

        const next = resolveNext(result.response);
        if (next === null) {
          this.progress.publish({ type: "cursor.exhausted" });
          break;
        }
        pageRequest = nextPageRequest(initial, next);
      }
    } catch (err) {
      return this.fail(logPath, err instanceof Error ? err : new Error(errorMessage(err)));
    }

    this.currentState = "done";
    this.progress.publish({ type: "session.completed", total: this.total, logPath });
    logger.info({ sessionName: request.sessionName, total: this.total, logPath }, "Collection completed");
    return { state: "done", total: this.total, logPath };
  }

  private fail(logPath: string, error: Error): CollectionOutcome {
    this.currentState = "failed";
    this.progress.publish({ type: "session.failed", total: this.total, error: error.message });
    logger.error({ err: error, total: this.total, logPath }, "Collection failed");
    return { state: "failed", total: this.total, logPath, error };
  }
}
