import { EventEmitter } from "node:events";

/** Notifications the collector pushes to its collaborator. */
export type ProgressPayload =
  | { type: "session.started"; sessionName: string; logPath: string; limit: number }
  | { type: "request.issued"; url: string }
  | { type: "page.received"; count: number }
  | { type: "rate.limited"; attempt: number; maxAttempts: number; waitSeconds: number }
  | { type: "request.failed"; attempt: number; maxAttempts: number; error: string }
  | { type: "retry.waiting"; waitSeconds: number }
  | { type: "body.empty"; attempt: number }
  | { type: "cursor.exhausted" }
  | { type: "session.completed"; total: number; logPath: string }
  | { type: "session.failed"; total: number; error: string }
  | { type: "export.completed"; csvPath: string; count: number }
  | { type: "export.failed"; error: string };

export type ProgressType = ProgressPayload["type"];

/** A published notification: payload plus its position, ISO timestamp and rendered message. */
export type ProgressEvent = ProgressPayload & {
  seq: number;
  at: string;
  message: string;
};

const PROGRESS_TOPIC = "progress";

export function describeProgress(payload: ProgressPayload): string {
  switch (payload.type) {
    case "session.started":
      return `Started ${payload.sessionName} | file: ${payload.logPath} | limit=${payload.limit}`;
    case "request.issued":
      return `Request: ${payload.url}`;
    case "page.received":
      return `Received: ${payload.count} events`;
    case "rate.limited":
      return `[429] Rate limited. Waiting ${payload.waitSeconds} seconds (attempt ${payload.attempt}/${payload.maxAttempts})`;
    case "request.failed":
      return `[Request error] attempt ${payload.attempt}/${payload.maxAttempts}: ${payload.error}`;
    case "retry.waiting":
      return `Waiting ${payload.waitSeconds} seconds before retry`;
    case "body.empty":
      return `[Error] The result of request is empty (attempt ${payload.attempt})`;
    case "cursor.exhausted":
      return "No next token: collection complete";
    case "session.completed":
      return `Collection complete: saved ${payload.total} events to ${payload.logPath}`;
    case "session.failed":
      return `[Error] Collection failed after ${payload.total} events: ${payload.error}`;
    case "export.completed":
      return `Exported CSV: ${payload.csvPath} (${payload.count} records)`;
    case "export.failed":
      return `[Error] CSV export failed: ${payload.error}`;
  }
}

export function isTerminalProgress(event: ProgressEvent): boolean {
  return event.type === "session.completed" || event.type === "session.failed";
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `[YYYY-MM-DD HH:mm:ss] message`, in local time. */
export function formatProgressLine(event: ProgressEvent): string {
  const d = new Date(event.at);
  const stamp =
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
  return `[${stamp}] ${event.message}`;
}

/**
 * Ordered, unbounded, one-directional channel from the collector to its collaborator.
 * Nothing is dropped: every event stays in history. A single consumer pulls with
 * drain(); pollers read by position with since(); push subscribers use onProgress().
 */
export class ProgressChannel {
  private readonly emitter = new EventEmitter();
  private readonly history: ProgressEvent[] = [];
  private drained = 0;
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
    // SSE streams attach one listener each.
    this.emitter.setMaxListeners(0);
  }

  publish(payload: ProgressPayload): ProgressEvent {
    const event: ProgressEvent = {
      ...payload,
      seq: this.history.length,
      at: this.now().toISOString(),
      message: describeProgress(payload),
    };
    this.history.push(event);
    this.emitter.emit(PROGRESS_TOPIC, event);
    return event;
  }

  /** Everything published since the previous drain, in arrival order. */
  drain(): ProgressEvent[] {
    const pending = this.history.slice(this.drained);
    this.drained = this.history.length;
    return pending;
  }

  /** History from position `index` (0-based) onward. */
  since(index: number): ProgressEvent[] {
    return this.history.slice(Math.max(0, index));
  }

  get size(): number {
    return this.history.length;
  }

  /** Live subscribers, e.g. open progress streams. */
  get subscriberCount(): number {
    return this.emitter.listenerCount(PROGRESS_TOPIC);
  }

  /** Subscribe to events published from now on; returns the unsubscribe function. */
  onProgress(listener: (event: ProgressEvent) => void): () => void {
    this.emitter.on(PROGRESS_TOPIC, listener);
    return () => {
      this.emitter.off(PROGRESS_TOPIC, listener);
    };
  }
}
