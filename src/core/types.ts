/** One collection run: a session name and an epoch-ms window (start <= end). */
export interface CollectionRequest {
  readonly sessionName: string;
  readonly windowStartMs: number;
  readonly windowEndMs: number;
}

/** A follow-up link from upstream; already carries limit, window and cursor. */
export interface AbsolutePageRequest {
  kind: "absolute";
  url: string;
}

export interface QueryPageRequest {
  kind: "query";
  baseUrl: string;
  limit: number;
  windowStartMs: number;
  windowEndMs: number;
  cursor?: string;
}

/** Exactly one representation is active; the two are never merged. */
export type PageRequest = AbsolutePageRequest | QueryPageRequest;

/** Opaque upstream event; only a handful of paths are read (see normalizeEvent). */
export type RawEvent = unknown;

/** Decoded events-stream page. `nextCursor` is a cursor token or an absolute URL; null means exhausted. */
export interface PageResponse {
  events: RawEvent[];
  nextCursor: string | null;
}

/** Resolved follow-up page: an absolute link, or a cursor to attach to the original query. */
export type NextPage =
  | { kind: "url"; url: string }
  | { kind: "cursor"; cursor: string };

/** Persisted unit; one JSON line in the session log. */
export interface AuditRecord {
  time: string | null;
  action: string | null;
  actor_name: string | null;
  actor_email: string | null;
  ip: string | null;
  event_id: string | null;
}

/** Column order shared by the log writer and the CSV exporter. */
export const AUDIT_RECORD_FIELDS = [
  "time",
  "action",
  "actor_name",
  "actor_email",
  "ip",
  "event_id",
] as const satisfies ReadonlyArray<keyof AuditRecord>;

export type CollectorState = "idle" | "requesting" | "persisting" | "done" | "failed";

export type CollectionOutcome =
  | { state: "done"; total: number; logPath: string }
  | { state: "failed"; total: number; logPath: string; error: Error };
