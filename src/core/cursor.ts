import type { CollectorSettings } from "../config/types.js";
import type {
  CollectionRequest,
  NextPage,
  PageRequest,
  PageResponse,
  QueryPageRequest,
  RawEvent,
} from "./types.js";
import { isRecord } from "./normalize.js";

const ABSOLUTE_URL_RE = /^https?:\/\//i;

/** `next` under a section, when it is a non-empty string or a non-zero number. */
function nextFrom(section: unknown): string | null {
  if (!isRecord(section)) return null;
  const next = section.next;
  if (typeof next === "string" && next !== "") return next;
  if (typeof next === "number" && Number.isFinite(next) && next !== 0) return String(next);
  return null;
}

/**
 * Decode a parsed events-stream body. `data` must be an array to count as events;
 * the next token comes from `meta.next`, falling back to `links.next`.
 */
export function decodePage(body: unknown): PageResponse {
  if (!isRecord(body)) return emptyPage();
  const events: RawEvent[] = Array.isArray(body.data) ? body.data : [];
  return {
    events,
    nextCursor: nextFrom(body.meta) ?? nextFrom(body.links),
  };
}

export function emptyPage(): PageResponse {
  return { events: [], nextCursor: null };
}

/** Classify the next token: a full http(s) URL is followed verbatim, anything else is a cursor. */
export function resolveNext(response: PageResponse): NextPage | null {
  const token = response.nextCursor;
  if (token === null) return null;
  if (ABSOLUTE_URL_RE.test(token)) return { kind: "url", url: token };
  return { kind: "cursor", cursor: token };
}

export function eventsStreamUrl(settings: CollectorSettings): string {
  const base = settings.apiBaseUrl.replace(/\/+$/, "");
  return `${base}/${encodeURIComponent(settings.orgId)}/events-stream`;
}

export function initialPageRequest(
  settings: CollectorSettings,
  request: CollectionRequest,
): QueryPageRequest {
  return {
    kind: "query",
    baseUrl: eventsStreamUrl(settings),
    limit: settings.pageSize,
    windowStartMs: request.windowStartMs,
    windowEndMs: request.windowEndMs,
  };
}

/**
 * Build the follow-up request. An upstream link replaces the whole request;
 * a cursor is attached to the original base URL, window and page size.
 */
export function nextPageRequest(initial: QueryPageRequest, next: NextPage): PageRequest {
  if (next.kind === "url") {
    return { kind: "absolute", url: next.url };
  }
  return { ...initial, cursor: next.cursor };
}

/** Render a PageRequest to the URL actually fetched. */
export function pageRequestUrl(request: PageRequest): string {
  if (request.kind === "absolute") return request.url;
  const url = new URL(request.baseUrl);
  url.searchParams.set("limit", String(request.limit));
  url.searchParams.set("from", String(request.windowStartMs));
  url.searchParams.set("to", String(request.windowEndMs));
  if (request.cursor !== undefined) {
    url.searchParams.set("cursor", request.cursor);
  }
  return url.toString();
}
