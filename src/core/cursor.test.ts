import { describe, it, expect } from "vitest";
import type { CollectorSettings } from "../config/types.js";
import {
  decodePage,
  eventsStreamUrl,
  initialPageRequest,
  nextPageRequest,
  pageRequestUrl,
  resolveNext,
} from "./cursor.js";

const settings: CollectorSettings = {
  orgId: "org-1",
  apiToken: "test-token",
  apiBaseUrl: "https://api.example.com/orgs/",
  pageSize: 100,
  maxRetries: 5,
  retryBaseSeconds: 3,
  requestTimeoutSeconds: 30,
  logsDir: "./logs",
};

describe("decodePage", () => {
  it("prefers meta.next over links.next", () => {
    const page = decodePage({
      data: [{ id: "a" }],
      meta: { next: "c1" },
      links: { next: "https://api.example.com/next" },
    });
    expect(page).toEqual({ events: [{ id: "a" }], nextCursor: "c1" });
  });

  it("falls back to links.next when meta.next is empty", () => {
    const page = decodePage({ data: [], meta: { next: "" }, links: { next: "c2" } });
    expect(page.nextCursor).toBe("c2");
  });

  it("stringifies a numeric token and ignores zero", () => {
    expect(decodePage({ meta: { next: 42 } }).nextCursor).toBe("42");
    expect(decodePage({ meta: { next: 0 } }).nextCursor).toBeNull();
  });

  it("reads no events when data is not an array", () => {
    expect(decodePage({ data: { id: "a" } })).toEqual({ events: [], nextCursor: null });
  });
});

describe("resolveNext", () => {
  it("classifies http(s) URLs case-insensitively", () => {
    expect(resolveNext({ events: [], nextCursor: "HTTPS://api.example.com/p2" })).toEqual({
      kind: "url",
      url: "HTTPS://api.example.com/p2",
    });
    expect(resolveNext({ events: [], nextCursor: "abc" })).toEqual({
      kind: "cursor",
      cursor: "abc",
    });
    expect(resolveNext({ events: [], nextCursor: null })).toBeNull();
  });
});

describe("page requests", () => {
  const initial = initialPageRequest(settings, {
    sessionName: "s1",
    windowStartMs: 10,
    windowEndMs: 20,
  });

  it("builds the events-stream URL without a doubled slash", () => {
    expect(eventsStreamUrl(settings)).toBe("https://api.example.com/orgs/org-1/events-stream");
    expect(eventsStreamUrl({ ...settings, orgId: "a b" })).toBe(
      "https://api.example.com/orgs/a%20b/events-stream",
    );
  });

  it("renders limit, from and to on the first request", () => {
    expect(pageRequestUrl(initial)).toBe(
      "https://api.example.com/orgs/org-1/events-stream?limit=100&from=10&to=20",
    );
  });

  it("keeps the window and page size when attaching a cursor", () => {
    const next = nextPageRequest(initial, { kind: "cursor", cursor: "c/1" });
    expect(pageRequestUrl(next)).toBe(
      "https://api.example.com/orgs/org-1/events-stream?limit=100&from=10&to=20&cursor=c%2F1",
    );
  });

  it("follows an absolute link verbatim with no extra parameters", () => {
    const url = "https://api.example.com/orgs/org-1/events-stream?cursor=zz";
    const next = nextPageRequest(initial, { kind: "url", url });
    expect(next).toEqual({ kind: "absolute", url });
    expect(pageRequestUrl(next)).toBe(url);
  });

  it("allows a window whose start equals its end", () => {
    const single = initialPageRequest(settings, {
      sessionName: "s1",
      windowStartMs: 5,
      windowEndMs: 5,
    });
    expect(pageRequestUrl(single)).toContain("from=5&to=5");
  });
});
