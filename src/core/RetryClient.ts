import type { CollectorSettings } from "../config/types.js";
import {
  ExhaustedRetriesError,
  RateLimitedError,
  TransportFailureError,
  errorMessage,
} from "../errors.js";
import { logger } from "../logger.js";
import { decodePage, emptyPage, pageRequestUrl } from "./cursor.js";
import { isRecord } from "./normalize.js";
import type { ProgressChannel } from "./ProgressChannel.js";
import type { PageRequest, PageResponse } from "./types.js";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;
export type SleepFn = (ms: number) => Promise<void>;

/** Explicit retry state threaded through the loop; attempt counts from 1. */
export interface RetryState {
  readonly attempt: number;
  readonly maxAttempts: number;
}

export type FetchResult =
  | { ok: true; response: PageResponse }
  | { ok: false; error: ExhaustedRetriesError };

/** The retry client as seen by the collector; tests substitute scripted pages. */
export interface PageFetcher {
  fetchPage(request: PageRequest): Promise<FetchResult>;
}

export interface RetryClientOptions {
  settings: CollectorSettings;
  progress: ProgressChannel;
  fetch?: FetchFn;
  sleep?: SleepFn;
}

type AttemptOutcome =
  | { kind: "page"; response: PageResponse }
  | { kind: "rate-limited"; error: RateLimitedError }
  | { kind: "failed"; error: TransportFailureError };

const RETRY_AFTER_RE = /^\d+$/;

/** Largest delay setTimeout honors; anything above fires after 1 ms. */
export const MAX_DELAY_MS = 2 ** 31 - 1;

export function delayMs(seconds: number): number {
  return Math.min(seconds * 1000, MAX_DELAY_MS);
}

export const defaultSleep: SleepFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Server-advised wait in seconds, when the header is a non-negative integer. */
export function parseRetryAfter(header: string | null): number | null {
  if (header === null) return null;
  const value = header.trim();
  return RETRY_AFTER_RE.test(value) ? Number.parseInt(value, 10) : null;
}

/** `base * 2^(attempt-1)` seconds. */
export function backoffSeconds(baseSeconds: number, attempt: number): number {
  return baseSeconds * 2 ** (attempt - 1);
}

/**
 * Issues one logical events-stream request with bounded retry.
 * Rate limiting (429) always waits before deciding to give up; transport failures
 * and other non-2xx statuses are reported, backed off and retried. Both share one
 * attempt budget (settings.maxRetries). A 2xx body that is not a JSON object is an
 * empty page.
 */
export class HttpRetryClient implements PageFetcher {
  private readonly settings: CollectorSettings;
  private readonly progress: ProgressChannel;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;
  private readonly headers: Record<string, string>;

  constructor(options: RetryClientOptions) {
    this.settings = options.settings;
    this.progress = options.progress;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.headers = {
      Authorization: `Bearer ${this.settings.apiToken}`,
      Accept: "application/json",
    };
  }

  async fetchPage(request: PageRequest): Promise<FetchResult> {
    const url = pageRequestUrl(request);
    let state: RetryState = { attempt: 1, maxAttempts: this.settings.maxRetries };

    for (;;) {
      const outcome = await this.attempt(url, state);
      if (outcome.kind === "page") {
        return { ok: true, response: outcome.response };
      }

      if (outcome.kind === "rate-limited") {
        const waitSeconds =
          outcome.error.retryAfterSeconds ??
          backoffSeconds(this.settings.retryBaseSeconds, state.attempt);
        this.progress.publish({
          type: "rate.limited",
          attempt: state.attempt,
          maxAttempts: state.maxAttempts,
          waitSeconds,
        });
        logger.warn({ url, ...state, waitSeconds }, "Rate limited by upstream");
        await this.sleep(delayMs(waitSeconds));
        if (state.attempt >= state.maxAttempts) {
          return this.giveUp(url, state, outcome.error);
        }
      } else {
        this.progress.publish({
          type: "request.failed",
          attempt: state.attempt,
          maxAttempts: state.maxAttempts,
          error: outcome.error.message,
        });
        logger.warn(
          { url, ...state, status: outcome.error.status, err: outcome.error },
          "Request failed",
        );
        if (state.attempt >= state.maxAttempts) {
          return this.giveUp(url, state, outcome.error);
        }
        const waitSeconds = backoffSeconds(this.settings.retryBaseSeconds, state.attempt);
        this.progress.publish({ type: "retry.waiting", waitSeconds });
        await this.sleep(delayMs(waitSeconds));
      }

      state = { ...state, attempt: state.attempt + 1 };
    }
  }

  private giveUp(
    url: string,
    state: RetryState,
    cause: RateLimitedError | TransportFailureError,
  ): FetchResult {
    logger.error({ url, attempts: state.attempt, code: cause.code }, "Retry budget exhausted");
    return { ok: false, error: new ExhaustedRetriesError(state.attempt, cause) };
  }

  private async attempt(url: string, state: RetryState): Promise<AttemptOutcome> {
    const timeoutMs = delayMs(this.settings.requestTimeoutSeconds);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    logger.debug({ url, ...state }, "Requesting page");
    try {
      const res = await this.fetchFn(url, {
        method: "GET",
        headers: this.headers,
        signal: controller.signal,
      });
      if (res.status === 429) {
        // Drain so the connection can be reused.
        await res.text().catch(() => "");
        return {
          kind: "rate-limited",
          error: new RateLimitedError(url, parseRetryAfter(res.headers.get("Retry-After"))),
        };
      }
      if (!res.ok) {
        const detail = await res.text().catch(() => "");
        return {
          kind: "failed",
          error: new TransportFailureError(
            `${res.status} ${res.statusText || "Error"} for url: ${url}${detail ? ` (${detail.slice(0, 200)})` : ""}`,
            res.status,
          ),
        };
      }
      const text = await res.text();
      return { kind: "page", response: this.decodeBody(text, state) };
    } catch (err) {
      const message = controller.signal.aborted
        ? `Request timed out after ${this.settings.requestTimeoutSeconds}s for url: ${url}`
        : `Request error for url: ${url}: ${errorMessage(err)}`;
      return {
        kind: "failed",
        error: new TransportFailureError(message, null, { cause: err }),
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private decodeBody(text: string, state: RetryState): PageResponse {
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      body = undefined;
    }
    if (!isRecord(body)) {
      this.progress.publish({ type: "body.empty", attempt: state.attempt });
      logger.debug({ ...state, length: text.length }, "Empty or non-JSON page body");
      return emptyPage();
    }
    return decodePage(body);
  }
}
