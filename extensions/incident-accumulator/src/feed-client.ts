/**
 * Incident Feed Client
 *
 * Fetches the current alert batch from the upstream feed with native
 * `fetch()`. Only transport concerns live here: the response is reduced to
 * an array of raw alert objects and handed to the engine unchanged.
 */

import { FetchFailureError, describeError } from "./errors.js";
import { isRecord } from "./normalizer.js";
import type { RawRecord } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type FeedClientOptions = {
  url: string;
  /** Request timeout in ms (default: 30000). */
  timeout?: number;
  userAgent?: string;
  headers?: Record<string, string>;
};

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

// =============================================================================
// Response shapes
// =============================================================================

/**
 * Locate the alert array in a feed response. Accepted shapes:
 * `{ alerts }`, `{ data: { alerts } }`, `{ items }`, or a bare array.
 * Non-object entries are dropped; an unrecognised shape yields no alerts.
 */
export function extractAlerts(body: unknown): RawRecord[] {
  let alerts: unknown = [];

  if (Array.isArray(body)) {
    alerts = body;
  } else if (isRecord(body)) {
    if ("alerts" in body) {
      alerts = body.alerts;
    } else if (isRecord(body.data) && "alerts" in body.data) {
      alerts = body.data.alerts;
    } else if ("items" in body) {
      alerts = body.items;
    }
  }

  return Array.isArray(alerts) ? alerts.filter(isRecord) : [];
}

// =============================================================================
// Client
// =============================================================================

export class FeedClient {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: FeedClientOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeout ?? 30_000;
    this.headers = {
      "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
      Accept: "application/json",
      ...options.headers,
    };
  }

  /** Fetch and unwrap one batch. Any failure surfaces as FetchFailureError. */
  async fetchBatch(): Promise<RawRecord[]> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let res: Response;
      try {
        res = await fetch(this.url, { method: "GET", headers: this.headers, signal: controller.signal });
      } catch (err) {
        const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : describeError(err);
        throw new FetchFailureError(`Feed request failed: ${reason}`, { url: this.url, cause: err });
      }

      if (!res.ok) {
        await res.body?.cancel();
        throw new FetchFailureError(`Feed responded with HTTP ${res.status}`, { url: this.url, status: res.status });
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        throw new FetchFailureError("Feed response is not valid JSON", { url: this.url, status: res.status, cause: err });
      }
      return extractAlerts(body);
    } finally {
      clearTimeout(timer);
    }
  }
}
