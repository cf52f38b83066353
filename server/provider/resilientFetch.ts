/**
 * Outbound GET with classified retries.
 *
 * - 4xx: permanent, no retry
 * - 5xx, network, connect and timeout failures: transient, retried with
 *   exponential backoff (BASE * 2^attempt) up to MAX_ATTEMPTS in total
 * - anything else (e.g. an unparseable body): permanent
 *
 * Exhausted or permanent failures resolve to null. Callers treat null as
 * "no data" and answer with a degraded message.
 */

import type { z } from "zod";
import { HTTP_CONSTANTS } from "../config/constants";
import { getErrorMessage } from "../utils/errorHandler";
import { logError, logWarn } from "../utils/logger";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type FetchOutcome =
  | { kind: "ok"; data: unknown }
  | { kind: "transient"; reason: string }
  | { kind: "permanent"; reason: string };

export type ResilientFetchOptions = {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  maxAttempts?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
  userAgent?: string;
};

export function classifyStatus(status: number): FetchOutcome {
  if (status >= 400 && status < 500) {
    return { kind: "permanent", reason: `client error ${status}` };
  }
  if (status >= 500 && status < 600) {
    return { kind: "transient", reason: `server error ${status}` };
  }
  return { kind: "permanent", reason: `unexpected status ${status}` };
}

/**
 * fetch rejects with a TypeError for network/DNS/connect failures and with a
 * TimeoutError/AbortError when the request signal fires.
 */
export function classifyThrown(error: unknown): FetchOutcome {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return { kind: "transient", reason: `timeout: ${error.message}` };
  }
  if (error instanceof TypeError) {
    return { kind: "transient", reason: `network error: ${getErrorMessage(error)}` };
  }
  return { kind: "permanent", reason: `unexpected error: ${getErrorMessage(error)}` };
}

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url;

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.append(key, String(value));
  }

  const query = search.toString();
  if (!query) return url;
  return `${url}${url.includes("?") ? "&" : "?"}${query}`;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class ResilientFetch {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: ResilientFetchOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? HTTP_CONSTANTS.MAX_ATTEMPTS);
    this.baseDelayMs = options.baseDelayMs ?? HTTP_CONSTANTS.BASE_RETRY_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? HTTP_CONSTANTS.REQUEST_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? HTTP_CONSTANTS.USER_AGENT;
  }

  /**
   * Resolves to the parsed JSON body, or null when the request failed.
   */
  async get(url: string, params?: QueryParams): Promise<unknown> {
    const target = buildUrl(url, params);

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const outcome = await this.attempt(target);

      if (outcome.kind === "ok") {
        return outcome.data;
      }

      if (outcome.kind === "permanent") {
        logError(`[HTTP] ${outcome.reason} for ${target}`, { url: target });
        return null;
      }

      if (attempt === this.maxAttempts - 1) {
        logError(`[HTTP] ${outcome.reason} for ${target} after ${this.maxAttempts} attempts`, { url: target });
        return null;
      }

      const delay = this.baseDelayMs * 2 ** attempt;
      logWarn(`[HTTP] ${outcome.reason} (attempt ${attempt + 1}/${this.maxAttempts}), retrying in ${delay}ms`, {
        url: target,
        attempt: attempt + 1,
      });
      await this.sleep(delay);
    }

    return null;
  }

  /**
   * get() followed by schema validation. A body of the wrong shape is
   * treated like any other failed lookup.
   */
  async getParsed<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, url: string, params?: QueryParams): Promise<T | null> {
    const data = await this.get(url, params);
    if (data === null) return null;

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      logWarn(`[HTTP] Unexpected response shape from ${url}: ${getErrorMessage(parsed.error)}`, { url });
      return null;
    }
    return parsed.data;
  }

  private async attempt(url: string): Promise<FetchOutcome> {
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          "User-Agent": this.userAgent,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        return classifyStatus(response.status);
      }

      return { kind: "ok", data: await response.json() };
    } catch (error) {
      return classifyThrown(error);
    }
  }
}
