// src/services/http.ts
// Centralized fetch helper with timeout, retry and jitter. Used once per input at startup.

import { DASHBOARD_CONFIG } from "../config";
import { HttpError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("http");

export type FetchOptions<T> = {
  /** Abort after timeoutMs. Default from DASHBOARD_CONFIG (12000ms). */
  timeoutMs?: number;
  /** Number of retries on network/5xx. Default 2 (i.e., 3 total attempts). */
  retries?: number;
  /** Base delay before the first retry; doubles each time. */
  backoffMs?: number;
  /** Validate/narrow the parsed body; a throw here is not retried. */
  map?: (body: unknown) => T;
};

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

function jitter(base: number) {
  // +/- 30% jitter
  const delta = base * 0.3;
  return base - delta + Math.random() * (2 * delta);
}

function isRetryable(err: unknown): boolean {
  if (err instanceof HttpError) return err.status >= 500;
  // Network failures surface as TypeError from fetch; aborts and body parse errors do not
  return err instanceof TypeError;
}

/**
 * GET `url` and read the body with `read`:
 * - AbortController timeout per attempt
 * - Exponential backoff retry (network errors + 5xx)
 * - No retry on 4xx or timeout
 */
export async function fetchWithRetry<T>(
  url: string,
  read: (res: Response) => Promise<T>,
  opt: Omit<FetchOptions<T>, "map"> = {}
): Promise<T> {
  const {
    timeoutMs = DASHBOARD_CONFIG.fetch.timeoutMs,
    retries = DASHBOARD_CONFIG.fetch.retries,
    backoffMs = DASHBOARD_CONFIG.fetch.backoffMs,
  } = opt;

  const attempt = async (): Promise<T> => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(url, {
        method: "GET",
        signal: controller.signal,
      });
      if (!res.ok) throw new HttpError(url, res.status);
      return await read(res);
    } finally {
      clearTimeout(timeout);
    }
  };

  let lastErr: unknown;
  for (let i = 0; i <= retries; i++) {
    try {
      return await attempt();
    } catch (err) {
      lastErr = err;
      if (!isRetryable(err) || i === retries) break;
      const delay = jitter(backoffMs * Math.pow(2, i));
      log.warn(`attempt ${i + 1} for ${url} failed, retrying in ${Math.round(delay)}ms`, err);
      await sleep(delay);
    }
  }
  throw lastErr ?? new Error("Request failed");
}

async function readJson(res: Response): Promise<unknown> {
  return res.json();
}

/** Fetch and parse JSON; `map` narrows the unknown body to T. */
export async function fetchJson<T>(
  url: string,
  opt: FetchOptions<T> & { map: (body: unknown) => T }
): Promise<T> {
  const { map, ...rest } = opt;
  const json = await fetchWithRetry(url, readJson, rest);
  return map(json);
}

/** Fetch a text body (CSV and friends). */
export async function fetchText(url: string, opt: Omit<FetchOptions<string>, "map"> = {}): Promise<string> {
  return fetchWithRetry(url, (res) => res.text(), opt);
}
