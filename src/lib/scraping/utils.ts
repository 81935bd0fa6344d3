import { fetch as undiciFetch, type Dispatcher, type Response } from "undici";
import { config } from "../config";
import { NetworkError } from "../errors";

export const DEFAULT_HEADERS: Record<string, string> = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
};

export interface FetchPageOptions {
  dispatcher: Dispatcher;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Single GET through the session's dispatcher. No retries: any transport
 * failure or non-2xx status becomes a NetworkError.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<string> {
  const { dispatcher, headers, timeoutMs = config.timeoutMs } = options;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    let response: Response;
    try {
      response = await undiciFetch(url, {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          ...DEFAULT_HEADERS,
          ...headers,
        },
        signal: controller.signal,
        dispatcher,
      });
    } catch (error: unknown) {
      throw new NetworkError(
        `Request failed for ${url}: ${describeError(error, timeoutMs)}`,
        url,
        undefined,
        { cause: error }
      );
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new NetworkError(`HTTP ${response.status} for ${url}`, url, response.status);
    }

    // Headers arrived, but the body can still time out or be cut off
    let body: string;
    try {
      body = await response.text();
    } catch (error: unknown) {
      throw new NetworkError(
        `Reading body failed for ${url}: ${describeError(error, timeoutMs)}`,
        url,
        response.status,
        { cause: error }
      );
    }

    console.log(`[books] GET ${response.status} ${url}`);
    return body;
  } finally {
    clearTimeout(timeout);
  }
}

function isAbortError(error: unknown): boolean {
  // DOMException from AbortController, not always an Error subclass
  return typeof error === "object" && error !== null && "name" in error && error.name === "AbortError";
}

function describeError(error: unknown, timeoutMs: number): string {
  if (isAbortError(error)) return `timed out after ${timeoutMs}ms`;
  if (!(error instanceof Error)) return String(error);
  // undici reports "fetch failed" and keeps the socket error in `cause`
  if (error.cause instanceof Error) return `${error.message} (${error.cause.message})`;
  return error.message;
}

const FREE_PRICE = /^(free|give away|gratis|no charge)$/i;

export function parsePrice(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;
  if (FREE_PRICE.test(trimmed)) return 0;
  // Remove currency symbols, thousands separators and whitespace
  const cleaned = trimmed.replace(/[$€£¥,\s]/g, "");
  if (!/^\d+(\.\d+)?$/.test(cleaned)) return null;
  const num = parseFloat(cleaned);
  return isNaN(num) ? null : num;
}

/** Two decimals with comma thousands grouping, the inverse of parsePrice. */
export function formatPrice(value: number, symbol: string): string {
  const fixed = value.toFixed(2).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return `${symbol}${fixed}`;
}
