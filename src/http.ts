/**
 * HTTP page fetching
 *
 * Listing and chapter pages are static HTML, so a plain GET is enough;
 * every request is single-shot and fails with a NetworkError naming the URL.
 */

import { NetworkError } from "./errors.js";

/**
 * Realistic Chrome user agent to avoid bot detection.
 * Matches a recent stable Chrome version on macOS.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/** Default per-request timeout (ms) */
export const DEFAULT_TIMEOUT = 30000;

export interface FetchOptions {
  /** Abort the request after this many milliseconds */
  timeout?: number;
  userAgent?: string;
}

/** Fetches the HTML body of a page */
export type PageFetcher = (url: string) => Promise<string>;

function describeFailure(error: unknown, timeout: number): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return `Request timed out after ${timeout}ms`;
    }
    // fetch() reports connection problems as TypeError("fetch failed") with the socket error as cause
    if (error.cause instanceof Error) {
      return `Request failed: ${error.cause.message}`;
    }
    return `Request failed: ${error.message}`;
  }
  return `Request failed: ${String(error)}`;
}

/**
 * Pick the decoder named by the Content-Type charset.
 * Pages without one, or with a label the runtime does not know, are read as UTF-8.
 */
export function decoderFor(contentType: string | null): InstanceType<typeof TextDecoder> {
  const charset = contentType?.match(/charset\s*=\s*"?([^";\s]+)/i)?.[1];
  if (charset) {
    try {
      return new TextDecoder(charset);
    } catch {
      return new TextDecoder("utf-8");
    }
  }
  return new TextDecoder("utf-8");
}

/**
 * Fetch a page and return its HTML.
 *
 * @throws {NetworkError} On timeout, connection failure, or a non-2xx status
 */
export async function fetchHtml(url: string, options: FetchOptions = {}): Promise<string> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
      },
      redirect: "follow",
      signal: AbortSignal.timeout(timeout),
    });
  } catch (error) {
    throw new NetworkError(describeFailure(error, timeout), url, { cause: error });
  }

  if (!response.ok) {
    throw new NetworkError(`HTTP ${response.status} ${response.statusText}`.trim(), url);
  }

  try {
    const body = await response.arrayBuffer();
    return decoderFor(response.headers.get("content-type")).decode(body);
  } catch (error) {
    throw new NetworkError(describeFailure(error, timeout), url, { cause: error });
  }
}

/**
 * Create a page fetcher bound to fixed request options.
 */
export function createFetcher(options: FetchOptions = {}): PageFetcher {
  return (url) => fetchHtml(url, options);
}
