/**
 * Error types raised by the download pipeline.
 *
 * Each error names the URL or file path it concerns and carries the exit code
 * the CLI terminates with.
 */

export type ErrorKind = "NetworkError" | "ParseError" | "IOError";

export abstract class ScraperError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly exitCode: number;

  /** URL (network, parse) or file path (io) the failure concerns */
  public readonly target: string;

  constructor(message: string, target: string, options?: { cause?: unknown }) {
    super(message, options);
    this.target = target;
  }
}

/** A listing or chapter request failed: timeout, non-2xx status, or connection error */
export class NetworkError extends ScraperError {
  readonly kind = "NetworkError";
  readonly exitCode = 2;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, url, options);
    this.name = "NetworkError";
  }
}

/** A fetched page lacks an element the site profile expects */
export class ParseError extends ScraperError {
  readonly kind = "ParseError";
  readonly exitCode = 3;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, url, options);
    this.name = "ParseError";
  }
}

/** The output document could not be written */
export class IOError extends ScraperError {
  readonly kind = "IOError";
  readonly exitCode = 4;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, path, options);
    this.name = "IOError";
  }
}

/**
 * Format an error as a one-line diagnostic.
 *
 * @example
 * formatError(new ParseError("Content region not found", "https://example.com/c1"))
 * // 'ParseError: Content region not found (https://example.com/c1)'
 */
export function formatError(error: unknown): string {
  if (error instanceof ScraperError) {
    return `${error.kind}: ${error.message} (${error.target})`;
  }
  return error instanceof Error ? error.message : String(error);
}
