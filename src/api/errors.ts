/**
 * Error kinds raised while talking to the Flaticon API
 *
 * Every request failure is one of these. The item runner turns them into
 * per-item results; only an AuthError ends the run.
 */

export type FetchErrorKind =
  | "auth"
  | "search"
  | "download"
  | "asset"
  | "unexpected-response"
  | "timeout";

export class FetchError extends Error {
  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    readonly status?: number,
    readonly excerpt?: string,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

export class AuthError extends FetchError {
  constructor(message: string, status?: number, excerpt?: string) {
    super("auth", message, status, excerpt);
    this.name = "AuthError";
  }
}

export class SearchError extends FetchError {
  constructor(message: string, status?: number, excerpt?: string) {
    super("search", message, status, excerpt);
    this.name = "SearchError";
  }
}

export class DownloadError extends FetchError {
  constructor(message: string, status?: number, excerpt?: string) {
    super("download", message, status, excerpt);
    this.name = "DownloadError";
  }
}

export class AssetError extends FetchError {
  constructor(message: string, status?: number, excerpt?: string) {
    super("asset", message, status, excerpt);
    this.name = "AssetError";
  }
}

export class UnexpectedResponseError extends FetchError {
  constructor(message: string, status?: number, excerpt?: string) {
    super("unexpected-response", message, status, excerpt);
    this.name = "UnexpectedResponseError";
  }
}

export class TimeoutError extends FetchError {
  constructor(url: string, timeout: number) {
    super("timeout", `Request to ${url} timed out after ${timeout}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Truncate a response body for logs
 */
export function excerpt(text: string, length: number): string {
  return text.length > length ? text.slice(0, length) : text;
}

/**
 * One-line description of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
