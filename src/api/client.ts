/**
 * Shared request plumbing for the Flaticon API
 */

import type { FetchConfig } from "../types";
import type { Logger } from "../utils/logger";
import { TimeoutError } from "./errors";

export interface ApiClient {
  baseUrl: string;
  timeout: number;
  excerptLength: number;
  logger: Logger;
}

export type QueryParams = Record<string, string | number | undefined>;

export function createApiClient(config: FetchConfig, logger: Logger): ApiClient {
  return {
    baseUrl: config.api.baseUrl,
    timeout: config.api.timeout,
    excerptLength: config.download.excerptLength,
    logger,
  };
}

/**
 * Join an API path onto the base URL and append the defined query params
 *
 * @example
 * buildUrl("https://api.flaticon.com/v3", "/search/icons/added", { q: "api", page: 1 })
 * // "https://api.flaticon.com/v3/search/icons/added?q=api&page=1"
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  params: QueryParams = {},
): string {
  const url = new URL(baseUrl.replace(/\/+$/, "") + path);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export function authHeaders(token: string): Record<string, string> {
  return {
    Accept: "application/json",
    Authorization: `Bearer ${token}`,
  };
}

/**
 * Run a request with an abort timer that covers the whole task,
 * body reads included. An aborted task surfaces as a TimeoutError.
 */
export async function withTimeout<T>(
  client: ApiClient,
  url: string,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), client.timeout);

  try {
    return await task(controller.signal);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TimeoutError(url, client.timeout);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
