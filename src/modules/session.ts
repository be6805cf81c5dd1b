/**
 * Session Module
 * Builds the fetch context and holds the per-run bearer token
 */

import { authenticate, createApiClient } from "../api";
import type { SearchOptions } from "../api";
import { Logger, Tracker } from "../utils";
import type { FetchConfig, FetchContext } from "../types";

export function createContext(
  config: FetchConfig,
  apiKey: string,
  logger: Logger = new Logger(config.logging.level),
): FetchContext {
  return {
    config,
    apiKey,
    logger,
    api: createApiClient(config, logger),
    tracker: new Tracker(),
  };
}

/**
 * Fetch the bearer token once for the run
 * Any failure is an AuthError and ends the run
 *
 * Writes to context:
 * - token
 */
export async function authorize(ctx: FetchContext): Promise<string> {
  const token = await authenticate(ctx.api, ctx.apiKey);
  ctx.token = token;
  ctx.logger.debug("Obtained bearer token");
  return token;
}

export function requireToken(ctx: FetchContext): string {
  if (!ctx.token) {
    throw new Error("Not authenticated: authorize() must run first");
  }
  return ctx.token;
}

export function searchOptions(config: FetchConfig, limit: number): SearchOptions {
  return {
    order: config.search.order,
    limit,
    pageSize: config.search.pageSize,
    pageDelay: config.search.pageDelay,
    termination: config.search.termination,
  };
}
