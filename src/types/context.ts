/**
 * Fetch context - flows through the entire run
 * Commands build it once, modules read what they need from it
 */

import type { FetchConfig } from "./config";
import type { IconRecord } from "./icons";
import type { ApiClient } from "../api/client";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

export interface FetchContext {
  // Input - provided at initialization
  config: FetchConfig;
  apiKey: string;

  api: ApiClient;
  logger: Logger;

  // Unified tracking for counters and issues
  tracker: Tracker;

  token?: string; // Set by authorize(), valid for the rest of the run
}

/**
 * One unit of work for the item runner
 *
 * Batch-by-label builds one item per label and searches lazily;
 * batch-by-query builds one item per search result.
 */
export interface FetchItem {
  label: string; // Shown in reports
  query: string; // Effective search query
  locate: () => Promise<IconRecord | null>;
  filename: (iconId: number) => string; // Base name, no extension
}

export type MissReason = "no-results" | "missing-id";

export type ItemResult =
  | { status: "ok"; item: FetchItem; iconId: number; path: string }
  | { status: "miss"; item: FetchItem; reason: MissReason }
  | { status: "error"; item: FetchItem; error: unknown };
