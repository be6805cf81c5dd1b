/**
 * Fetch Tracker
 * Unified tracking for run counters and per-item issues
 */

import { FetchError } from "../api/errors";
import type { FetchErrorKind } from "../api/errors";
import type { MissReason } from "../types";

// ============================================================================
// Types
// ============================================================================

export type IssueReason = MissReason | FetchErrorKind | "network" | "write-error";

export interface Issue {
  label: string;
  query: string;
  reason: IssueReason;
  details: string;
}

export interface FetchStats {
  totalItems: number;
  succeeded: number;
  missed: number;
  errored: number;
  failed: number; // missed + errored
  issues: Issue[];
  duration: number;
}

// Shared by the per-item line and the issue details
export const MISS_DETAILS: Record<MissReason, string> = {
  "no-results": "no results",
  "missing-id": "missing id",
};

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo {
  reason: IssueReason;
  details: string;
}

function mapItemError(error: unknown): IssueInfo {
  if (error instanceof FetchError) {
    return { reason: error.kind, details: error.message };
  }
  if (error instanceof Error) {
    // Filesystem failures carry an errno code (EACCES, ENOSPC, ...)
    if ("code" in error && typeof error.code === "string") {
      return { reason: "write-error", details: error.message };
    }
    // fetch() rejects with a TypeError when the connection fails
    if (error instanceof TypeError) {
      return { reason: "network", details: error.message };
    }
    return { reason: "download", details: error.message };
  }
  return { reason: "download", details: String(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalItems = 0;
  private succeeded = 0;
  private missed = 0;
  private errored = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  setTotalItems(count: number): void {
    this.totalItems = count;
  }

  trackSuccess(): void {
    this.succeeded++;
  }

  trackMiss(label: string, query: string, reason: MissReason): void {
    this.missed++;
    this.issues.push({ label, query, reason, details: MISS_DETAILS[reason] });
  }

  /**
   * Track a failed item, auto-detecting the reason from the error type
   */
  trackError(label: string, query: string, error: unknown): void {
    this.errored++;
    const { reason, details } = mapItemError(error);
    this.issues.push({ label, query, reason, details });
  }

  getIssues(reason?: IssueReason): Issue[] {
    if (!reason) return this.issues;
    return this.issues.filter((i) => i.reason === reason);
  }

  getStats(): FetchStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalItems: this.totalItems,
      succeeded: this.succeeded,
      missed: this.missed,
      errored: this.errored,
      failed: this.missed + this.errored,
      issues: this.issues,
      duration,
    };
  }
}
