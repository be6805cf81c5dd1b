/**
 * Label-to-query normalization for batch-by-label runs
 */

import type { NormalizerRule } from "../types";

/**
 * Rewrite a free-text label into a better search query
 *
 * Rules match by substring, not whole words, and run in order: each one sees
 * the output of the previous ones. A label that normalizes to nothing falls
 * back to the trimmed original.
 *
 * @example
 * normalizeQuery("E.Guitar", [{ from: "e.guitar", to: "electric guitar" }]) // "electric guitar"
 * normalizeQuery("a.guitar", []) // "a guitar"
 */
export function normalizeQuery(label: string, rules: NormalizerRule[]): string {
  const raw = label.trim();

  let key = raw.toLowerCase().replace(/[–—]/g, "-");

  for (const { from, to } of rules) {
    if (key.includes(from)) {
      key = key.split(from).join(to);
    }
  }

  key = key.replace(/\./g, " ").replace(/\s+/g, " ").trim();

  return key || raw;
}
