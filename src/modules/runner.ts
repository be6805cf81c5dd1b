/**
 * Runner Module
 * Locates and downloads items one at a time (or `batch.concurrency` at a time),
 * isolating failures per item
 */

import { mkdir } from "fs/promises";
import { join } from "node:path";
import chalk from "chalk";
import { describeError, downloadIcon } from "../api";
import { MISS_DETAILS, sleep } from "../utils";
import type { FetchContext, FetchItem, ItemResult } from "../types";
import { requireToken } from "./session";

// ============================================================================
// Reporting
// ============================================================================

const TAGS: Record<ItemResult["status"], string> = {
  ok: chalk.green("OK  "),
  miss: chalk.yellow("MISS"),
  error: chalk.red("ERR "),
};

/**
 * Describe an item result without its status tag
 *
 * @example
 * "label='e.guitar' | query='electric guitar' | id=11 | → icons/e-guitar.png"
 */
export function describeResult(result: ItemResult): string {
  const { label, query } = result.item;
  const head = `label='${label}' | query='${query}'`;

  switch (result.status) {
    case "ok":
      return `${head} | id=${result.iconId} | → ${result.path}`;
    case "miss":
      return `${head} | reason=${MISS_DETAILS[result.reason]}`;
    case "error":
      return `${head} | ${describeError(result.error)}`;
  }
}

/**
 * Count the result and print its line (OK on stdout, MISS/ERR on stderr)
 */
export function record(ctx: FetchContext, result: ItemResult): void {
  const { tracker } = ctx;
  const { label, query } = result.item;
  const line = `${TAGS[result.status]} | ${describeResult(result)}`;

  switch (result.status) {
    case "ok":
      tracker.trackSuccess();
      console.log(line);
      break;
    case "miss":
      tracker.trackMiss(label, query, result.reason);
      console.error(line);
      break;
    case "error":
      tracker.trackError(label, query, result.error);
      console.error(line);
      break;
  }
}

// ============================================================================
// Processing
// ============================================================================

export async function ensureOutputDirectory(ctx: FetchContext): Promise<void> {
  await mkdir(ctx.config.download.output, { recursive: true });
}

async function processItem(
  ctx: FetchContext,
  item: FetchItem,
): Promise<ItemResult> {
  const { download } = ctx.config;

  try {
    const icon = await item.locate();
    if (!icon) {
      return { status: "miss", item, reason: "no-results" };
    }
    if (icon.id === undefined) {
      return { status: "miss", item, reason: "missing-id" };
    }

    const destination = join(
      download.output,
      `${item.filename(icon.id)}.${download.format}`,
    );
    const path = await downloadIcon(ctx.api, requireToken(ctx), {
      id: icon.id,
      format: download.format,
      size: download.size,
      destination,
      chunkSize: download.chunkSize,
    });

    return { status: "ok", item, iconId: icon.id, path };
  } catch (error) {
    return { status: "error", item, error };
  }
}

/**
 * Process every item, pausing `delay` ms after each one
 * Results come back in item order whatever the concurrency
 */
export async function run(
  ctx: FetchContext,
  items: FetchItem[],
  delay: number,
): Promise<ItemResult[]> {
  const results: ItemResult[] = new Array(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      const result = await processItem(ctx, items[index]);
      record(ctx, result);
      results[index] = result;

      if (next < items.length) {
        await sleep(delay);
      }
    }
  }

  const workers = Math.max(
    1,
    Math.min(ctx.config.batch.concurrency, items.length),
  );
  await Promise.all(Array.from({ length: workers }, () => worker()));

  return results;
}
