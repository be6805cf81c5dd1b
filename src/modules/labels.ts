/**
 * Labels Module
 * Batch-by-label: one icon per label, saved under a name derived from the label
 */

import { searchFirstIcon } from "../api";
import { normalizeQuery, safeFilename } from "../utils";
import type { FetchContext, FetchItem, ItemResult } from "../types";
import { ensureOutputDirectory, run } from "./runner";
import { requireToken, searchOptions } from "./session";

export function labelItems(ctx: FetchContext, labels: string[]): FetchItem[] {
  const { config, api } = ctx;
  const token = requireToken(ctx);
  const options = searchOptions(config, 1);

  return labels.map((label) => {
    const query = normalizeQuery(label, config.normalizer.rules);
    return {
      label,
      query,
      locate: () => searchFirstIcon(api, token, query, options),
      filename: () => safeFilename(label),
    };
  });
}

export async function fetchByLabels(
  ctx: FetchContext,
  labels: string[],
): Promise<ItemResult[]> {
  await ensureOutputDirectory(ctx);

  const items = labelItems(ctx, labels);
  ctx.tracker.setTotalItems(items.length);

  return run(ctx, items, ctx.config.batch.labelDelay);
}
