/**
 * Query Module
 * Batch-by-query: up to `batch.limit` icons for one query, saved as {id}.{format}
 */

import { searchIcons } from "../api";
import type {
  FetchContext,
  FetchItem,
  IconRecord,
  ItemResult,
} from "../types";
import { ensureOutputDirectory, record, run } from "./runner";
import { requireToken, searchOptions } from "./session";

export async function fetchByQuery(
  ctx: FetchContext,
  query: string,
): Promise<ItemResult[]> {
  const { config, api, logger, tracker } = ctx;
  await ensureOutputDirectory(ctx);

  const token = requireToken(ctx);
  const limit = config.batch.limit;

  let icons: IconRecord[];
  try {
    icons = await searchIcons(api, token, query, searchOptions(config, limit));
  } catch (error) {
    // The query itself is the only item when the search fails
    const item: FetchItem = {
      label: query,
      query,
      locate: async () => null,
      filename: (id) => String(id),
    };
    const result: ItemResult = { status: "error", item, error };
    tracker.setTotalItems(1);
    record(ctx, result);
    return [result];
  }

  logger.info(`Found ${icons.length} results; downloading up to ${limit}…`);

  const items = icons.map(
    (icon): FetchItem => ({
      label: icon.id === undefined ? "(no id)" : String(icon.id),
      query,
      locate: async () => icon,
      filename: (id) => String(id),
    }),
  );
  tracker.setTotalItems(items.length);

  return run(ctx, items, config.batch.queryDelay);
}
