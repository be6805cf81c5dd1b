/**
 * Query command - fetch up to N icons for one search query
 */

import ora from "ora";
import { authorize, fetchByQuery, stats } from "../../modules";
import {
  QueryOptionsSchema,
  createCommandContext,
  fail,
  parseOptions,
} from "../setup";

export async function queryCommand(query: string, opts: unknown): Promise<void> {
  const options = parseOptions(QueryOptionsSchema, opts);
  const ctx = await createCommandContext(options, "queryDelay", (config) => ({
    ...config,
    batch: { ...config.batch, limit: options.limit ?? config.batch.limit },
  }));

  const spinner = ora({ text: "Authenticating...", indent: 2 }).start();

  try {
    await authorize(ctx);
    spinner.succeed("Authenticated");
  } catch (error) {
    fail(spinner, "Authentication failed", error);
  }

  await fetchByQuery(ctx, query);
  stats(ctx);
}
