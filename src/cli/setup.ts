/**
 * Shared command setup - option schemas, config overrides and fatal exits
 */

import chalk from "chalk";
import type { Ora } from "ora";
import { z } from "zod";
import { describeError } from "../api";
import { createContext } from "../modules";
import { IconFormatSchema, SearchOrderSchema } from "../types";
import type { FetchConfig, FetchContext } from "../types";
import { Logger, loadConfig } from "../utils";

export const EXIT_FAILURE = 1;
export const EXIT_MISSING_API_KEY = 2;

// Commander hands numeric options over as strings
export const CommonOptionsSchema = z.object({
  format: IconFormatSchema.optional(),
  size: z.coerce.number().int().positive().optional(),
  order: SearchOrderSchema.optional(),
  out: z.string().min(1).optional(),
  delayMs: z.coerce.number().int().nonnegative().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export const LabelsOptionsSchema = CommonOptionsSchema;

export const QueryOptionsSchema = CommonOptionsSchema.extend({
  limit: z.coerce.number().int().positive().optional(),
});

export type CommonOptions = z.infer<typeof CommonOptionsSchema>;

type DelayKey = "labelDelay" | "queryDelay";

/**
 * Print a startup failure and exit; nothing has been downloaded yet
 */
export function fail(spinner: Ora | null, text: string, error: unknown): never {
  if (spinner) {
    spinner.fail(text);
  } else {
    console.error(chalk.red(text));
  }
  console.error(chalk.red(`  ${describeError(error)}`));
  process.exit(EXIT_FAILURE);
}

export function parseOptions<T extends z.ZodType>(
  schema: T,
  opts: unknown,
): z.output<T> {
  const result = schema.safeParse(opts);
  if (!result.success) {
    fail(null, "Invalid options", z.prettifyError(result.error));
  }
  return result.data;
}

/**
 * Override configuration values with the CLI options that were given
 */
export function applyOptions(
  config: FetchConfig,
  options: CommonOptions,
  delayKey: DelayKey,
): FetchConfig {
  const batch = {
    ...config.batch,
    concurrency: options.concurrency ?? config.batch.concurrency,
  };
  if (options.delayMs !== undefined) {
    batch[delayKey] = options.delayMs;
  }

  return {
    ...config,
    search: {
      ...config.search,
      order: options.order ?? config.search.order,
    },
    download: {
      ...config.download,
      format: options.format ?? config.download.format,
      size: options.size ?? config.download.size,
      output: options.out ?? config.download.output,
    },
    batch,
  };
}

/**
 * Load configuration, apply CLI options and read the API key
 * Exits with EXIT_MISSING_API_KEY before any request when the key is absent
 */
export async function createCommandContext(
  options: CommonOptions,
  delayKey: DelayKey,
  overrides: (config: FetchConfig) => FetchConfig = (config) => config,
): Promise<FetchContext> {
  const { config: loaded, errors } = await loadConfig(options.config);
  const config = overrides(applyOptions(loaded, options, delayKey));
  const logger = new Logger(options.verbose ? "debug" : config.logging.level);

  for (const err of errors) {
    logger.warn(`Ignoring config ${err.path}: ${describeError(err.error)}`);
  }

  const apiKey = process.env[config.api.apiKeyEnv];
  if (!apiKey) {
    console.error(chalk.red(`${config.api.apiKeyEnv} is not set`));
    process.exit(EXIT_MISSING_API_KEY);
  }

  return createContext(config, apiKey, logger);
}
