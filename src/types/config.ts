/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const IconFormatSchema = z.enum(["png", "svg"]);

export const SearchOrderSchema = z.enum(["priority", "added"]);

export const ApiConfigSchema = z.object({
  baseUrl: z.url(),
  // Name of the environment variable holding the API key
  apiKeyEnv: z.string().min(1),
  timeout: z.number().int().positive(), // In milliseconds, applies to every request
});

export const SearchConfigSchema = z.object({
  order: SearchOrderSchema,
  pageSize: z.number().int().positive().max(100),
  pageDelay: z.number().int().nonnegative(), // In milliseconds
  // "page-count": stop once page >= ceil(total / pageSize)
  // "page-number": stop once page >= total (legacy comparison)
  termination: z.enum(["page-count", "page-number"]),
});

export const DownloadConfigSchema = z.object({
  format: IconFormatSchema,
  size: z.number().int().positive(), // PNG only
  output: z.string().min(1),
  chunkSize: z.number().int().positive(), // In bytes
  excerptLength: z.number().int().positive(),
});

export const BatchConfigSchema = z.object({
  labelDelay: z.number().int().nonnegative(),
  queryDelay: z.number().int().nonnegative(),
  limit: z.number().int().positive(),
  concurrency: z.number().int().positive(),
});

export const NormalizerRuleSchema = z.object({
  from: z.string().min(1),
  to: z.string(),
});

export const NormalizerConfigSchema = z.object({
  // Applied in order, each rule sees the output of the previous ones
  rules: z.array(NormalizerRuleSchema),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const FetchConfigSchema = z.object({
  api: ApiConfigSchema,
  search: SearchConfigSchema,
  download: DownloadConfigSchema,
  batch: BatchConfigSchema,
  normalizer: NormalizerConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialFetchConfigSchema = FetchConfigSchema.partial().extend({
  api: ApiConfigSchema.partial().optional(),
  search: SearchConfigSchema.partial().optional(),
  download: DownloadConfigSchema.partial().optional(),
  batch: BatchConfigSchema.partial().optional(),
  normalizer: NormalizerConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type IconFormat = z.infer<typeof IconFormatSchema>;
export type SearchOrder = z.infer<typeof SearchOrderSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type NormalizerRule = z.infer<typeof NormalizerRuleSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type FetchConfig = z.infer<typeof FetchConfigSchema>;
export type PartialFetchConfig = z.infer<typeof PartialFetchConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
