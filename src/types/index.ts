/**
 * Central type exports
 */

// Configuration
export type {
  FetchConfig,
  PartialFetchConfig,
  SearchConfig,
  NormalizerRule,
  LoggingConfig,
  IconFormat,
  SearchOrder,
  ConfigError,
} from "./config";
export {
  FetchConfigSchema,
  PartialFetchConfigSchema,
  IconFormatSchema,
  SearchOrderSchema,
} from "./config";

// Upstream payloads
export type {
  IconRecord,
  SearchMetadata,
  SearchPage,
} from "./icons";
export {
  SearchPageSchema,
  TokenResponseSchema,
  DownloadEnvelopeSchema,
} from "./icons";

// Context
export type { FetchContext, FetchItem, ItemResult, MissReason } from "./context";
