/**
 * Utility exports
 */

// Text utilities
export { normalizeQuery } from "./normalize-query";
export { safeFilename } from "./safe-filename";

// Timing
export { sleep } from "./sleep";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  getUserConfigPath,
} from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker, MISS_DETAILS } from "./tracker";
export type { Issue, IssueReason, FetchStats } from "./tracker";
