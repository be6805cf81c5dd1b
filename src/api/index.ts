/**
 * Flaticon API exports
 */

export { createApiClient } from "./client";
export type { ApiClient } from "./client";
export { authenticate } from "./authenticate";
export { searchIcons, searchFirstIcon } from "./search";
export type { SearchOptions } from "./search";
export { downloadIcon } from "./download";
export { DownloadError, describeError } from "./errors";
