/**
 * Paginated icon search
 * GET /search/icons/{order}?q=...&limit=...&page=...
 */

import { SearchPageSchema } from "../types";
import type {
  IconRecord,
  SearchConfig,
  SearchMetadata,
  SearchOrder,
  SearchPage,
} from "../types";
import { parseJson } from "../utils/parse-json";
import { sleep } from "../utils/sleep";
import { authHeaders, buildUrl, withTimeout } from "./client";
import type { ApiClient } from "./client";
import { SearchError, excerpt } from "./errors";

const MAX_PAGE_SIZE = 100;

export interface SearchOptions {
  order: SearchOrder;
  limit: number;
  pageSize: number;
  pageDelay: number;
  termination: SearchConfig["termination"];
}

interface PageRequest {
  query: string;
  order: SearchOrder;
  page: number;
  limit: number;
}

async function fetchPage(
  client: ApiClient,
  token: string,
  request: PageRequest,
): Promise<SearchPage> {
  const url = buildUrl(client.baseUrl, `/search/icons/${request.order}`, {
    q: request.query,
    limit: request.limit,
    page: request.page,
  });
  client.logger.debug(`GET ${url}`);

  return withTimeout(client, url, async (signal) => {
    const response = await fetch(url, { headers: authHeaders(token), signal });
    const text = await response.text();

    if (response.status !== 200) {
      const body = excerpt(text, client.excerptLength);
      throw new SearchError(
        `Search error: ${response.status} ${body}`,
        response.status,
        body,
      );
    }

    const parsed = SearchPageSchema.safeParse(parseJson(text));
    if (!parsed.success) {
      const body = excerpt(text, client.excerptLength);
      throw new SearchError(`Malformed search response: ${body}`, 200, body);
    }
    return parsed.data;
  });
}

/**
 * Decide from the server's pagination metadata whether `page` was the last one.
 * Without a total the caller keeps paging until an empty page or its limit.
 */
export function isLastPage(
  metadata: SearchMetadata | undefined,
  page: number,
  pageSize: number,
  termination: SearchOptions["termination"],
): boolean {
  const total = metadata?.total ?? metadata?.count;
  if (total === undefined) return false;

  const current = metadata?.page ?? page;
  if (termination === "page-number") {
    return current >= total;
  }
  return current >= Math.ceil(total / pageSize);
}

/**
 * Collect up to `limit` icons, one page at a time
 */
export async function searchIcons(
  client: ApiClient,
  token: string,
  query: string,
  options: SearchOptions,
): Promise<IconRecord[]> {
  const pageSize = Math.min(options.pageSize, MAX_PAGE_SIZE, options.limit);
  const icons: IconRecord[] = [];
  let page = 1;

  while (icons.length < options.limit) {
    const result = await fetchPage(client, token, {
      query,
      order: options.order,
      page,
      limit: pageSize,
    });

    if (result.data.length === 0) break;
    icons.push(...result.data);

    if (
      icons.length >= options.limit ||
      isLastPage(result.metadata, page, pageSize, options.termination)
    ) {
      break;
    }

    page++;
    await sleep(options.pageDelay);
  }

  return icons.slice(0, options.limit);
}

/**
 * First record of page 1, or null when the search comes back empty
 */
export async function searchFirstIcon(
  client: ApiClient,
  token: string,
  query: string,
  options: Omit<SearchOptions, "limit">,
): Promise<IconRecord | null> {
  const [icon] = await searchIcons(client, token, query, {
    ...options,
    limit: 1,
  });
  return icon ?? null;
}
