import { afterEach, describe, it, expect, vi } from "vitest";
import { isLastPage, searchFirstIcon, searchIcons } from "./search";
import type { SearchOptions } from "./search";
import { SearchError } from "./errors";
import { createTestClient } from "../test/context";
import {
  jsonResponse,
  requestHeaders,
  requestedUrls,
  stubFetch,
  textResponse,
} from "../test/fake-fetch";

const options: SearchOptions = {
  order: "priority",
  limit: 10,
  pageSize: 100,
  pageDelay: 0,
  termination: "page-count",
};

function icons(...ids: number[]) {
  return ids.map((id) => ({ id, description: `icon ${id}` }));
}

describe("searchIcons", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requests one page sized to the limit", async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({ data: icons(11, 22), metadata: { page: 1, total: 40 } }),
    );

    const result = await searchIcons(createTestClient(), "T1", "api", {
      ...options,
      limit: 2,
    });

    expect(result.map((icon) => icon.id)).toEqual([11, 22]);
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url] = requestedUrls(fetchMock);
    expect(url.pathname).toBe("/v3/search/icons/priority");
    expect(url.searchParams.get("q")).toBe("api");
    expect(url.searchParams.get("limit")).toBe("2");
    expect(url.searchParams.get("page")).toBe("1");
    expect(requestHeaders(fetchMock, 0).get("authorization")).toBe("Bearer T1");
  });

  it("uses the requested order in the path", async () => {
    const fetchMock = stubFetch(() => jsonResponse({ data: icons(1) }));

    await searchIcons(createTestClient(), "T1", "api", {
      ...options,
      order: "added",
      limit: 1,
    });

    expect(requestedUrls(fetchMock)[0].pathname).toBe("/v3/search/icons/added");
  });

  it("walks pages until the limit is reached", async () => {
    const pages: Record<string, number[]> = {
      "1": [1, 2],
      "2": [3, 4],
      "3": [5, 6],
    };
    const fetchMock = stubFetch((url) => {
      const page = url.searchParams.get("page") ?? "";
      return jsonResponse({
        data: icons(...(pages[page] ?? [])),
        metadata: { page: Number(page), total: 6 },
      });
    });

    const result = await searchIcons(createTestClient(), "T1", "api", {
      ...options,
      limit: 5,
      pageSize: 2,
    });

    expect(result.map((icon) => icon.id)).toEqual([1, 2, 3, 4, 5]);
    expect(
      requestedUrls(fetchMock).map((url) => [
        url.searchParams.get("page"),
        url.searchParams.get("limit"),
      ]),
    ).toEqual([
      ["1", "2"],
      ["2", "2"],
      ["3", "2"],
    ]);
  });

  it("stops at an empty page", async () => {
    const fetchMock = stubFetch((url) =>
      jsonResponse({
        data: url.searchParams.get("page") === "1" ? icons(1, 2) : [],
      }),
    );

    const result = await searchIcons(createTestClient(), "T1", "api", {
      ...options,
      pageSize: 2,
    });

    expect(result.map((icon) => icon.id)).toEqual([1, 2]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  describe("termination", () => {
    const pages: Record<string, number[]> = { "1": [1, 2], "2": [3] };

    function stubPages() {
      return stubFetch((url) => {
        const page = url.searchParams.get("page") ?? "";
        return jsonResponse({
          data: icons(...(pages[page] ?? [])),
          metadata: { page: Number(page), total: 3 },
        });
      });
    }

    it("stops once the page count is reached", async () => {
      const fetchMock = stubPages();

      const result = await searchIcons(createTestClient(), "T1", "api", {
        ...options,
        pageSize: 2,
      });

      expect(result.map((icon) => icon.id)).toEqual([1, 2, 3]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("compares the page number to the total in page-number mode", async () => {
      const fetchMock = stubPages();

      const result = await searchIcons(createTestClient(), "T1", "api", {
        ...options,
        pageSize: 2,
        termination: "page-number",
      });

      expect(result.map((icon) => icon.id)).toEqual([1, 2, 3]);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });
  });

  it("keeps records without an id", async () => {
    stubFetch(() => jsonResponse({ data: [{ description: "nameless" }] }));

    const [icon] = await searchIcons(createTestClient(), "T1", "api", {
      ...options,
      limit: 1,
    });

    expect(icon.id).toBeUndefined();
    expect(icon.description).toBe("nameless");
  });

  it("fails on a non-200 status", async () => {
    const fetchMock = stubFetch(() => textResponse("boom", 500));

    const attempt = searchIcons(createTestClient(), "T1", "api", options);

    await expect(attempt).rejects.toBeInstanceOf(SearchError);
    await expect(attempt).rejects.toMatchObject({
      kind: "search",
      status: 500,
      excerpt: "boom",
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("fails on a malformed body", async () => {
    stubFetch(() => jsonResponse({ results: [] }));

    await expect(
      searchIcons(createTestClient(), "T1", "api", options),
    ).rejects.toThrow('Malformed search response: {"results":[]}');
  });
});

describe("searchFirstIcon", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("asks for the first record of page 1", async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({ data: icons(7), metadata: { page: 1, total: 90 } }),
    );

    const icon = await searchFirstIcon(createTestClient(), "T1", "guitar", options);

    expect(icon?.id).toBe(7);
    const [url] = requestedUrls(fetchMock);
    expect(url.searchParams.get("limit")).toBe("1");
    expect(url.searchParams.get("page")).toBe("1");
  });

  it("returns null when nothing matches", async () => {
    stubFetch(() => jsonResponse({ data: [], metadata: { page: 1, total: 0 } }));

    await expect(
      searchFirstIcon(createTestClient(), "T1", "xyzzy", options),
    ).resolves.toBeNull();
  });
});

describe("isLastPage", () => {
  it("keeps paging without a total", () => {
    expect(isLastPage(undefined, 1, 100, "page-count")).toBe(false);
    expect(isLastPage({ page: 4 }, 4, 100, "page-count")).toBe(false);
  });

  it("compares against ceil(total / pageSize)", () => {
    expect(isLastPage({ page: 2, total: 250 }, 2, 100, "page-count")).toBe(false);
    expect(isLastPage({ page: 3, total: 250 }, 3, 100, "page-count")).toBe(true);
  });

  it("falls back to count when total is missing", () => {
    expect(isLastPage({ page: 1, count: 2 }, 1, 2, "page-count")).toBe(true);
  });

  it("uses the request's page number when metadata has none", () => {
    expect(isLastPage({ total: 4 }, 2, 2, "page-count")).toBe(true);
  });

  it("compares the page number to the total in page-number mode", () => {
    expect(isLastPage({ page: 3, total: 250 }, 3, 100, "page-number")).toBe(false);
    expect(isLastPage({ page: 1, total: 1 }, 1, 100, "page-number")).toBe(true);
  });
});
