import { describe, expect, it, vi } from "vitest";
import { crawlBook, type CrawlOptions, DEFAULT_BACKOFF_MS, fetchWithRetry } from "./crawl.js";
import { InvalidPageUrlError, ReaderNotFoundError, TransportError } from "./errors.js";
import { httpTransport, type Transport } from "./fetch.js";

const BASE = "https://reader.example";

/** Build a reader page with navigation links outside the reading region */
function readerPage(text: string, links: string[]): string {
  const nav = links.map((href) => `<a href="${href}">${href}</a>`).join(" ");
  return (
    `<html><body><div class="nav">${nav}</div>` +
    `<table><tr><td class="book-page-show"><p>${text}</p></td></tr></table></body></html>`
  );
}

/** In-memory transport serving the given pages by URL */
function fakeSite(pages: Record<string, string>) {
  return vi.fn<Transport>(async (url) => {
    const html = pages[url];
    if (html === undefined) {
      throw new TransportError(url, "HTTP 404 Not Found", { status: 404 });
    }
    return { body: new TextEncoder().encode(html), charset: "utf-8" };
  });
}

const THREE_PAGE_BOOK = {
  [`${BASE}/7/1/1`]: readerPage("One", ["/7/1/2", "/7/1/3"]),
  [`${BASE}/7/1/2`]: readerPage("Two", ["/7/1/1", "/7/1/3"]),
  [`${BASE}/7/1/3`]: readerPage("Three", ["/7/1/1", "/7/1/2"]),
};

function options(overrides: Partial<CrawlOptions>): CrawlOptions {
  return {
    startUrl: `${BASE}/7/1/1`,
    maxPages: 100,
    delayMs: 0,
    timeoutMs: 30000,
    retries: 3,
    sleep: vi.fn(async () => undefined),
    ...overrides,
  };
}

describe("fetchWithRetry", () => {
  const url = `${BASE}/7/1/1`;

  it("succeeds after two transient failures", async () => {
    const transport = vi
      .fn<Transport>()
      .mockRejectedValueOnce(new TransportError(url, "timeout"))
      .mockRejectedValueOnce(new TransportError(url, "HTTP 502", { status: 502 }))
      .mockResolvedValueOnce({ body: new TextEncoder().encode("<p>ok</p>"), charset: null });
    const sleep = vi.fn(async () => undefined);
    const onRetry = vi.fn();

    const html = await fetchWithRetry(url, transport, { retries: 3, timeoutMs: 1000, sleep, onRetry });

    expect(html).toBe("<p>ok</p>");
    expect(transport).toHaveBeenCalledTimes(3);
    expect(transport).toHaveBeenCalledWith(url, 1000);
    expect(sleep.mock.calls).toEqual([[DEFAULT_BACKOFF_MS], [DEFAULT_BACKOFF_MS * 2]]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[1][0]).toMatchObject({ url, attempt: 2, retries: 3, waitMs: 1600 });
  });

  it("fails once all attempts are used", async () => {
    const transport = vi.fn<Transport>().mockRejectedValue(new TransportError(url, "boom"));
    const sleep = vi.fn(async () => undefined);

    const error = await fetchWithRetry(url, transport, { retries: 2, timeoutMs: 1000, backoffMs: 10, sleep }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).message).toBe(`Failed to fetch ${url} after 2 attempts: boom`);
    expect(transport).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[10]]);
  });

  it("does not retry errors that are not transport failures", async () => {
    const transport = vi.fn<Transport>().mockRejectedValue(new Error("bug"));

    await expect(fetchWithRetry(url, transport, { retries: 3, timeoutMs: 1000 })).rejects.toThrow("bug");
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it("does not retry an invalid timeout in the HTTP transport", async () => {
    const mockFetch = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", mockFetch);
    const sleep = vi.fn(async () => undefined);

    try {
      await expect(fetchWithRetry(url, httpTransport, { retries: 3, timeoutMs: -1, sleep })).rejects.toThrow(RangeError);
      expect(sleep).not.toHaveBeenCalled();
      expect(mockFetch).not.toHaveBeenCalled();
    } finally {
      vi.unstubAllGlobals();
    }
  });
});

describe("crawlBook", () => {
  it("follows next links to the end of the book", async () => {
    const transport = fakeSite(THREE_PAGE_BOOK);
    const onProgress = vi.fn();

    const result = await crawlBook(options({ transport, onProgress }));

    expect(result.pages.map((page) => page.text)).toEqual(["One", "Two", "Three"]);
    expect(result.pages.map((page) => page.ref.page)).toEqual([1, 2, 3]);
    expect(result.stopReason).toBe("end-of-document");
    expect(result.estimatedTotalPages).toBe(3);
    expect(onProgress.mock.calls.map(([progress]) => [progress.processed, progress.total])).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  it("canonicalizes the start URL", async () => {
    const transport = fakeSite(THREE_PAGE_BOOK);

    const result = await crawlBook(options({ transport, startUrl: `${BASE}/7/1/1/?from=toc#top` }));

    expect(result.pages[0].url).toBe(`${BASE}/7/1/1`);
    expect(transport).toHaveBeenNthCalledWith(1, `${BASE}/7/1/1`, 30000);
  });

  it("stops at maxPages while more pages remain", async () => {
    const result = await crawlBook(options({ transport: fakeSite(THREE_PAGE_BOOK), maxPages: 2 }));

    expect(result.pages.map((page) => page.text)).toEqual(["One", "Two"]);
    expect(result.stopReason).toBe("max-pages");
  });

  it("ends normally when the last page is exactly maxPages", async () => {
    const result = await crawlBook(options({ transport: fakeSite(THREE_PAGE_BOOK), maxPages: 3 }));

    expect(result.pages).toHaveLength(3);
    expect(result.stopReason).toBe("end-of-document");
  });

  it("waits between requests but not after the last page", async () => {
    const sleep = vi.fn(async () => undefined);

    await crawlBook(options({ transport: fakeSite(THREE_PAGE_BOOK), delayMs: 500, sleep }));

    expect(sleep.mock.calls).toEqual([[500], [500]]);
  });

  it("retries a flaky page without aborting the run", async () => {
    const site = fakeSite(THREE_PAGE_BOOK);
    let failures = 0;
    const transport = vi.fn<Transport>(async (url, timeoutMs) => {
      if (url === `${BASE}/7/1/2` && failures < 2) {
        failures++;
        throw new TransportError(url, "socket hang up");
      }
      return site(url, timeoutMs);
    });

    const result = await crawlBook(options({ transport }));

    expect(result.pages.map((page) => page.text)).toEqual(["One", "Two", "Three"]);
    expect(transport).toHaveBeenCalledTimes(5);
  });

  it("aborts the run when a page cannot be fetched", async () => {
    const pages = { [`${BASE}/7/1/1`]: THREE_PAGE_BOOK[`${BASE}/7/1/1`] };

    const error = await crawlBook(options({ transport: fakeSite(pages) })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).message).toBe(
      `Failed to fetch ${BASE}/7/1/2 after 3 attempts: HTTP 404 Not Found`,
    );
    expect((error as TransportError).status).toBe(404);
  });

  it("aborts the run when a page has no reading region", async () => {
    const pages = { [`${BASE}/7/1/1`]: "<html><body><p>Maintenance</p></body></html>" };

    await expect(crawlBook(options({ transport: fakeSite(pages) }))).rejects.toThrow(ReaderNotFoundError);
  });

  it("rejects a start URL that is not a page URL", async () => {
    await expect(crawlBook(options({ startUrl: `${BASE}/about`, transport: fakeSite({}) }))).rejects.toThrow(
      InvalidPageUrlError,
    );
  });

  it("drops the estimate once the crawl outgrows it", async () => {
    const pages = {
      [`${BASE}/7/1/1`]: readerPage("One", ["/7/1/2"]),
      [`${BASE}/7/1/2`]: readerPage("Two", ["/7/1/1", "/7/2/0"]),
      [`${BASE}/7/2/0`]: readerPage("Three", ["/7/1/2"]),
    };
    const onProgress = vi.fn();

    const result = await crawlBook(options({ transport: fakeSite(pages), onProgress }));

    expect(result.pages.map((page) => page.text)).toEqual(["One", "Two", "Three"]);
    expect(result.estimatedTotalPages).toBeNull();
    expect(onProgress.mock.calls.map(([progress]) => progress.total)).toEqual([2, 2, 100]);
  });
});
