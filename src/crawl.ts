/**
 * Crawl a book page by page, following in-page "next" links
 *
 * The crawl is strictly sequential: the next page is only known once the
 * current one has been fetched and parsed.
 */

import { ReaderNotFoundError, TransportError } from "./errors.js";
import { extractPage } from "./extract.js";
import { decodeBody, httpTransport, type Transport } from "./fetch.js";
import { canonicalUrl, pageRefKey, parsePageRef } from "./page.js";
import { findLastPageInVolume, findNextPageUrl } from "./paginate.js";
import type { CrawlResult, PageRef, PageText, StopReason } from "./types.js";
import { delay } from "./utils.js";

/** Base backoff between fetch attempts; attempt n waits n times this */
export const DEFAULT_BACKOFF_MS = 800;

/** Progress snapshot reported after each page */
export interface CrawlProgress {
  /** Pages fetched so far */
  processed: number;
  /** Best known total: the page estimate, capped by maxPages */
  total: number;
  ref: PageRef;
}

/** Details of a failed fetch attempt that will be retried */
export interface RetryInfo {
  url: string;
  attempt: number;
  retries: number;
  waitMs: number;
  error: TransportError;
}

/** Configuration options for a crawl run */
export interface CrawlOptions {
  /** First page of the run; must be a /<book_id>/<volume>/<page> URL */
  startUrl: string;
  /** Safety cap on pages fetched */
  maxPages: number;
  /** Pause between page requests (ms) */
  delayMs: number;
  /** Per-request timeout (ms) */
  timeoutMs: number;
  /** Attempts per page before the run fails */
  retries: number;
  backoffMs?: number;
  transport?: Transport;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: (progress: CrawlProgress) => void;
  onRetry?: (info: RetryInfo) => void;
}

/** Options for fetchWithRetry */
export interface RetryOptions {
  retries: number;
  timeoutMs: number;
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: RetryInfo) => void;
}

/**
 * Fetch and decode a page, retrying transport failures with linear backoff.
 * Errors other than TransportError are not retried.
 *
 * @throws {TransportError} Once all attempts have failed
 */
export async function fetchWithRetry(url: string, transport: Transport, options: RetryOptions): Promise<string> {
  const { retries, timeoutMs, backoffMs = DEFAULT_BACKOFF_MS, sleep = delay, onRetry } = options;
  let lastError: TransportError | undefined;

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      const { body, charset } = await transport(url, timeoutMs);
      return decodeBody(body, charset);
    } catch (error) {
      if (!(error instanceof TransportError)) throw error;
      lastError = error;

      if (attempt < retries) {
        const waitMs = backoffMs * attempt;
        onRetry?.({ url, attempt, retries, waitMs, error });
        await sleep(waitMs);
      }
    }
  }

  const attempts = `${retries} attempt${retries === 1 ? "" : "s"}`;
  throw new TransportError(url, `Failed to fetch ${url} after ${attempts}: ${lastError?.message ?? "no attempts made"}`, {
    status: lastError?.status,
    cause: lastError,
  });
}

/**
 * Crawl from the start page until the book runs out of next links, a page
 * repeats, or maxPages pages have been fetched.
 *
 * @throws {InvalidPageUrlError} If the start URL is not a page URL
 * @throws {TransportError} If a page cannot be fetched within the retry budget
 * @throws {ReaderNotFoundError} If a page has no reading region
 */
export async function crawlBook(options: CrawlOptions): Promise<CrawlResult> {
  const { maxPages, delayMs, transport = httpTransport, sleep = delay, onProgress } = options;

  let currentUrl = canonicalUrl(options.startUrl);
  const startRef = parsePageRef(currentUrl);
  const visited = new Set<string>();
  const pages: PageText[] = [];
  let estimatedTotalPages: number | null = null;
  let stopReason: StopReason = "max-pages";

  while (pages.length < maxPages) {
    const currentRef = parsePageRef(currentUrl);
    if (visited.has(pageRefKey(currentRef))) {
      stopReason = "cycle";
      break;
    }
    visited.add(pageRefKey(currentRef));

    const html = await fetchWithRetry(currentUrl, transport, {
      retries: options.retries,
      timeoutMs: options.timeoutMs,
      backoffMs: options.backoffMs,
      sleep,
      onRetry: options.onRetry,
    });

    const { text, hrefs, foundReader } = extractPage(html);
    if (!foundReader) {
      throw new ReaderNotFoundError(currentUrl);
    }
    pages.push({ ref: currentRef, url: currentUrl, text });

    const lastPage = findLastPageInVolume(currentUrl, currentRef, hrefs);
    if (lastPage !== null && currentRef.volume === startRef.volume && lastPage >= startRef.page) {
      estimatedTotalPages = lastPage - startRef.page + 1;
    }
    // An estimate we have already overrun is wrong (e.g. the volume changed)
    if (estimatedTotalPages !== null && pages.length > estimatedTotalPages) {
      estimatedTotalPages = null;
    }

    onProgress?.({
      processed: pages.length,
      total: Math.min(maxPages, estimatedTotalPages ?? maxPages),
      ref: currentRef,
    });

    const nextUrl = findNextPageUrl(currentUrl, currentRef, hrefs);
    if (!nextUrl) {
      stopReason = "end-of-document";
      break;
    }
    if (visited.has(pageRefKey(parsePageRef(nextUrl)))) {
      stopReason = "cycle";
      break;
    }

    currentUrl = nextUrl;
    if (delayMs > 0 && pages.length < maxPages) {
      await sleep(delayMs);
    }
  }

  return { pages, stopReason, estimatedTotalPages };
}
