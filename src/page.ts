/**
 * Page identity and URL canonicalization
 */

import { InvalidPageUrlError } from "./errors.js";
import type { PageRef } from "./types.js";

const PAGE_PATH_RE = /\/(\d+)\/(\d+)\/(\d+)\/?$/;

function parseUrl(url: string): URL {
  try {
    return new URL(url);
  } catch {
    throw new InvalidPageUrlError(url);
  }
}

/**
 * Derive the (book, volume, page) triple from a page URL.
 *
 * @throws {InvalidPageUrlError} If the URL is unparseable or its path has another shape
 *
 * @example
 * parsePageRef('https://reader.example/15050/1/7') // { bookId: 15050, volume: 1, page: 7 }
 */
export function parsePageRef(url: string): PageRef {
  const match = PAGE_PATH_RE.exec(parseUrl(url).pathname);
  if (!match) {
    throw new InvalidPageUrlError(url);
  }

  const [bookId, volume, page] = match.slice(1, 4).map(Number);
  if (![bookId, volume, page].every(Number.isSafeInteger)) {
    throw new InvalidPageUrlError(url);
  }
  return { bookId, volume, page };
}

/**
 * Like parsePageRef, but returns null instead of throwing.
 * Used for candidate links, where unrelated URLs are expected.
 */
export function tryParsePageRef(url: string): PageRef | null {
  try {
    return parsePageRef(url);
  } catch (error) {
    if (error instanceof InvalidPageUrlError) return null;
    throw error;
  }
}

/**
 * Normalize a URL for comparison: drop query and fragment, strip trailing slashes.
 * An empty path becomes "/".
 *
 * @throws {InvalidPageUrlError} If the URL cannot be parsed
 *
 * @example
 * canonicalUrl('https://reader.example/1/2/3/?q=1#top') // 'https://reader.example/1/2/3'
 */
export function canonicalUrl(url: string): string {
  const parsed = parseUrl(url);
  parsed.search = "";
  parsed.hash = "";
  parsed.pathname = parsed.pathname.replace(/\/+$/, "") || "/";
  return parsed.href;
}

/** Set key for a page; two refs are the same page iff their keys are equal */
export function pageRefKey(ref: PageRef): string {
  return `${ref.bookId}/${ref.volume}/${ref.page}`;
}

/** Order pages by volume, then page. Book id is not compared. */
export function comparePageRefs(a: PageRef, b: PageRef): number {
  return a.volume - b.volume || a.page - b.page;
}
