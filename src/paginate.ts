/**
 * Link-based pagination
 *
 * The reader has no page-count API; everything here is inferred from the
 * hyperlinks on the current page.
 */

import { canonicalUrl, comparePageRefs, pageRefKey, tryParsePageRef } from "./page.js";
import type { PageRef } from "./types.js";

interface PageLink {
  ref: PageRef;
  url: string;
}

/**
 * Resolve hrefs against the current page and keep those that point at pages
 * of the same book. Unresolvable and non-page links are skipped.
 */
export function collectBookLinks(currentUrl: string, currentRef: PageRef, hrefs: string[]): PageLink[] {
  const links: PageLink[] = [];

  for (const href of hrefs) {
    let url: string;
    try {
      url = canonicalUrl(new URL(href, currentUrl).href);
    } catch {
      continue;
    }

    const ref = tryParsePageRef(url);
    if (ref && ref.bookId === currentRef.bookId) {
      links.push({ ref, url });
    }
  }

  return links;
}

/**
 * Find the nearest page after the current one among the page's links.
 * If several links point at the same page, the first one wins.
 *
 * @returns Canonical URL of the next page, or null at the end of the book
 */
export function findNextPageUrl(currentUrl: string, currentRef: PageRef, hrefs: string[]): string | null {
  const candidates = new Map<string, PageLink>();

  for (const link of collectBookLinks(currentUrl, currentRef, hrefs)) {
    if (comparePageRefs(link.ref, currentRef) <= 0) continue;

    const key = pageRefKey(link.ref);
    if (!candidates.has(key)) {
      candidates.set(key, link);
    }
  }

  let next: PageLink | null = null;
  for (const candidate of candidates.values()) {
    if (!next || comparePageRefs(candidate.ref, next.ref) < 0) {
      next = candidate;
    }
  }
  return next?.url ?? null;
}

/**
 * Highest page number linked within the current volume.
 *
 * @returns Never less than the current page; null if no link points into this volume
 */
export function findLastPageInVolume(currentUrl: string, currentRef: PageRef, hrefs: string[]): number | null {
  const pages = collectBookLinks(currentUrl, currentRef, hrefs)
    .filter((link) => link.ref.volume === currentRef.volume)
    .map((link) => link.ref.page);

  if (pages.length === 0) return null;
  return Math.max(currentRef.page, ...pages);
}
