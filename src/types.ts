/**
 * Shared type definitions for the crawler
 */

/** Identity of one page of one book, taken from a /<book_id>/<volume>/<page> path */
export interface PageRef {
  readonly bookId: number;
  readonly volume: number;
  readonly page: number;
}

/** Extracted text of a single page */
export interface PageText {
  ref: PageRef;
  /** Canonical URL the page was fetched from */
  url: string;
  text: string;
}

/** Output of one extraction pass over a page's markup */
export interface PageExtraction {
  /** Normalized reader text */
  text: string;
  /** Every href seen on the page, in document order */
  hrefs: string[];
  /** Whether the reading region was ever entered */
  foundReader: boolean;
}

/** Why a crawl run stopped */
export type StopReason = "end-of-document" | "cycle" | "max-pages";

/** Result of a whole crawl run, pages in reading order */
export interface CrawlResult {
  pages: PageText[];
  stopReason: StopReason;
  /** Last known estimate of the total page count, null if unknown */
  estimatedTotalPages: number | null;
}
