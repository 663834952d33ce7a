/**
 * Error types raised while crawling a book.
 *
 * Everything except a bad candidate link aborts the run: a missing page in the
 * middle of a book would silently corrupt the assembled text.
 */

/** A URL that does not end with /<book_id>/<volume>/<page> */
export class InvalidPageUrlError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`URL must end with /<book_id>/<volume>/<page>, got: ${url}`);
    this.name = "InvalidPageUrlError";
    this.url = url;
  }
}

/** Network failure, timeout or non-2xx response while fetching a page */
export class TransportError extends Error {
  readonly url: string;
  /** HTTP status, when the server answered at all */
  readonly status: number | undefined;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.url = url;
    this.status = options.status;
  }
}

/** The fetched page has no reading region (unsupported or changed layout) */
export class ReaderNotFoundError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Reader element not found in: ${url}`);
    this.name = "ReaderNotFoundError";
    this.url = url;
  }
}

/** Invalid command line configuration */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}
