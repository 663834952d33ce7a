/**
 * HTTP transport for reader pages
 *
 * One GET per call with browser-like headers and a per-request timeout.
 * Failures worth retrying surface as TransportError.
 */

import { TransportError } from "./errors.js";

/**
 * Realistic Chrome user agent to avoid bot detection.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

/** The reader serves Arabic and Persian books */
export const DEFAULT_ACCEPT_LANGUAGE = "ar,fa;q=0.9,en;q=0.5";

const DEFAULT_CHARSET = "utf-8";

/** Largest delay a timer signal accepts (ms) */
export const MAX_TIMEOUT_MS = 2 ** 32 - 1;

/** Raw response body plus the charset the server declared, if any */
export interface RawPage {
  body: Uint8Array;
  charset: string | null;
}

/** Fetches one URL; must throw TransportError for failures worth retrying */
export type Transport = (url: string, timeoutMs: number) => Promise<RawPage>;

/**
 * Extract the charset parameter from a Content-Type header.
 *
 * @example
 * parseCharset('text/html; charset="windows-1256"') // 'windows-1256'
 */
export function parseCharset(contentType: string | null): string | null {
  const match = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match ? match[1].toLowerCase() : null;
}

/**
 * Decode a response body. Unknown charsets fall back to UTF-8, with
 * undecodable bytes replaced by U+FFFD.
 */
export function decodeBody(body: Uint8Array, charset: string | null): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset ?? DEFAULT_CHARSET);
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;
    decoder = new TextDecoder(DEFAULT_CHARSET);
  }
  return decoder.decode(body);
}

/**
 * Fetch a page over HTTP(S) with the default headers.
 *
 * @throws {TransportError} On network failure, timeout, or a non-2xx status
 * @throws {RangeError} If timeoutMs is negative or not a number
 */
export const httpTransport: Transport = async (url, timeoutMs) => {
  const headers = {
    "User-Agent": DEFAULT_USER_AGENT,
    "Accept-Language": DEFAULT_ACCEPT_LANGUAGE,
  };
  // Timer signals take whole milliseconds
  const signal = AbortSignal.timeout(Math.min(Math.ceil(timeoutMs), MAX_TIMEOUT_MS));

  let response: Response;
  try {
    response = await fetch(url, { headers, signal });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TransportError(url, message, { cause: error });
  }

  if (!response.ok) {
    throw new TransportError(url, `HTTP ${response.status} ${response.statusText}`.trim(), {
      status: response.status,
    });
  }

  try {
    const body = new Uint8Array(await response.arrayBuffer());
    return { body, charset: parseCharset(response.headers.get("content-type")) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TransportError(url, message, { cause: error });
  }
};
