#!/usr/bin/env node
/**
 * Extract the full text of a book from its reader pages
 *
 * Usage: reader-book-text <start-url> [options]
 * Example: reader-book-text https://reader.example/15050/1/0 -o book.txt --delay 1
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { crawlBook } from "./crawl.js";
import { ArgumentError } from "./errors.js";
import { MAX_TIMEOUT_MS } from "./fetch.js";
import { writeOutput } from "./output.js";
import { tryParsePageRef } from "./page.js";
import {
  formatDuration,
  getNumberArg,
  getPositionalArg,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  progressBar,
  setupSignalHandlers,
  validateUrl,
  type ValidationResult,
} from "./utils.js";

const DEFAULT_OUTPUT = "book_text.txt";
const DEFAULT_MAX_PAGES = 10000;
const DEFAULT_DELAY_SECONDS = 0;
const DEFAULT_TIMEOUT_SECONDS = 30;
const DEFAULT_RETRIES = 3;

/** Exit code for invalid arguments */
export const EXIT_USAGE = 2;

/** Flags that take values, used for positional argument detection */
const VALUE_FLAGS = ["-o", "--output", "--max-pages", "--delay", "--timeout", "--retries"];

/** Parsed command line options */
export interface CliOptions {
  startUrl: string;
  output: string;
  maxPages: number;
  /** Seconds between page requests */
  delay: number;
  /** Per-request timeout in seconds */
  timeout: number;
  retries: number;
  quiet: boolean;
  showHelp: boolean;
}

/**
 * Print usage information.
 */
function showUsage(): void {
  console.log("Usage: reader-book-text <start-url> [options]");
  console.log("");
  console.log("Extract the reader text of a book, following its page links.");
  console.log("");
  console.log("Options:");
  console.log(`  -o, --output <path>    Output UTF-8 text file (default: ${DEFAULT_OUTPUT})`);
  console.log(`  --max-pages <n>        Safety cap on pages fetched (default: ${DEFAULT_MAX_PAGES})`);
  console.log(`  --delay <seconds>      Delay between page requests (default: ${DEFAULT_DELAY_SECONDS})`);
  console.log(`  --timeout <seconds>    Request timeout (default: ${DEFAULT_TIMEOUT_SECONDS})`);
  console.log(`  --retries <n>          Attempts per page (default: ${DEFAULT_RETRIES})`);
  console.log("  --quiet                Disable progress output on stderr");
  console.log("  --help, -h             Show this help message");
  console.log("");
  console.log("Example:");
  console.log("  reader-book-text https://reader.example/15050/1/0 -o book.txt");
}

/**
 * Parse command line arguments.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @throws {ArgumentError} If a numeric option is not a number
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  return {
    startUrl: getPositionalArg(args, VALUE_FLAGS),
    output: getStringArg(args, ["-o", "--output"], DEFAULT_OUTPUT),
    maxPages: getNumberArg(args, "--max-pages", DEFAULT_MAX_PAGES),
    delay: getNumberArg(args, "--delay", DEFAULT_DELAY_SECONDS),
    timeout: getNumberArg(args, "--timeout", DEFAULT_TIMEOUT_SECONDS),
    retries: getNumberArg(args, "--retries", DEFAULT_RETRIES),
    quiet: hasFlag(args, ["--quiet"]),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Check option ranges and the start URL shape.
 */
export function validateOptions(options: CliOptions): ValidationResult {
  const urlValidation = validateUrl(options.startUrl);
  if (!urlValidation.isValid) {
    return urlValidation;
  }
  if (!tryParsePageRef(options.startUrl)) {
    return { isValid: false, error: `URL must end with /<book_id>/<volume>/<page>, got: ${options.startUrl}` };
  }
  if (!Number.isInteger(options.maxPages) || options.maxPages < 1) {
    return { isValid: false, error: "--max-pages must be an integer >= 1" };
  }
  if (!Number.isInteger(options.retries) || options.retries < 1) {
    return { isValid: false, error: "--retries must be an integer >= 1" };
  }
  if (options.timeout <= 0) {
    return { isValid: false, error: "--timeout must be > 0" };
  }
  if (Math.ceil(options.timeout * 1000) > MAX_TIMEOUT_MS) {
    return { isValid: false, error: `--timeout must be <= ${Math.floor(MAX_TIMEOUT_MS / 1000)}` };
  }
  if (options.delay < 0) {
    return { isValid: false, error: "--delay must be >= 0" };
  }
  return { isValid: true };
}

/**
 * Main entry point.
 * Crawls the book from the start URL and writes its text once every page
 * has been extracted.
 *
 * @throws Exits with code 2 on invalid arguments, 1 if the crawl or write fails
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof ArgumentError)) throw error;
    console.error(`Error: ${error.message}`);
    process.exit(EXIT_USAGE);
  }

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  const validation = validateOptions(options);
  if (!validation.isValid) {
    console.error(`Error: ${validation.error}`);
    process.exit(EXIT_USAGE);
  }

  const { quiet } = options;
  const started = Date.now();

  try {
    const result = await crawlBook({
      startUrl: options.startUrl,
      maxPages: options.maxPages,
      delayMs: options.delay * 1000,
      timeoutMs: Math.ceil(options.timeout * 1000),
      retries: options.retries,
      onProgress: quiet ? undefined : ({ processed, total, ref }) => progressBar(processed, total, ref),
      onRetry: quiet
        ? undefined
        : ({ url, attempt, retries, waitMs, error }) =>
            console.error(`\n  Attempt ${attempt}/${retries} failed for ${url}: ${error.message} (retrying in ${waitMs}ms)`),
    });

    if (!quiet) {
      process.stderr.write("\n");
      if (result.stopReason === "max-pages") {
        console.error(`Stopped at --max-pages (${options.maxPages}).`);
      } else if (result.stopReason === "cycle") {
        console.error("Stopped: next page was already visited.");
      }
    }

    await writeOutput(options.output, result.pages);

    console.log(`Done. Pages extracted: ${result.pages.length}`);
    console.log(`Output file: ${options.output}`);
    console.log(`Completed in ${formatDuration(Date.now() - started)}`);
  } catch (error) {
    if (!quiet) process.stderr.write("\n");
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

/** True when this module is the process entry point (also through an npm bin symlink) */
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Only run main when executed directly (not when imported for testing)
if (isEntryPoint()) {
  setupSignalHandlers("Crawl");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
