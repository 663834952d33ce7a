/**
 * Utility functions for the crawler
 * Extracted for testability
 */

import { ArgumentError } from "./errors.js";
import type { PageRef } from "./types.js";

/** Flag to prevent multiple signal handlers from running */
let isExiting = false;

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Crawl")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = (signal: NodeJS.Signals) => {
    if (isExiting) return;
    isExiting = true;

    console.error(`\n${commandName} interrupted.`);

    // 128 + signal number (SIGINT = 2, SIGTERM = 15)
    process.exit(signal === "SIGINT" ? 130 : 143);
  };

  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(65000) // '1m 5s'
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Render one progress line, e.g.
 * `[###############---------------]  50.00% 5/10 pages | volume 1 page 4`
 */
export function formatProgress(processed: number, total: number, ref: PageRef): string {
  const barWidth = 30;
  const safeTotal = Math.max(1, total);
  const ratio = Math.min(1, processed / safeTotal);
  const filled = Math.floor(barWidth * ratio);
  const bar = "#".repeat(filled) + "-".repeat(barWidth - filled);
  const percent = (ratio * 100).toFixed(2).padStart(6);

  return `[${bar}] ${percent}% ${processed}/${safeTotal} pages | volume ${ref.volume} page ${ref.page}`;
}

/**
 * Redraw the progress bar in place on stderr.
 */
export function progressBar(processed: number, total: number, ref: PageRef): void {
  process.stderr.write(`\r${formatProgress(processed, total, ref)}`);
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return hasFlag(args, ["--help", "-h"]);
}

/**
 * Check if any of the given boolean flags is present.
 */
export function hasFlag(args: string[], flags: string[]): boolean {
  return args.some((arg) => flags.includes(arg));
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flags - Flag and its aliases (e.g., ['--output', '-o'])
 * @param defaultValue - Default value if flag not found
 * @returns The argument value or default
 * @throws {ArgumentError} If the flag is not followed by a value
 */
export function getStringArg(args: string[], flags: string[], defaultValue: string): string {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    if (!flags.includes(args[i])) continue;

    const value = args[i + 1];
    if (!value || value.startsWith("-")) {
      throw new ArgumentError(`${args[i]} expects a value`);
    }
    result = value;
  }
  return result;
}

/**
 * Get a number argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--delay')
 * @param defaultValue - Default value if flag not found
 * @returns The parsed number or default
 * @throws {ArgumentError} If the flag has no value or a value that is not a number
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    if (args[i] !== flag) continue;

    const raw = args[i + 1];
    if (raw === undefined) {
      throw new ArgumentError(`${flag} expects a value`);
    }
    const parsed = raw.trim() === "" ? NaN : Number(raw);
    if (!Number.isFinite(parsed)) {
      throw new ArgumentError(`${flag} expects a number, got: ${raw}`);
    }
    result = parsed;
  }
  return result;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--delay 2', skips '2').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], knownFlags: string[] = []): string {
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      return arg;
    }
  }
  return "";
}

// ============================================================================
// Validation Helpers
// ============================================================================

/** Result of a validation check */
export type ValidationResult = { isValid: true } | { isValid: false; error: string };

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @param url - URL string to validate
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): ValidationResult {
  if (!url) {
    return { isValid: false, error: "URL is required" };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { isValid: false, error: "URL must use http or https protocol" };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: "Invalid URL format" };
  }
}
