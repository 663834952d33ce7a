/**
 * Assemble page texts into the final book file
 */

import * as fs from "node:fs/promises";
import type { PageText } from "./types.js";

export const PAGE_SEPARATOR = "PAGE_SEPARATOR";

/**
 * Join page texts in reading order, one separator line between pages,
 * with line endings normalized to \n.
 */
export function formatBookText(pages: PageText[]): string {
  return pages
    .map((page) => page.text)
    .join(`\n${PAGE_SEPARATOR}\n`)
    .replace(/\r\n?/g, "\n");
}

/**
 * Write the assembled book in one step. The text goes to a temporary file
 * next to the target first and is renamed over it, so a failed write never
 * leaves a truncated book behind.
 *
 * @param outputPath - Destination file
 * @param pages - Pages in reading order
 */
export async function writeOutput(outputPath: string, pages: PageText[]): Promise<void> {
  const tempPath = `${outputPath}.${process.pid}.tmp`;

  try {
    await fs.writeFile(tempPath, formatBookText(pages), "utf-8");
    await fs.rename(tempPath, outputPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
