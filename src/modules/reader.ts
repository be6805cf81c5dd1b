/**
 * Reader Module
 * Loads labels from a text file, one per line
 */

import { readFile } from "fs/promises";

/**
 * Blank lines and lines starting with "#" are skipped; the rest are trimmed
 */
export function parseLabels(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

export async function readLabels(path: string): Promise<string[]> {
  const content = await readFile(path, "utf-8");
  return parseLabels(content);
}
