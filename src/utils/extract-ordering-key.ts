import path from "node:path";

/**
 * Extract the natural ordering key of a slide file
 * Parses the first run of decimal digits in the base name, ignoring directories
 *
 * @example
 * extractOrderingKey("page10.html") // 10
 * extractOrderingKey("/decks/2024/intro-03.html") // 3
 * extractOrderingKey("cover.html") // null
 */
export function extractOrderingKey(filename: string): number | null {
  const match = path.basename(filename).match(/\d+/);
  return match ? Number.parseInt(match[0], 10) : null;
}
