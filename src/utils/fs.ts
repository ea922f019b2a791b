/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, stat } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Size of a regular file in bytes, or null when it is missing or not a file
 */
export async function fileSize(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : null;
  } catch {
    return null;
  }
}

/**
 * Append an extension when the filename does not already end with it
 *
 * @example
 * withExtension("deck", ".pptx") // "deck.pptx"
 * withExtension("deck.PDF", ".pdf") // "deck.PDF"
 */
export function withExtension(filename: string, extension: string): string {
  return filename.toLowerCase().endsWith(extension.toLowerCase())
    ? filename
    : `${filename}${extension}`;
}
