import { extractOrderingKey } from "./extract-ordering-key";

interface Orderable {
  path: string;
  filename: string;
  orderKey?: number | null;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Natural slide comparator
 * Keyed names first by key, unkeyed names last; ties by filename, then path
 */
export function compareSlides(a: Orderable, b: Orderable): number {
  const keyA = a.orderKey !== undefined ? a.orderKey : extractOrderingKey(a.filename);
  const keyB = b.orderKey !== undefined ? b.orderKey : extractOrderingKey(b.filename);

  if (keyA !== null && keyB !== null && keyA !== keyB) {
    return keyA - keyB;
  }
  if (keyA !== null && keyB === null) return -1;
  if (keyA === null && keyB !== null) return 1;

  return compareText(a.filename, b.filename) || compareText(a.path, b.path);
}
