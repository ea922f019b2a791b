import { InputError } from "./errors";

/**
 * Parsed slide range, 1-based positions
 */
export type RangeSelection =
  | { kind: "single"; position: number }
  | { kind: "span"; start: number; end: number }
  | { kind: "list"; positions: number[] };

const NUMBER = /^\d+$/;
const SPAN = /^(\d+)\s*-\s*(\d+)$/;

function invalid(spec: string): InputError {
  return new InputError(
    "invalid-range",
    `Invalid range "${spec}". Use N, A-B or A,B,C (1-based slide positions)`,
  );
}

/**
 * Parse a range spec
 * Malformed input throws; bounds are applied later against the slide set
 *
 * @example
 * parseRange("3") // { kind: "single", position: 3 }
 * parseRange("2-4") // { kind: "span", start: 2, end: 4 }
 * parseRange("1, 3,5") // { kind: "list", positions: [1, 3, 5] }
 */
export function parseRange(spec: string): RangeSelection {
  const trimmed = spec.trim();

  if (trimmed.includes(",")) {
    const tokens = trimmed.split(",").map((token) => token.trim());
    if (tokens.some((token) => !NUMBER.test(token))) {
      throw invalid(spec);
    }
    return { kind: "list", positions: tokens.map(Number) };
  }

  const span = trimmed.match(SPAN);
  if (span) {
    return { kind: "span", start: Number(span[1]), end: Number(span[2]) };
  }

  if (NUMBER.test(trimmed)) {
    return { kind: "single", position: Number(trimmed) };
  }

  throw invalid(spec);
}

/**
 * Resolve a selection to the 0-based indices it keeps, ascending
 * Out-of-bounds positions are dropped; spans are clamped to [1, count]
 */
export function selectionIndices(
  selection: RangeSelection,
  count: number,
): number[] {
  const inBounds = (position: number) => position >= 1 && position <= count;

  switch (selection.kind) {
    case "single":
      return inBounds(selection.position) ? [selection.position - 1] : [];
    case "span": {
      const start = Math.max(selection.start, 1);
      const end = Math.min(selection.end, count);
      const indices: number[] = [];
      for (let position = start; position <= end; position++) {
        indices.push(position - 1);
      }
      return indices;
    }
    case "list": {
      const unique = new Set(selection.positions.filter(inBounds));
      return [...unique].sort((a, b) => a - b).map((p) => p - 1);
    }
  }
}
