/**
 * Pipeline-level errors
 * Per-slide problems never use these; they travel as failure results
 */

import type { AggregationReport } from "./tracker";

export class SlideforgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type InputErrorCause =
  | "no-input"
  | "invalid-range"
  | "empty-selection"
  | "invalid-workers"
  | "invalid-count"
  | "invalid-dpi"
  | "output-exists";

/**
 * Bad input detected before any rendering happens
 */
export class InputError extends SlideforgeError {
  constructor(
    readonly kind: InputErrorCause,
    message: string,
  ) {
    super(message);
  }
}

/**
 * Every slide was attempted and none made it into the output
 */
export class AggregateFailure extends SlideforgeError {
  constructor(readonly report: AggregationReport) {
    super(`No slides were converted (0/${report.total})`);
  }
}

/**
 * The run was interrupted; no output was finalized
 */
export class CancellationError extends SlideforgeError {
  constructor(message = "Conversion cancelled") {
    super(message);
  }
}

/**
 * PDF <-> deck conversion failed in every available method
 */
export class BridgeError extends SlideforgeError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
