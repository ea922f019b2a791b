/**
 * Aggregation Tracker
 * Unified tracking for per-slide outcomes and failures of one run
 */

import type {
  MergeFailureReason,
  RenderFailureReason,
  SlideInput,
} from "../types";

export type FailureStage = "render" | "merge";
export type FailureReason = RenderFailureReason | MergeFailureReason;

export interface FailureEntry {
  index: number; // Position in the aggregated slide set
  slide: string; // Slide filename
  stage: FailureStage;
  reason: FailureReason;
  details: string;
}

export interface AggregationReport {
  readonly total: number;
  readonly succeeded: number;
  readonly failures: readonly FailureEntry[];
  readonly duration: number; // Milliseconds
}

// ============================================================================
// Error Mapping
// ============================================================================

interface FailureInfo<T> {
  reason: T;
  details: string;
}

/**
 * Categorize an error thrown by a renderer
 */
export function mapRenderError(error: unknown): FailureInfo<RenderFailureReason> {
  if (error instanceof Error) {
    if (error.name === "TimeoutError") {
      return { reason: "timeout", details: error.message };
    }
    if (error.name === "AbortError") {
      return { reason: "cancelled", details: error.message };
    }
    if ("code" in error && error.code === "ENOENT") {
      return { reason: "not-found", details: error.message };
    }
    return { reason: "engine-error", details: error.message };
  }
  return { reason: "engine-error", details: String(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private readonly total: number;
  private succeeded = 0;
  private failures: FailureEntry[] = [];
  private startTime = Date.now();

  constructor(private slides: readonly SlideInput[]) {
    this.total = slides.length;
  }

  // ============================================================================
  // Stat counters
  // ============================================================================

  incrementSucceeded(): void {
    this.succeeded++;
  }

  // ============================================================================
  // Failure tracking
  // ============================================================================

  trackRenderFailure(
    index: number,
    reason: RenderFailureReason,
    details: string,
  ): void {
    this.failures.push({
      index,
      slide: this.slideName(index),
      stage: "render",
      reason,
      details,
    });
  }

  trackMergeFailure(index: number, error: unknown): void {
    this.failures.push({
      index,
      slide: this.slideName(index),
      stage: "merge",
      reason: "merge-error",
      details: error instanceof Error ? error.message : String(error),
    });
  }

  // ============================================================================
  // Results
  // ============================================================================

  getReport(): AggregationReport {
    const failures = [...this.failures].sort((a, b) => a.index - b.index);

    return Object.freeze({
      total: this.total,
      succeeded: this.succeeded,
      failures: Object.freeze(failures),
      duration: Date.now() - this.startTime,
    });
  }

  private slideName(index: number): string {
    return this.slides[index]?.filename ?? `#${index + 1}`;
  }
}
