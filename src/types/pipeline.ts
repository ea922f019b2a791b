/**
 * Pipeline capability and option types
 */

import type { ArtifactHandle, ArtifactKind, SlideInput } from "./slides";
import type { ArtifactStore } from "../utils/artifact-store";
import type { Logger } from "../utils/logger";

// ============================================================================
// Renderer
// ============================================================================

export interface RenderCallOptions {
  signal: AbortSignal; // Aborted on per-slide timeout or run cancellation
}

/**
 * A rendering engine behind a uniform contract
 *
 * `render` writes exactly one single-page artifact of `kind` to
 * `target.path`. It may throw engine-specific errors; the invoker turns
 * them into failure results.
 */
export interface Renderer {
  readonly name: string;
  readonly kind: ArtifactKind;
  open(): Promise<void>;
  close(): Promise<void>;
  render(
    slide: SlideInput,
    target: ArtifactHandle,
    options: RenderCallOptions,
  ): Promise<void>;
}

// ============================================================================
// Output sink
// ============================================================================

export interface OutputSink {
  readonly kind: ArtifactKind; // Artifact kind accepted by append
  readonly pageCount: number;
  append(artifact: ArtifactHandle): Promise<void>;
  finalize(outputPath: string): Promise<void>;
}

// ============================================================================
// Aggregators
// ============================================================================

export type ProgressEvent =
  | { type: "start"; total: number }
  | { type: "rendered"; index: number; completed: number; total: number }
  | { type: "failed"; index: number; completed: number; total: number }
  | { type: "merging"; total: number };

export interface AggregatorOptions {
  store: ArtifactStore;
  timeout: number; // Per-slide deadline in milliseconds
  signal?: AbortSignal;
  logger?: Logger;
  onProgress?: (event: ProgressEvent) => void;
}
