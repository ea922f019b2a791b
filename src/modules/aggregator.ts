/**
 * Sequential Aggregator
 * Renders slides one at a time and appends each result to the sink immediately
 */

import { invokeRender } from "./invoker";
import {
  AggregateFailure,
  CancellationError,
  Tracker,
  mapRenderError,
} from "../utils";
import type { ArtifactStore } from "../utils/artifact-store";
import type { Logger } from "../utils/logger";
import type {
  AggregationReport,
  AggregatorOptions,
  ArtifactHandle,
  OutputSink,
  RenderFailure,
  Renderer,
  SlideSet,
} from "../types";

/**
 * Render every slide in order and merge successes into the sink
 *
 * Render and merge failures are recorded and skipped. Throws
 * AggregateFailure when nothing reached the sink and CancellationError when
 * the signal fires. The store holds no artifacts once this returns or throws.
 */
export async function runSequential(
  slides: SlideSet,
  renderer: Renderer,
  sink: OutputSink,
  options: AggregatorOptions,
): Promise<AggregationReport> {
  const { store, timeout, signal, logger, onProgress } = options;
  assertCompatible(renderer, sink);

  const tracker = new Tracker(slides);
  const total = slides.length;
  let completed = 0;

  onProgress?.({ type: "start", total });

  try {
    for (let index = 0; index < total; index++) {
      if (signal?.aborted) throw new CancellationError();

      let result = await invokeRender(
        renderer,
        { index, slide: slides[index] },
        { store, timeout, signal, logger },
      );

      if (signal?.aborted) throw new CancellationError();
      completed++;

      try {
        onProgress?.({
          type: result.status === "success" ? "rendered" : "failed",
          index,
          completed,
          total,
        });
      } catch (error) {
        // Same outcome as a throwing pool task in the parallel aggregator
        if (result.status === "success") await store.release(result.artifact);
        const { reason, details } = mapRenderError(error);
        result = { status: "failure", index, reason, details };
      }

      if (result.status === "failure") {
        recordFailure(tracker, result, slides, logger);
        continue;
      }

      await mergeArtifact(sink, result.artifact, { tracker, store, logger });
    }
  } finally {
    await store.releaseAll();
  }

  return finish(tracker);
}

// ============================================================================
// Shared with the parallel aggregator
// ============================================================================

interface MergeContext {
  tracker: Tracker;
  store: ArtifactStore;
  logger?: Logger;
}

/**
 * Append one artifact, then release it whatever the outcome
 */
export async function mergeArtifact(
  sink: OutputSink,
  artifact: ArtifactHandle,
  { tracker, store, logger }: MergeContext,
): Promise<boolean> {
  try {
    await sink.append(artifact);
    tracker.incrementSucceeded();
    return true;
  } catch (error) {
    tracker.trackMergeFailure(artifact.index, error);
    logger?.warn(
      `Failed to merge slide ${artifact.index + 1}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return false;
  } finally {
    await store.release(artifact);
  }
}

export function recordFailure(
  tracker: Tracker,
  result: RenderFailure,
  slides: SlideSet,
  logger?: Logger,
): void {
  tracker.trackRenderFailure(result.index, result.reason, result.details);
  logger?.warn(
    `Failed to render slide ${result.index + 1} (${slides[result.index]?.filename}): ${result.details}`,
  );
}

export function assertCompatible(renderer: Renderer, sink: OutputSink): void {
  if (renderer.kind !== sink.kind) {
    throw new Error(
      `Renderer "${renderer.name}" produces ${renderer.kind} artifacts but the sink expects ${sink.kind}`,
    );
  }
}

export function finish(tracker: Tracker): AggregationReport {
  const report = tracker.getReport();
  if (report.succeeded === 0) {
    throw new AggregateFailure(report);
  }
  return report;
}
