/**
 * Parallel Aggregator
 * Renders slides on a bounded worker pool, then merges results in slide order
 */

import { invokeRender } from "./invoker";
import {
  assertCompatible,
  finish,
  mergeArtifact,
  recordFailure,
} from "./aggregator";
import {
  CancellationError,
  InputError,
  Tracker,
  mapRenderError,
  runPool,
} from "../utils";
import type { PoolOutcome } from "../utils/worker-pool";
import type {
  AggregationReport,
  AggregatorOptions,
  OutputSink,
  RenderResult,
  RenderTask,
  Renderer,
  SlideSet,
} from "../types";

export function assertWorkerCount(workerCount: number): void {
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new InputError(
      "invalid-workers",
      `Worker count must be a positive integer, got ${workerCount}`,
    );
  }
}

/**
 * Render slides concurrently with `workerCount` workers
 *
 * Completion order is arbitrary, so results are buffered by index and the
 * sink only sees them after every task settled, in index order. Workers never
 * touch the sink.
 */
export async function runParallel(
  slides: SlideSet,
  renderer: Renderer,
  sink: OutputSink,
  workerCount: number,
  options: AggregatorOptions,
): Promise<AggregationReport> {
  assertWorkerCount(workerCount);

  const { store, timeout, signal, logger, onProgress } = options;
  assertCompatible(renderer, sink);

  const tracker = new Tracker(slides);
  const total = slides.length;
  const tasks: RenderTask[] = slides.map((slide, index) => ({ index, slide }));
  let completed = 0;

  onProgress?.({ type: "start", total });
  logger?.debug(`Rendering ${total} slides with ${workerCount} workers`);

  try {
    const outcomes = await runPool(
      tasks,
      async (task) => {
        const result = await invokeRender(renderer, task, {
          store,
          timeout,
          signal,
          logger,
        });
        completed++;
        onProgress?.({
          type: result.status === "success" ? "rendered" : "failed",
          index: task.index,
          completed,
          total,
        });
        return result;
      },
      { concurrency: workerCount, signal },
    );

    if (signal?.aborted) throw new CancellationError();

    onProgress?.({ type: "merging", total });

    for (let index = 0; index < total; index++) {
      const result = toResult(index, outcomes.get(index));

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

/**
 * Convert a pool outcome into a render result; a thrown task becomes a failure
 */
function toResult(
  index: number,
  outcome: PoolOutcome<RenderResult> | undefined,
): RenderResult {
  if (!outcome) {
    return {
      status: "failure",
      index,
      reason: "cancelled",
      details: "Task was never dispatched",
    };
  }
  if (outcome.ok) {
    return outcome.value;
  }
  const { reason, details } = mapRenderError(outcome.error);
  return { status: "failure", index, reason, details };
}
