/**
 * Render Invoker
 * Runs one renderer call behind a contract that never throws
 */

import { fileSize, mapRenderError } from "../utils";
import type { ArtifactStore } from "../utils/artifact-store";
import type { Logger } from "../utils/logger";
import type {
  ArtifactHandle,
  RenderFailureReason,
  RenderResult,
  RenderTask,
  Renderer,
} from "../types";

export class RenderTimeoutError extends Error {
  name = "TimeoutError";
}

export class RenderCancelledError extends Error {
  name = "AbortError";
}

class EmptyArtifactError extends Error {}

export interface InvokeOptions {
  store: ArtifactStore;
  timeout: number; // Milliseconds, local to this call
  signal?: AbortSignal; // Run-level cancellation
  logger?: Logger;
}

/**
 * Render one slide into a fresh artifact
 *
 * Success hands ownership of the artifact to the caller. Any error,
 * deadline or cancellation releases the artifact and yields a failure
 * result for the task's index.
 */
export async function invokeRender(
  renderer: Renderer,
  task: RenderTask,
  options: InvokeOptions,
): Promise<RenderResult> {
  const { store, timeout, signal, logger } = options;

  if (signal?.aborted) {
    return failure(task.index, "cancelled", "Run cancelled before render");
  }

  const controller = new AbortController();
  const onAbort = () =>
    controller.abort(new RenderCancelledError("Run cancelled"));
  signal?.addEventListener("abort", onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  let artifact: ArtifactHandle | undefined;

  try {
    artifact = store.allocate(task.index, renderer.kind);

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort(
          new RenderTimeoutError(`Render timed out after ${timeout}ms`),
        );
      }, timeout);
      controller.signal.addEventListener(
        "abort",
        () => reject(controller.signal.reason),
        { once: true },
      );
    });

    await Promise.race([
      renderer.render(task.slide, artifact, { signal: controller.signal }),
      deadline,
    ]);

    const size = await fileSize(artifact.path);
    if (!size) {
      throw new EmptyArtifactError(
        `${renderer.name} produced no output for ${task.slide.filename}`,
      );
    }

    return { status: "success", index: task.index, artifact };
  } catch (error) {
    if (artifact) {
      await store.release(artifact).catch((releaseError: unknown) => {
        logger?.debug(`Could not release ${artifact?.path}: ${String(releaseError)}`);
      });
    }

    if (error instanceof EmptyArtifactError) {
      return failure(task.index, "empty-output", error.message);
    }
    if (signal?.aborted) {
      return failure(task.index, "cancelled", "Run cancelled");
    }
    const { reason, details } = mapRenderError(error);
    return failure(task.index, reason, details);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}

function failure(
  index: number,
  reason: RenderFailureReason,
  details: string,
): RenderResult {
  return { status: "failure", index, reason, details };
}
