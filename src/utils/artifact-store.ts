/**
 * Artifact Store
 * Owns the temporary files holding intermediate single-page renders
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ArtifactHandle, ArtifactKind } from "../types";

export class ArtifactStore {
  private live = new Map<string, ArtifactHandle>();
  private sequence = 0;
  private disposed = false;

  private constructor(readonly directory: string) {}

  /**
   * Create a store backed by a fresh temp directory
   */
  static async create(prefix = "slideforge-"): Promise<ArtifactStore> {
    const directory = await mkdtemp(join(tmpdir(), prefix));
    return new ArtifactStore(directory);
  }

  /**
   * Number of artifacts allocated and not yet released
   */
  get size(): number {
    return this.live.size;
  }

  allocate(index: number, kind: ArtifactKind): ArtifactHandle {
    if (this.disposed) {
      throw new Error("Artifact store has been disposed");
    }

    const id = `slide-${index + 1}-${++this.sequence}`;
    const handle: ArtifactHandle = {
      id,
      index,
      kind,
      path: join(this.directory, `${id}.${kind}`),
    };
    this.live.set(id, handle);
    return handle;
  }

  /**
   * Delete the artifact file; releasing twice is a no-op
   */
  async release(handle: ArtifactHandle): Promise<void> {
    if (!this.live.delete(handle.id)) return;
    await rm(handle.path, { force: true });
  }

  async releaseAll(): Promise<void> {
    const handles = [...this.live.values()];
    this.live.clear();
    await Promise.all(handles.map((h) => rm(h.path, { force: true })));
  }

  /**
   * Release everything and remove the directory, including files a
   * renderer may have written after its call was abandoned
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.live.clear();
    await rm(this.directory, { recursive: true, force: true });
  }
}
