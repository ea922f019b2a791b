import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile } from "fs/promises";
import { invokeRender } from "./invoker";
import { ArtifactStore, fileExists } from "../utils";
import { FakeRenderer, makeSlides } from "../testing/fakes";

describe("invokeRender", () => {
  let store: ArtifactStore;
  const [slide] = makeSlides(["page1.html"]);
  const task = { index: 0, slide };

  beforeEach(async () => {
    store = await ArtifactStore.create();
  });

  afterEach(async () => {
    await store.dispose();
  });

  it("hands over a non-empty artifact on success", async () => {
    const result = await invokeRender(new FakeRenderer(), task, {
      store,
      timeout: 1000,
    });

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.index).toBe(0);
    expect(await readFile(result.artifact.path, "utf-8")).toBe(
      "slide:page1.html",
    );
    expect(store.size).toBe(1);
  });

  it("maps a renderer error to engine-error and releases the artifact", async () => {
    const renderer = new FakeRenderer({
      "page1.html": { type: "throw", error: new Error("page crashed") },
    });

    const result = await invokeRender(renderer, task, { store, timeout: 1000 });

    expect(result).toEqual({
      status: "failure",
      index: 0,
      reason: "engine-error",
      details: "page crashed",
    });
    expect(store.size).toBe(0);
  });

  it("maps a missing engine to not-found", async () => {
    const error = Object.assign(new Error("spawn weasyprint ENOENT"), {
      code: "ENOENT",
    });
    const renderer = new FakeRenderer({
      "page1.html": { type: "throw", error },
    });

    const result = await invokeRender(renderer, task, { store, timeout: 1000 });

    expect(result.status === "failure" && result.reason).toBe("not-found");
  });

  it("fails with timeout when the deadline passes", async () => {
    const renderer = new FakeRenderer({ "page1.html": { type: "hang" } });

    const result = await invokeRender(renderer, task, { store, timeout: 20 });

    expect(result).toEqual({
      status: "failure",
      index: 0,
      reason: "timeout",
      details: "Render timed out after 20ms",
    });
    expect(store.size).toBe(0);
  });

  it("rejects an empty artifact", async () => {
    const renderer = new FakeRenderer({ "page1.html": { type: "empty" } });

    const result = await invokeRender(renderer, task, { store, timeout: 1000 });

    expect(result).toEqual({
      status: "failure",
      index: 0,
      reason: "empty-output",
      details: "fake produced no output for page1.html",
    });
    expect(store.size).toBe(0);
  });

  it("reports cancelled when the run is aborted mid-render", async () => {
    const controller = new AbortController();
    const renderer = new FakeRenderer({ "page1.html": { type: "hang" } });

    const pending = invokeRender(renderer, task, {
      store,
      timeout: 5000,
      signal: controller.signal,
    });
    controller.abort();
    const result = await pending;

    expect(result.status === "failure" && result.reason).toBe("cancelled");
    expect(store.size).toBe(0);
  });

  it("does not call the renderer once the run is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const renderer = new FakeRenderer();

    const result = await invokeRender(renderer, task, {
      store,
      timeout: 1000,
      signal: controller.signal,
    });

    expect(result.status === "failure" && result.reason).toBe("cancelled");
    expect(renderer.calls).toEqual([]);
  });

  it("leaves no file behind after a failure", async () => {
    const renderer = new FakeRenderer({ "page1.html": { type: "empty" } });
    const allocated: string[] = [];
    const allocate = store.allocate.bind(store);
    store.allocate = (index, kind) => {
      const handle = allocate(index, kind);
      allocated.push(handle.path);
      return handle;
    };

    await invokeRender(renderer, task, { store, timeout: 1000 });

    expect(allocated).toHaveLength(1);
    expect(await fileExists(allocated[0])).toBe(false);
  });
});
