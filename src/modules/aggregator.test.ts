import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { runSequential } from "./aggregator";
import { AggregateFailure, ArtifactStore, CancellationError } from "../utils";
import { FakeRenderer, RecordingSink, makeSlides } from "../testing/fakes";
import type { ProgressEvent } from "../types";

describe("runSequential", () => {
  let store: ArtifactStore;
  const slides = makeSlides(["s1.html", "s2.html", "s3.html", "s4.html"]);

  beforeEach(async () => {
    store = await ArtifactStore.create();
  });

  afterEach(async () => {
    await store.dispose();
  });

  it("appends every slide in order", async () => {
    const sink = new RecordingSink();

    const report = await runSequential(slides, new FakeRenderer(), sink, {
      store,
      timeout: 1000,
    });

    expect(sink.appended).toEqual([
      "slide:s1.html",
      "slide:s2.html",
      "slide:s3.html",
      "slide:s4.html",
    ]);
    expect(report.total).toBe(4);
    expect(report.succeeded).toBe(4);
    expect(report.failures).toEqual([]);
    expect(store.size).toBe(0);
  });

  it("skips failed slides and keeps the relative order of the rest", async () => {
    const renderer = new FakeRenderer({
      "s2.html": { type: "throw", error: new Error("layout crashed") },
    });
    const sink = new RecordingSink();

    const report = await runSequential(slides, renderer, sink, {
      store,
      timeout: 1000,
    });

    expect(sink.appended).toEqual([
      "slide:s1.html",
      "slide:s3.html",
      "slide:s4.html",
    ]);
    expect(report.succeeded).toBe(3);
    expect(report.failures).toEqual([
      {
        index: 1,
        slide: "s2.html",
        stage: "render",
        reason: "engine-error",
        details: "layout crashed",
      },
    ]);
    expect(renderer.calls).toEqual(["s1.html", "s2.html", "s3.html", "s4.html"]);
  });

  it("records a merge failure and continues", async () => {
    const sink = new RecordingSink("pdf", ["slide:s3.html"]);

    const report = await runSequential(slides, new FakeRenderer(), sink, {
      store,
      timeout: 1000,
    });

    expect(sink.appended).toEqual([
      "slide:s1.html",
      "slide:s2.html",
      "slide:s4.html",
    ]);
    expect(report.succeeded).toBe(3);
    expect(report.failures).toMatchObject([
      { index: 2, stage: "merge", reason: "merge-error" },
    ]);
    expect(store.size).toBe(0);
  });

  it("throws AggregateFailure with the report when nothing succeeds", async () => {
    const error = new Error("no engine");
    const renderer = new FakeRenderer(
      Object.fromEntries(
        slides.map((s) => [s.filename, { type: "throw" as const, error }]),
      ),
    );

    const run = runSequential(slides, renderer, new RecordingSink(), {
      store,
      timeout: 1000,
    });

    await expect(run).rejects.toBeInstanceOf(AggregateFailure);
    await run.catch((failure: unknown) => {
      expect(failure instanceof AggregateFailure && failure.report.total).toBe(4);
      expect(failure instanceof AggregateFailure && failure.report.failures).toHaveLength(4);
    });
    expect(store.size).toBe(0);
  });

  it("stops at the next slide when cancelled", async () => {
    const controller = new AbortController();
    const sink = new RecordingSink();
    const renderer = new FakeRenderer();

    const run = runSequential(slides, renderer, sink, {
      store,
      timeout: 1000,
      signal: controller.signal,
      onProgress: (event) => {
        if (event.type === "rendered" && event.index === 1) controller.abort();
      },
    });

    await expect(run).rejects.toBeInstanceOf(CancellationError);
    expect(renderer.calls).toEqual(["s1.html", "s2.html"]);
    expect(sink.appended).toEqual(["slide:s1.html", "slide:s2.html"]);
    expect(sink.finalizedTo).toBeNull();
    expect(store.size).toBe(0);
  });

  it("reports progress for every slide", async () => {
    const events: ProgressEvent[] = [];
    const renderer = new FakeRenderer({ "s3.html": { type: "empty" } });

    await runSequential(slides, renderer, new RecordingSink(), {
      store,
      timeout: 1000,
      onProgress: (event) => events.push(event),
    });

    expect(events).toEqual([
      { type: "start", total: 4 },
      { type: "rendered", index: 0, completed: 1, total: 4 },
      { type: "rendered", index: 1, completed: 2, total: 4 },
      { type: "failed", index: 2, completed: 3, total: 4 },
      { type: "rendered", index: 3, completed: 4, total: 4 },
    ]);
  });

  it("times out a hanging slide and carries on with the rest", async () => {
    const renderer = new FakeRenderer({ "s2.html": { type: "hang" } });
    const sink = new RecordingSink();

    const report = await runSequential(slides.slice(0, 3), renderer, sink, {
      store,
      timeout: 30,
    });

    expect(sink.appended).toEqual(["slide:s1.html", "slide:s3.html"]);
    expect(report.failures).toEqual([
      {
        index: 1,
        slide: "s2.html",
        stage: "render",
        reason: "timeout",
        details: "Render timed out after 30ms",
      },
    ]);
    expect(store.size).toBe(0);
  });

  it("counts a throwing progress listener as an engine error", async () => {
    const sink = new RecordingSink();

    const report = await runSequential(slides.slice(0, 3), new FakeRenderer(), sink, {
      store,
      timeout: 1000,
      onProgress: (event: ProgressEvent) => {
        if (event.type === "rendered" && event.index === 1) {
          throw new Error("progress listener failed");
        }
      },
    });

    expect(sink.appended).toEqual(["slide:s1.html", "slide:s3.html"]);
    expect(report.failures).toEqual([
      {
        index: 1,
        slide: "s2.html",
        stage: "render",
        reason: "engine-error",
        details: "progress listener failed",
      },
    ]);
    expect(store.size).toBe(0);
  });

  it("rejects a renderer whose artifacts the sink cannot take", async () => {
    await expect(
      runSequential(slides, new FakeRenderer({}, "png"), new RecordingSink("pdf"), {
        store,
        timeout: 1000,
      }),
    ).rejects.toThrow('Renderer "fake" produces png artifacts but the sink expects pdf');
  });
});
