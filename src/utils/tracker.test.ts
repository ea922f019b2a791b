import { describe, it, expect } from "vitest";
import { Tracker, mapRenderError } from "./tracker";
import { makeSlides } from "../testing/fakes";

describe("mapRenderError", () => {
  it("maps timeouts by error name", () => {
    const error = new Error("too slow");
    error.name = "TimeoutError";
    expect(mapRenderError(error)).toEqual({
      reason: "timeout",
      details: "too slow",
    });
  });

  it("maps aborts to cancelled", () => {
    const error = new Error("stop");
    error.name = "AbortError";
    expect(mapRenderError(error).reason).toBe("cancelled");
  });

  it("maps ENOENT to not-found", () => {
    const error = Object.assign(new Error("spawn weasyprint ENOENT"), {
      code: "ENOENT",
    });
    expect(mapRenderError(error).reason).toBe("not-found");
  });

  it("maps anything else to engine-error", () => {
    expect(mapRenderError(new Error("crash"))).toEqual({
      reason: "engine-error",
      details: "crash",
    });
    expect(mapRenderError("plain")).toEqual({
      reason: "engine-error",
      details: "plain",
    });
  });
});

describe("Tracker", () => {
  it("builds a frozen report with failures sorted by index", () => {
    const tracker = new Tracker(makeSlides(["a.html", "b.html", "c.html"]));
    tracker.incrementSucceeded();
    tracker.trackMergeFailure(2, new Error("bad pdf"));
    tracker.trackRenderFailure(0, "timeout", "slow");

    const report = tracker.getReport();

    expect(report.total).toBe(3);
    expect(report.succeeded).toBe(1);
    expect(report.failures).toEqual([
      { index: 0, slide: "a.html", stage: "render", reason: "timeout", details: "slow" },
      { index: 2, slide: "c.html", stage: "merge", reason: "merge-error", details: "bad pdf" },
    ]);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.failures)).toBe(true);
  });

  it("stringifies non-Error merge failures", () => {
    const tracker = new Tracker(makeSlides(["a.html", "b.html"]));
    tracker.trackMergeFailure(1, "sink closed");

    expect(tracker.getReport().failures[0].details).toBe("sink closed");
  });

  it("names unknown indices by position", () => {
    const tracker = new Tracker(makeSlides(["a.html"]));
    tracker.trackRenderFailure(3, "cancelled", "stop");

    expect(tracker.getReport().failures[0].slide).toBe("#4");
  });
});
