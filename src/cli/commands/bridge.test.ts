import { describe, it, expect } from "vitest";
import path from "path";
import { resolveBridgeOutput } from "./bridge";

describe("resolveBridgeOutput", () => {
  it("defaults to the input stem beside the input", () => {
    expect(resolveBridgeOutput("/talks/q3.pdf", ".pptx")).toBe("/talks/q3.pptx");
  });

  it("adds a missing extension to an explicit output", () => {
    expect(resolveBridgeOutput("/talks/q3.pdf", ".pptx", "/exports/final")).toBe(
      "/exports/final.pptx",
    );
  });

  it("resolves a relative output against the working directory", () => {
    expect(resolveBridgeOutput("deck.pptx", ".pdf", "out/deck.PDF")).toBe(
      path.resolve("out/deck.PDF"),
    );
  });
});
