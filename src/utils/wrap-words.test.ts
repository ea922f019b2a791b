import { describe, it, expect } from "vitest";
import { wrapWords } from "./wrap-words";

describe("wrapWords", () => {
  it("fills lines greedily up to the limit", () => {
    expect(wrapWords("aaa bbb ccc", 7)).toEqual(["aaa bbb", "ccc"]);
  });

  it("collapses runs of whitespace", () => {
    expect(wrapWords("  one\n two\tthree ", 80)).toEqual(["one two three"]);
  });

  it("puts an overlong word on its own line", () => {
    expect(wrapWords("a abcdefghij b", 5)).toEqual(["a", "abcdefghij", "b"]);
  });

  it("returns nothing for blank text", () => {
    expect(wrapWords("   ", 10)).toEqual([]);
  });
});
