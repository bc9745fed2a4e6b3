import { describe, expect, it } from "vitest";
import { truncateTail } from "../tools/truncation.js";

describe("truncateTail", () => {
  const text = "abcdefghij".repeat(10);

  it("returns text that already fits", () => {
    expect(truncateTail("short", 5)).toBe("short");
  });

  it("keeps the tail behind a marker counted toward the limit", () => {
    const result = truncateTail(text, 40);
    expect(result).toBe("[truncated 81 chars]\nbcdefghijabcdefghij");
    expect(result).toHaveLength(40);
  });

  it("grows the marker when the dropped count gains a digit", () => {
    const long = "x".repeat(1_005);
    const result = truncateTail(long, 30);
    expect(result.startsWith("[truncated 997 chars]\n")).toBe(true);
    expect(result).toHaveLength(30);
  });

  it("falls back to the raw tail when the limit is smaller than the marker", () => {
    expect(truncateTail(text, 6)).toBe("efghij");
    expect(truncateTail(text, 0)).toBe("");
  });

  it("never cuts through a surrogate pair", () => {
    expect(truncateTail(`ab${"😀".repeat(10)}`, 5)).toBe("😀😀");
    expect(truncateTail("😀".repeat(20), 26)).toBe("[truncated 36 chars]\n😀😀");
  });

  it("is idempotent", () => {
    const once = truncateTail(text, 40);
    expect(truncateTail(once, 40)).toBe(once);
  });
});
