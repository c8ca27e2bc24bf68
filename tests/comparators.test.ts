import { describe, it, expect } from "vitest";
import { ascending, descending, fromCompare, reversed } from "../src/comparators";

describe("comparators", () => {
  it("should order ascending", () => {
    expect(ascending(1, 2)).toBe(true);
    expect(ascending(2, 1)).toBe(false);
    expect(ascending("a", "a")).toBe(false);
  });

  it("should order descending", () => {
    expect(descending(2n, 1n)).toBe(true);
    expect(descending(1n, 2n)).toBe(false);
    expect(descending(3, 3)).toBe(false);
  });

  it("should build a predicate from a three-way comparator", () => {
    const byLength = fromCompare((a: string, b: string) => a.length - b.length);

    expect(byLength("ab", "abc")).toBe(true);
    expect(byLength("abc", "ab")).toBe(false);
    expect(byLength("ab", "cd")).toBe(false);
  });

  it("should reverse a predicate", () => {
    const latestFirst = reversed((a: number, b: number) => a < b);

    expect(latestFirst(2, 1)).toBe(true);
    expect(latestFirst(1, 2)).toBe(false);
  });
});
