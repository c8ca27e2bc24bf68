import { describe, it, expect } from "vitest";
import { asAsync, asAsyncIterator, isAsyncIterable, isIterable } from "../src/async";
import { collect, ManualSource } from "./helpers/manualSource";

describe("async adaptors", () => {
  it("should recognise the kinds of source", () => {
    const source = new ManualSource<number>();

    expect(isAsyncIterable<number>([1])).toBe(false);
    expect(isIterable<number>([1])).toBe(true);
    expect(isIterable<string>("ab")).toBe(true);
    expect(isIterable<number>(source)).toBe(false);
    expect(isAsyncIterable<number>(source)).toBe(false);
  });

  it("should lift arrays and strings", async () => {
    expect(await collect(asAsync([1, 2]))).toEqual([1, 2]);
    expect(await collect(asAsync("ab"))).toEqual(["a", "b"]);
  });

  it("should use an async iterator as is", async () => {
    const source = new ManualSource<number>().push(1).end();

    expect(asAsyncIterator(source)).toBe(source);
    expect(await collect(asAsync(source))).toEqual([1]);
  });

  it("should open async iterables", async () => {
    async function *numbers() {
      yield 1;
      yield 2;
    }

    expect(await collect(asAsync(numbers()))).toEqual([1, 2]);
  });

  it("should forward return to a sync iterator", async () => {
    let closed = false;
    function *numbers() {
      try {
        yield 1;
        yield 2;
      } finally {
        closed = true;
      }
    }

    const iterator = asAsyncIterator(numbers());
    expect(await iterator.next()).toEqual({ done: false, value: 1 });
    await iterator.return?.();

    expect(closed).toBe(true);
  });
});
