import Heap from "heap";
import type { Source } from "./async";
import { ascending, descending, fromCompare } from "./comparators";
import type { Compare, Ordered, Precedes } from "./comparators";
import { createMergeConfig } from "./config";
import type { MergeConfig, MergeOptions } from "./config";
import { createDebugLogger } from "./debug";
import { deferred } from "./deferred";
import type { DebugLogger } from "./debug";
import { ConfigurationError, MergeTerminatedError, UpstreamError } from "./errors";
import { nextTurn } from "./microtask";
import { SourceSlot } from "./slot";

export interface PullItem<T> {
  kind: "item";
  value: T;
}

export interface PullEnd {
  kind: "end";
}

export interface PullError {
  kind: "error";
  error: UpstreamError;
}

export type PullResult<T> = PullItem<T> | PullEnd | PullError;

const END: PullEnd = Object.freeze({ kind: "end" });

/**
 * Lazily merges k individually ordered sources into one ordered sequence.
 *
 * Each round every source holds at most one peeked item; the item that
 * precedes all others is emitted, ties going to the lowest source index.
 * A failing source surfaces its error once and drops out, the others carry on.
 *
 * A comparator that throws rejects the call that invoked it; later calls carry
 * on, though the item being selected when it threw may be lost.
 *
 * ```ts
 * const merged = kmergeMin([[1, 3, 5], [2, 4, 6]]);
 * for await (const value of merged) {
 *   console.log(value); // 1 2 3 4 5 6
 * }
 * ```
 */
export class KMerge<T> implements AsyncIterable<T> {
  private readonly config: MergeConfig;
  private readonly log: DebugLogger;
  private readonly ready: Heap<SourceSlot<T>>;
  private waiting: SourceSlot<T>[] = [];
  private failures: UpstreamError[] = [];
  private nextIndex = 0;
  private terminal: PullEnd | PullError | undefined = undefined;
  private rounds: Promise<unknown> = Promise.resolve();
  private readonly closed = deferred();

  constructor(sources: Iterable<Source<T>>, precedes: Precedes<T>, options?: MergeOptions) {
    if (typeof precedes !== "function") {
      throw new ConfigurationError("precedes must be a function");
    }
    this.config = createMergeConfig(options);
    this.log = createDebugLogger(this.config.label, this.config.debug);
    this.ready = new Heap<SourceSlot<T>>((a, b) => {
      const left = a.peek();
      const right = b.peek();
      if (precedes(left, right)) return -1;
      if (precedes(right, left)) return 1;
      return a.index - b.index;
    });
    for (const source of sources) {
      this.add(source);
    }
    if (!this.waiting.length) {
      this.terminal = END;
    }
  }

  /**
   * Number of sources still taking part in the merge
   */
  get size(): number {
    return this.waiting.length + this.ready.size();
  }

  /**
   * Number of items pulled from sources and not yet emitted, at most one per source
   */
  bufferedCount(): number {
    return this.ready.size();
  }

  isTerminated(): boolean {
    return this.terminal !== undefined;
  }

  /**
   * Add another source, ordered after every source already present
   */
  merge(source: Source<T>): this {
    if (this.terminal) {
      throw new MergeTerminatedError();
    }
    this.add(source);
    return this;
  }

  /**
   * Produce the next item, the end of the merge, or an error from one source.
   *
   * Once `end` has been returned it is returned again on every call.
   */
  pullNext(): Promise<PullResult<T>> {
    const round = this.rounds.then(() => this.round());
    // The caller of this round receives its rejection, the next round starts regardless
    this.rounds = round.catch(() => undefined);
    return round;
  }

  /**
   * Release every source. Pending and later calls to pullNext resolve with `end`,
   * unless the merge had already terminated on an error.
   */
  async close(): Promise<void> {
    const slots = [...this.waiting, ...this.ready.toArray()];
    this.waiting = [];
    this.ready.clear();
    this.failures = [];
    if (!this.terminal) {
      this.terminal = END;
    }
    this.closed.resolve();
    if (!slots.length) {
      return;
    }
    this.log("closing %d sources", slots.length);
    await Promise.all(slots.map(slot => slot.release()));
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    try {
      while (true) {
        const result = await this.pullNext();
        if (result.kind === "end") {
          return;
        }
        if (result.kind === "error") {
          throw result.error;
        }
        yield result.value;
      }
    } finally {
      await this.close();
    }
  }

  private add(source: Source<T>) {
    this.waiting.push(new SourceSlot(this.nextIndex, source, this.log));
    this.nextIndex += 1;
  }

  private async round(): Promise<PullResult<T>> {
    while (!this.terminal) {
      const failure = this.failures.shift();
      if (failure) {
        return this.surface(failure);
      }

      const pending: Promise<void>[] = [];
      const stillWaiting: SourceSlot<T>[] = [];
      const peeked: SourceSlot<T>[] = [];
      const failed: UpstreamError[] = [];

      for (const slot of this.waiting) {
        const pull = slot.poll();
        if (pull) {
          pending.push(pull);
          stillWaiting.push(slot);
          continue;
        }
        const slotFailure = slot.takeFailure();
        if (slotFailure) {
          this.log("source #%d failed: %s", slot.index, slotFailure.message);
          failed.push(slotFailure);
        } else if (slot.hasPeeked()) {
          peeked.push(slot);
        } else {
          this.log("source #%d exhausted", slot.index);
        }
      }

      this.waiting = stillWaiting;
      failed.sort((a, b) => a.sourceIndex - b.sourceIndex);
      this.failures.push(...failed);
      for (let i = 0; i < peeked.length; i += 1) {
        try {
          this.ready.push(peeked[i]);
        } catch (error) {
          // Not yet in the heap, poll() hands their items back next round
          this.waiting.push(...peeked.slice(i + 1));
          throw error;
        }
      }

      if (failed.length) {
        continue;
      }

      if (pending.length) {
        // Revisit once any source settles, without waiting on the slowest
        await Promise.race([...pending, this.closed.promise]);
        await nextTurn(this.config.queueMicrotask);
        continue;
      }

      const winner = this.ready.pop();
      if (!winner) {
        this.log("all sources exhausted");
        this.terminal = END;
        return END;
      }
      const value = winner.take();
      this.waiting.push(winner);
      return { kind: "item", value };
    }
    return this.terminal ?? END;
  }

  private surface(error: UpstreamError): PullError {
    const result: PullError = { kind: "error", error };
    if (!this.failures.length && !this.size) {
      this.log("final source failed, terminating");
      this.terminal = result;
    }
    return result;
  }
}

export function kmergeBy<T>(sources: Iterable<Source<T>>, precedes: Precedes<T>, options?: MergeOptions): KMerge<T> {
  return new KMerge(sources, precedes, options);
}

export function kmergeByCompare<T>(sources: Iterable<Source<T>>, compare: Compare<T>, options?: MergeOptions): KMerge<T> {
  if (typeof compare !== "function") {
    throw new ConfigurationError("compare must be a function");
  }
  return new KMerge(sources, fromCompare(compare), options);
}

/**
 * Merge ascending sources, smallest item first
 */
export function kmergeMin<T extends Ordered>(sources: Iterable<Source<T>>, options?: MergeOptions): KMerge<T> {
  return new KMerge<T>(sources, ascending, options);
}

/**
 * Merge descending sources, largest item first
 */
export function kmergeMax<T extends Ordered>(sources: Iterable<Source<T>>, options?: MergeOptions): KMerge<T> {
  return new KMerge<T>(sources, descending, options);
}
