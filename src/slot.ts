import { asAsyncIterator } from "./async";
import type { Source } from "./async";
import type { DebugLogger } from "./debug";
import { UpstreamError } from "./errors";

interface Peeked<T> {
  value: T;
}

/**
 * Wraps one source with a single item of lookahead.
 *
 * A slot never asks its source for more than one item at a time, and once
 * exhausted (ended, failed or released) it never pulls again. The source is
 * opened on the first poll, so a source that fails to open fails like any pull.
 */
export class SourceSlot<T> {
  readonly index: number;
  private source: Source<T> | undefined;
  private iterator: AsyncIterator<T> | undefined = undefined;
  private peeked: Peeked<T> | undefined = undefined;
  private inFlight: Promise<void> | undefined = undefined;
  private exhausted = false;
  private released = false;
  private failure: UpstreamError | undefined = undefined;
  private readonly log: DebugLogger;

  constructor(index: number, source: Source<T>, log: DebugLogger = () => undefined) {
    this.index = index;
    this.source = source;
    this.log = log;
  }

  /**
   * Start pulling the next item if the slot has none and is not exhausted.
   *
   * Returns the pending pull, or undefined when there is nothing to wait for.
   */
  poll(): Promise<void> | undefined {
    if (this.exhausted || this.peeked) {
      return undefined;
    }
    if (this.inFlight) {
      return this.inFlight;
    }
    const pending = this.pull().finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = pending;
    return pending;
  }

  take(): T {
    const peeked = this.peeked;
    if (!peeked) {
      throw new Error(`Source #${this.index} has no peeked item`);
    }
    this.peeked = undefined;
    return peeked.value;
  }

  peek(): T {
    if (!this.peeked) {
      throw new Error(`Source #${this.index} has no peeked item`);
    }
    return this.peeked.value;
  }

  hasPeeked(): boolean {
    return this.peeked !== undefined;
  }

  isExhausted(): boolean {
    return this.exhausted;
  }

  isPending(): boolean {
    return this.inFlight !== undefined;
  }

  takeFailure(): UpstreamError | undefined {
    const failure = this.failure;
    this.failure = undefined;
    return failure;
  }

  /**
   * Cancel the source. Any peeked item, or an item still in flight, is discarded.
   *
   * With a pull in flight, `return()` is started but not awaited: an async
   * generator only answers it once its pending `next()` settles.
   */
  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    this.exhausted = true;
    this.peeked = undefined;
    this.source = undefined;
    const iterator = this.iterator;
    this.iterator = undefined;
    if (!iterator?.return) {
      return;
    }
    const closing = iterator.return();
    if (!this.inFlight) {
      await closing;
      return;
    }
    void closing.then(
      () => this.log("source #%d closed after its pending pull", this.index),
      (error: unknown) => this.log("source #%d failed to close: %s", this.index, String(error))
    );
  }

  private async pull(): Promise<void> {
    let result: IteratorResult<T>;
    try {
      result = await this.open().next();
    } catch (error) {
      if (!this.released) {
        this.failure = new UpstreamError(this.index, error);
      }
      this.finish();
      return;
    }
    if (this.released) {
      return;
    }
    if (result.done) {
      this.finish();
    } else {
      this.peeked = { value: result.value };
    }
  }

  private open(): AsyncIterator<T> {
    if (this.iterator) {
      return this.iterator;
    }
    const source = this.source;
    if (source === undefined) {
      throw new Error(`Source #${this.index} is closed`);
    }
    this.source = undefined;
    this.iterator = asAsyncIterator(source);
    return this.iterator;
  }

  private finish() {
    this.exhausted = true;
    this.source = undefined;
    this.iterator = undefined;
  }
}
