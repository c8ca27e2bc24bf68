// In-process source driven by the test: items are handed out only when pushed

interface Waiter<T> {
  resolve(result: IteratorResult<T>): void;
  reject(error: unknown): void;
}

type Step<T> = { kind: "item"; value: T } | { kind: "end" } | { kind: "fail"; error: unknown };

export class ManualSource<T> implements AsyncIterator<T> {
  private steps: Step<T>[] = [];
  private waiting: Waiter<T>[] = [];
  private finished = false;
  nextCalls = 0;
  returnCalls = 0;

  push(...values: T[]): this {
    for (const value of values) {
      this.deliver({ kind: "item", value });
    }
    return this;
  }

  end(): this {
    this.deliver({ kind: "end" });
    return this;
  }

  fail(error: unknown): this {
    this.deliver({ kind: "fail", error });
    return this;
  }

  /**
   * Number of next() calls still waiting for an item
   */
  get pendingPulls(): number {
    return this.waiting.length;
  }

  next(): Promise<IteratorResult<T>> {
    this.nextCalls += 1;
    if (this.finished) {
      return Promise.resolve({ done: true, value: undefined });
    }
    const step = this.steps.shift();
    if (step) {
      return this.settle(step);
    }
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  return(): Promise<IteratorResult<T>> {
    this.returnCalls += 1;
    this.finished = true;
    this.steps = [];
    for (const waiter of this.waiting.splice(0)) {
      waiter.resolve({ done: true, value: undefined });
    }
    return Promise.resolve({ done: true, value: undefined });
  }

  private deliver(step: Step<T>) {
    const waiter = this.waiting.shift();
    if (!waiter) {
      this.steps.push(step);
      return;
    }
    void this.settle(step).then(waiter.resolve, waiter.reject);
  }

  private settle(step: Step<T>): Promise<IteratorResult<T>> {
    if (step.kind === "item") {
      return Promise.resolve({ done: false, value: step.value });
    }
    this.finished = true;
    if (step.kind === "end") {
      return Promise.resolve({ done: true, value: undefined });
    }
    return Promise.reject(step.error);
  }
}

export async function *failingAfter<T>(values: T[], error: unknown): AsyncGenerator<T, void, undefined> {
  for (const value of values) {
    yield value;
  }
  throw error;
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of iterable) {
    values.push(value);
  }
  return values;
}

export async function flush(turns = 10): Promise<void> {
  for (let turn = 0; turn < turns; turn += 1) {
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}
