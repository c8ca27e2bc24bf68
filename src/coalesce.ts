import { asAsync } from "./async";
import type { Source } from "./async";

export type Coalesced<T> = { merged: true; value: T } | { merged: false };

export interface CoalesceFn<T> {
  (previous: T, current: T): Coalesced<T>;
}

/**
 * Merge runs of consecutive items.
 *
 * When `fn` merges a pair, the merged value is carried on as `previous`;
 * otherwise `previous` is emitted and `current` is carried on. The value
 * carried at the end of the source is emitted last.
 */
export async function *coalesce<T>(source: Source<T>, fn: CoalesceFn<T>): AsyncGenerator<T, void, undefined> {
  let previous: { value: T } | undefined = undefined;

  for await (const current of asAsync(source)) {
    if (!previous) {
      previous = { value: current };
      continue;
    }
    const result = fn(previous.value, current);
    if (result.merged) {
      previous = { value: result.value };
    } else {
      const emit = previous.value;
      previous = { value: current };
      yield emit;
    }
  }

  if (previous) {
    yield previous.value;
  }
}
