export type Input<T> = AsyncIterable<T> | Iterable<T>;

/**
 * Anything exposing the pull-next-item contract with item type T
 */
export type Source<T> = Input<T> | AsyncIterator<T>;

export function isAsyncIterable<T>(source: Source<T>): source is AsyncIterable<T> {
  return typeof source === "object" && source !== null && Symbol.asyncIterator in source;
}

export function isIterable<T>(source: Source<T>): source is Iterable<T> {
  return typeof source === "string" || (typeof source === "object" && source !== null && Symbol.iterator in source);
}

export function asAsyncIterator<T>(source: Source<T>): AsyncIterator<T> {
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }
  if (isIterable(source)) {
    return fromIterable(source);
  }
  return source;
}

export function asAsync<T>(source: Source<T>): AsyncIterable<T> {
  if (isAsyncIterable(source)) {
    return source;
  }
  return {
    [Symbol.asyncIterator]: () => asAsyncIterator(source)
  };
}

// for-of closes the sync iterator when the async generator is returned early
async function *fromIterable<T>(iterable: Iterable<T>): AsyncGenerator<T, void, undefined> {
  for (const value of iterable) {
    yield value;
  }
}
