export interface Deferred<T = void> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(fn => {
    resolve = fn;
  });
  return {
    promise,
    resolve(value: T) {
      resolve(value);
    }
  };
}
