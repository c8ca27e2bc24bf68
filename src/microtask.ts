
export function defaultQueueMicrotask(fn: () => void): void {
  if (typeof queueMicrotask === "function") {
    queueMicrotask(fn);
  } else if (typeof setImmediate === "function") {
    setImmediate(fn);
  } else {
    setTimeout(fn, 0);
  }
}

export interface QueueMicrotask {
  (callback: () => void): void;
}

/**
 * Resolves once the queued callback runs, i.e. on the next scheduling turn
 */
export function nextTurn(queue: QueueMicrotask): Promise<void> {
  return new Promise<void>(resolve => queue(() => resolve()));
}
