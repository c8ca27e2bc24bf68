export * from "./async";
export * from "./coalesce";
export * from "./comparators";
export * from "./config";
export * from "./errors";
export * from "./kmerge";
export { defaultQueueMicrotask, nextTurn } from "./microtask";
export type { QueueMicrotask } from "./microtask";
export { SourceSlot } from "./slot";
