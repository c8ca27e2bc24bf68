/**
 * `true` when `a` must be emitted at or before `b` while both are available.
 * Must be irreflexive; the merge does not verify it.
 */
export type Precedes<T> = (a: T, b: T) => boolean;

/**
 * `Array.prototype.sort` convention: negative when `a` comes first
 */
export type Compare<T> = (a: T, b: T) => number;

export type Ordered = number | bigint | string;

export function ascending<T extends Ordered>(a: T, b: T): boolean {
  return a < b;
}

export function descending<T extends Ordered>(a: T, b: T): boolean {
  return a > b;
}

export function fromCompare<T>(compare: Compare<T>): Precedes<T> {
  return (a, b) => compare(a, b) < 0;
}

export function reversed<T>(precedes: Precedes<T>): Precedes<T> {
  return (a, b) => precedes(b, a);
}
