/**
 * Binary heap ordered by a `less` predicate; the least item sits on top.
 * Used with "less = worse" so the top is the weakest of the kept items.
 */
export interface Heap<T> {
  readonly size: number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  /** Heap contents in storage order. */
  toArray(): T[];
}

export type Comparator<T> = (a: T, b: T) => number;

export interface TopKSelector<T> {
  /**
   * Best `k` items, sorted. Comparator follows Array.sort: <0 means a ranks
   * before b.
   */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
