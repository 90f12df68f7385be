export interface TopKSelector<T> {
  /**
   * Returns at most `k` items, best first.
   * Comparator follows Array.sort: <0 means a ranks before b.
   */
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[];
}
