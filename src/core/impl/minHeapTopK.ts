import type { TopKSelector } from "../topK.js";

/** Binary heap; the item `less` ranks lowest sits on top. */
class ArrayHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) {}

  size(): number {
    return this.items.length;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(item: T): void {
    this.items.push(item);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (last !== undefined && this.items.length > 0) {
      this.items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /** Contents in storage order. */
  toArray(): T[] {
    return this.items.slice();
  }

  private siftUp(i: number): void {
    const a = this.items;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(a[i]!, a[parent]!)) return;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const a = this.items;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let least = i;
      if (left < a.length && this.less(a[left]!, a[least]!)) least = left;
      if (right < a.length && this.less(a[right]!, a[least]!)) least = right;
      if (least === i) return;
      this.swap(i, least);
      i = least;
    }
  }

  private swap(i: number, j: number): void {
    const a = this.items;
    const tmp = a[i]!;
    a[i] = a[j]!;
    a[j] = tmp;
  }
}

/**
 * Bounded top-K selection.
 *
 * The heap keeps the weakest of the current best K on top, so each further
 * item costs one comparison unless it displaces that entry.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    if (k <= 0) return [];

    // a is "less" when it ranks after b
    const heap = new ArrayHeap<T>((a, b) => comparator(a, b) > 0);

    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const weakest = heap.peek();
      if (weakest !== undefined && comparator(item, weakest) < 0) {
        heap.pop();
        heap.push(item);
      }
    }

    return heap.toArray().sort(comparator);
  }
}
