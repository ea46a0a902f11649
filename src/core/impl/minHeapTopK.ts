import type { Comparator, TopKSelector } from "../heap.js";

/**
 * Binary heap whose root is the item ranking LAST under `comparator`,
 * i.e. the worst of the items kept so far.
 */
class WorstFirstHeap<T> {
  private readonly data: T[] = [];

  constructor(private readonly comparator: Comparator<T>) {}

  get size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    this.data.push(item);
    this.siftUp(this.data.length - 1);
  }

  /** Replaces the root with `item` and restores heap order. */
  replaceTop(item: T): void {
    this.data[0] = item;
    this.siftDown(0);
  }

  drain(): T[] {
    return this.data.splice(0, this.data.length);
  }

  private worse(i: number, j: number): boolean {
    return this.comparator(this.at(i), this.at(j)) > 0;
  }

  private at(i: number): T {
    const item = this.data[i];
    if (item === undefined) throw new RangeError(`heap index ${i} out of bounds`);
    return item;
  }

  private swap(i: number, j: number): void {
    const tmp = this.at(i);
    this.data[i] = this.at(j);
    this.data[j] = tmp;
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.worse(i, parent)) return;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const n = this.data.length;
    for (;;) {
      const l = i * 2 + 1;
      const r = l + 1;
      let worst = i;
      if (l < n && this.worse(l, worst)) worst = l;
      if (r < n && this.worse(r, worst)) worst = r;
      if (worst === i) return;
      this.swap(i, worst);
      i = worst;
    }
  }
}

/**
 * Keeps the best K items seen so far in a heap of size K; each new item only has
 * to beat the current worst to get in. O(n log k).
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    const heap = new WorstFirstHeap<T>(comparator);
    for (const item of items) {
      if (heap.size < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) heap.replaceTop(item);
    }

    return heap.drain().sort(comparator);
  }
}
