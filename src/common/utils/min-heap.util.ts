// src/common/utils/min-heap.util.ts

/**
 * Binary min-heap ordered by a caller-supplied comparator.
 *
 * The comparator must be a strict total order for pop order to be
 * deterministic.
 */
export class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
    this.up(this.items.length - 1);
  }

  pop(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.down(0);
    }
    return top;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  private up(i: number): void {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (this.compare(this.items[p], this.items[i]) <= 0) break;
      this.swap(p, i);
      i = p;
    }
  }

  private down(i: number): void {
    const n = this.items.length;
    while (true) {
      let m = i;
      const l = i * 2 + 1;
      const r = l + 1;
      if (l < n && this.compare(this.items[l], this.items[m]) < 0) m = l;
      if (r < n && this.compare(this.items[r], this.items[m]) < 0) m = r;
      if (m === i) break;
      this.swap(m, i);
      i = m;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = tmp;
  }
}
