// src/common/utils/min-heap.util.spec.ts
import { MinHeap } from './min-heap.util';

describe('MinHeap', () => {
  it('should pop items in comparator order', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    [5, 1, 4, 1, 3, 9, 2].forEach((n) => heap.push(n));

    const popped: number[] = [];
    for (let n = heap.pop(); n !== undefined; n = heap.pop()) {
      popped.push(n);
    }

    expect(popped).toEqual([1, 1, 2, 3, 4, 5, 9]);
    expect(heap.size).toBe(0);
  });

  it('should break ties with the comparator only', () => {
    const heap = new MinHeap<{ cost: number; id: number }>((a, b) => a.cost - b.cost || a.id - b.id);
    heap.push({ cost: 2, id: 3 });
    heap.push({ cost: 2, id: 1 });
    heap.push({ cost: 1, id: 2 });

    expect(heap.peek()).toEqual({ cost: 1, id: 2 });
    expect([heap.pop(), heap.pop(), heap.pop()].map((x) => x?.id)).toEqual([2, 1, 3]);
  });

  it('should return undefined when empty', () => {
    const heap = new MinHeap<string>((a, b) => a.localeCompare(b));
    expect(heap.pop()).toBeUndefined();
    expect(heap.peek()).toBeUndefined();
  });
});
