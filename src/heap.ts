/**
 * pascals-triangle — binary min-heap
 *
 * Array-backed priority queue used by the collision search. The element at
 * index i has children at 2i+1 and 2i+2; every parent compares ≤ its
 * children under `compare`.
 *
 * push / pop are O(log N); peek / size are O(1).
 */

export class MinHeap<T> {
  private readonly _items: T[] = [];

  constructor(private readonly _compare: (a: T, b: T) => number) {}

  get size(): number {
    return this._items.length;
  }

  get isEmpty(): boolean {
    return this._items.length === 0;
  }

  /** The smallest element, or undefined when empty. */
  peek(): T | undefined {
    return this._items[0];
  }

  push(item: T): void {
    const items = this._items;
    items.push(item);

    // Sift up.
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >>> 1;
      if (this._compare(items[i]!, items[parent]!) >= 0) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  /** Remove and return the smallest element, or undefined when empty. */
  pop(): T | undefined {
    const items = this._items;
    const top   = items[0];
    const last  = items.pop();
    if (items.length === 0 || last === undefined) return top;
    items[0] = last;

    // Sift down.
    const len = items.length;
    let i = 0;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let smallest = i;
      if (l < len && this._compare(items[l]!, items[smallest]!) < 0) smallest = l;
      if (r < len && this._compare(items[r]!, items[smallest]!) < 0) smallest = r;
      if (smallest === i) break;
      this.swap(i, smallest);
      i = smallest;
    }
    return top;
  }

  private swap(i: number, j: number): void {
    const items = this._items;
    const tmp   = items[i]!;
    items[i]    = items[j]!;
    items[j]    = tmp;
  }
}
