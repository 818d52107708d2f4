/**
 * 배열 기반 이진 힙
 *
 * compare(a, b) < 0 이면 a가 b보다 먼저 나옵니다 (Array.sort와 같은 규약).
 * 생성자에 넘긴 항목들은 O(N) heapify로 정리됩니다.
 */
export class BinaryHeap<T> {
  private items: T[];
  private readonly compare: (a: T, b: T) => number;

  constructor(items: Iterable<T>, compare: (a: T, b: T) => number) {
    this.items = Array.from(items);
    this.compare = compare;
    this.heapify();
  }

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
    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private heapify(): void {
    for (let i = Math.floor(this.items.length / 2) - 1; i >= 0; i--) {
      this.siftDown(i);
    }
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (this.compare(this.items[child], this.items[parent]) >= 0) {
        break;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    const length = this.items.length;
    let parent = index;

    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let first = parent;

      if (left < length && this.compare(this.items[left], this.items[first]) < 0) {
        first = left;
      }
      if (right < length && this.compare(this.items[right], this.items[first]) < 0) {
        first = right;
      }
      if (first === parent) {
        return;
      }

      this.swap(parent, first);
      parent = first;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = tmp;
  }
}
