/**
 * Ordering function: negative if `a` sorts before `b`, positive if after, zero if equal.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Binary min-heap ordered by a comparator.
 * The item for which `compare` returns the smallest value sits at the root.
 * Provides O(log n) insertion and removal, O(1) peek.
 *
 * The scheduler uses it with a (time, sequence) comparator; PriorityQueue
 * uses it with a reversed comparator to get a max-heap.
 *
 * @example
 * ```typescript
 * const heap = new BinaryHeap<number>((a, b) => a - b);
 * heap.push(3);
 * heap.push(1);
 * heap.pop(); // 1
 * ```
 */
export class BinaryHeap<T> {
  private readonly heap: T[] = [];

  constructor(private readonly compare: Comparator<T>) {}

  /**
   * Add an item, restoring the heap property.
   */
  push(item: T): void {
    this.heap.push(item);
    this.bubbleUp(this.heap.length - 1);
  }

  /**
   * Remove and return the root item.
   *
   * @returns The smallest item, or undefined if the heap is empty
   */
  pop(): T | undefined {
    if (this.heap.length <= 1) {
      return this.heap.pop();
    }

    const root = this.heap[0];
    // eslint-disable-next-line @typescript-eslint/no-non-null-assertion
    this.heap[0] = this.heap.pop()!;
    this.bubbleDown(0);

    return root;
  }

  /**
   * View the root item without removing it.
   */
  peek(): T | undefined {
    return this.heap[0];
  }

  get length(): number {
    return this.heap.length;
  }

  get isEmpty(): boolean {
    return this.heap.length === 0;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);

      if (this.compare(this.heap[index]!, this.heap[parentIndex]!) >= 0) {
        break;
      }

      [this.heap[index], this.heap[parentIndex]] = [
        this.heap[parentIndex]!,
        this.heap[index]!,
      ];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (
        leftChild < this.heap.length &&
        this.compare(this.heap[leftChild]!, this.heap[smallest]!) < 0
      ) {
        smallest = leftChild;
      }

      if (
        rightChild < this.heap.length &&
        this.compare(this.heap[rightChild]!, this.heap[smallest]!) < 0
      ) {
        smallest = rightChild;
      }

      if (smallest === index) {
        break;
      }

      [this.heap[index], this.heap[smallest]] = [
        this.heap[smallest]!,
        this.heap[index]!,
      ];
      index = smallest;
    }
  }
}
