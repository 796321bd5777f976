import { BinaryHeap, type Comparator } from '../collections/BinaryHeap.js';
import { Queue, type QueueItem, type QueueOptions } from './Queue.js';

/**
 * Natural ascending order for numbers, strings and bigints.
 *
 * @example
 * ```typescript
 * const queue = new PriorityQueue<number>(naturalOrder);
 * ```
 */
export function naturalOrder<T extends number | string | bigint>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Queue that always releases its greatest item first, per `compare`.
 * Ties between equal items are released in no particular order.
 *
 * @example
 * ```typescript
 * const triage = new PriorityQueue<Patient>((a, b) => a.severity - b.severity);
 * triage.push({ name: 'A', severity: 2 });
 * triage.push({ name: 'B', severity: 5 });
 * triage.pop(); // { name: 'B', severity: 5 }
 * ```
 */
export class PriorityQueue<T extends QueueItem> extends Queue<T> {
  private readonly heap: BinaryHeap<T>;

  /**
   * Create a priority queue that holds at most `capacity` items.
   */
  static bounded<T extends QueueItem>(
    capacity: number,
    compare: Comparator<T>,
    name?: string
  ): PriorityQueue<T> {
    return new PriorityQueue<T>(compare, { capacity, name });
  }

  /**
   * @param compare - Ascending order of items; the greatest item is popped first
   */
  constructor(compare: Comparator<T>, options: QueueOptions = {}) {
    super(options);
    this.heap = new BinaryHeap<T>((a, b) => compare(b, a));
  }

  protected enqueue(item: T): void {
    this.heap.push(item);
  }

  pop(): T | undefined {
    return this.heap.pop();
  }

  peek(): T | undefined {
    return this.heap.peek();
  }

  get length(): number {
    return this.heap.length;
  }
}
