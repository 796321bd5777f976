import { Queue, type QueueItem } from './Queue.js';

// Consumed slots at the front are reclaimed once they make up half the buffer.
const COMPACT_THRESHOLD = 32;

/**
 * First-in first-out queue with optional bounded capacity.
 * Backed by an array with a moving head index, so both ends are amortized O(1).
 *
 * @example
 * ```typescript
 * const inbox = Fifo.bounded<string>(2);
 * inbox.push('A'); // { ok: true }
 * inbox.push('B'); // { ok: true }
 * inbox.push('C'); // { ok: false, error: PushError }
 * inbox.pop();     // 'A'
 * ```
 */
export class Fifo<T extends QueueItem> extends Queue<T> {
  private items: Array<T | undefined> = [];
  private head = 0;

  /**
   * Create a queue that holds at most `capacity` items.
   */
  static bounded<T extends QueueItem>(capacity: number, name?: string): Fifo<T> {
    return new Fifo<T>({ capacity, name });
  }

  protected enqueue(item: T): void {
    this.items.push(item);
  }

  pop(): T | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const item = this.items[this.head];
    this.items[this.head] = undefined;
    this.head++;

    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  peek(): T | undefined {
    return this.items[this.head];
  }

  get length(): number {
    return this.items.length - this.head;
  }
}
