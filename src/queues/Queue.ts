import { validateCapacity } from '../utils/validation.js';

/**
 * Configuration options for a queue
 */
export interface QueueOptions {
  /** Maximum number of items (default: Infinity, i.e. unbounded) */
  capacity?: number;
  /** Name for the queue (for debugging/logging) */
  name?: string;
}

/**
 * Error describing a rejected push.
 * Returned inside a PushResult, not thrown: the caller decides whether to
 * drop the item, retry later or log it.
 */
export class PushError extends Error {
  readonly kind = 'capacity-exceeded' as const;

  constructor(
    public readonly queueName: string,
    public readonly capacity: number
  ) {
    super(`Queue '${queueName}' is full (capacity ${capacity})`);
    this.name = 'PushError';
    Object.setPrototypeOf(this, PushError.prototype);
  }
}

/**
 * Outcome of a push or send.
 */
export type PushResult = { ok: true } | { ok: false; error: PushError };

/**
 * Anything but `undefined`, which `pop` and `peek` reserve for "empty".
 */
export type QueueItem = {} | null;

/**
 * Item type of a concrete queue type, e.g. `ItemOf<Fifo<Order>>` is `Order`.
 */
export type ItemOf<Q> = Q extends Queue<infer T extends QueueItem> ? T : never;

/**
 * Base class for queues that can be stored in a State.
 * Subclasses provide the storage discipline (`enqueue`, `pop`, `peek`,
 * `length`); capacity accounting lives here so every queue rejects pushes
 * the same way. Items cannot be `undefined`, since `pop` returns that for an
 * empty queue.
 *
 * @example
 * ```typescript
 * class Stack<T extends QueueItem> extends Queue<T> {
 *   private items: T[] = [];
 *   protected enqueue(item: T): void { this.items.push(item); }
 *   pop(): T | undefined { return this.items.pop(); }
 *   peek(): T | undefined { return this.items[this.items.length - 1]; }
 *   get length(): number { return this.items.length; }
 * }
 * ```
 */
export abstract class Queue<T extends QueueItem> {
  readonly capacity: number;
  readonly name: string;

  constructor(options: QueueOptions = {}) {
    this.name = options.name ?? this.constructor.name;
    this.capacity = options.capacity ?? Infinity;
    validateCapacity(this.capacity, this.name);
  }

  /**
   * Add an item, unless the queue is at capacity.
   *
   * @returns `{ ok: true }`, or `{ ok: false, error }` when the queue is full
   */
  push(item: T): PushResult {
    if (this.length >= this.capacity) {
      return { ok: false, error: new PushError(this.name, this.capacity) };
    }
    this.enqueue(item);
    return { ok: true };
  }

  /** Store an item; only called when there is room. */
  protected abstract enqueue(item: T): void;

  /** Remove and return the next item, or undefined if empty. */
  abstract pop(): T | undefined;

  /** Next item that pop() would return, without removing it. */
  abstract peek(): T | undefined;

  abstract get length(): number;

  get isEmpty(): boolean {
    return this.length === 0;
  }

  get isFull(): boolean {
    return this.length >= this.capacity;
  }
}
