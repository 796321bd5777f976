import { type Handle, Key, QueueId, nextId } from '../core/handles.js';
import { Fifo } from '../queues/Fifo.js';
import type { ItemOf, PushResult, Queue, QueueItem } from '../queues/Queue.js';
import { InvariantError } from '../utils/errors.js';

/**
 * A stored value or queue together with the handle it was issued under.
 * Retrieval narrows a slot back to the handle's payload type, which is only
 * sound for that exact handle object.
 */
interface Slot<T> {
  readonly handle: Handle;
  value: T;
}

function isValueSlot<V>(slot: Slot<unknown>, key: Key<V>): slot is Slot<V> {
  return slot.handle === key;
}

function isQueueSlot<Q>(slot: Slot<unknown>, queue: QueueId<Q>): slot is Slot<Q> {
  return slot.handle === queue;
}

function isItemQueueSlot<Q>(
  slot: Slot<unknown>,
  queue: QueueId<Q>
): slot is Slot<Queue<ItemOf<Q>>> {
  return slot.handle === queue;
}

/**
 * Read-only view of a State, handed to executor side effects.
 */
export interface ReadonlyState {
  readonly valueCount: number;
  readonly queueCount: number;
  get<V>(key: Key<V>): V | undefined;
  has<V>(key: Key<V>): boolean;
  len<Q extends Queue<QueueItem>>(queue: QueueId<Q>): number;
  queue<Q extends Queue<QueueItem>>(queue: QueueId<Q>): Q;
}

/**
 * Shared scratch space of a simulation: a store of arbitrary values and a
 * registry of queues, both addressed through typed handles.
 *
 * A handle can only be obtained by storing something of its type, so a
 * `Key<number>` always leads to a number. Values can be removed; queues
 * live as long as the state.
 *
 * @example
 * ```typescript
 * const state = new State();
 *
 * const count = state.insert(7);           // Key<number>
 * state.update(count, (n) => n + 1);
 * state.remove(count);                     // 8
 *
 * const inbox = state.newBoundedQueue<string>(1);
 * state.send(inbox, 'A');                  // { ok: true }
 * state.send(inbox, 'B');                  // { ok: false, error: PushError }
 * state.recv(inbox);                       // 'A'
 * ```
 */
export class State implements ReadonlyState {
  private readonly values = new Map<number, Slot<unknown>>();
  private readonly queues = new Map<number, Slot<unknown>>();
  private nextQueueId = 0;

  /**
   * Store a value and return the key that reads it back.
   * Discarding the key leaves the value unreachable.
   */
  insert<V>(value: V): Key<V> {
    const key = new Key<V>(nextId());
    this.values.set(key.id, { handle: key, value });
    return key;
  }

  /**
   * Remove a value, handing it back to the caller.
   *
   * @returns The value, or undefined if it was already removed
   */
  remove<V>(key: Key<V>): V | undefined {
    const slot = this.valueSlot(key);
    if (slot === undefined) {
      return undefined;
    }
    this.values.delete(key.id);
    return slot.value;
  }

  /**
   * Read a value. Objects are returned by reference and may be mutated in place.
   *
   * @returns The value, or undefined if it was removed
   */
  get<V>(key: Key<V>): V | undefined {
    return this.valueSlot(key)?.value;
  }

  has<V>(key: Key<V>): boolean {
    return this.valueSlot(key) !== undefined;
  }

  /**
   * Replace a value.
   *
   * @returns false if the value was removed (nothing is stored)
   */
  set<V>(key: Key<V>, value: V): boolean {
    const slot = this.valueSlot(key);
    if (slot === undefined) {
      return false;
    }
    slot.value = value;
    return true;
  }

  /**
   * Replace a value with `fn(current)`.
   *
   * @returns false if the value was removed (`fn` is not called)
   *
   * @example
   * ```typescript
   * state.update(counter, (n) => n + 1);
   * ```
   */
  update<V>(key: Key<V>, fn: (current: V) => V): boolean {
    const slot = this.valueSlot(key);
    if (slot === undefined) {
      return false;
    }
    slot.value = fn(slot.value);
    return true;
  }

  /**
   * Register a queue and return its handle.
   *
   * @example
   * ```typescript
   * const triage = state.addQueue(new PriorityQueue<Patient>(bySeverity));
   * state.send(triage, patient);
   * ```
   */
  addQueue<Q extends Queue<QueueItem>>(queue: Q): QueueId<Q> {
    const handle = new QueueId<Q>(this.nextQueueId++);
    this.queues.set(handle.id, { handle, value: queue });
    return handle;
  }

  /**
   * Register a new unbounded FIFO queue.
   */
  newQueue<T extends QueueItem>(): QueueId<Fifo<T>> {
    return this.addQueue(new Fifo<T>());
  }

  /**
   * Register a new FIFO queue holding at most `capacity` items.
   */
  newBoundedQueue<T extends QueueItem>(capacity: number): QueueId<Fifo<T>> {
    return this.addQueue(Fifo.bounded<T>(capacity));
  }

  /**
   * Push `item` onto a queue.
   *
   * @returns `{ ok: false, error }` if the queue is at capacity
   */
  send<Q extends Queue<QueueItem>>(queue: QueueId<Q>, item: ItemOf<Q>): PushResult {
    return this.itemQueue(queue).push(item);
  }

  /**
   * Pop the next item from a queue.
   *
   * @returns The item, or undefined if the queue is empty
   */
  recv<Q extends Queue<QueueItem>>(queue: QueueId<Q>): ItemOf<Q> | undefined {
    return this.itemQueue(queue).pop();
  }

  /** Number of items in a queue. */
  len<Q extends Queue<QueueItem>>(queue: QueueId<Q>): number {
    return this.queue(queue).length;
  }

  /**
   * The queue behind a handle, for operations `send`/`recv`/`len` do not cover.
   *
   * @throws {InvariantError} If this state never issued the handle
   */
  queue<Q extends Queue<QueueItem>>(queue: QueueId<Q>): Q {
    const slot = this.queueSlot(queue);
    if (!isQueueSlot(slot, queue)) {
      throw foreignHandle(queue);
    }
    return slot.value;
  }

  /** Number of values currently stored. */
  get valueCount(): number {
    return this.values.size;
  }

  /** Number of registered queues. */
  get queueCount(): number {
    return this.queues.size;
  }

  private valueSlot<V>(key: Key<V>): Slot<V> | undefined {
    const slot = this.values.get(key.id);
    if (slot === undefined) {
      return undefined;
    }
    if (!isValueSlot(slot, key)) {
      throw foreignHandle(key);
    }
    return slot;
  }

  private queueSlot<Q>(queue: QueueId<Q>): Slot<unknown> {
    const slot = this.queues.get(queue.id);
    if (slot === undefined) {
      throw new InvariantError(`Unknown queue ${queue.toString()}; queues cannot be removed`, {
        queueId: queue.id,
      });
    }
    return slot;
  }

  private itemQueue<Q>(queue: QueueId<Q>): Queue<ItemOf<Q>> {
    const slot = this.queueSlot(queue);
    if (!isItemQueueSlot(slot, queue)) {
      throw foreignHandle(queue);
    }
    return slot.value;
  }
}

function foreignHandle(handle: Handle): InvariantError {
  return new InvariantError(`${handle.toString()} was not issued by this state`, {
    handle: handle.toString(),
  });
}
