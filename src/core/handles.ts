/**
 * Typed handles for components, stored values and queues.
 *
 * A handle is a numeric id plus a type-only marker for its payload type. The
 * marker has no runtime presence; it makes a `ComponentId<Ping>` and a
 * `ComponentId<Pong>` incompatible for the type checker even though both are
 * just numbers at runtime. Every marker is invariant (`(x: T) => T`) so a
 * handle for a narrow type is not accepted where a wider one is expected.
 *
 * Handles are only minted by the kernel: `Components.add` and `State.insert`
 * draw from the process-wide counter, `State.addQueue` from the state's own.
 * The kernel accepts only the handle objects it issued; a handle rebuilt from
 * a bare id, or issued by another state, is rejected with `InvariantError`.
 */

let idCounter = 0;

/**
 * Return a fresh id, unique for the lifetime of the process.
 * Components and values share this counter so that ids carried by scheduler
 * entries never collide across simulations living in the same process.
 * @internal
 */
export function nextId(): number {
  return idCounter++;
}

export abstract class Handle {
  /** @internal */
  constructor(public readonly id: number) {}

  /**
   * Two handles are equal when they are of the same kind and carry the same id.
   */
  equals(other: Handle): boolean {
    return other.constructor === this.constructor && other.id === this.id;
  }

  toString(): string {
    return `${this.constructor.name}(${this.id})`;
  }
}

/**
 * Identifier of a registered component whose event type is `E`.
 * Only a `ComponentId<E>` can be used to schedule an `E`.
 *
 * @example
 * ```typescript
 * const producer = sim.addComponent(new Producer());   // ComponentId<ProducerEvent>
 * sim.schedule(0, producer, { kind: 'produce' });
 * sim.schedule(0, producer, { kind: 'finished' });     // type error
 * ```
 */
export class ComponentId<E> extends Handle {
  protected declare readonly eventType: (event: E) => E;
}

/**
 * Key of a value of type `V` in the state's value store.
 * A key can only be obtained from `State.insert`; discarding it makes the value unreachable.
 *
 * @example
 * ```typescript
 * const counter = state.insert(0);       // Key<number>
 * state.update(counter, (n) => n + 1);
 * state.get(counter);                    // 1
 * ```
 */
export class Key<V> extends Handle {
  protected declare readonly valueType: (value: V) => V;
}

/**
 * Identifier of a queue held by a state. `Q` is the concrete queue type
 * (for example `Fifo<Order>`), so `send` and `recv` infer the item type.
 *
 * Like the other handles this one is invariant: a `QueueId<Fifo<string>>`
 * cannot be widened to a handle of a looser queue and then fed a number.
 */
export class QueueId<Q> extends Handle {
  protected declare readonly queueType: (queue: Q) => Q;
}
