import type { State } from '../state/State.js';
import { InvariantError } from '../utils/errors.js';
import type { EventEntry } from './EventEntry.js';
import { ComponentId, nextId } from './handles.js';
import type { Scheduler } from './Scheduler.js';

/**
 * A simulation component reacting to events of type `E`.
 *
 * Components refer to each other only through ids, never through direct
 * references; per-component data that changes over a run belongs in the
 * State (or in fields the component manages itself).
 *
 * @example
 * ```typescript
 * type ConsumerEvent = { kind: 'received' } | { kind: 'finished' };
 *
 * class Consumer implements Component<ConsumerEvent> {
 *   constructor(private readonly incoming: QueueId<Fifo<Product>>) {}
 *
 *   processEvent(self: ComponentId<ConsumerEvent>, event: ConsumerEvent, scheduler: Scheduler, state: State): void {
 *     if (event.kind === 'received' && state.recv(this.incoming) !== undefined) {
 *       scheduler.schedule(1, self, { kind: 'finished' });
 *     }
 *   }
 * }
 * ```
 */
export interface Component<E> {
  /**
   * React to `event`.
   *
   * @param selfId - This component's id, for scheduling events to itself
   * @param scheduler - Current time and scheduling of further events
   * @param state - Values and queues shared with other components
   */
  processEvent(selfId: ComponentId<E>, event: E, scheduler: Scheduler, state: State): void;
}

type Dispatcher = (entry: EventEntry, scheduler: Scheduler, state: State) => void;

/**
 * Container of all registered components.
 *
 * Components of unrelated event types live side by side. Registration
 * captures each component's event type in a dispatcher, which narrows the
 * type-erased payload of an entry back before calling the component.
 *
 * @example
 * ```typescript
 * const components = new Components();
 * const consumer = components.add(new Consumer(queue));
 *
 * scheduler.schedule(1, consumer, { kind: 'received' });
 * const entry = scheduler.pop();
 * if (entry) components.processEventEntry(entry, scheduler, state);
 * ```
 */
export class Components {
  private readonly dispatchers = new Map<number, Dispatcher>();

  /**
   * Register a component and return its id. Components cannot be removed.
   */
  add<E>(component: Component<E>): ComponentId<E> {
    const id = new ComponentId<E>(nextId());

    this.dispatchers.set(id.id, (entry, scheduler, state) => {
      if (!entry.isFor(id)) {
        throw new InvariantError(
          `Event for ${id.toString()} was scheduled with a handle this registry did not issue`,
          { componentId: id.id }
        );
      }
      component.processEvent(id, entry.event, scheduler, state);
    });

    return id;
  }

  /**
   * Deliver an entry to the component it is addressed to.
   *
   * @throws {InvariantError} If no component with the entry's id is registered
   */
  processEventEntry(entry: EventEntry, scheduler: Scheduler, state: State): void {
    const dispatch = this.dispatchers.get(entry.componentIdx);
    if (dispatch === undefined) {
      throw new InvariantError(`No component registered with id ${entry.componentIdx}`, {
        componentId: entry.componentIdx,
      });
    }
    dispatch(entry, scheduler, state);
  }

  has<E>(component: ComponentId<E>): boolean {
    return this.dispatchers.has(component.id);
  }

  /** Number of registered components. */
  get size(): number {
    return this.dispatchers.size;
  }
}
