import type { ComponentId, Handle } from './handles.js';

/**
 * A scheduled event: the time it fires, the component it is addressed to,
 * and the payload. The payload's type is erased once the entry sits in the
 * scheduler; `isFor` narrows it back for the component that owns the id.
 */
export class EventEntry<E = unknown> {
  /** Numeric id of the target component */
  public readonly componentIdx: number;

  /** @internal */
  constructor(
    /** Simulation time when the event fires */
    public readonly time: number,
    /** Handle the event was scheduled with */
    private readonly target: Handle,
    /** Event payload */
    public readonly event: E,
    /** Scheduler-local insertion counter, used to break ties between equal times */
    public readonly sequence: number
  ) {
    this.componentIdx = target.id;
  }

  /**
   * Check that this entry was scheduled with `component`, narrowing the
   * payload to the component's event type.
   *
   * The narrowing holds because `schedule` only accepts an `E` alongside a
   * `ComponentId<E>`. A different handle object carrying the same id, such as
   * one rebuilt with `new ComponentId(n)`, does not match.
   */
  isFor<T>(component: ComponentId<T>): this is EventEntry<T> {
    return this.target === component;
  }
}

/**
 * Order entries by time, then by insertion order.
 */
export function compareEntries(a: EventEntry, b: EventEntry): number {
  if (a.time !== b.time) {
    return a.time - b.time;
  }
  return a.sequence - b.sequence;
}
