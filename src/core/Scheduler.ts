import { BinaryHeap } from '../collections/BinaryHeap.js';
import { validateMinimum, validateTime } from '../utils/validation.js';
import { Clock, ClockRef } from './Clock.js';
import { EventEntry, compareEntries } from './EventEntry.js';
import type { ComponentId } from './handles.js';

/**
 * Read-only view of a Scheduler, handed to executor side effects.
 */
export interface SchedulerView {
  readonly time: number;
  readonly length: number;
  readonly isEmpty: boolean;
  clock(): ClockRef;
  peek(): EventEntry | undefined;
}

/**
 * Keeps the simulation clock and the set of upcoming events.
 *
 * Events fire in time order; events scheduled for the same time fire in the
 * order they were scheduled. Popping an event moves the clock to its time.
 *
 * @example
 * ```typescript
 * const scheduler = new Scheduler();
 * scheduler.schedule(1, consumer, { kind: 'received' });
 * scheduler.scheduleNow(producer, { kind: 'produce' });
 *
 * const entry = scheduler.pop(); // producer's event, at time 0
 * console.log(scheduler.time);   // 0
 * ```
 */
export class Scheduler implements SchedulerView {
  private readonly events = new BinaryHeap<EventEntry>(compareEntries);
  private readonly clockCell: Clock;
  private sequence = 0;

  /**
   * @param initialTime - Time the clock starts at (default: 0)
   */
  constructor(initialTime: number = 0) {
    validateTime(initialTime, 'initialTime');
    this.clockCell = new Clock(initialTime);
  }

  /**
   * Schedule `event` for `component` at `time + delay`.
   *
   * @param delay - Time from now (must be >= 0)
   * @throws {ValidationError} If delay is negative or not finite
   */
  schedule<E>(delay: number, component: ComponentId<E>, event: NoInfer<E>): EventEntry<E> {
    validateTime(delay, 'delay');
    return this.insert(this.time + delay, component, event);
  }

  /**
   * Schedule `event` for `component` at the current time.
   * It fires after every event already scheduled for the current time.
   */
  scheduleNow<E>(component: ComponentId<E>, event: NoInfer<E>): EventEntry<E> {
    return this.insert(this.time, component, event);
  }

  /**
   * Schedule `event` for `component` at an absolute time.
   *
   * @throws {ValidationError} If time is earlier than the current time
   */
  scheduleAt<E>(time: number, component: ComponentId<E>, event: NoInfer<E>): EventEntry<E> {
    validateTime(time, 'time');
    validateMinimum(time, this.time, 'time', 'Events cannot be scheduled in the past');
    return this.insert(time, component, event);
  }

  /**
   * Remove and return the next event, moving the clock to its time.
   *
   * @returns The next event, or undefined if none are left
   */
  pop(): EventEntry | undefined {
    const entry = this.events.pop();
    if (entry) {
      this.clockCell.advanceTo(entry.time);
    }
    return entry;
  }

  /**
   * View the next event without removing it or touching the clock.
   */
  peek(): EventEntry | undefined {
    return this.events.peek();
  }

  /** Current simulation time. */
  get time(): number {
    return this.clockCell.now;
  }

  /**
   * Read-only handle on the clock. Cheap to create; every handle observes
   * the same underlying time.
   */
  clock(): ClockRef {
    return new ClockRef(this.clockCell);
  }

  /** Number of pending events. */
  get length(): number {
    return this.events.length;
  }

  get isEmpty(): boolean {
    return this.events.isEmpty;
  }

  private insert<E>(time: number, component: ComponentId<E>, event: NoInfer<E>): EventEntry<E> {
    const entry = new EventEntry<E>(time, component, event, this.sequence++);
    this.events.push(entry);
    return entry;
  }
}
