import { InvariantError } from '../utils/errors.js';

/**
 * The simulation's authoritative time cell.
 * Owned by the Scheduler, which is the only writer; everyone else reads
 * through a ClockRef.
 */
export class Clock {
  private current: number;

  constructor(initialTime: number = 0) {
    this.current = initialTime;
  }

  get now(): number {
    return this.current;
  }

  /**
   * Move the clock to `time`.
   * @throws {InvariantError} If `time` is earlier than the current time
   * @internal
   */
  advanceTo(time: number): void {
    if (time < this.current) {
      throw new InvariantError(
        `Clock cannot move backwards (from ${this.current} to ${time})`,
        { now: this.current, time }
      );
    }
    this.current = time;
  }
}

/**
 * Read-only view of a Clock.
 * Every ClockRef handed out by the same scheduler observes the same cell,
 * so a reference taken before a run reports the latest time after it.
 *
 * @example
 * ```typescript
 * const clock = sim.scheduler.clock();
 * sim.run();
 * console.log(clock.time); // time of the last dispatched event
 * ```
 */
export class ClockRef {
  constructor(private readonly clock: Clock) {}

  /** Current simulation time. */
  get time(): number {
    return this.clock.now;
  }
}
