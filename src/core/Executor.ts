import { validateStepCount, validateTime } from '../utils/validation.js';
import type {
  EndCondition,
  SideEffect,
  Simulation,
  SimulationResult,
} from './Simulation.js';

/**
 * Anything that can drive a simulation to some stopping condition.
 */
export interface Execute {
  execute(sim: Simulation): SimulationResult;
}

/**
 * Reusable run policy: when to stop, and what to call after each step.
 * Executors are immutable; `sideEffect` returns a new one.
 *
 * @example
 * ```typescript
 * // Run no further than time 100, recording the clock after every event
 * const times: number[] = [];
 * Executor.timed(100)
 *   .sideEffect((view) => times.push(view.now))
 *   .execute(sim);
 *
 * // Step through the first 10 events only
 * Executor.steps(10).execute(sim);
 * ```
 */
export class Executor implements Execute {
  private constructor(
    readonly endCondition: EndCondition,
    private readonly hook?: SideEffect
  ) {}

  /**
   * Run until no events are left.
   */
  static unbound(): Executor {
    return new Executor({ kind: 'empty' });
  }

  /**
   * Run every event scheduled at or before `until`.
   * Stops early when events run out; the clock is left at the last executed
   * event's time, not moved to `until`.
   *
   * @throws {ValidationError} If until is negative or not finite
   */
  static timed(until: number): Executor {
    validateTime(until, 'until');
    return new Executor({ kind: 'time', until });
  }

  /**
   * Run at most `steps` events, stopping early when events run out.
   *
   * @throws {ValidationError} If steps is not a non-negative integer
   */
  static steps(steps: number): Executor {
    validateStepCount(steps);
    return new Executor({ kind: 'steps', steps });
  }

  /**
   * Return an executor with the same end condition that calls `fn` after
   * each executed event (never after the step that finds no event).
   */
  sideEffect(fn: SideEffect): Executor {
    return new Executor(this.endCondition, fn);
  }

  execute(sim: Simulation): SimulationResult {
    return sim.runUntil(this.endCondition, this.hook);
  }
}
