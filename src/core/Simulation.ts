import type { Fifo } from '../queues/Fifo.js';
import type { Queue, QueueItem } from '../queues/Queue.js';
import { State, type ReadonlyState } from '../state/State.js';
import { Components, type Component } from './Components.js';
import type { EventEntry } from './EventEntry.js';
import type { ComponentId, Key, QueueId } from './handles.js';
import { Scheduler, type SchedulerView } from './Scheduler.js';

/**
 * Configuration options for the simulation.
 */
export interface SimulationOptions {
  /** Initial simulation time (default: 0) */
  initialTime?: number;
  /** Enable logging for debugging (default: false) */
  enableLogging?: boolean;
}

/**
 * Result returned when a run completes.
 */
export interface SimulationResult {
  /** Simulation time when the run stopped */
  endTime: number;
  /** Number of events dispatched during this run */
  eventsProcessed: number;
}

/**
 * Snapshot of simulation counters.
 */
export interface SimulationStatistics {
  currentTime: number;
  eventsProcessed: number;
  eventsInQueue: number;
  components: number;
  values: number;
  queues: number;
}

/**
 * Event trace entry for detailed logging
 */
export interface EventTrace {
  /** Scheduler insertion counter of the entry */
  sequence: number;
  /** Id of the component the event was delivered to */
  componentId: number;
  /** Time the event fired */
  time: number;
  /** 1-based position of the event in dispatch order */
  executedAt: number;
}

/**
 * When a run stops:
 * - `empty`: once no events are left
 * - `time`: once the next event is later than `until` (or none are left)
 * - `steps`: after `steps` events (or earlier, once none are left)
 */
export type EndCondition =
  | { kind: 'empty' }
  | { kind: 'time'; until: number }
  | { kind: 'steps'; steps: number };

/**
 * Read-only view of a simulation, passed to side effects after each step.
 */
export interface SimulationView {
  readonly now: number;
  readonly state: ReadonlyState;
  readonly scheduler: SchedulerView;
  readonly statistics: SimulationStatistics;
}

/**
 * Function called after every successful step of a run.
 */
export type SideEffect = (sim: SimulationView) => void;

/**
 * Lifecycle events and the arguments their handlers receive.
 */
export interface SimulationEventMap {
  /** After each dispatched event */
  step: [entry: EventEntry];
  /** After a run finishes */
  complete: [result: SimulationResult];
  /** When a component's handler throws; the error is rethrown afterwards */
  error: [error: unknown];
}

export type SimulationEventHandler<K extends keyof SimulationEventMap> = (
  ...args: SimulationEventMap[K]
) => void;

type HandlerRegistry = {
  [K in keyof SimulationEventMap]: Set<SimulationEventHandler<K>>;
};

/**
 * Discrete-event simulation: one State, one Scheduler and one set of
 * Components, plus the loop that drives them.
 *
 * The clock advances from event to event, not in real time. Events fire in
 * time order; events at the same time fire in the order they were scheduled.
 *
 * @example
 * ```typescript
 * const sim = new Simulation();
 *
 * const queue = sim.addQueue(new Fifo<Product>());
 * const consumer = sim.addComponent(new Consumer(queue));
 * const producer = sim.addComponent(new Producer(queue, consumer));
 *
 * sim.schedule(0, producer, { kind: 'produce' });
 * sim.run((view) => console.log(view.now));
 * ```
 */
export class Simulation implements SimulationView {
  readonly state: State;
  readonly scheduler: Scheduler;
  readonly components: Components;

  private readonly options: Required<SimulationOptions>;
  private readonly eventHandlers: HandlerRegistry;
  private readonly eventTrace: EventTrace[];
  private eventsProcessed: number;
  private isRunning: boolean;
  private enableTracing: boolean;

  /**
   * Create a new, empty simulation.
   *
   * @example
   * ```typescript
   * const sim = new Simulation({ initialTime: 0, enableLogging: true });
   * ```
   */
  constructor(options: SimulationOptions = {}) {
    this.options = {
      initialTime: options.initialTime ?? 0,
      enableLogging: options.enableLogging ?? false,
    };

    this.state = new State();
    this.scheduler = new Scheduler(this.options.initialTime);
    this.components = new Components();
    this.eventHandlers = { step: new Set(), complete: new Set(), error: new Set() };
    this.eventTrace = [];
    this.eventsProcessed = 0;
    this.isRunning = false;
    this.enableTracing = false;

    this.log('Simulation created', { options: this.options });
  }

  /**
   * Current simulation time.
   */
  get now(): number {
    return this.scheduler.time;
  }

  /**
   * Register a component.
   *
   * @returns The id used to schedule events for it
   */
  addComponent<E>(component: Component<E>): ComponentId<E> {
    const id = this.components.add(component);
    this.log('Component added', { componentId: id.id });
    return id;
  }

  /**
   * Register a queue in the state.
   *
   * @example
   * ```typescript
   * const inbox = sim.addQueue(new Fifo<Order>());
   * const triage = sim.addQueue(new PriorityQueue<number>(naturalOrder));
   * ```
   */
  addQueue<Q extends Queue<QueueItem>>(queue: Q): QueueId<Q> {
    const id = this.state.addQueue(queue);
    this.log('Queue added', { queueId: id.id, name: queue.name, capacity: queue.capacity });
    return id;
  }

  /**
   * Register a FIFO queue holding at most `capacity` items.
   */
  addBoundedQueue<T extends QueueItem>(capacity: number): QueueId<Fifo<T>> {
    const id = this.state.newBoundedQueue<T>(capacity);
    this.log('Queue added', { queueId: id.id, capacity });
    return id;
  }

  /**
   * Store a value in the state.
   */
  insert<V>(value: V): Key<V> {
    return this.state.insert(value);
  }

  /**
   * Schedule `event` for `component` after `delay`.
   *
   * @param delay - Time delay from now (must be >= 0)
   * @throws {ValidationError} If delay is negative or not finite
   */
  schedule<E>(delay: number, component: ComponentId<E>, event: NoInfer<E>): void {
    const entry = this.scheduler.schedule(delay, component, event);
    this.log('Event scheduled', {
      componentId: component.id,
      time: entry.time,
      delay,
      sequence: entry.sequence,
    });
  }

  /**
   * Schedule `event` for `component` at the current time.
   */
  scheduleNow<E>(component: ComponentId<E>, event: NoInfer<E>): void {
    this.schedule(0, component, event);
  }

  /**
   * Execute a single event: advance the clock to the next event and deliver
   * it to its component.
   *
   * @returns true if an event was executed, false if none are left
   *
   * @example
   * ```typescript
   * sim.schedule(10, machine, { kind: 'start' });
   * sim.step();          // true
   * console.log(sim.now); // 10
   * sim.step();          // false
   * ```
   */
  step(): boolean {
    const entry = this.scheduler.pop();

    if (!entry) {
      this.log('Step called but no events in queue');
      return false;
    }

    this.eventsProcessed++;

    this.log('Executing event', {
      componentId: entry.componentIdx,
      time: entry.time,
      sequence: entry.sequence,
    });

    if (this.enableTracing) {
      this.eventTrace.push({
        sequence: entry.sequence,
        componentId: entry.componentIdx,
        time: entry.time,
        executedAt: this.eventsProcessed,
      });
    }

    try {
      this.components.processEventEntry(entry, this.scheduler, this.state);
    } catch (error) {
      this.emit('error', error);
      throw error;
    }

    this.emit('step', entry);

    return true;
  }

  /**
   * Run until no events remain.
   *
   * @param sideEffect - Called after each executed event
   * @returns Summary of the run
   *
   * @example
   * ```typescript
   * const times: number[] = [];
   * const result = sim.run((view) => times.push(view.now));
   * console.log(`Ended at ${result.endTime}, processed ${result.eventsProcessed} events`);
   * ```
   */
  run(sideEffect?: SideEffect): SimulationResult {
    return this.runUntil({ kind: 'empty' }, sideEffect);
  }

  /**
   * Run until `condition` is met. Executor is the usual way to call this.
   *
   * @throws {Error} If the simulation is already running
   */
  runUntil(condition: EndCondition, sideEffect?: SideEffect): SimulationResult {
    if (this.isRunning) {
      throw new Error('Simulation is already running');
    }

    this.isRunning = true;
    const startEvents = this.eventsProcessed;

    this.log('Simulation run started', { condition, startTime: this.now });

    try {
      let steps = 0;
      while (this.shouldContinue(condition, steps)) {
        if (!this.step()) {
          break;
        }
        steps++;
        sideEffect?.(this);
      }

      const result: SimulationResult = {
        endTime: this.now,
        eventsProcessed: this.eventsProcessed - startEvents,
      };

      this.log('Simulation run completed', result);
      this.emit('complete', result);

      return result;
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * Register a handler for a lifecycle event.
   *
   * @example
   * ```typescript
   * sim.on('step', (entry) => {
   *   console.log(`Executed event for component ${entry.componentIdx} at time ${entry.time}`);
   * });
   *
   * sim.on('complete', (result) => {
   *   console.log(`Simulation completed at time ${result.endTime}`);
   * });
   *
   * sim.on('error', (error) => {
   *   console.error('Component failed:', error);
   * });
   * ```
   */
  on<K extends keyof SimulationEventMap>(event: K, handler: SimulationEventHandler<K>): void {
    this.eventHandlers[event].add(handler);
  }

  /**
   * Unregister a handler (must be the same reference as registered).
   */
  off<K extends keyof SimulationEventMap>(event: K, handler: SimulationEventHandler<K>): void {
    this.eventHandlers[event].delete(handler);
  }

  /**
   * Counters describing the simulation so far.
   */
  get statistics(): SimulationStatistics {
    return {
      currentTime: this.now,
      eventsProcessed: this.eventsProcessed,
      eventsInQueue: this.scheduler.length,
      components: this.components.size,
      values: this.state.valueCount,
      queues: this.state.queueCount,
    };
  }

  /**
   * Enable event tracing.
   * While enabled, each executed event is recorded; read them with getEventTrace().
   */
  enableEventTrace(): void {
    this.enableTracing = true;
  }

  disableEventTrace(): void {
    this.enableTracing = false;
  }

  /**
   * Executed events recorded while tracing was enabled, in dispatch order.
   */
  getEventTrace(): readonly EventTrace[] {
    return this.eventTrace;
  }

  clearEventTrace(): void {
    this.eventTrace.length = 0;
  }

  private shouldContinue(condition: EndCondition, steps: number): boolean {
    switch (condition.kind) {
      case 'empty':
        return true;
      case 'time': {
        const next = this.scheduler.peek();
        return next !== undefined && next.time <= condition.until;
      }
      case 'steps':
        return steps < condition.steps;
    }
  }

  private emit<K extends keyof SimulationEventMap>(
    event: K,
    ...args: SimulationEventMap[K]
  ): void {
    for (const handler of this.eventHandlers[event]) {
      handler(...args);
    }
  }

  /**
   * Log a message if logging is enabled.
   */
  private log(message: string, data?: unknown): void {
    if (this.options.enableLogging) {
      console.log(`[Simulation @ ${this.now}] ${message}`, data ?? '');
    }
  }
}
