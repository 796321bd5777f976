// Core simulation engine
export { Simulation } from './core/Simulation.js';
export type {
  SimulationOptions,
  SimulationResult,
  SimulationStatistics,
  SimulationView,
  SimulationEventMap,
  SimulationEventHandler,
  EventTrace,
  EndCondition,
  SideEffect,
} from './core/Simulation.js';
export { Executor } from './core/Executor.js';
export type { Execute } from './core/Executor.js';

// Scheduling
export { Scheduler } from './core/Scheduler.js';
export type { SchedulerView } from './core/Scheduler.js';
export { EventEntry } from './core/EventEntry.js';
export { Clock, ClockRef } from './core/Clock.js';

// Components
export { Components } from './core/Components.js';
export type { Component } from './core/Components.js';

// Typed handles
export { ComponentId, Key, QueueId } from './core/handles.js';

// State and queues
export { State } from './state/State.js';
export type { ReadonlyState } from './state/State.js';
export { Queue, PushError } from './queues/Queue.js';
export type { QueueOptions, PushResult, QueueItem, ItemOf } from './queues/Queue.js';
export { Fifo } from './queues/Fifo.js';
export { PriorityQueue, naturalOrder } from './queues/PriorityQueue.js';
export type { Comparator } from './collections/BinaryHeap.js';

// Errors
export { ValidationError } from './utils/validation.js';
export { InvariantError } from './utils/errors.js';
