import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Simulation } from '../../src/core/Simulation.js';
import type { ComponentId } from '../../src/core/handles.js';
import { Fifo } from '../../src/queues/Fifo.js';
import { PriorityQueue, naturalOrder } from '../../src/queues/PriorityQueue.js';
import { ValidationError } from '../../src/utils/validation.js';

type Action = () => void;

describe('Simulation', () => {
  let sim: Simulation;
  let actor: ComponentId<Action>;

  beforeEach(() => {
    sim = new Simulation();
    // Runs whatever callback it receives as its event
    actor = sim.addComponent<Action>({ processEvent: (_self, action) => action() });
  });

  describe('initialization', () => {
    it('should initialize with default time 0', () => {
      expect(sim.now).toBe(0);
    });

    it('should initialize with custom initial time', () => {
      const late = new Simulation({ initialTime: 100 });
      expect(late.now).toBe(100);
    });

    it('should reject a negative initial time', () => {
      expect(() => new Simulation({ initialTime: -1 })).toThrow(ValidationError);
    });

    it('should start with an empty state and scheduler', () => {
      const fresh = new Simulation();

      expect(fresh.scheduler.isEmpty).toBe(true);
      expect(fresh.state.valueCount).toBe(0);
      expect(fresh.state.queueCount).toBe(0);
      expect(fresh.components.size).toBe(0);
    });
  });

  describe('registration', () => {
    it('should register queues in the state', () => {
      const inbox = sim.addQueue(new Fifo<string>());
      const urgent = sim.addQueue(new PriorityQueue<number>(naturalOrder));
      const bounded = sim.addBoundedQueue<string>(2);

      expect(inbox.id).toBe(0);
      expect(urgent.id).toBe(1);
      expect(bounded.id).toBe(2);
      expect(sim.state.queue(bounded).capacity).toBe(2);
      expect(sim.state.queueCount).toBe(3);
    });

    it('should store values in the state', () => {
      const total = sim.insert(0);

      expect(sim.state.get(total)).toBe(0);
    });
  });

  describe('event scheduling', () => {
    it('should schedule an event with delay', () => {
      sim.schedule(10, actor, () => {});

      expect(sim.scheduler.length).toBe(1);
      expect(sim.scheduler.peek()?.time).toBe(10);
    });

    it('should throw error for negative delay', () => {
      expect(() => sim.schedule(-5, actor, () => {})).toThrow(ValidationError);
    });

    it('should schedule at the current time with scheduleNow', () => {
      sim.schedule(5, actor, () => sim.scheduleNow(actor, () => {}));
      sim.step();

      expect(sim.scheduler.peek()?.time).toBe(5);
    });
  });

  describe('stepping through simulation', () => {
    it('should execute one event per step', () => {
      const executed: number[] = [];

      sim.schedule(10, actor, () => executed.push(1));
      sim.schedule(20, actor, () => executed.push(2));

      expect(sim.step()).toBe(true);
      expect(executed).toEqual([1]);
      expect(sim.now).toBe(10);

      expect(sim.step()).toBe(true);
      expect(executed).toEqual([1, 2]);
      expect(sim.now).toBe(20);
    });

    it('should return false when stepping with no events', () => {
      expect(sim.step()).toBe(false);
      expect(sim.now).toBe(0);
    });

    it('should execute same-time events in scheduling order', () => {
      const order: string[] = [];

      sim.schedule(10, actor, () => order.push('first'));
      sim.schedule(10, actor, () => order.push('second'));
      sim.schedule(5, actor, () => order.push('earlier'));
      sim.schedule(10, actor, () => order.push('third'));

      sim.run();

      expect(order).toEqual(['earlier', 'first', 'second', 'third']);
    });
  });

  describe('running simulation', () => {
    it('should run until the scheduler is empty', () => {
      const order: number[] = [];

      sim.schedule(10, actor, () => order.push(1));
      sim.schedule(30, actor, () => order.push(2));

      const result = sim.run();

      expect(order).toEqual([1, 2]);
      expect(result).toEqual({ endTime: 30, eventsProcessed: 2 });
      expect(sim.scheduler.isEmpty).toBe(true);
    });

    it('should handle an empty scheduler', () => {
      const result = sim.run();

      expect(result).toEqual({ endTime: 0, eventsProcessed: 0 });
    });

    it('should call the side effect after each event', () => {
      const times: number[] = [];

      sim.schedule(1, actor, () => {});
      sim.schedule(4, actor, () => {});

      sim.run((view) => times.push(view.now));

      expect(times).toEqual([1, 4]);
    });

    it('should handle events scheduled during execution', () => {
      const order: number[] = [];

      sim.schedule(10, actor, () => {
        order.push(1);
        sim.schedule(5, actor, () => order.push(3));
      });
      sim.schedule(20, actor, () => order.push(2));

      sim.run();

      expect(order).toEqual([1, 3, 2]);
    });

    it('should throw error if already running', () => {
      const nested = vi.fn(() => sim.run());

      sim.schedule(10, actor, () => {
        expect(nested).toThrow('Simulation is already running');
      });

      sim.run();

      expect(nested).toHaveBeenCalledTimes(1);
    });

    it('should allow running again after a handler fails', () => {
      sim.schedule(1, actor, () => {
        throw new Error('boom');
      });
      sim.schedule(2, actor, () => {});

      expect(() => sim.run()).toThrow('boom');
      expect(sim.now).toBe(1);

      const result = sim.run();
      expect(result).toEqual({ endTime: 2, eventsProcessed: 1 });
    });
  });

  describe('event handlers', () => {
    it('should call step handler for each event', () => {
      const stepHandler = vi.fn();
      sim.on('step', stepHandler);

      sim.schedule(10, actor, () => {});
      sim.schedule(20, actor, () => {});

      sim.run();

      expect(stepHandler).toHaveBeenCalledTimes(2);
      expect(stepHandler).toHaveBeenLastCalledWith(
        expect.objectContaining({ time: 20, componentIdx: actor.id })
      );
    });

    it('should call complete handler when run finishes', () => {
      const completeHandler = vi.fn();
      sim.on('complete', completeHandler);

      sim.schedule(10, actor, () => {});
      sim.run();

      expect(completeHandler).toHaveBeenCalledTimes(1);
      expect(completeHandler).toHaveBeenCalledWith({ endTime: 10, eventsProcessed: 1 });
    });

    it('should call error handler when a component throws', () => {
      const errorHandler = vi.fn();
      const completeHandler = vi.fn();
      sim.on('error', errorHandler);
      sim.on('complete', completeHandler);

      const error = new Error('Test error');
      sim.schedule(10, actor, () => {
        throw error;
      });

      expect(() => sim.run()).toThrow('Test error');

      expect(errorHandler).toHaveBeenCalledWith(error);
      expect(completeHandler).not.toHaveBeenCalled();
    });

    it('should allow removing event handlers', () => {
      const handler = vi.fn();
      sim.on('step', handler);

      sim.schedule(10, actor, () => {});
      sim.step();
      expect(handler).toHaveBeenCalledTimes(1);

      sim.off('step', handler);
      sim.schedule(20, actor, () => {});
      sim.step();
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('statistics', () => {
    it('should provide basic statistics', () => {
      sim.insert('x');
      sim.addQueue(new Fifo<number>());
      sim.schedule(10, actor, () => {});
      sim.schedule(20, actor, () => {});
      sim.step();

      expect(sim.statistics).toEqual({
        currentTime: 10,
        eventsProcessed: 1,
        eventsInQueue: 1,
        components: 1,
        values: 1,
        queues: 1,
      });
    });

    it('should count events across runs', () => {
      sim.schedule(1, actor, () => {});
      sim.run();
      sim.schedule(1, actor, () => {});
      const result = sim.run();

      expect(result.eventsProcessed).toBe(1);
      expect(sim.statistics.eventsProcessed).toBe(2);
      expect(sim.statistics.currentTime).toBe(2);
    });
  });
});
