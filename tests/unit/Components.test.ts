import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Components, type Component } from '../../src/core/Components.js';
import { ComponentId } from '../../src/core/handles.js';
import { Scheduler } from '../../src/core/Scheduler.js';
import { State } from '../../src/state/State.js';
import { InvariantError } from '../../src/utils/errors.js';

type LampEvent = { kind: 'on' } | { kind: 'off' };

class Lamp implements Component<LampEvent> {
  readonly seen: Array<{ kind: string; time: number }> = [];

  processEvent(
    _selfId: ComponentId<LampEvent>,
    event: LampEvent,
    scheduler: Scheduler
  ): void {
    this.seen.push({ kind: event.kind, time: scheduler.time });
  }
}

describe('Components', () => {
  let components: Components;
  let scheduler: Scheduler;
  let state: State;

  beforeEach(() => {
    components = new Components();
    scheduler = new Scheduler();
    state = new State();
  });

  it('should register components under distinct ids', () => {
    const first = components.add(new Lamp());
    const second = components.add(new Lamp());

    expect(first.equals(second)).toBe(false);
    expect(components.has(first)).toBe(true);
    expect(components.has(second)).toBe(true);
    expect(components.size).toBe(2);
  });

  it('should deliver an entry to the component it is addressed to', () => {
    const kitchen = new Lamp();
    const hall = new Lamp();
    const kitchenId = components.add(kitchen);
    components.add(hall);

    scheduler.schedule(3, kitchenId, { kind: 'on' });
    const entry = scheduler.pop();
    if (entry) components.processEventEntry(entry, scheduler, state);

    expect(kitchen.seen).toEqual([{ kind: 'on', time: 3 }]);
    expect(hall.seen).toEqual([]);
  });

  it('should pass the component its own id, the scheduler and the state', () => {
    const processEvent = vi.fn();
    const id = components.add<string>({ processEvent });

    scheduler.scheduleNow(id, 'ping');
    const entry = scheduler.pop();
    if (entry) components.processEventEntry(entry, scheduler, state);

    expect(processEvent).toHaveBeenCalledTimes(1);
    expect(processEvent).toHaveBeenCalledWith(id, 'ping', scheduler, state);
  });

  it('should fail on an entry for an unknown component', () => {
    const stray = new ComponentId<LampEvent>(-1);
    scheduler.scheduleNow(stray, { kind: 'off' });
    const entry = scheduler.pop();

    expect(entry).toBeDefined();
    if (entry) {
      expect(() => components.processEventEntry(entry, scheduler, state)).toThrow(
        InvariantError
      );
      expect(() => components.processEventEntry(entry, scheduler, state)).toThrow(
        'No component registered with id -1'
      );
    }
  });

  it('should fail on an entry scheduled with a rebuilt id', () => {
    const lamp = new Lamp();
    const real = components.add(lamp);
    scheduler.scheduleNow(new ComponentId<LampEvent>(real.id), { kind: 'on' });
    const entry = scheduler.pop();

    expect(entry).toBeDefined();
    if (entry) {
      expect(() => components.processEventEntry(entry, scheduler, state)).toThrow(
        `Event for ComponentId(${real.id}) was scheduled with a handle this registry did not issue`
      );
    }
    expect(lamp.seen).toEqual([]);
  });
});
