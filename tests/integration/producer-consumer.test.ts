import { describe, it, expect, beforeEach } from 'vitest';
import {
  Simulation,
  Executor,
  Fifo,
  type Component,
  type ComponentId,
  type Key,
  type QueueId,
  type Scheduler,
  type State,
} from '../../src/index.js';

interface Product {
  serial: number;
}

interface ProducerEvent {
  kind: 'produce';
}

type ConsumerEvent = { kind: 'received' } | { kind: 'finished' };

const PRODUCT_LIMIT = 10;

class Producer implements Component<ProducerEvent> {
  constructor(
    private readonly outgoing: QueueId<Fifo<Product>>,
    private readonly consumer: ComponentId<ConsumerEvent>,
    private readonly producedCount: Key<number>,
    private readonly messages: string[]
  ) {}

  processEvent(
    selfId: ComponentId<ProducerEvent>,
    _event: ProducerEvent,
    scheduler: Scheduler,
    state: State
  ): void {
    const count = state.get(this.producedCount) ?? 0;
    if (count >= PRODUCT_LIMIT) {
      return;
    }
    state.send(this.outgoing, { serial: count });
    this.messages.push('Produced');
    scheduler.schedule(1, selfId, { kind: 'produce' });
    scheduler.schedule(0, this.consumer, { kind: 'received' });
    state.set(this.producedCount, count + 1);
  }
}

class Consumer implements Component<ConsumerEvent> {
  constructor(
    private readonly incoming: QueueId<Fifo<Product>>,
    private readonly workingOn: Key<Product | null>,
    private readonly messages: string[]
  ) {}

  processEvent(
    selfId: ComponentId<ConsumerEvent>,
    event: ConsumerEvent,
    scheduler: Scheduler,
    state: State
  ): void {
    switch (event.kind) {
      case 'received': {
        if (state.get(this.workingOn) !== null) {
          return;
        }
        const product = state.recv(this.incoming);
        if (product !== undefined) {
          state.set(this.workingOn, product);
          scheduler.schedule(1, selfId, { kind: 'finished' });
        }
        return;
      }
      case 'finished':
        state.set(this.workingOn, null);
        this.messages.push('Consumed');
        if (state.len(this.incoming) > 0) {
          scheduler.schedule(0, selfId, { kind: 'received' });
        }
        return;
    }
  }
}

function expectedTrace(): string[] {
  const trace = ['Produced', '0s', '0s'];
  for (let t = 1; t < PRODUCT_LIMIT; t++) {
    trace.push('Produced', `${t}s`, 'Consumed', `${t}s`, `${t}s`, `${t}s`);
  }
  trace.push('10s', 'Consumed', '10s');
  return trace;
}

describe('producer/consumer', () => {
  let sim: Simulation;
  let messages: string[];
  let queue: QueueId<Fifo<Product>>;
  let workingOn: Key<Product | null>;
  let producedCount: Key<number>;
  let producer: ComponentId<ProducerEvent>;

  beforeEach(() => {
    sim = new Simulation();
    messages = [];
    queue = sim.addQueue(new Fifo<Product>());
    workingOn = sim.insert<Product | null>(null);
    const consumer = sim.addComponent(new Consumer(queue, workingOn, messages));
    producedCount = sim.insert(0);
    producer = sim.addComponent(new Producer(queue, consumer, producedCount, messages));
    sim.schedule(0, producer, { kind: 'produce' });
  });

  it('should interleave production, consumption and step times', () => {
    sim.run((view) => messages.push(`${view.scheduler.time}s`));

    expect(messages).toEqual(expectedTrace());
  });

  it('should leave everything consumed and the clock at the last event', () => {
    const result = sim.run();

    expect(result.endTime).toBe(10);
    expect(sim.state.get(producedCount)).toBe(PRODUCT_LIMIT);
    expect(sim.state.len(queue)).toBe(0);
    expect(sim.state.get(workingOn)).toBeNull();
    expect(messages.filter((m) => m === 'Produced')).toHaveLength(PRODUCT_LIMIT);
    expect(messages.filter((m) => m === 'Consumed')).toHaveLength(PRODUCT_LIMIT);
  });

  it('should give the same trace through an unbound executor', () => {
    Executor.unbound()
      .sideEffect((view) => messages.push(`${view.now}s`))
      .execute(sim);

    expect(messages).toEqual(expectedTrace());
  });

  it('should stop halfway through with a timed executor', () => {
    Executor.timed(4).execute(sim);

    expect(sim.now).toBe(4);
    expect(sim.state.get(producedCount)).toBe(5);
    expect(messages.filter((m) => m === 'Consumed')).toHaveLength(4);
    expect(sim.scheduler.peek()?.time).toBe(5);
  });
});
