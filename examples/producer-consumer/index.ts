/**
 * Producer/Consumer Example
 *
 * A producer makes one product per time unit and hands it to a consumer
 * through a FIFO queue. The consumer needs one time unit per product.
 *
 * This example demonstrates:
 * 1. Components addressing each other through typed ids
 * 2. Sharing a queue and per-component values through the state
 * 3. Recording the clock after every step with a side effect
 */

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

// Simulation parameters
const PRODUCT_COUNT = 10;
const PRODUCTION_TIME = 1;
const CONSUMPTION_TIME = 1;

interface Product {
  serial: number;
  producedAt: number;
}

interface ProducerEvent {
  kind: 'produce';
}

type ConsumerEvent = { kind: 'received' } | { kind: 'finished' };

class Producer implements Component<ProducerEvent> {
  constructor(
    private readonly outgoing: QueueId<Fifo<Product>>,
    private readonly consumer: ComponentId<ConsumerEvent>,
    private readonly producedCount: Key<number>
  ) {}

  processEvent(
    selfId: ComponentId<ProducerEvent>,
    _event: ProducerEvent,
    scheduler: Scheduler,
    state: State
  ): void {
    const count = state.get(this.producedCount) ?? 0;
    if (count >= PRODUCT_COUNT) {
      return;
    }

    state.send(this.outgoing, { serial: count, producedAt: scheduler.time });
    console.log(`[${scheduler.time}] Produced #${count}`);

    scheduler.schedule(PRODUCTION_TIME, selfId, { kind: 'produce' });
    scheduler.scheduleNow(this.consumer, { kind: 'received' });
    state.set(this.producedCount, count + 1);
  }
}

class Consumer implements Component<ConsumerEvent> {
  constructor(
    private readonly incoming: QueueId<Fifo<Product>>,
    private readonly workingOn: Key<Product | null>,
    private readonly totalWait: Key<number>
  ) {}

  processEvent(
    selfId: ComponentId<ConsumerEvent>,
    event: ConsumerEvent,
    scheduler: Scheduler,
    state: State
  ): void {
    switch (event.kind) {
      case 'received': {
        // Busy: the product will be picked up after the current one
        if (state.get(this.workingOn) !== null) {
          return;
        }
        const product = state.recv(this.incoming);
        if (product === undefined) {
          return;
        }
        state.set(this.workingOn, product);
        state.update(this.totalWait, (wait) => wait + scheduler.time - product.producedAt);
        scheduler.schedule(CONSUMPTION_TIME, selfId, { kind: 'finished' });
        return;
      }
      case 'finished': {
        const product = state.get(this.workingOn);
        state.set(this.workingOn, null);
        if (product) {
          console.log(`[${scheduler.time}] Consumed #${product.serial}`);
        }
        if (state.len(this.incoming) > 0) {
          scheduler.scheduleNow(selfId, { kind: 'received' });
        }
        return;
      }
    }
  }
}

/**
 * Run the producer/consumer simulation
 */
function runSimulation() {
  console.log('='.repeat(60));
  console.log('Producer/Consumer Simulation');
  console.log('='.repeat(60));

  const sim = new Simulation();

  const queue = sim.addQueue(new Fifo<Product>({ name: 'Products' }));
  const workingOn = sim.insert<Product | null>(null);
  const totalWait = sim.insert(0);
  const consumer = sim.addComponent(new Consumer(queue, workingOn, totalWait));

  const producedCount = sim.insert(0);
  const producer = sim.addComponent(new Producer(queue, consumer, producedCount));

  sim.schedule(0, producer, { kind: 'produce' });

  // Track the longest queue seen after any step
  let maxQueueLength = 0;
  const result = Executor.unbound()
    .sideEffect((view) => {
      maxQueueLength = Math.max(maxQueueLength, view.state.len(queue));
    })
    .execute(sim);

  console.log();
  console.log(`Simulated time: ${result.endTime} time units`);
  console.log(`Events processed: ${result.eventsProcessed}`);
  console.log(`Products made: ${sim.state.get(producedCount) ?? 0}`);
  console.log(`Longest queue: ${maxQueueLength}`);
  console.log(
    `Average wait: ${((sim.state.get(totalWait) ?? 0) / PRODUCT_COUNT).toFixed(2)} time units`
  );
  console.log('='.repeat(60));

  return result;
}

runSimulation();

export { runSimulation };
