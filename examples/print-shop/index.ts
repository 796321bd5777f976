/**
 * Print Shop Example
 *
 * Jobs arrive at a print shop with a small intake tray. Jobs that find the
 * tray full are turned away. Whenever it is free, the printer moves jobs
 * from the tray into a priority queue and prints the most urgent one.
 *
 * This example demonstrates:
 * 1. Bounded queues and handling rejected pushes
 * 2. Priority queues with a custom comparator
 * 3. Stopping a run at a fixed time with a timed executor
 * 4. Lifecycle hooks and event tracing
 */

import {
  Simulation,
  Executor,
  Fifo,
  PriorityQueue,
  type Component,
  type ComponentId,
  type Key,
  type QueueId,
  type Scheduler,
  type State,
} from '../../src/index.js';

// Simulation parameters
const TRAY_CAPACITY = 3;
const ARRIVAL_INTERVAL = 2;
const CLOSING_TIME = 40;

interface PrintJob {
  id: number;
  pages: number;
  urgency: number;
}

interface ShopStats {
  arrived: number;
  rejected: number;
  printed: number;
  pagesPrinted: number;
}

// Repeating arrival pattern: [pages, urgency]
const JOB_PATTERN: ReadonlyArray<[number, number]> = [
  [5, 1],
  [2, 3],
  [8, 1],
  [1, 5],
  [4, 2],
];

type ArrivalEvent = { kind: 'arrive' };
type PrinterEvent = { kind: 'wake' } | { kind: 'done' };

class Arrivals implements Component<ArrivalEvent> {
  constructor(
    private readonly tray: QueueId<Fifo<PrintJob>>,
    private readonly printer: ComponentId<PrinterEvent>,
    private readonly stats: Key<ShopStats>
  ) {}

  processEvent(
    selfId: ComponentId<ArrivalEvent>,
    _event: ArrivalEvent,
    scheduler: Scheduler,
    state: State
  ): void {
    const stats = state.get(this.stats);
    if (!stats) {
      return;
    }

    const pattern = JOB_PATTERN[stats.arrived % JOB_PATTERN.length] ?? [1, 1];
    const job: PrintJob = { id: stats.arrived, pages: pattern[0], urgency: pattern[1] };
    stats.arrived++;

    const pushed = state.send(this.tray, job);
    if (pushed.ok) {
      scheduler.scheduleNow(this.printer, { kind: 'wake' });
    } else {
      stats.rejected++;
      console.log(`[${scheduler.time}] Job ${job.id} turned away: ${pushed.error.message}`);
    }

    scheduler.schedule(ARRIVAL_INTERVAL, selfId, { kind: 'arrive' });
  }
}

class Printer implements Component<PrinterEvent> {
  private busy = false;

  constructor(
    private readonly tray: QueueId<Fifo<PrintJob>>,
    private readonly sorted: QueueId<PriorityQueue<PrintJob>>,
    private readonly stats: Key<ShopStats>
  ) {}

  processEvent(
    selfId: ComponentId<PrinterEvent>,
    event: PrinterEvent,
    scheduler: Scheduler,
    state: State
  ): void {
    if (event.kind === 'done') {
      this.busy = false;
    } else if (this.busy) {
      return;
    }

    // Move everything waiting in the tray into priority order
    let job = state.recv(this.tray);
    while (job !== undefined) {
      state.send(this.sorted, job);
      job = state.recv(this.tray);
    }

    const next = state.recv(this.sorted);
    if (next === undefined) {
      return;
    }

    this.busy = true;
    state.update(this.stats, (s) => ({
      ...s,
      printed: s.printed + 1,
      pagesPrinted: s.pagesPrinted + next.pages,
    }));
    scheduler.schedule(next.pages, selfId, { kind: 'done' });
  }
}

/**
 * Run the print shop simulation
 */
function runSimulation() {
  console.log('='.repeat(60));
  console.log('Print Shop Simulation');
  console.log('='.repeat(60));

  const sim = new Simulation();

  const tray = sim.addQueue(Fifo.bounded<PrintJob>(TRAY_CAPACITY, 'Tray'));
  const sorted = sim.addQueue(
    new PriorityQueue<PrintJob>((a, b) => a.urgency - b.urgency || b.id - a.id, {
      name: 'Sorted',
    })
  );
  const stats = sim.insert<ShopStats>({ arrived: 0, rejected: 0, printed: 0, pagesPrinted: 0 });

  const printer = sim.addComponent(new Printer(tray, sorted, stats));
  const arrivals = sim.addComponent(new Arrivals(tray, printer, stats));

  sim.on('error', (error) => {
    console.error('Simulation failed:', error);
  });

  sim.enableEventTrace();
  sim.schedule(0, arrivals, { kind: 'arrive' });

  const result = Executor.timed(CLOSING_TIME).execute(sim);

  const finalStats = sim.state.get(stats);
  console.log();
  console.log(`Closed at: ${result.endTime}`);
  console.log(`Events processed: ${result.eventsProcessed}`);
  console.log(`Events traced: ${sim.getEventTrace().length}`);
  console.log(`Still waiting: ${sim.state.len(tray) + sim.state.len(sorted)}`);
  if (finalStats) {
    console.log(`Jobs arrived: ${finalStats.arrived}`);
    console.log(`Jobs rejected: ${finalStats.rejected}`);
    console.log(`Jobs printed: ${finalStats.printed}`);
    console.log(`Pages printed: ${finalStats.pagesPrinted}`);
  }
  console.log('='.repeat(60));

  return result;
}

runSimulation();

export { runSimulation };
