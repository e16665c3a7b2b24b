import { createLogger } from '@workspace/logger';
import type { Task } from '../task/task.js';

const log = createLogger('queue');

type QueueStats = {
  ready: number;
  delayed: number;
  inFlight: number;
  enqueued: number;
};

type Waiter = (task: Task | undefined) => void;

/**
 * Work queue shared by the workers.
 *
 * A Task handed out by `take()` counts as in flight until the worker calls
 * `settle()`. The queue closes once nothing is ready, nothing is waiting
 * out a retry delay and nothing is in flight; every pending `take()` then
 * resolves with `undefined`.
 *
 * All bookkeeping happens synchronously, so workers interleaving at await
 * points always see a consistent count.
 */
export class TaskQueue {
  private readonly ready: Task[];
  private readonly timers: Set<NodeJS.Timeout>;
  private readonly waiters: Waiter[];
  private inFlight: number;
  private enqueued: number;
  private closed: boolean;

  constructor() {
    this.ready = [];
    this.timers = new Set();
    this.waiters = [];
    this.inFlight = 0;
    this.enqueued = 0;
    this.closed = false;
  }

  put(task: Task): boolean {
    if (this.closed) {
      log.debug('Queue closed, task not added', { url: task.target });
      return false;
    }

    this.enqueued += 1;
    const waiter = this.waiters.shift();

    if (waiter) {
      this.inFlight += 1;
      waiter(task);
    } else {
      this.ready.push(task);
    }

    return true;
  }

  /** Adds `task` after `delayMs`. Counts as pending work in the meantime. */
  putLater(task: Task, delayMs: number): boolean {
    if (this.closed) {
      return false;
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.put(task);
      this.closeIfDrained();
    }, delayMs);

    this.timers.add(timer);
    return true;
  }

  /**
   * Next Task, or `undefined` once the queue has closed. A returned Task is
   * already counted as in flight.
   */
  take(): Promise<Task | undefined> {
    const task = this.ready.shift();

    if (task) {
      this.inFlight += 1;
      return Promise.resolve(task);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Releases the in-flight slot of a Task handed out by `take()`. */
  settle(): void {
    if (this.inFlight === 0) {
      throw new Error('settle() called without a task in flight');
    }

    this.inFlight -= 1;
    this.closeIfDrained();
  }

  /**
   * Closes the queue if no work is left. Called once after seeding, so an
   * empty entry list ends the run immediately.
   */
  closeIfDrained(): void {
    if (
      !this.closed &&
      this.ready.length === 0 &&
      this.timers.size === 0 &&
      this.inFlight === 0
    ) {
      this.close();
    }
  }

  /**
   * Stops the queue: pending retries are cancelled, ready Tasks are
   * discarded and waiting workers wake up. Returns how many Tasks were
   * discarded.
   */
  abort(): number {
    const discarded = this.ready.length + this.timers.size;

    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.ready.length = 0;
    this.close();

    return discarded;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get stats(): QueueStats {
    return {
      ready: this.ready.length,
      delayed: this.timers.size,
      inFlight: this.inFlight,
      enqueued: this.enqueued,
    };
  }

  private close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    log.debug('Queue closed', { enqueued: this.enqueued });

    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      waiter(undefined);
    }
  }
}

export type { QueueStats };
