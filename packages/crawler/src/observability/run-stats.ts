import type { SpiderErrorKind } from '../errors/spider-error.js';

type DurationStats = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type RunSummary = {
  requests: number;
  responses: number;
  /** Response counts keyed by HTTP status. */
  statuses: Record<string, number>;
  transportFailures: number;
  retries: number;
  errors: Partial<Record<SpiderErrorKind, number>>;
  tasksEnqueued: number;
  itemsCollected: number;
  itemsDropped: number;
  /** Tasks left behind by an early stop. */
  abandoned: number;
  /** URLs that ended in a DownloadError. */
  failedUrls: string[];
  fetchDurations: DurationStats;
  elapsedMs: number;
  stopped: boolean;
};

/**
 * Counters of one run. Updated by the workers, read as a `RunSummary` at
 * the end and by the periodic progress line.
 */
export class RunStats {
  private readonly counters: Map<string, number>;
  private readonly statuses: Map<number, number>;
  private readonly errors: Map<SpiderErrorKind, number>;
  private readonly fetchDurations: DurationStats;
  private readonly failedUrls: string[];
  private readonly now: () => number;
  private readonly startedAt: number;
  private stopped: boolean;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.counters = new Map();
    this.statuses = new Map();
    this.errors = new Map();
    this.fetchDurations = { count: 0, min: 0, max: 0, avg: 0, total: 0 };
    this.failedUrls = [];
    this.startedAt = now();
    this.stopped = false;
  }

  increment(counter: string, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  count(counter: string): number {
    return this.counters.get(counter) ?? 0;
  }

  recordFetch(elapsedMs: number, status?: number): void {
    this.increment('requests');
    this.recordDuration(elapsedMs);

    if (status === undefined) {
      this.increment('transportFailures');
      return;
    }

    this.increment('responses');
    this.statuses.set(status, (this.statuses.get(status) ?? 0) + 1);
  }

  recordError(kind: SpiderErrorKind, url: string): void {
    this.errors.set(kind, (this.errors.get(kind) ?? 0) + 1);
    if (kind === 'DownloadError') {
      this.failedUrls.push(url);
    }
  }

  private recordDuration(elapsedMs: number): void {
    const stats = this.fetchDurations;
    stats.min = stats.count === 0 ? elapsedMs : Math.min(stats.min, elapsedMs);
    stats.max = stats.count === 0 ? elapsedMs : Math.max(stats.max, elapsedMs);
    stats.count += 1;
    stats.total += elapsedMs;
    stats.avg = stats.total / stats.count;
  }

  markStopped(): void {
    this.stopped = true;
  }

  durations(): DurationStats {
    return { ...this.fetchDurations };
  }

  summary(): RunSummary {
    const statuses: Record<string, number> = {};
    for (const [status, count] of [...this.statuses].sort(([a], [b]) => a - b)) {
      statuses[String(status)] = count;
    }

    return {
      requests: this.count('requests'),
      responses: this.count('responses'),
      statuses,
      transportFailures: this.count('transportFailures'),
      retries: this.count('retries'),
      errors: Object.fromEntries(this.errors),
      tasksEnqueued: this.count('tasksEnqueued'),
      itemsCollected: this.count('itemsCollected'),
      itemsDropped: this.count('itemsDropped'),
      abandoned: this.count('abandoned'),
      failedUrls: [...this.failedUrls],
      fetchDurations: this.durations(),
      elapsedMs: this.now() - this.startedAt,
      stopped: this.stopped,
    };
  }
}

export type { DurationStats, RunSummary };
