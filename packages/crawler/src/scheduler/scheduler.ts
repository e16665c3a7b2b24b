import { createLogger } from '@workspace/logger';
import { RateLimiter } from '../anti-blocking/rate-limiter.js';
import { RetryStrategy } from '../anti-blocking/retry-strategy.js';
import { parseSpiderConfig, type SpiderConfig } from '../config/spider-config.js';
import {
  describeCause,
  downloadError,
  parseError,
  type SpiderError,
} from '../errors/spider-error.js';
import { AxiosFetcher } from '../fetcher/axios-fetcher.js';
import type {
  ConnectionContext,
  FetchRequest,
  FetchResult,
  Fetcher,
} from '../fetcher/types.js';
import { RunStats } from '../observability/run-stats.js';
import { TaskQueue } from '../queue/task-queue.js';
import { SessionStore, buildFetchRequest } from '../session/session-store.js';
import { CrawlResponse } from '../task/response.js';
import {
  describeTask,
  inheritSession,
  isTask,
  resolveTarget,
  toTask,
  type Task,
} from '../task/task.js';
import type { CrawlContext, Extraction } from '../task/types.js';
import type {
  EntrySource,
  Outcome,
  RunOptions,
  RunSummary,
  SchedulerOptions,
  SpiderHandlers,
} from './types.js';

const log = createLogger('scheduler');

const isAsyncIterable = (value: unknown): value is AsyncIterable<unknown> =>
  typeof value === 'object' && value !== null && Symbol.asyncIterator in value;

const isIterable = (value: unknown): value is Iterable<unknown> =>
  typeof value === 'object' && value !== null && Symbol.iterator in value;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const setCookieOf = (result: FetchResult): string[] | string | undefined => {
  if (!result.ok) {
    return undefined;
  }

  const name = Object.keys(result.headers).find(
    (key) => key.toLowerCase() === 'set-cookie',
  );
  return name === undefined ? undefined : result.headers[name];
};

/**
 * Runs a spider: seeds its entry Tasks, then lets `workers` concurrent
 * loops take Tasks from the queue until no work is left or the run is
 * stopped.
 *
 * Each Task goes through pre-fetch hooks, the download delay, the fetch,
 * the retry policy, post-fetch hooks, extraction and the output pipes.
 * Every failure that ends a Task is reported to `spider.onError`.
 *
 * A Scheduler runs once.
 */
export class Scheduler {
  private readonly spider: SpiderHandlers;
  private readonly config: SpiderConfig;
  private readonly fetcher: Fetcher;
  private readonly queue: TaskQueue;
  private readonly sessions: SessionStore;
  private readonly rateLimiter: RateLimiter;
  private readonly retryStrategy: RetryStrategy;
  private readonly stats: RunStats;
  private readonly stopController: AbortController;
  private readonly abandonController: AbortController;
  private readonly context: CrawlContext;
  private started: boolean;

  constructor(options: SchedulerOptions) {
    this.spider = options.spider;
    this.config = parseSpiderConfig(options.config);
    this.fetcher = options.fetcher ?? new AxiosFetcher();
    this.queue = new TaskQueue();
    this.sessions = new SessionStore();
    this.rateLimiter = new RateLimiter(this.config, options.random);
    this.retryStrategy = new RetryStrategy(this.config);
    this.stats = new RunStats();
    this.stopController = new AbortController();
    this.abandonController = new AbortController();
    this.context = {
      stop: (reason?: string) => this.stop(reason),
      signal: this.stopController.signal,
    };
    this.started = false;
  }

  get settings(): SpiderConfig {
    return this.config;
  }

  get isStopped(): boolean {
    return this.stopController.signal.aborted;
  }

  /**
   * Stops pulling Tasks. Queued Tasks and pending retries are discarded.
   * Under `abortMode: 'abandon'` in-flight fetches are aborted as well;
   * under `'drain'` they run to completion.
   */
  stop(reason = 'stop requested'): void {
    if (this.isStopped) {
      return;
    }

    this.stats.markStopped();
    this.stopController.abort(reason);

    const discarded = this.queue.abort();
    this.stats.increment('abandoned', discarded);
    log.warn('Stopping spider', {
      reason,
      discarded,
      abortMode: this.config.abortMode,
    });

    if (this.config.abortMode === 'abandon') {
      this.abandonController.abort(reason);
    }
  }

  async run(options: RunOptions = {}): Promise<RunSummary> {
    if (this.started) {
      throw new Error('A scheduler can only run once');
    }
    this.started = true;

    const { signal } = options;
    const onExternalAbort = () => this.stop('run signal aborted');
    const onProcessSignal = (name: NodeJS.Signals) => this.stop(`received ${name}`);

    signal?.addEventListener('abort', onExternalAbort, { once: true });
    if (signal?.aborted) {
      this.stop('run signal aborted');
    }

    if (this.config.handleSignals) {
      process.on('SIGINT', onProcessSignal);
      process.on('SIGTERM', onProcessSignal);
    }

    const statsInterval =
      this.config.statsIntervalMs > 0
        ? setInterval(() => this.logProgress(), this.config.statsIntervalMs)
        : undefined;

    log.info('Spider is running...');

    try {
      await this.spider.onStart();
      await this.seed();
      this.queue.closeIfDrained();

      await Promise.all(
        Array.from({ length: this.config.workers }, () => this.runWorker()),
      );
    } finally {
      clearInterval(statsInterval);
      signal?.removeEventListener('abort', onExternalAbort);
      if (this.config.handleSignals) {
        process.removeListener('SIGINT', onProcessSignal);
        process.removeListener('SIGTERM', onProcessSignal);
      }

      // Left open only when onStart or entry() threw.
      this.stats.increment('abandoned', this.queue.abort());
      await this.sessions.release(this.fetcher);

      try {
        await this.spider.onFinish();
      } finally {
        this.logExit();
      }
    }

    return this.stats.summary();
  }

  private async seed(): Promise<void> {
    const source: EntrySource = await this.spider.entry();

    if (typeof source === 'string' || isTask(source)) {
      this.enqueueEntry(source);
      return;
    }

    if (isAsyncIterable(source)) {
      for await (const value of source) {
        this.enqueueEntry(value);
      }
      return;
    }

    for (const value of source) {
      this.enqueueEntry(value);
    }
  }

  private enqueueEntry(value: unknown): void {
    this.enqueue(toTask(value));
  }

  private enqueue(task: Task): void {
    if (this.queue.put(task)) {
      this.stats.increment('tasksEnqueued');
      log.debug('Task enqueued', { task: describeTask(task) });
    } else {
      this.stats.increment('abandoned');
    }
  }

  private async runWorker(): Promise<void> {
    for (;;) {
      const task = await this.queue.take();
      if (!task) {
        return;
      }

      try {
        await this.process(task);
      } catch (error) {
        log.error('Unexpected failure while handling task', {
          task: describeTask(task),
          error: errorMessage(error),
        });
      } finally {
        this.queue.settle();
      }
    }
  }

  private get abandoning(): boolean {
    return this.abandonController.signal.aborted;
  }

  private async process(task: Task): Promise<void> {
    const prepared = await this.spider.hooks.runBeforeFetch(task, this.context);
    if (prepared.status === 'ignored') {
      await this.report(prepared.error);
      return;
    }

    if (this.abandoning) {
      this.stats.increment('abandoned');
      return;
    }

    try {
      await this.rateLimiter.wait(this.abandonController.signal);
    } catch (error) {
      if (!this.abandoning) {
        throw error;
      }
      this.stats.increment('abandoned');
      return;
    }

    const outcome = await this.download(prepared.value);
    if (this.abandoning) {
      this.stats.increment('abandoned');
      return;
    }

    if (outcome.status === 'failure') {
      await this.handleFailure(outcome);
      return;
    }

    const accepted = await this.spider.hooks.runAfterFetch(
      outcome.response,
      this.context,
    );
    if (accepted.status === 'ignored') {
      if (accepted.error.replacement) {
        this.enqueue(accepted.error.replacement);
      }
      await this.report(accepted.error);
      return;
    }

    await this.extract(accepted.value);
  }

  /** One physical fetch, classified by the retry policy. */
  private async download(task: Task): Promise<Outcome> {
    const resolved = this.sessions.resolve(task);
    const request = buildFetchRequest(task, resolved, {
      headers: this.config.defaultHeaders,
      timeoutMs: this.config.timeoutMs,
    });

    const result = await this.fetchSafely(request, resolved.context);
    const seconds = (result.elapsedMs / 1000).toFixed(2);

    if (!result.ok) {
      this.stats.recordFetch(result.elapsedMs);
      log.warn(`"${request.method} ${request.url}" failed (${result.code}) ${seconds}s`, {
        message: result.message,
        attempt: task.attempt,
      });

      const failureClass = this.retryStrategy.classify({
        type: 'transport',
        code: result.code,
      });
      return {
        status: 'failure',
        task,
        error: downloadError(task, {
          cause: result.cause ?? new Error(result.message),
        }),
        retryable: failureClass === 'retry',
      };
    }

    this.stats.recordFetch(result.elapsedMs, result.status);
    log.info(`"${request.method} ${request.url}" ${result.status} ${seconds}s`);

    resolved.context.cookies.absorb(setCookieOf(result), result.url);

    const response = new CrawlResponse({
      status: result.status,
      headers: result.headers,
      body: result.body,
      url: result.url,
      elapsedMs: result.elapsedMs,
      task,
      sessionKey: resolved.session?.key,
    });

    const failureClass = this.retryStrategy.classify({
      type: 'status',
      status: result.status,
    });
    if (failureClass === 'pass') {
      return { status: 'success', task, response };
    }

    return {
      status: 'failure',
      task,
      error: downloadError(task, { response }),
      retryable: failureClass === 'retry',
    };
  }

  /** A Fetcher that throws yields a terminal `unknown` failure. */
  private async fetchSafely(
    request: FetchRequest,
    context: ConnectionContext,
  ): Promise<FetchResult> {
    const startTime = Date.now();
    try {
      return await this.fetcher.fetch(request, context, this.abandonController.signal);
    } catch (error) {
      return {
        ok: false,
        code: 'unknown',
        message: errorMessage(error),
        cause: error,
        elapsedMs: Date.now() - startTime,
      };
    }
  }

  private async handleFailure(
    outcome: Extract<Outcome, { status: 'failure' }>,
  ): Promise<void> {
    if (!outcome.retryable) {
      await this.report(outcome.error);
      return;
    }

    const decision = this.retryStrategy.decide({
      task: outcome.task,
      failureClass: 'retry',
      cause: outcome.error.cause,
      response: outcome.error.response,
    });

    if (!decision.retry) {
      await this.report(decision.error);
      return;
    }

    if (this.queue.putLater(decision.task, decision.delayMs)) {
      this.stats.increment('retries');
      log.warn('Task will be retried', {
        url: outcome.task.target,
        attempt: decision.task.attempt,
        delayMs: decision.delayMs,
      });
    } else {
      this.stats.increment('abandoned');
    }
  }

  private async extract(response: CrawlResponse): Promise<void> {
    const { task } = response;

    try {
      const output: Extraction = task.extractor
        ? task.extractor(response, this.context)
        : this.spider.parse(response, this.context);

      if (isAsyncIterable(output)) {
        for await (const value of output) {
          await this.handleExtracted(value, response);
        }
      } else if (isIterable(output)) {
        for (const value of output) {
          await this.handleExtracted(value, response);
        }
      } else {
        await output;
      }
    } catch (error) {
      await this.report(parseError(task, { response, cause: error }));
    }
  }

  /** Tasks are scheduled; anything else is an item for the pipes. */
  private async handleExtracted(value: unknown, response: CrawlResponse): Promise<void> {
    if (isTask(value)) {
      this.enqueue(inheritSession(resolveTarget(value, response.url), response.sessionKey));
      return;
    }

    const result = await this.spider.hooks.runPipes(value, response, (item, from) =>
      this.spider.collect(item, from),
    );

    switch (result.status) {
      case 'collected':
        this.stats.increment('itemsCollected');
        break;
      case 'dropped':
        this.stats.increment('itemsDropped');
        break;
      case 'failed':
        await this.report(result.error);
        break;
    }
  }

  private async report(error: SpiderError): Promise<void> {
    this.stats.recordError(error.kind, error.task.target);

    const details = {
      task: describeTask(error.task),
      status: error.response?.status,
      cause: describeCause(error.cause),
    };
    if (error.kind === 'DownloadError' || error.kind === 'ParseError') {
      log.error(error.message, details);
    } else {
      log.warn(error.message, details);
    }

    try {
      await this.spider.onError(error);
    } catch (handlerError) {
      log.error('Error handler failed', {
        task: describeTask(error.task),
        error: errorMessage(handlerError),
      });
    }
  }

  private logProgress(): void {
    const queue = this.queue.stats;
    log.info('Progress', {
      requests: this.stats.count('requests'),
      items: this.stats.count('itemsCollected'),
      ready: queue.ready,
      delayed: queue.delayed,
      inFlight: queue.inFlight,
    });
  }

  private logExit(): void {
    const summary = this.stats.summary();

    log.info(`Spider exited; running time: ${(summary.elapsedMs / 1000).toFixed(2)}s.`, {
      requests: summary.requests,
      statuses: summary.statuses,
      retries: summary.retries,
      items: summary.itemsCollected,
      errors: summary.errors,
      abandoned: summary.abandoned,
    });

    if (summary.failedUrls.length > 0) {
      log.warn(`Failed to download ${summary.failedUrls.length} URL(s)`, {
        urls: summary.failedUrls,
      });
    }
  }
}
