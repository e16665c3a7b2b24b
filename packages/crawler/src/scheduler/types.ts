import type { SpiderConfigInput } from '../config/spider-config.js';
import type { SpiderError } from '../errors/spider-error.js';
import type { Fetcher } from '../fetcher/types.js';
import type { HookChain } from '../hooks/hook-chain.js';
import type { MaybePromise } from '../hooks/types.js';
import type { CrawlResponse } from '../task/response.js';
import type { Task } from '../task/task.js';
import type { CrawlContext, Extraction } from '../task/types.js';

type EntryValue = string | Task;

type EntrySource =
  | EntryValue
  | Iterable<EntryValue>
  | AsyncIterable<EntryValue>;

/** What the scheduler needs from a spider. */
interface SpiderHandlers {
  readonly hooks: HookChain;
  entry(): EntrySource | Promise<EntrySource>;
  onStart(): MaybePromise<void>;
  onFinish(): MaybePromise<void>;
  onError(error: SpiderError): MaybePromise<void>;
  parse(response: CrawlResponse, context: CrawlContext): Extraction;
  collect(item: unknown, response: CrawlResponse): MaybePromise<void>;
}

/** Result of one fetch attempt. */
type Outcome =
  | { status: 'success'; task: Task; response: CrawlResponse }
  | { status: 'failure'; task: Task; error: SpiderError; retryable: boolean };

type SchedulerOptions = {
  spider: SpiderHandlers;
  config?: SpiderConfigInput;
  /** Defaults to an `AxiosFetcher`. */
  fetcher?: Fetcher;
  /** Source of randomness for download delays. */
  random?: () => number;
};

type RunOptions = {
  /** Aborting it stops the run like `Scheduler.stop()`. */
  signal?: AbortSignal;
};

export type {
  EntrySource,
  EntryValue,
  Outcome,
  RunOptions,
  SchedulerOptions,
  SpiderHandlers,
};
export type { RunSummary } from '../observability/run-stats.js';
