import type { CrawlResponse } from '../task/response.js';
import type { Task } from '../task/task.js';
import type { CrawlContext } from '../task/types.js';
import type { SpiderError } from '../errors/spider-error.js';

type MaybePromise<T> = T | Promise<T>;

type Proceed<T> = { action: 'proceed'; value: T };
type Drop = { action: 'drop'; reason?: string };
type Replace = { action: 'replace'; task: Task };

type BeforeFetchDecision = Proceed<Task> | Drop;
type AfterFetchDecision = Proceed<CrawlResponse> | Replace | Drop;

type BeforeFetchHook = (
  task: Task,
  context: CrawlContext,
) => MaybePromise<BeforeFetchDecision>;

type AfterFetchHook = (
  response: CrawlResponse,
  context: CrawlContext,
) => MaybePromise<AfterFetchDecision>;

/** Returns the transformed item, or null/undefined to drop it silently. */
type PipeHook = (item: unknown, response: CrawlResponse) => MaybePromise<unknown>;

type ChainResult<T> =
  | { status: 'continue'; value: T }
  | { status: 'ignored'; error: SpiderError };

type PipeResult =
  | { status: 'collected' }
  | { status: 'dropped'; stage: number }
  | { status: 'failed'; error: SpiderError };

export type {
  AfterFetchDecision,
  AfterFetchHook,
  BeforeFetchDecision,
  BeforeFetchHook,
  ChainResult,
  Drop,
  MaybePromise,
  PipeHook,
  PipeResult,
  Proceed,
  Replace,
};
