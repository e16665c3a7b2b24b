import { createLogger } from '@workspace/logger';
import {
  pipeError,
  requestIgnored,
  responseIgnored,
} from '../errors/spider-error.js';
import type { CrawlResponse } from '../task/response.js';
import { describeTask, type Task } from '../task/task.js';
import type { CrawlContext } from '../task/types.js';
import type {
  AfterFetchHook,
  BeforeFetchHook,
  ChainResult,
  Drop,
  PipeHook,
  PipeResult,
  Proceed,
  Replace,
} from './types.js';

const log = createLogger('hooks');

export const proceed = <T>(value: T): Proceed<T> => ({
  action: 'proceed',
  value,
});

export const drop = (reason?: string): Drop =>
  reason === undefined ? { action: 'drop' } : { action: 'drop', reason };

/** Post-fetch only: schedule `task` instead of handling this Response. */
export const replaceWith = (task: Task): Replace => ({
  action: 'replace',
  task,
});

type Collect = (item: unknown, response: CrawlResponse) => unknown;

/**
 * The three ordered hook lists of a spider. Hooks run in registration
 * order; the first veto stops the chain.
 */
export class HookChain {
  private readonly beforeFetchHooks: BeforeFetchHook[];
  private readonly afterFetchHooks: AfterFetchHook[];
  private readonly pipeHooks: PipeHook[];

  constructor() {
    this.beforeFetchHooks = [];
    this.afterFetchHooks = [];
    this.pipeHooks = [];
  }

  addBeforeFetch(hook: BeforeFetchHook): this {
    this.beforeFetchHooks.push(hook);
    return this;
  }

  addAfterFetch(hook: AfterFetchHook): this {
    this.afterFetchHooks.push(hook);
    return this;
  }

  addPipe(hook: PipeHook): this {
    this.pipeHooks.push(hook);
    return this;
  }

  get size(): { beforeFetch: number; afterFetch: number; pipes: number } {
    return {
      beforeFetch: this.beforeFetchHooks.length,
      afterFetch: this.afterFetchHooks.length,
      pipes: this.pipeHooks.length,
    };
  }

  async runBeforeFetch(
    task: Task,
    context: CrawlContext,
  ): Promise<ChainResult<Task>> {
    let current = task;

    for (const hook of this.beforeFetchHooks) {
      try {
        const decision = await hook(current, context);
        if (decision.action === 'drop') {
          log.debug('Request dropped by hook', {
            task: describeTask(current),
            reason: decision.reason,
          });
          return { status: 'ignored', error: requestIgnored(current) };
        }

        current = decision.value;
      } catch (error) {
        return {
          status: 'ignored',
          error: requestIgnored(current, { cause: error }),
        };
      }
    }

    return { status: 'continue', value: current };
  }

  /**
   * A `replace` decision stops the chain as well: the replacement is carried
   * on the ResponseIgnored error for the caller to enqueue.
   */
  async runAfterFetch(
    response: CrawlResponse,
    context: CrawlContext,
  ): Promise<ChainResult<CrawlResponse>> {
    let current = response;

    for (const hook of this.afterFetchHooks) {
      try {
        const decision = await hook(current, context);

        if (decision.action === 'replace') {
          return {
            status: 'ignored',
            error: responseIgnored(current.task, {
              response: current,
              replacement: decision.task,
            }),
          };
        }

        if (decision.action === 'drop') {
          log.debug('Response dropped by hook', {
            task: describeTask(current.task),
            reason: decision.reason,
          });
          return {
            status: 'ignored',
            error: responseIgnored(current.task, { response: current }),
          };
        }

        current = decision.value;
      } catch (error) {
        return {
          status: 'ignored',
          error: responseIgnored(current.task, {
            response: current,
            cause: error,
          }),
        };
      }
    }

    return { status: 'continue', value: current };
  }

  /**
   * Runs one item through the pipes and then `collect`, the implicit last
   * pipe.
   */
  async runPipes(
    item: unknown,
    response: CrawlResponse,
    collect: Collect,
  ): Promise<PipeResult> {
    let current = item;

    try {
      for (const [stage, hook] of this.pipeHooks.entries()) {
        current = await hook(current, response);
        if (current === null || current === undefined) {
          return { status: 'dropped', stage };
        }
      }

      await collect(current, response);
      return { status: 'collected' };
    } catch (error) {
      return {
        status: 'failed',
        error: pipeError(response.task, { response, cause: error }),
      };
    }
  }
}

export type { Collect };
