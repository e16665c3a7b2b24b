import { downloadError } from '../errors/spider-error.js';
import type { CrawlResponse } from '../task/response.js';
import { nextAttempt, type Task } from '../task/task.js';
import type { TransportFailureCode } from '../fetcher/types.js';
import type {
  FailureClass,
  FailureInput,
  RetryDecision,
  RetryPolicyConfig,
} from './types.js';

const RETRYABLE_TRANSPORT: ReadonlySet<TransportFailureCode> = new Set([
  'dns',
  'refused',
  'reset',
  'timeout',
]);

const DEFAULT_CONFIG: RetryPolicyConfig = {
  retryTimes: 3,
  retryCodes: [500, 502, 503, 504, 408, 429],
  retryDelayMs: 3_000,
};

type DecideInput = {
  task: Task;
  failureClass: FailureClass;
  cause?: unknown;
  response?: CrawlResponse;
};

export class RetryStrategy {
  private readonly config: RetryPolicyConfig;
  private readonly retryCodes: ReadonlySet<number>;

  constructor(config?: Partial<RetryPolicyConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.retryCodes = new Set(this.config.retryCodes);
  }

  /**
   * Transport failures that may heal (DNS, refused, reset, timeout) always
   * retry; a status only retries when it is listed in `retryCodes`.
   */
  classify(input: FailureInput): FailureClass {
    switch (input.type) {
      case 'transport':
        return RETRYABLE_TRANSPORT.has(input.code) ? 'retry' : 'terminal';

      case 'status':
        return this.retryCodes.has(input.status) ? 'retry' : 'pass';
    }
  }

  /**
   * Attempt numbers start at 1, so a Task is fetched at most
   * `retryTimes + 1` times.
   */
  decide(input: DecideInput): RetryDecision {
    const { task, failureClass } = input;

    if (failureClass === 'retry' && task.attempt <= this.config.retryTimes) {
      return {
        retry: true,
        task: nextAttempt(task),
        delayMs: this.config.retryDelayMs,
      };
    }

    return {
      retry: false,
      error: downloadError(task, {
        cause: input.cause,
        response: input.response,
      }),
    };
  }

  get retryTimes(): number {
    return this.config.retryTimes;
  }
}

export type { DecideInput };
