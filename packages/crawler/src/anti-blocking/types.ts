import type { SpiderError } from '../errors/spider-error.js';
import type { Task } from '../task/task.js';
import type { TransportFailureCode } from '../fetcher/types.js';

/**
 * `retry`: worth another attempt. `terminal`: report now. `pass`: not a
 * failure at all, the Response goes down the success path.
 */
type FailureClass = 'retry' | 'terminal' | 'pass';

type FailureInput =
  | { type: 'status'; status: number }
  | { type: 'transport'; code: TransportFailureCode };

type RetryDecision =
  | { retry: true; task: Task; delayMs: number }
  | { retry: false; error: SpiderError };

type DownloadDelayConfig = {
  downloadDelayMs: number;
  randomDownloadDelay: boolean | readonly [number, number];
};

type RetryPolicyConfig = {
  retryTimes: number;
  retryCodes: readonly number[];
  retryDelayMs: number;
};

export type {
  DownloadDelayConfig,
  FailureClass,
  FailureInput,
  RetryDecision,
  RetryPolicyConfig,
};
