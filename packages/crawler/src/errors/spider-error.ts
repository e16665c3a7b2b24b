import type { CrawlResponse } from '../task/response.js';
import type { Task } from '../task/task.js';

type SpiderErrorKind =
  | 'RequestIgnored'
  | 'ResponseIgnored'
  | 'DownloadError'
  | 'ParseError'
  | 'PipeError';

/**
 * A terminal failure reported to `Spider.onError`. Plain data: the engine
 * only branches on `kind` for retry classification.
 */
type SpiderError = {
  readonly kind: SpiderErrorKind;
  readonly message: string;
  readonly cause?: unknown;
  readonly task: Task;
  readonly response?: CrawlResponse;
  /** Task a post-fetch hook scheduled in place of the ignored Response. */
  readonly replacement?: Task;
};

type ErrorDetails = {
  cause?: unknown;
  response?: CrawlResponse;
};

const build = (
  kind: SpiderErrorKind,
  message: string,
  task: Task,
  details: ErrorDetails & { replacement?: Task },
): SpiderError => ({
  kind,
  message,
  task,
  ...(details.cause !== undefined ? { cause: details.cause } : {}),
  ...(details.response ? { response: details.response } : {}),
  ...(details.replacement ? { replacement: details.replacement } : {}),
});

export const requestIgnored = (
  task: Task,
  details: ErrorDetails = {},
): SpiderError =>
  build('RequestIgnored', `Request was ignored for ${task.target}`, task, details);

export const responseIgnored = (
  task: Task,
  details: ErrorDetails & { replacement?: Task } = {},
): SpiderError =>
  build(
    'ResponseIgnored',
    `Response was ignored for ${task.target}`,
    task,
    details,
  );

export const downloadError = (
  task: Task,
  details: ErrorDetails = {},
): SpiderError =>
  build('DownloadError', `Cannot download from ${task.target}`, task, details);

export const parseError = (
  task: Task,
  details: ErrorDetails = {},
): SpiderError =>
  build(
    'ParseError',
    `Error occurred when parsing response from ${task.target}`,
    task,
    details,
  );

export const pipeError = (
  task: Task,
  details: ErrorDetails = {},
): SpiderError =>
  build(
    'PipeError',
    `Error occurred when collecting results from ${task.target}`,
    task,
    details,
  );

export const describeCause = (cause: unknown): string | undefined => {
  if (cause === undefined) {
    return undefined;
  }

  return cause instanceof Error ? cause.message : String(cause);
};

/**
 * Invalid engine configuration; carries one line per offending field.
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid spider configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export type { SpiderError, SpiderErrorKind };
