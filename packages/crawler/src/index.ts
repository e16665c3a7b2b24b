export { Spider, type StartOptions } from './spider/spider.js';
export { Scheduler } from './scheduler/scheduler.js';
export type {
  EntrySource,
  EntryValue,
  Outcome,
  RunOptions,
  RunSummary,
  SchedulerOptions,
  SpiderHandlers,
} from './scheduler/types.js';
export {
  createTask,
  describeTask,
  isTask,
  nextAttempt,
  toTask,
  withTask,
  type Task,
} from './task/task.js';
export { CrawlResponse, type CrawlResponseInit } from './task/response.js';
export type {
  CrawlContext,
  Extraction,
  Extractor,
  MultipartPart,
  QueryValue,
  SessionOverrides,
  SessionRef,
  TaskBody,
  TaskInit,
  TaskPatch,
} from './task/types.js';
export { HookChain, drop, proceed, replaceWith } from './hooks/hook-chain.js';
export {
  USER_AGENTS,
  dropStatuses,
  logDownload,
  randomUserAgent,
  type RandomUserAgentOptions,
} from './hooks/builtin.js';
export type {
  AfterFetchDecision,
  AfterFetchHook,
  BeforeFetchDecision,
  BeforeFetchHook,
  PipeHook,
} from './hooks/types.js';
export {
  ConfigError,
  type SpiderError,
  type SpiderErrorKind,
} from './errors/spider-error.js';
export {
  parseSpiderConfig,
  type SpiderConfig,
  type SpiderConfigInput,
} from './config/spider-config.js';
export { AxiosFetcher, type AxiosFetcherOptions } from './fetcher/axios-fetcher.js';
export type {
  ConnectionContext,
  FetchRequest,
  FetchResult,
  Fetcher,
  TransportFailureCode,
} from './fetcher/types.js';
export { CookieJar } from './session/cookie-jar.js';
