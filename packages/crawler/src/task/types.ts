import type { CrawlResponse } from './response.js';

type QueryValue = string | number | boolean;

type MultipartPart =
  | { name: string; value: string }
  | { name: string; data: Buffer; filename: string; contentType?: string };

type TaskBody =
  | { type: 'none' }
  | { type: 'form'; fields: Readonly<Record<string, string>> }
  | { type: 'json'; value: unknown }
  | { type: 'multipart'; parts: readonly MultipartPart[] }
  | { type: 'raw'; data: string | Buffer; contentType?: string };

/**
 * Fields a session applies to every fetch that uses it. Explicit Task
 * fields win over these.
 */
type SessionOverrides = {
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
  query?: Record<string, QueryValue>;
  proxy?: string;
  verifyTls?: boolean;
  timeoutMs?: number;
};

type SessionRef =
  | { kind: 'none' }
  | { kind: 'inherit' }
  | { kind: 'keyed'; key: string; overrides?: Readonly<SessionOverrides> };

type CrawlContext = {
  /** Stops pulling new Tasks; in-flight ones follow the configured abort mode. */
  stop: (reason?: string) => void;
  readonly signal: AbortSignal;
};

/**
 * What an extractor hands back: Tasks to schedule and items to run through
 * the output pipes, in any mix. Plain values other than Tasks are items.
 */
type Extraction =
  | Iterable<unknown>
  | AsyncIterable<unknown>
  | void
  | Promise<void>;

type Extractor = (response: CrawlResponse, context: CrawlContext) => Extraction;

type TaskInit = {
  method?: string;
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
  query?: Record<string, QueryValue>;
  body?: TaskBody;
  /** Shorthand for `body: { type: 'form', fields }`. */
  form?: Record<string, string>;
  /** Shorthand for `body: { type: 'json', value }`. */
  json?: unknown;
  proxy?: string;
  verifyTls?: boolean;
  timeoutMs?: number;
  extractor?: Extractor;
  /**
   * `true` opens a new session, a string joins the session with that key,
   * an object opens a new session with default overrides, `false` opts out.
   * Left out, the Task joins the session of the Response that produced it.
   */
  session?: boolean | string | SessionOverrides;
  state?: unknown;
};

type TaskPatch = Partial<
  Pick<
    TaskInit,
    | 'method'
    | 'headers'
    | 'cookies'
    | 'query'
    | 'body'
    | 'proxy'
    | 'verifyTls'
    | 'timeoutMs'
    | 'extractor'
    | 'state'
  >
> & { target?: string; session?: SessionRef };

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
};
