import type { QueryValue, TaskBody } from '../task/types.js';
import type { CookieJar } from '../session/cookie-jar.js';

/**
 * Transport-level failure kinds. `dns`, `refused`, `reset` and `timeout`
 * are retried; `aborted`, `invalid` and `unknown` are terminal.
 */
type TransportFailureCode =
  | 'dns'
  | 'refused'
  | 'reset'
  | 'timeout'
  | 'aborted'
  | 'invalid'
  | 'unknown';

type FetchRequest = {
  method: string;
  url: string;
  headers: Readonly<Record<string, string>>;
  cookies: Readonly<Record<string, string>>;
  query: Readonly<Record<string, QueryValue>>;
  body: TaskBody;
  proxy: string | undefined;
  verifyTls: boolean;
  timeoutMs: number;
};

/**
 * Connection state a fetch runs in. Persistent contexts belong to a session
 * and live for the run; one-shot contexts are made for a single fetch.
 */
type ConnectionContext = {
  readonly id: string;
  readonly persistent: boolean;
  readonly cookies: CookieJar;
};

type FetchSuccess = {
  ok: true;
  status: number;
  headers: Record<string, string | string[]>;
  body: Buffer;
  /** Final URL after redirects. */
  url: string;
  elapsedMs: number;
};

type FetchFailure = {
  ok: false;
  code: TransportFailureCode;
  message: string;
  cause?: unknown;
  elapsedMs: number;
};

type FetchResult = FetchSuccess | FetchFailure;

/**
 * Performs one HTTP exchange. Implementations never throw for transport
 * problems; they return a `FetchFailure`.
 */
interface Fetcher {
  fetch(
    request: FetchRequest,
    context: ConnectionContext,
    signal?: AbortSignal,
  ): Promise<FetchResult>;
  /** Called once per persistent context when the run ends. */
  release?(context: ConnectionContext): Promise<void> | void;
}

export type {
  ConnectionContext,
  FetchFailure,
  FetchRequest,
  FetchResult,
  FetchSuccess,
  Fetcher,
  TransportFailureCode,
};
