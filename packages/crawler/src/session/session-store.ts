import { createLogger } from '@workspace/logger';
import type { ConnectionContext, FetchRequest, Fetcher } from '../fetcher/types.js';
import type { Task } from '../task/task.js';
import type { SessionOverrides } from '../task/types.js';
import { CookieJar } from './cookie-jar.js';
import { Session } from './session.js';

const log = createLogger('session');

type ResolvedSession = {
  context: ConnectionContext;
  session: Session | undefined;
};

type RequestDefaults = {
  headers: Readonly<Record<string, string>>;
  timeoutMs: number;
};

/**
 * Merges header layers, later layers winning. Names are compared
 * case-insensitively and the winning layer's spelling is kept.
 */
export function mergeHeaders(
  ...layers: ReadonlyArray<Readonly<Record<string, string>> | undefined>
): Record<string, string> {
  const merged = new Map<string, [string, string]>();

  for (const layer of layers) {
    for (const [name, value] of Object.entries(layer ?? {})) {
      merged.set(name.toLowerCase(), [name, value]);
    }
  }

  return Object.fromEntries(merged.values());
}

/**
 * Layers config defaults, session overrides and the Task's own fields into
 * one request. Explicit Task fields always win.
 */
export function buildFetchRequest(
  task: Task,
  resolved: ResolvedSession,
  defaults: RequestDefaults,
): FetchRequest {
  const overrides: Readonly<SessionOverrides> = resolved.session?.overrides ?? {};

  return {
    method: task.method,
    url: task.target,
    headers: mergeHeaders(defaults.headers, overrides.headers, task.headers),
    cookies: {
      ...resolved.context.cookies.cookiesFor(task.target),
      ...overrides.cookies,
      ...task.cookies,
    },
    query: { ...overrides.query, ...task.query },
    body: task.body,
    proxy: task.proxy ?? overrides.proxy,
    verifyTls: task.verifyTls ?? overrides.verifyTls ?? true,
    timeoutMs: task.timeoutMs ?? overrides.timeoutMs ?? defaults.timeoutMs,
  };
}

export class SessionStore {
  private readonly sessions: Map<string, Session>;
  private oneShotCount: number;

  constructor() {
    this.sessions = new Map();
    this.oneShotCount = 0;
  }

  /**
   * Keyed Tasks share one Session, created on first use. Other Tasks get a
   * fresh one-shot context.
   */
  resolve(task: Task): ResolvedSession {
    if (task.session.kind !== 'keyed') {
      this.oneShotCount += 1;
      return {
        context: {
          id: `one-shot-${this.oneShotCount}`,
          persistent: false,
          cookies: new CookieJar(),
        },
        session: undefined,
      };
    }

    const { key, overrides } = task.session;
    let session = this.sessions.get(key);

    if (!session) {
      session = new Session(key, overrides);
      this.sessions.set(key, session);
      log.debug('Session opened', { session: key });
    }

    session.markUsed();
    return { context: session.context, session };
  }

  get(key: string): Session | undefined {
    return this.sessions.get(key);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Closes every persistent context. Failures are logged, not thrown. */
  async release(fetcher: Fetcher): Promise<void> {
    const sessions = [...this.sessions.values()];
    this.sessions.clear();

    for (const session of sessions) {
      try {
        await fetcher.release?.(session.context);
      } catch (error) {
        log.warn('Failed to release session', {
          session: session.key,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

export type { RequestDefaults, ResolvedSession };
