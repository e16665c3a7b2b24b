import type { ConnectionContext } from '../fetcher/types.js';
import type { SessionOverrides } from '../task/types.js';
import { CookieJar } from './cookie-jar.js';

type SessionInfo = {
  key: string;
  usageCount: number;
  createdAt: number;
  lastUsedAt: number;
};

/**
 * Persistent connection state shared by every Task with the same session
 * key. Lives until the run ends.
 */
export class Session {
  readonly key: string;
  readonly overrides: Readonly<SessionOverrides>;
  readonly cookies: CookieJar;
  readonly context: ConnectionContext;
  private usageCount: number;
  private readonly createdAt: number;
  private lastUsedAt: number;

  constructor(key: string, overrides?: Readonly<SessionOverrides>) {
    this.key = key;
    this.overrides = { ...overrides };
    this.cookies = new CookieJar();
    this.context = { id: key, persistent: true, cookies: this.cookies };
    this.usageCount = 0;
    this.createdAt = Date.now();
    this.lastUsedAt = this.createdAt;
  }

  markUsed(): void {
    this.usageCount += 1;
    this.lastUsedAt = Date.now();
  }

  get info(): SessionInfo {
    return {
      key: this.key,
      usageCount: this.usageCount,
      createdAt: this.createdAt,
      lastUsedAt: this.lastUsedAt,
    };
  }
}

export type { SessionInfo };
