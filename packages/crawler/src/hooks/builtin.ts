import { createLogger } from '@workspace/logger';
import { withTask } from '../task/task.js';
import { drop, proceed } from './hook-chain.js';
import type { AfterFetchHook, BeforeFetchHook } from './types.js';

const log = createLogger('hooks');

const USER_AGENTS = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
];

type RandomUserAgentOptions = {
  userAgents?: readonly string[];
  random?: () => number;
};

/**
 * Sets a random User-Agent. Session-less Tasks draw a new one per fetch;
 * every Task of a session keeps the agent drawn for its first Task.
 */
export function randomUserAgent(
  options: RandomUserAgentOptions = {},
): BeforeFetchHook {
  const userAgents = options.userAgents ?? USER_AGENTS;
  const random = options.random ?? Math.random;
  const bySession = new Map<string, string>();

  const pick = (): string =>
    userAgents[Math.floor(random() * userAgents.length)] ?? USER_AGENTS[0] ?? '';

  return (task) => {
    let agent: string;

    if (task.session.kind === 'keyed') {
      agent = bySession.get(task.session.key) ?? pick();
      bySession.set(task.session.key, agent);
    } else {
      agent = pick();
    }

    const headers = Object.fromEntries(
      Object.entries(task.headers).filter(
        ([name]) => name.toLowerCase() !== 'user-agent',
      ),
    );

    return proceed(withTask(task, { headers: { ...headers, 'User-Agent': agent } }));
  };
}

/** Logs every Task right before it is fetched. */
export function logDownload(): BeforeFetchHook {
  return (task) => {
    log.info(`Downloading from ${task.target}...`);
    return proceed(task);
  };
}

/** Ignores Responses whose status is in `statuses`. */
export function dropStatuses(statuses: readonly number[]): AfterFetchHook {
  const blocked = new Set(statuses);

  return (response) =>
    blocked.has(response.status)
      ? drop(`status ${response.status}`)
      : proceed(response);
}

export { USER_AGENTS };
export type { RandomUserAgentOptions };
