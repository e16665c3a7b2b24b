import { describe, it, expect, vi } from 'vitest';
import { HookChain, drop, proceed, replaceWith } from './hook-chain.js';
import { dropStatuses, logDownload, randomUserAgent } from './builtin.js';
import { createTask, withTask, type Task } from '../task/task.js';
import { CrawlResponse } from '../task/response.js';
import type { CrawlContext } from '../task/types.js';

const context: CrawlContext = {
  stop: vi.fn(),
  signal: new AbortController().signal,
};

function makeResponse(status = 200, url = 'https://example.com/a') {
  return new CrawlResponse({
    status,
    headers: {},
    body: Buffer.from(''),
    url,
    elapsedMs: 1,
    task: createTask(url),
    sessionKey: undefined,
  });
}

describe('HookChain before-fetch', () => {
  it('runs hooks in registration order and passes modified tasks along', async () => {
    const calls: string[] = [];
    const chain = new HookChain()
      .addBeforeFetch((task) => {
        calls.push('first');
        return proceed(withTask(task, { headers: { 'X-Step': '1' } }));
      })
      .addBeforeFetch((task) => {
        calls.push(`second:${task.headers['X-Step']}`);
        return proceed(task);
      });

    const result = await chain.runBeforeFetch(
      createTask('https://example.com/a'),
      context,
    );

    expect(calls).toEqual(['first', 'second:1']);
    expect(result.status).toBe('continue');
    if (result.status === 'continue') {
      expect(result.value.headers).toEqual({ 'X-Step': '1' });
    }
  });

  it('stops at the first drop and reports RequestIgnored', async () => {
    const later = vi.fn((task: Task) => proceed(task));
    const chain = new HookChain()
      .addBeforeFetch(() => drop('blocked host'))
      .addBeforeFetch(later);

    const task = createTask('https://example.com/a');
    const result = await chain.runBeforeFetch(task, context);

    expect(later).not.toHaveBeenCalled();
    expect(result.status).toBe('ignored');
    if (result.status === 'ignored') {
      expect(result.error.kind).toBe('RequestIgnored');
      expect(result.error.message).toBe(
        'Request was ignored for https://example.com/a',
      );
      expect(result.error.task).toBe(task);
      expect(result.error.response).toBeUndefined();
    }
  });

  it('turns a throwing hook into RequestIgnored with the cause', async () => {
    const failure = new Error('wrong value');
    const chain = new HookChain().addBeforeFetch(() => {
      throw failure;
    });

    const result = await chain.runBeforeFetch(
      createTask('https://example.com/a'),
      context,
    );

    expect(result.status).toBe('ignored');
    if (result.status === 'ignored') {
      expect(result.error.cause).toBe(failure);
    }
  });

  it('awaits async hooks', async () => {
    const chain = new HookChain().addBeforeFetch(async (task) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return proceed(withTask(task, { method: 'head' }));
    });

    const result = await chain.runBeforeFetch(
      createTask('https://example.com/a'),
      context,
    );

    expect(result.status === 'continue' && result.value.method).toBe('HEAD');
  });
});

describe('HookChain after-fetch', () => {
  it('passes the response through every hook', async () => {
    const seen: number[] = [];
    const chain = new HookChain()
      .addAfterFetch((response) => {
        seen.push(1);
        return proceed(response);
      })
      .addAfterFetch((response) => {
        seen.push(2);
        return proceed(response);
      });

    const response = makeResponse();
    const result = await chain.runAfterFetch(response, context);

    expect(seen).toEqual([1, 2]);
    expect(result).toEqual({ status: 'continue', value: response });
  });

  it('replaceWith stops the chain and carries the replacement', async () => {
    const later = vi.fn((response: CrawlResponse) => proceed(response));
    const replacement = createTask('https://example.com/login');
    const chain = new HookChain()
      .addAfterFetch(() => replaceWith(replacement))
      .addAfterFetch(later);

    const response = makeResponse();
    const result = await chain.runAfterFetch(response, context);

    expect(later).not.toHaveBeenCalled();
    expect(result.status).toBe('ignored');
    if (result.status === 'ignored') {
      expect(result.error.kind).toBe('ResponseIgnored');
      expect(result.error.replacement).toBe(replacement);
      expect(result.error.response).toBe(response);
    }
  });

  it('dropStatuses ignores matching responses only', async () => {
    const chain = new HookChain().addAfterFetch(dropStatuses([404]));

    const missing = await chain.runAfterFetch(makeResponse(404), context);
    const found = await chain.runAfterFetch(makeResponse(200), context);

    expect(missing.status).toBe('ignored');
    expect(found.status).toBe('continue');
  });

  it('turns a throwing hook into ResponseIgnored', async () => {
    const chain = new HookChain().addAfterFetch(() => {
      throw new Error('test raise an exception');
    });

    const result = await chain.runAfterFetch(makeResponse(), context);

    expect(result.status === 'ignored' && result.error.kind).toBe(
      'ResponseIgnored',
    );
  });
});

describe('HookChain pipes', () => {
  it('transforms items in order before collect', async () => {
    const collect = vi.fn();
    const chain = new HookChain()
      .addPipe((item) => `${String(item)}-a`)
      .addPipe((item) => `${String(item)}-b`);

    const response = makeResponse();
    const result = await chain.runPipes('item', response, collect);

    expect(result).toEqual({ status: 'collected' });
    expect(collect).toHaveBeenCalledWith('item-a-b', response);
  });

  it('drops items silently when a pipe returns null', async () => {
    const collect = vi.fn();
    const chain = new HookChain()
      .addPipe((item) => item)
      .addPipe(() => null);

    const result = await chain.runPipes('item', makeResponse(), collect);

    expect(result).toEqual({ status: 'dropped', stage: 1 });
    expect(collect).not.toHaveBeenCalled();
  });

  it('reports a throwing pipe as PipeError', async () => {
    const chain = new HookChain().addPipe(() => {
      throw new Error('num 42');
    });

    const result = await chain.runPipes('item', makeResponse(), vi.fn());

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.error.kind).toBe('PipeError');
      expect(result.error.message).toBe(
        'Error occurred when collecting results from https://example.com/a',
      );
    }
  });

  it('reports a throwing collect as PipeError', async () => {
    const chain = new HookChain();
    const result = await chain.runPipes('item', makeResponse(), () => {
      throw new Error('disk full');
    });

    expect(result.status).toBe('failed');
  });
});

describe('randomUserAgent', () => {
  it('replaces any user agent header', async () => {
    const hook = randomUserAgent({ userAgents: ['agent-a'] });
    const task = createTask('https://example.com', {
      headers: { 'user-agent': 'old', Accept: '*/*' },
    });

    const decision = await hook(task, context);

    expect(decision.action).toBe('proceed');
    if (decision.action === 'proceed') {
      expect(decision.value.headers).toEqual({
        Accept: '*/*',
        'User-Agent': 'agent-a',
      });
    }
  });

  it('keeps one agent per session', async () => {
    const draws = [0, 0.99, 0.5];
    const hook = randomUserAgent({
      userAgents: ['agent-a', 'agent-b'],
      random: () => draws.shift() ?? 0,
    });

    const first = await hook(
      createTask('https://example.com/1', { session: 'shop' }),
      context,
    );
    const second = await hook(
      createTask('https://example.com/2', { session: 'shop' }),
      context,
    );
    const loose = await hook(createTask('https://example.com/3'), context);

    const agentOf = (decision: Awaited<ReturnType<typeof hook>>) =>
      decision.action === 'proceed'
        ? decision.value.headers['User-Agent']
        : undefined;

    expect(agentOf(first)).toBe('agent-a');
    expect(agentOf(second)).toBe('agent-a');
    expect(agentOf(loose)).toBe('agent-b');
  });
});

describe('logDownload', () => {
  it('passes the task through untouched', async () => {
    const task = createTask('https://example.com/a');

    const decision = await logDownload()(task, context);

    expect(decision).toEqual({ action: 'proceed', value: task });
  });
});
