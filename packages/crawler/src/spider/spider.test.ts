import { describe, it, expect, vi } from 'vitest';
import { Spider } from './spider.js';
import { FakeFetcher } from '../testing/fake-fetcher.js';
import { dropStatuses, randomUserAgent } from '../hooks/builtin.js';

class CatalogueSpider extends Spider {
  constructor() {
    super();
    this.beforeFetch(randomUserAgent({ userAgents: ['agent-test'] })).afterFetch(
      dropStatuses([410]),
    );
  }

  entry() {
    return ['https://example.com/catalogue', 'https://example.com/gone'];
  }
}

describe('Spider', () => {
  it('registers hooks through the builder', () => {
    expect(new CatalogueSpider().hooks.size).toEqual({
      beforeFetch: 1,
      afterFetch: 1,
      pipes: 0,
    });
  });

  it('collects each response by default', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/catalogue': { body: '<h1>Catalogue</h1>' },
      'https://example.com/gone': { status: 410 },
    });
    const spider = new CatalogueSpider();
    const collect = vi.spyOn(spider, 'collect');

    const summary = await spider.start({
      fetcher,
      config: { workers: 1, handleSignals: false },
    });

    expect(collect).toHaveBeenCalledTimes(1);
    expect(summary.itemsCollected).toBe(1);
    expect(summary.errors).toEqual({ ResponseIgnored: 1 });
    expect(fetcher.calls[0]?.request.headers).toEqual({ 'User-Agent': 'agent-test' });
  });

  it('removes its signal listeners after the run', async () => {
    const before = process.listenerCount('SIGINT');
    const spider = new CatalogueSpider();

    await spider.start({ fetcher: new FakeFetcher(), config: { workers: 1 } });

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
