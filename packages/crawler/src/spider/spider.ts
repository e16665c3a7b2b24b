import { createLogger, type Logger } from '@workspace/logger';
import type { SpiderConfigInput } from '../config/spider-config.js';
import { describeCause, type SpiderError } from '../errors/spider-error.js';
import type { Fetcher } from '../fetcher/types.js';
import { HookChain } from '../hooks/hook-chain.js';
import type { AfterFetchHook, BeforeFetchHook, PipeHook } from '../hooks/types.js';
import { Scheduler } from '../scheduler/scheduler.js';
import type {
  EntrySource,
  RunSummary,
  SpiderHandlers,
} from '../scheduler/types.js';
import { CrawlResponse } from '../task/response.js';
import type { CrawlContext, Extraction } from '../task/types.js';

type StartOptions = {
  config?: SpiderConfigInput;
  fetcher?: Fetcher;
  signal?: AbortSignal;
};

/**
 * Base class of a crawl.
 *
 * ```typescript
 * class Books extends Spider {
 *   constructor() {
 *     super();
 *     this.beforeFetch(randomUserAgent()).pipe((item) => normalize(item));
 *   }
 *
 *   entry() {
 *     return 'https://books.example/catalogue';
 *   }
 *
 *   *parse(response: CrawlResponse) {
 *     for (const link of response.select('h3 a').toArray()) {
 *       yield createTask(link.attribs.href ?? '', { extractor: (page) => this.detail(page) });
 *     }
 *   }
 * }
 *
 * await new Books().start({ config: { workers: 4 } });
 * ```
 *
 * `parse` handles every Response whose Task has no extractor of its own.
 * Whatever an extractor yields is either a Task to schedule or an item for
 * the output pipes, which end in `collect`.
 */
export abstract class Spider implements SpiderHandlers {
  readonly hooks: HookChain;
  protected readonly log: Logger;

  constructor(name?: string) {
    this.hooks = new HookChain();
    this.log = createLogger(name ?? this.constructor.name);
  }

  abstract entry(): EntrySource | Promise<EntrySource>;

  onStart(): void | Promise<void> {}

  onFinish(): void | Promise<void> {}

  onError(error: SpiderError): void | Promise<void> {
    this.log.debug('Task failed', {
      kind: error.kind,
      url: error.task.target,
      cause: describeCause(error.cause),
    });
  }

  /** Default extraction: the Response itself is the one item. */
  parse(response: CrawlResponse, _context: CrawlContext): Extraction {
    return [response];
  }

  collect(item: unknown, response: CrawlResponse): void | Promise<void> {
    if (item instanceof CrawlResponse) {
      this.log.info('Collected response', { url: item.url, status: item.status });
    } else {
      this.log.info('Collected item', { url: response.url, item });
    }
  }

  protected beforeFetch(hook: BeforeFetchHook): this {
    this.hooks.addBeforeFetch(hook);
    return this;
  }

  protected afterFetch(hook: AfterFetchHook): this {
    this.hooks.addAfterFetch(hook);
    return this;
  }

  protected pipe(hook: PipeHook): this {
    this.hooks.addPipe(hook);
    return this;
  }

  start(options: StartOptions = {}): Promise<RunSummary> {
    const scheduler = new Scheduler({
      spider: this,
      config: options.config,
      fetcher: options.fetcher,
    });

    return scheduler.run({ signal: options.signal });
  }
}

export type { StartOptions };
