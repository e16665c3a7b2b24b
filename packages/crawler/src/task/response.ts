import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Task } from './task.js';

type ResponseHeaders = Readonly<Record<string, string | string[]>>;

type CrawlResponseInit = {
  status: number;
  headers: ResponseHeaders;
  body: Buffer;
  url: string;
  elapsedMs: number;
  task: Task;
  sessionKey: string | undefined;
};

const charsetOf = (contentType: string | undefined): string => {
  const match = contentType?.match(/charset=["']?([\w-]+)/i);
  return match?.[1]?.toLowerCase() ?? 'utf-8';
};

/**
 * A successful fetch. Only produced for exchanges the retry policy let
 * through, whatever the status code.
 */
export class CrawlResponse {
  readonly status: number;
  readonly headers: ResponseHeaders;
  readonly body: Buffer;
  /** Final URL after redirects. */
  readonly url: string;
  readonly elapsedMs: number;
  readonly task: Task;
  readonly sessionKey: string | undefined;
  private decoded: string | undefined;
  private document: CheerioAPI | undefined;

  constructor(init: CrawlResponseInit) {
    this.status = init.status;
    this.headers = init.headers;
    this.body = init.body;
    this.url = init.url;
    this.elapsedMs = init.elapsedMs;
    this.task = init.task;
    this.sessionKey = init.sessionKey;
    this.decoded = undefined;
    this.document = undefined;
  }

  /** The originating Task's state, same reference. */
  get state(): unknown {
    return this.task.state;
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  header(name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(this.headers)) {
      if (key.toLowerCase() === wanted) {
        return Array.isArray(value) ? value.join(', ') : value;
      }
    }

    return undefined;
  }

  get text(): string {
    if (this.decoded === undefined) {
      this.decoded = this.decode();
    }

    return this.decoded;
  }

  json(): unknown {
    return JSON.parse(this.text);
  }

  /** Parsed document, built once per Response. */
  $(): CheerioAPI {
    if (!this.document) {
      this.document = cheerio.load(this.text);
    }

    return this.document;
  }

  /** CSS selection over the body. */
  select(selector: string) {
    return this.$()(selector);
  }

  private decode(): string {
    try {
      return new TextDecoder(charsetOf(this.header('content-type'))).decode(
        this.body,
      );
    } catch {
      return new TextDecoder('utf-8').decode(this.body);
    }
  }
}

export type { CrawlResponseInit, ResponseHeaders };
