import http from 'node:http';
import https from 'node:https';
import axios, { type AxiosInstance, type AxiosProxyConfig } from 'axios';
import { createLogger } from '@workspace/logger';
import type { TaskBody } from '../task/types.js';
import type {
  ConnectionContext,
  FetchRequest,
  FetchResult,
  Fetcher,
  TransportFailureCode,
} from './types.js';

const log = createLogger('fetcher');

const TRANSPORT_CODES: Readonly<Record<string, TransportFailureCode>> = {
  ENOTFOUND: 'dns',
  EAI_AGAIN: 'dns',
  ECONNREFUSED: 'refused',
  EHOSTUNREACH: 'refused',
  EHOSTDOWN: 'refused',
  ENETUNREACH: 'refused',
  ENETDOWN: 'refused',
  ECONNRESET: 'reset',
  EPIPE: 'reset',
  EPROTO: 'reset',
  ERR_NETWORK: 'reset',
  ECONNABORTED: 'timeout',
  ETIMEDOUT: 'timeout',
  ERR_CANCELED: 'aborted',
  ERR_INVALID_URL: 'invalid',
  ERR_BAD_OPTION_VALUE: 'invalid',
  ERR_FR_TOO_MANY_REDIRECTS: 'invalid',
};

type AxiosFetcherOptions = {
  maxRedirects: number;
  maxSocketsPerSession: number;
};

const DEFAULT_OPTIONS: AxiosFetcherOptions = {
  maxRedirects: 10,
  maxSocketsPerSession: 6,
};

type AgentPair = { http: http.Agent; https: https.Agent };

type EncodedBody = {
  data: string | Buffer | FormData | undefined;
  contentType: string | undefined;
};

const hasCode = (value: unknown): value is { code: unknown } =>
  typeof value === 'object' && value !== null && 'code' in value;

/**
 * Maps an error thrown by axios or Node's networking to a transport failure
 * kind.
 */
export function mapTransportError(
  error: unknown,
  signal?: AbortSignal,
): { code: TransportFailureCode; message: string } {
  const message = error instanceof Error ? error.message : String(error);

  if (signal?.aborted) {
    return { code: 'aborted', message };
  }

  const candidates: unknown[] = [error];
  if (error instanceof Error) {
    candidates.push(error.cause);
  }

  for (const candidate of candidates) {
    if (hasCode(candidate) && typeof candidate.code === 'string') {
      // TLS handshake failures surface as ERR_SSL_<reason>.
      const code =
        TRANSPORT_CODES[candidate.code] ??
        (candidate.code.startsWith('ERR_SSL_') ? 'reset' : undefined);
      if (code) {
        return { code, message };
      }
    }
  }

  if (error instanceof TypeError && /invalid url/i.test(message)) {
    return { code: 'invalid', message };
  }

  return { code: 'unknown', message };
}

export function toAxiosProxy(proxy: string): AxiosProxyConfig {
  const url = new URL(proxy);
  const defaultPort = url.protocol === 'https:' ? 443 : 80;

  return {
    protocol: url.protocol.replace(/:$/, ''),
    host: url.hostname,
    port: url.port ? Number(url.port) : defaultPort,
    ...(url.username
      ? {
          auth: {
            username: decodeURIComponent(url.username),
            password: decodeURIComponent(url.password),
          },
        }
      : {}),
  };
}

export function encodeBody(body: TaskBody): EncodedBody {
  switch (body.type) {
    case 'none':
      return { data: undefined, contentType: undefined };

    case 'form':
      return {
        data: new URLSearchParams({ ...body.fields }).toString(),
        contentType: 'application/x-www-form-urlencoded',
      };

    case 'json':
      return {
        data: JSON.stringify(body.value),
        contentType: 'application/json',
      };

    case 'multipart': {
      const form = new FormData();
      for (const part of body.parts) {
        if ('value' in part) {
          form.append(part.name, part.value);
        } else {
          const blob = new Blob([new Uint8Array(part.data)], {
            type: part.contentType ?? 'application/octet-stream',
          });
          form.append(part.name, blob, part.filename);
        }
      }
      // axios sets the boundary itself.
      return { data: form, contentType: undefined };
    }

    case 'raw':
      return { data: body.data, contentType: body.contentType };
  }
}

/** Header name lookup ignoring case. */
const findHeader = (
  headers: Readonly<Record<string, string>>,
  name: string,
): string | undefined =>
  Object.keys(headers).find((key) => key.toLowerCase() === name);

export function buildHeaders(
  request: Pick<FetchRequest, 'headers' | 'cookies'>,
  contentType: string | undefined,
): Record<string, string> {
  const headers: Record<string, string> = { ...request.headers };

  const cookiePairs = Object.entries(request.cookies).map(
    ([name, value]) => `${name}=${value}`,
  );
  if (cookiePairs.length > 0) {
    const existing = findHeader(headers, 'cookie');
    const given = existing ? headers[existing] : undefined;
    headers[existing ?? 'Cookie'] = [given, ...cookiePairs]
      .filter(Boolean)
      .join('; ');
  }

  if (contentType && !findHeader(headers, 'content-type')) {
    headers['Content-Type'] = contentType;
  }

  return headers;
}

const normalizeHeaders = (
  raw: Record<string, unknown>,
): Record<string, string | string[]> => {
  const headers: Record<string, string | string[]> = {};

  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      headers[name] = value;
    } else if (Array.isArray(value)) {
      headers[name] = value.map(String);
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      headers[name] = String(value);
    }
  }

  return headers;
};

const toBuffer = (data: unknown): Buffer => {
  if (Buffer.isBuffer(data)) {
    return data;
  }

  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }

  if (typeof data === 'string') {
    return Buffer.from(data);
  }

  return Buffer.alloc(0);
};

/** Final URL after redirects, as recorded by Node's http adapter. */
const responseUrlOf = (request: unknown): string | undefined => {
  if (typeof request !== 'object' || request === null || !('res' in request)) {
    return undefined;
  }

  const { res } = request;
  if (typeof res !== 'object' || res === null || !('responseUrl' in res)) {
    return undefined;
  }

  return typeof res.responseUrl === 'string' ? res.responseUrl : undefined;
};

/**
 * HTTP fetcher on axios. Statuses are never treated as errors here; the
 * retry policy classifies them. Persistent contexts get their own
 * keep-alive agents so a session reuses its connections.
 */
export class AxiosFetcher implements Fetcher {
  private readonly client: AxiosInstance;
  private readonly options: AxiosFetcherOptions;
  private readonly agents: Map<string, AgentPair>;

  constructor(options?: Partial<AxiosFetcherOptions>, client?: AxiosInstance) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.agents = new Map();
    this.client =
      client ??
      axios.create({
        maxRedirects: this.options.maxRedirects,
        validateStatus: () => true,
        responseType: 'arraybuffer',
        // The raw body is kept; nothing is parsed here.
        transformResponse: (data: unknown) => data,
      });
  }

  async fetch(
    request: FetchRequest,
    context: ConnectionContext,
    signal?: AbortSignal,
  ): Promise<FetchResult> {
    const startTime = Date.now();
    const agents = this.agentsFor(context, request.verifyTls);

    try {
      const { data, contentType } = encodeBody(request.body);
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: buildHeaders(request, contentType),
        params: request.query,
        data,
        timeout: request.timeoutMs,
        signal,
        httpAgent: agents.http,
        httpsAgent: agents.https,
        proxy: request.proxy ? toAxiosProxy(request.proxy) : false,
      });

      return {
        ok: true,
        status: response.status,
        headers: normalizeHeaders({ ...response.headers }),
        body: toBuffer(response.data),
        url: responseUrlOf(response.request) ?? request.url,
        elapsedMs: Date.now() - startTime,
      };
    } catch (error) {
      const { code, message } = mapTransportError(error, signal);
      log.debug('Fetch failed', { url: request.url, code, message });

      return {
        ok: false,
        code,
        message,
        cause: error,
        elapsedMs: Date.now() - startTime,
      };
    } finally {
      if (!context.persistent) {
        agents.http.destroy();
        agents.https.destroy();
      }
    }
  }

  release(context: ConnectionContext): void {
    for (const verifyTls of [true, false]) {
      const key = `${context.id}:${verifyTls}`;
      const pair = this.agents.get(key);
      if (pair) {
        pair.http.destroy();
        pair.https.destroy();
        this.agents.delete(key);
      }
    }
  }

  private agentsFor(context: ConnectionContext, verifyTls: boolean): AgentPair {
    if (!context.persistent) {
      return {
        http: new http.Agent({ keepAlive: false }),
        https: new https.Agent({ keepAlive: false, rejectUnauthorized: verifyTls }),
      };
    }

    const key = `${context.id}:${verifyTls}`;
    let pair = this.agents.get(key);

    if (!pair) {
      const maxSockets = this.options.maxSocketsPerSession;
      pair = {
        http: new http.Agent({ keepAlive: true, maxSockets }),
        https: new https.Agent({
          keepAlive: true,
          maxSockets,
          rejectUnauthorized: verifyTls,
        }),
      };
      this.agents.set(key, pair);
    }

    return pair;
  }
}

export type { AxiosFetcherOptions };
