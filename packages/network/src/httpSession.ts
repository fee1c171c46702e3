/**
 * HTTP Session
 * 
 * Owns the undici dispatchers used for metadata API calls, one per egress
 * identity, plus the default headers (cookies, user agent) those calls carry.
 * The headers never leave this session: content downloads use their own
 * plain requests.
 *
 * Open it once, close it on every exit path (see withSession).
 */

import { Buffer } from 'node:buffer';
import { Agent, ProxyAgent, request, type Dispatcher } from 'undici';
import { socksDispatcher } from 'fetch-socks';
import type { ProxyEndpoint } from '@mediafetch/core';
import { createLogger } from '@mediafetch/utils';
import type { ProxyRotator } from './proxyRotator.js';

const log = createLogger({ component: 'http-session' });

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface HttpResponse {
  url: string;
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

export type DispatcherFactory = (proxy: ProxyEndpoint | null, timeoutMs: number) => Dispatcher;

export interface HttpSessionOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  dispatcherFactory?: DispatcherFactory;
}

export interface GetOptions {
  query?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Dispatcher for one egress identity: plain agent, HTTP(S) forward proxy
 * or SOCKS5 proxy.
 */
export function createDispatcher(proxy: ProxyEndpoint | null, timeoutMs: number): Dispatcher {
  const timeouts = {
    connect: { timeout: timeoutMs },
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
  };

  if (!proxy) {
    return new Agent(timeouts);
  }

  if (proxy.scheme === 'socks5' || proxy.scheme === 'socks5h') {
    return socksDispatcher(
      {
        type: 5,
        host: proxy.host,
        port: proxy.port,
        userId: proxy.username,
        password: proxy.password,
      },
      { headersTimeout: timeoutMs, bodyTimeout: timeoutMs }
    );
  }

  const token = proxy.username
    ? `Basic ${Buffer.from(`${proxy.username}:${proxy.password ?? ''}`).toString('base64')}`
    : undefined;

  return new ProxyAgent({
    uri: `${proxy.scheme}://${proxy.host}:${proxy.port}`,
    token,
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
  });
}

export class HttpSession {
  private readonly dispatchers = new Map<string, Dispatcher>();
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly dispatcherFactory: DispatcherFactory;
  private state: 'idle' | 'open' | 'closed' = 'idle';

  constructor(
    private readonly proxies: ProxyRotator,
    options: HttpSessionOptions = {}
  ) {
    this.headers = {
      'user-agent': DEFAULT_USER_AGENT,
      accept: '*/*',
      'accept-language': 'en-US,en;q=0.9',
      ...options.headers,
    };
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.dispatcherFactory = options.dispatcherFactory ?? createDispatcher;
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  open(): this {
    if (this.state === 'closed') {
      throw new Error('HTTP session already closed');
    }
    this.state = 'open';
    return this;
  }

  /**
   * Dispatcher for the rotator's current proxy, created on first use
   */
  dispatcher(): Dispatcher {
    if (this.state !== 'open') {
      throw new Error('HTTP session is not open');
    }
    const proxy = this.proxies.current();
    const key = proxy?.url ?? 'direct';
    let dispatcher = this.dispatchers.get(key);
    if (!dispatcher) {
      dispatcher = this.dispatcherFactory(proxy, this.timeoutMs);
      this.dispatchers.set(key, dispatcher);
    }
    return dispatcher;
  }

  async get(url: string, options: GetOptions = {}): Promise<HttpResponse> {
    const { statusCode, headers, body } = await request(url, {
      method: 'GET',
      query: compactQuery(options.query),
      headers: { ...this.headers, ...options.headers },
      dispatcher: this.dispatcher(),
      signal: options.signal,
    });

    return {
      url,
      statusCode,
      headers,
      body: await body.text(),
    };
  }

  async close(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    const dispatchers = [...this.dispatchers.values()];
    this.dispatchers.clear();
    const results = await Promise.allSettled(dispatchers.map(d => d.close()));
    const failures = results.filter(r => r.status === 'rejected').length;
    if (failures > 0) {
      log.warn({ failures }, 'Some connections did not close cleanly');
    }
  }
}

function compactQuery(
  query: GetOptions['query']
): Record<string, string | number> | undefined {
  if (!query) {
    return undefined;
  }
  const entries = Object.entries(query).filter(
    (entry): entry is [string, string | number] => entry[1] !== undefined
  );
  return Object.fromEntries(entries);
}

/**
 * Open the session, run `fn`, close the session whatever happens
 */
export async function withSession<T>(
  session: HttpSession,
  fn: (session: HttpSession) => Promise<T>
): Promise<T> {
  session.open();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
