/**
 * Proxy Rotator
 * 
 * Chooses the egress identity for API and content requests:
 * - direct: no proxy
 * - single: one fixed proxy, never rotates
 * - pool: list of proxies, rotated circularly every `rotateEvery`
 *   requests and immediately after a rate-limit signal
 *
 * All state changes happen synchronously, so concurrent async callers
 * never observe a half-rotated index/counter pair.
 */

import type { ProxyEndpoint, ProxyMode, RotationReason } from '@mediafetch/core';
import { createLogger, safeReadFile } from '@mediafetch/utils';
import { parseProxyList, parseProxyUrl, redactProxy } from './proxyList.js';

const log = createLogger({ component: 'proxy-rotator' });

export interface ProxyRotatorOptions {
  /** Single proxy URL; takes precedence over `proxyFile` */
  proxy?: string;
  /** Path of a proxy list file (pool mode) */
  proxyFile?: string;
  rotateEvery?: number;
  /** Shuffle the pool once after loading */
  shuffle?: boolean;
  random?: () => number;
}

export class ProxyRotator {
  public readonly mode: ProxyMode;
  public readonly warnings: readonly string[];

  private readonly endpoints: ProxyEndpoint[];
  private readonly rotateEvery: number;
  private index = 0;
  private requestCount = 0;

  constructor(
    endpoints: ProxyEndpoint[] = [],
    options: { mode?: ProxyMode; rotateEvery?: number; warnings?: string[] } = {}
  ) {
    this.endpoints = [...endpoints];
    this.rotateEvery = options.rotateEvery ?? 20;
    this.warnings = options.warnings ?? [];

    if (this.endpoints.length === 0) {
      this.mode = 'direct';
    } else if (options.mode === 'single' || (this.endpoints.length === 1 && options.mode !== 'pool')) {
      this.mode = 'single';
    } else {
      this.mode = 'pool';
    }
  }

  /**
   * Build a rotator from a proxy URL or a proxy list file.
   * Bad input never throws: it is logged, kept in `warnings`, and the
   * rotator falls back to direct egress.
   */
  static async create(options: ProxyRotatorOptions = {}): Promise<ProxyRotator> {
    const rotateEvery = options.rotateEvery;

    if (options.proxy) {
      const parsed = parseProxyUrl(options.proxy);
      if (!parsed.ok) {
        log.warn({ reason: parsed.reason }, 'Ignoring invalid proxy, using direct connection');
        return new ProxyRotator([], { rotateEvery, warnings: [parsed.reason] });
      }
      return new ProxyRotator([parsed.endpoint], { mode: 'single', rotateEvery });
    }

    if (options.proxyFile) {
      const content = await safeReadFile(options.proxyFile);
      if (content === null) {
        const warning = `proxy file not found: ${options.proxyFile}`;
        log.warn({ proxyFile: options.proxyFile }, 'Proxy file not found, using direct connection');
        return new ProxyRotator([], { rotateEvery, warnings: [warning] });
      }

      const { endpoints, warnings } = parseProxyList(content);
      for (const warning of warnings) {
        log.warn({ proxyFile: options.proxyFile }, `Skipping proxy entry, ${warning}`);
      }
      if (options.shuffle ?? true) {
        shuffleInPlace(endpoints, options.random ?? Math.random);
      }
      log.info({ count: endpoints.length }, `Loaded ${endpoints.length} proxies`);
      return new ProxyRotator(endpoints, { mode: 'pool', rotateEvery, warnings });
    }

    return new ProxyRotator();
  }

  get enabled(): boolean {
    return this.endpoints.length > 0;
  }

  get hasMultiple(): boolean {
    return this.mode === 'pool' && this.endpoints.length > 1;
  }

  get size(): number {
    return this.endpoints.length;
  }

  /** Requests issued since start or the last rotation */
  get requestsSinceRotation(): number {
    return this.requestCount;
  }

  current(): ProxyEndpoint | null {
    return this.endpoints[this.index] ?? null;
  }

  /**
   * Advance to the next pool entry. Single and direct modes stay put.
   * The request counter restarts either way.
   */
  rotate(reason: RotationReason): void {
    this.requestCount = 0;
    if (this.mode !== 'pool' || this.endpoints.length === 0) {
      return;
    }

    const previous = this.index;
    this.index = (this.index + 1) % this.endpoints.length;
    const next = this.endpoints[this.index];

    log.debug(
      {
        reason,
        from: previous + 1,
        to: this.index + 1,
        of: this.endpoints.length,
        proxy: next ? redactProxy(next) : undefined,
      },
      'Rotating proxy'
    );
  }

  /**
   * Count an issued request and rotate preventively at the threshold
   */
  requestIssued(): void {
    if (this.mode !== 'pool') {
      return;
    }
    this.requestCount++;
    if (this.requestCount >= this.rotateEvery) {
      this.rotate('preventive');
    }
  }
}

function shuffleInPlace<T>(items: T[], random: () => number): void {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const a = items[i];
    const b = items[j];
    if (a !== undefined && b !== undefined) {
      items[i] = b;
      items[j] = a;
    }
  }
}
