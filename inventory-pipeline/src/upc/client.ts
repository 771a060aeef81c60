/**
 * UPC lookup client (UPCitemdb-compatible API)
 *
 * - One GET per unseen UPC, fixed timeout
 * - Misses (non-200, empty items, bad JSON, transport errors) are cached
 *   so a dead UPC is asked about once per run
 * - Fixed pause after every network call for the free tier's rate limit
 * - Never throws
 */

import type { UpcLookupConfig } from '../config/env.js';
import { LookupCache, type LookupCacheStats } from '../lookup/lookupCache.js';
import { defaultFetch, readJsonBody, withQuery, type FetchLike } from '../lookup/http.js';
import { isRecord, readNumber, readRecords, readString } from '../utils/json.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';
import { sleep as defaultSleep, type SleepFn } from '../utils/rateLimit.js';

export interface UpcOffer {
  merchant: string;
  domain: string;
  price: number;      // 0 when the service has no price for this offer
  link: string;
}

export interface UpcProduct {
  upc: string;
  title: string;
  brand: string;
  offers: UpcOffer[];
}

export interface UpcLookupClientOptions {
  fetchImpl?: FetchLike;
  sleep?: SleepFn;
  logger?: Logger;
  cache?: LookupCache<UpcProduct>;
}

export function parseUpcOffer(raw: Record<string, unknown>): UpcOffer {
  return {
    merchant: readString(raw, 'merchant') ?? '',
    domain: readString(raw, 'domain') ?? '',
    price: Math.max(0, readNumber(raw, 'price') ?? 0),
    link: readString(raw, 'link') ?? '',
  };
}

/**
 * First item of a lookup response, or null when there is none.
 */
export function parseUpcResponse(upc: string, body: unknown): UpcProduct | null {
  if (!isRecord(body)) return null;

  const [first] = readRecords(body, 'items');
  if (!first) return null;

  return {
    upc,
    title: readString(first, 'title') ?? '',
    brand: readString(first, 'brand') ?? '',
    offers: readRecords(first, 'offers').map(parseUpcOffer),
  };
}

export class UpcLookupClient {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;
  private readonly log: Logger;
  private readonly cache: LookupCache<UpcProduct>;
  private requestCount = 0;

  constructor(private readonly config: UpcLookupConfig, options: UpcLookupClientOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? createLogger('upc');
    this.cache = options.cache ?? new LookupCache<UpcProduct>();
  }

  async lookup(upc: string): Promise<UpcProduct | null> {
    const cached = this.cache.get(upc);
    if (cached) {
      this.log.debug(`cache ${cached.status} for UPC ${upc}`);
      return cached.status === 'hit' ? cached.value : null;
    }

    const product = await this.fetchProduct(upc);
    if (product) {
      this.cache.setHit(upc, product);
    } else {
      this.cache.setMiss(upc);
    }
    return product;
  }

  get networkRequests(): number {
    return this.requestCount;
  }

  cacheStats(): LookupCacheStats {
    return this.cache.stats();
  }

  private async fetchProduct(upc: string): Promise<UpcProduct | null> {
    this.requestCount++;
    try {
      const response = await this.fetchImpl(withQuery(this.config.baseUrl, { upc }), {
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (response.status !== 200) {
        this.log.debug(`UPC ${upc}: HTTP ${response.status}`);
        return null;
      }

      const product = parseUpcResponse(upc, await readJsonBody(response));
      if (!product) {
        this.log.debug(`UPC ${upc}: no items`);
      }
      return product;
    } catch (err) {
      this.log.warn(`UPC lookup failed for ${upc}: ${describeError(err)}`);
      return null;
    } finally {
      await this.sleep(this.config.delayMs);
    }
  }
}
