/**
 * Walmart affiliate catalog client
 *
 * Two signed GET endpoints:
 *   /items?upc=...                       exact item by UPC
 *   /search?query=...&numItems=...       free-text catalog search
 *
 * Failures are logged and come back as "not found" (null / []).
 */

import type { WalmartConfig } from '../config/env.js';
import { LookupCache, type LookupCacheStats } from '../lookup/lookupCache.js';
import { defaultFetch, readJsonBody, withQuery, type FetchLike } from '../lookup/http.js';
import { isRecord, readNumber, readRecords, readString } from '../utils/json.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';
import type { RequestSigner } from './auth.js';

export interface WalmartItem {
  itemId?: string;
  name: string;
  salePrice: number;   // 0 when absent
  brandName?: string;
}

export type WalmartClientConfig = Pick<WalmartConfig, 'apiBase' | 'timeoutMs'>;

export interface WalmartClientOptions {
  fetchImpl?: FetchLike;
  logger?: Logger;
  cache?: LookupCache<WalmartItem>;
}

export function parseWalmartItem(raw: Record<string, unknown>): WalmartItem {
  const item: WalmartItem = {
    name: readString(raw, 'name') ?? '',
    salePrice: Math.max(0, readNumber(raw, 'salePrice') ?? 0),
  };
  const itemId = readString(raw, 'itemId');
  if (itemId) item.itemId = itemId;
  const brandName = readString(raw, 'brandName');
  if (brandName) item.brandName = brandName;
  return item;
}

export function parseWalmartItems(body: unknown): WalmartItem[] {
  if (!isRecord(body)) return [];
  return readRecords(body, 'items').map(parseWalmartItem);
}

export class WalmartClient {
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;
  private readonly itemCache: LookupCache<WalmartItem>;
  private requestCount = 0;

  constructor(
    private readonly signer: RequestSigner,
    private readonly config: WalmartClientConfig,
    options: WalmartClientOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.log = options.logger ?? createLogger('walmart');
    this.itemCache = options.cache ?? new LookupCache<WalmartItem>();
  }

  get networkRequests(): number {
    return this.requestCount;
  }

  cacheStats(): LookupCacheStats {
    return this.itemCache.stats();
  }

  async lookupByUpc(upc: string): Promise<WalmartItem | null> {
    const cached = this.itemCache.get(upc);
    if (cached) {
      this.log.debug(`cache ${cached.status} for UPC ${upc}`);
      return cached.status === 'hit' ? cached.value : null;
    }

    const body = await this.signedGet(`${this.config.apiBase}/items`, { upc }, `UPC ${upc}`);
    const [first] = parseWalmartItems(body);

    if (first) {
      this.itemCache.setHit(upc, first);
      return first;
    }
    this.itemCache.setMiss(upc);
    return null;
  }

  async search(query: string, numItems: number): Promise<WalmartItem[]> {
    const body = await this.signedGet(
      `${this.config.apiBase}/search`,
      { query, numItems, format: 'json' },
      `search "${query}"`
    );
    return parseWalmartItems(body);
  }

  /**
   * GET with fresh signature headers. Resolves to the parsed body, or
   * undefined on any failure.
   */
  private async signedGet(
    endpoint: string,
    params: Record<string, string | number>,
    label: string
  ): Promise<unknown> {
    this.requestCount++;
    try {
      const response = await this.fetchImpl(withQuery(endpoint, params), {
        headers: this.signer.getHeaders(),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (response.status !== 200) {
        const text = await response.text();
        this.log.debug(`Walmart API error ${response.status} for ${label}: ${text.slice(0, 200)}`);
        return undefined;
      }

      return await readJsonBody(response);
    } catch (err) {
      this.log.warn(`Walmart request failed for ${label}: ${describeError(err)}`);
      return undefined;
    }
  }
}
