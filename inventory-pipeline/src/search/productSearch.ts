/**
 * ══════════════════════════════════════════════════════════════════════════════
 * FILE: productSearch.ts
 * PURPOSE: Last-resort price lookup by product description
 *
 * Supplier descriptions ("POST CANDY CANES 12CT 5.29oz BEST BY 12/25") are
 * cleaned into a search query, sent to the retailer's text search, and the
 * returned items are scored by word overlap with the query. Only a clear
 * enough overlap counts as a match.
 * ══════════════════════════════════════════════════════════════════════════════
 */

import { WALMART, type RetailerProfile } from '../config/retailers.js';
import { LookupCache } from '../lookup/lookupCache.js';
import { miss, type PriceQuery, type PriceSource, type SourceOutcome } from '../lookup/types.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';
import { MinIntervalGate } from '../utils/rateLimit.js';

// ============================================================================
// Types
// ============================================================================

export interface SearchCandidate {
  itemId?: string;
  name: string;
  salePrice: number;
}

export interface ProductSearchClient {
  search(query: string, numItems: number): Promise<SearchCandidate[]>;
}

export interface SearchMatch {
  price: number;
  url: string;
}

export interface ScoredCandidate {
  candidate: SearchCandidate;
  /** share of query words found in the candidate name */
  score: number;
  /** share of candidate name words found in the query */
  precision: number;
}

export interface SearchCacheStats {
  totalSearches: number;
  matches: number;
  misses: number;
  hitRate: number;
}

export interface ProductSearchOptions {
  maxResults?: number;
  minIntervalMs?: number;
  gate?: MinIntervalGate;
  retailer?: RetailerProfile;
  cache?: LookupCache<SearchMatch>;
  logger?: Logger;
}

export const MAX_QUERY_LENGTH = 100;
export const MIN_MATCH_SCORE = 0.3;

const NO_MATCH: SearchMatch = Object.freeze({ price: 0, url: '' });

// ============================================================================
// Query cleaning
// ============================================================================

/**
 * Strip expiry markers, dates, counts and unit sizes that hurt search recall.
 */
export function cleanProductName(productName: string): string {
  if (!productName) return '';

  const cleaned = productName
    .replace(/\s+(BEST BY|BB|EXP|EXPIRES)\b.*$/i, '')
    .replace(/\s+\d{1,2}\/\d{1,2}\/\d{2,4}.*$/, '')
    .replace(/\s+\d+\s?CT\b/gi, ' ')
    .replace(/\s+\d+(?:\.\d+)?\s?(?:FL\.?\s?OZ|OZ|LBS?|KG|G|ML|L)\b/gi, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return cleaned.slice(0, MAX_QUERY_LENGTH).trim();
}

// ============================================================================
// Matching
// ============================================================================

export function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

export function scoreCandidate(query: string, candidate: SearchCandidate): ScoredCandidate {
  const queryWords = wordSet(query);
  const nameWords = wordSet(candidate.name);

  let common = 0;
  for (const word of queryWords) {
    if (nameWords.has(word)) common++;
  }

  return {
    candidate,
    score: common / Math.max(queryWords.size, 1),
    precision: common / Math.max(nameWords.size, 1),
  };
}

function outranks(a: ScoredCandidate, b: ScoredCandidate): boolean {
  if (a.score !== b.score) return a.score > b.score;
  return a.precision > b.precision;
}

/**
 * Best priced candidate whose score clears MIN_MATCH_SCORE.
 * Candidates are taken in the order the search returned them and only a
 * strictly better (score, precision) pair replaces the current best.
 */
export function pickBestCandidate(query: string, candidates: SearchCandidate[]): ScoredCandidate | null {
  let best: ScoredCandidate | null = null;

  for (const candidate of candidates) {
    if (!(candidate.salePrice > 0)) continue;

    const scored = scoreCandidate(query, candidate);
    if (scored.score <= MIN_MATCH_SCORE) continue;

    if (!best || outranks(scored, best)) {
      best = scored;
    }
  }

  return best;
}

// ============================================================================
// Fallback source
// ============================================================================

export class ProductSearchFallback implements PriceSource {
  readonly name = 'retailer-search';
  readonly kind = 'RetailerSearch' as const;
  readonly requiresUpc = false;

  private readonly maxResults: number;
  private readonly gate: MinIntervalGate;
  private readonly retailer: RetailerProfile;
  private readonly cache: LookupCache<SearchMatch>;
  private readonly log: Logger;

  constructor(private readonly client: ProductSearchClient | null, options: ProductSearchOptions = {}) {
    this.maxResults = options.maxResults ?? 5;
    this.gate = options.gate ?? new MinIntervalGate(options.minIntervalMs ?? 200);
    this.retailer = options.retailer ?? WALMART;
    this.cache = options.cache ?? new LookupCache<SearchMatch>();
    this.log = options.logger ?? createLogger('search');

    if (client) {
      this.log.debug(`${this.retailer.name} search enabled`);
    }
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  async resolve(query: PriceQuery): Promise<SourceOutcome> {
    const match = await this.searchProductPrice(query.description);
    if (match.price > 0) {
      return { status: 'priced', price: match.price, url: match.url };
    }
    return miss(this.client ? 'no qualifying search result' : 'search disabled');
  }

  async searchProductPrice(productName: string): Promise<SearchMatch> {
    if (!this.client || !productName.trim()) return NO_MATCH;

    const cleaned = cleanProductName(productName);
    if (!cleaned) return NO_MATCH;

    const cacheKey = cleaned.toLowerCase();
    const cached = this.cache.get(cacheKey);
    if (cached) {
      this.log.debug(`Using cached search result for: ${cleaned.slice(0, 30)}...`);
      return cached.status === 'hit' ? cached.value : NO_MATCH;
    }

    const candidates = await this.runSearch(this.client, cleaned);
    const best = pickBestCandidate(cleaned, candidates);

    if (!best) {
      this.log.debug(`No search match for: ${cleaned}`);
      this.cache.setMiss(cacheKey);
      return NO_MATCH;
    }

    const { itemId, salePrice } = best.candidate;
    const match: SearchMatch = Object.freeze({
      price: salePrice,
      url: itemId ? this.retailer.productUrl(itemId) : this.retailer.searchUrl(cleaned),
    });
    this.cache.setHit(cacheKey, match);
    this.log.info(
      `Found search match: $${salePrice.toFixed(2)} for '${cleaned.slice(0, 30)}...' (score: ${best.score.toFixed(2)})`
    );
    return match;
  }

  getCacheStats(): SearchCacheStats {
    const { entries, hits, misses } = this.cache.stats();
    return {
      totalSearches: entries,
      matches: hits,
      misses,
      hitRate: entries > 0 ? hits / entries : 0,
    };
  }

  private async runSearch(client: ProductSearchClient, query: string): Promise<SearchCandidate[]> {
    await this.gate.waitTurn();
    try {
      this.log.debug(`Searching ${this.retailer.name} for: ${query}`);
      return await client.search(query, this.maxResults);
    } catch (err) {
      this.log.warn(`Search failed for '${query}': ${describeError(err)}`);
      return [];
    } finally {
      this.gate.markCall();
    }
  }
}
