/**
 * Wire the lookup clients into a PriceResolver from PipelineConfig.
 *
 * Walmart credentials that fail to load disable Walmart (direct lookup and
 * text search) for the run instead of stopping it.
 */

import type { PipelineConfig } from '../config/env.js';
import { WALMART } from '../config/retailers.js';
import type { FetchLike } from '../lookup/http.js';
import type { PriceSource } from '../lookup/types.js';
import { ProductSearchFallback } from '../search/productSearch.js';
import { UpcLookupClient } from '../upc/client.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';
import { MinIntervalGate, monotonicNow, sleep as defaultSleep, type ClockFn, type SleepFn } from '../utils/rateLimit.js';
import { WalmartAuth, WalmartCredentialError } from '../walmart/auth.js';
import { WalmartClient } from '../walmart/client.js';
import { PriceResolver } from './resolvePrice.js';
import { UpcOfferSource, WalmartItemSource } from './sources.js';

export interface PipelineDeps {
  fetchImpl?: FetchLike;
  sleep?: SleepFn;
  now?: ClockFn;
  logger?: Logger;
}

export interface PricingPipeline {
  resolver: PriceResolver;
  upcClient: UpcLookupClient;
  walmartClient: WalmartClient | null;
  search: ProductSearchFallback;
}

/**
 * Load Walmart auth, or null when unconfigured or the key is unusable.
 * Anything other than a credential problem is rethrown.
 */
export function tryCreateWalmartAuth(config: PipelineConfig, log: Logger): WalmartAuth | null {
  if (!config.walmart) {
    log.info('Walmart credentials not configured; using UPC offers only');
    return null;
  }

  try {
    return new WalmartAuth(config.walmart);
  } catch (err) {
    if (err instanceof WalmartCredentialError) {
      log.warn(`Walmart API disabled for this run: ${describeError(err)}`);
      return null;
    }
    throw err;
  }
}

export function buildPricingPipeline(config: PipelineConfig, deps: PipelineDeps = {}): PricingPipeline {
  const log = deps.logger ?? createLogger('pipeline');
  const sleep = deps.sleep ?? defaultSleep;

  const upcClient = new UpcLookupClient(config.upcLookup, { fetchImpl: deps.fetchImpl, sleep });

  const auth = tryCreateWalmartAuth(config, log);
  const walmartClient =
    auth && config.walmart
      ? new WalmartClient(auth, config.walmart, { fetchImpl: deps.fetchImpl })
      : null;

  const search = new ProductSearchFallback(walmartClient, {
    maxResults: config.search.maxResults,
    gate: new MinIntervalGate(config.search.minIntervalMs, deps.now ?? monotonicNow, sleep),
    retailer: WALMART,
  });

  const sources: PriceSource[] = [new UpcOfferSource(upcClient, config.primaryRetailerDomain)];
  if (walmartClient) {
    sources.push(new WalmartItemSource(walmartClient, WALMART));
  }
  sources.push(search);

  const resolver = new PriceResolver(sources);
  log.info(`Price sources: ${resolver.sourceNames.join(' → ')}`);

  return { resolver, upcClient, walmartClient, search };
}
