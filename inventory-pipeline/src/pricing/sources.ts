/**
 * UPC-keyed price sources. The description-keyed fallback lives in
 * search/productSearch.ts.
 */

import { WALMART, matchesRetailerDomain, type RetailerProfile } from '../config/retailers.js';
import { miss, type PriceQuery, type PriceSource, type SourceOutcome } from '../lookup/types.js';
import type { UpcLookupClient, UpcOffer, UpcProduct } from '../upc/client.js';
import type { WalmartClient } from '../walmart/client.js';

// ─────────────────────────────────────────────────────────────────────────────
// UPC database offers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Offer to price against: the primary retailer's priced offer, else the
 * first priced offer from anyone.
 */
export function selectPricedOffer(offers: UpcOffer[], primaryDomain: string): UpcOffer | undefined {
  return (
    offers.find(o => o.price > 0 && matchesRetailerDomain(o.domain, primaryDomain)) ??
    offers.find(o => o.price > 0)
  );
}

/**
 * Link to surface when no offer is priced, preferring the primary retailer.
 */
export function selectOfferLink(offers: UpcOffer[], primaryDomain: string): string | undefined {
  const withLink = offers.filter(o => o.link);
  const preferred = withLink.find(o => matchesRetailerDomain(o.domain, primaryDomain)) ?? withLink[0];
  return preferred?.link;
}

export function outcomeFromUpcProduct(product: UpcProduct | null, primaryDomain: string): SourceOutcome {
  if (!product) return miss('UPC not found');
  if (product.offers.length === 0) return miss('UPC record has no offers');

  const offer = selectPricedOffer(product.offers, primaryDomain);
  if (offer) {
    return { status: 'priced', price: offer.price, url: offer.link };
  }

  const link = selectOfferLink(product.offers, primaryDomain);
  return link ? { status: 'link', url: link } : miss('UPC offers have no price or link');
}

export class UpcOfferSource implements PriceSource {
  readonly name = 'upc-offers';
  readonly kind = 'CodeLookup' as const;
  readonly requiresUpc = true;

  constructor(private readonly client: UpcLookupClient, private readonly primaryDomain: string) {}

  async resolve(query: PriceQuery): Promise<SourceOutcome> {
    if (!query.upc) return miss('no UPC');
    const product = await this.client.lookup(query.upc);
    return outcomeFromUpcProduct(product, this.primaryDomain);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Walmart catalog by UPC
// ─────────────────────────────────────────────────────────────────────────────

export class WalmartItemSource implements PriceSource {
  readonly name = 'walmart-items';
  readonly kind = 'RetailerDirect' as const;
  readonly requiresUpc = true;

  constructor(private readonly client: WalmartClient, private readonly retailer: RetailerProfile = WALMART) {}

  async resolve(query: PriceQuery): Promise<SourceOutcome> {
    if (!query.upc) return miss('no UPC');

    const item = await this.client.lookupByUpc(query.upc);
    if (!item) return miss('item not found');
    if (!(item.salePrice > 0)) return miss('item has no sale price');

    const url = item.itemId ? this.retailer.productUrl(item.itemId) : this.retailer.searchUrl(query.upc);
    return { status: 'priced', price: item.salePrice, url };
  }
}
