/**
 * Retailer URL registry
 *
 * Where a resolved price points the buyer. The catalog API answers with item
 * ids; these builders turn them into browsable product pages.
 */

export interface RetailerProfile {
  name: string;
  productUrl(itemId: string): string;
  searchUrl(query: string): string;
}

export const WALMART: RetailerProfile = {
  name: 'Walmart',
  productUrl: (itemId) => `https://www.walmart.com/ip/${encodeURIComponent(itemId)}`,
  searchUrl: (query) => `https://www.walmart.com/search?q=${encodeURIComponent(query)}`,
};

/**
 * Does an offer's domain belong to the given retailer?
 * "www.walmart.com", "Walmart.com" and "grocery.walmart.com" all match "walmart.com".
 */
export function matchesRetailerDomain(offerDomain: string, retailerDomain: string): boolean {
  const normalize = (d: string) =>
    d.trim().toLowerCase().replace(/^https?:\/\//, '').replace(/\/.*$/, '').replace(/^www\./, '');

  const offer = normalize(offerDomain);
  const target = normalize(retailerDomain);
  if (!offer || !target) return false;
  return offer === target || offer.endsWith(`.${target}`);
}
