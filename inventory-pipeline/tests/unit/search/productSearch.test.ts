import { describe, expect, it, vi } from 'vitest';
import {
  cleanProductName,
  pickBestCandidate,
  ProductSearchFallback,
  scoreCandidate,
  type SearchCandidate,
} from '../../../src/search/productSearch.js';
import { MinIntervalGate } from '../../../src/utils/rateLimit.js';
import { recordingLogger } from '../../helpers/fakes.js';

function fakeSearchClient(results: SearchCandidate[]) {
  return { search: vi.fn(async (_query: string, _numItems: number) => results) };
}

describe('cleanProductName', () => {
  it.each([
    ['WIDGET 12CT', 'WIDGET'],
    ['POST CANDY CANES 12 CT 5.29oz BEST BY 12/25', 'POST CANDY CANES'],
    ['KNORR MEXICAN CHICKEN BOUILLON 7.9oz', 'KNORR MEXICAN CHICKEN BOUILLON'],
    ['COFFEE CREAMER 32 FL OZ EXP 01/2025', 'COFFEE CREAMER'],
    ['CRACKERS 10/12/24 CLEARANCE', 'CRACKERS'],
    ['DOG FOOD 5 LB BAG', 'DOG FOOD BAG'],
    ['  SPARKLING   WATER  ', 'SPARKLING WATER'],
  ])('%s -> %s', (raw, cleaned) => {
    expect(cleanProductName(raw)).toBe(cleaned);
  });

  it('keeps words that only start like an expiry marker', () => {
    expect(cleanProductName('SMOKY BBQ SAUCE')).toBe('SMOKY BBQ SAUCE');
  });

  it('caps the query length', () => {
    const cleaned = cleanProductName('WORD '.repeat(40));
    expect(cleaned.length).toBeLessThanOrEqual(100);
    expect(cleaned.endsWith(' ')).toBe(false);
  });

  it('returns an empty query for an empty name', () => {
    expect(cleanProductName('')).toBe('');
  });
});

describe('scoreCandidate', () => {
  it('measures the share of query words present in the candidate name', () => {
    const scored = scoreCandidate('Candy Canes Peppermint', { name: 'candy canes', salePrice: 2 });
    expect(scored.score).toBeCloseTo(2 / 3);
    expect(scored.precision).toBe(1);
  });
});

describe('pickBestCandidate', () => {
  it('prefers the tighter name when query coverage ties', () => {
    const best = pickBestCandidate('A B', [
      { itemId: '1', name: 'A B C', salePrice: 5 },
      { itemId: '2', name: 'A B', salePrice: 6 },
    ]);
    expect(best?.candidate.itemId).toBe('2');
  });

  it('breaks an equal score on the share of the name the query covers', () => {
    const best = pickBestCandidate('A B', [
      { itemId: '1', name: 'A B X Y', salePrice: 5 },
      { itemId: '2', name: 'A B X', salePrice: 6 },
    ]);
    expect(best?.score).toBe(1);
    expect(best?.precision).toBeCloseTo(2 / 3);
    expect(best?.candidate.itemId).toBe('2');
  });

  it('keeps the first of identical candidates', () => {
    const best = pickBestCandidate('WIDGET', [
      { itemId: '1', name: 'Widget', salePrice: 5 },
      { itemId: '2', name: 'Widget', salePrice: 4 },
    ]);
    expect(best?.candidate.itemId).toBe('1');
  });

  it('requires a score strictly above 0.3', () => {
    const query = 'a b c d e f g h i j';
    expect(pickBestCandidate(query, [{ name: 'a b c', salePrice: 1 }])).toBeNull();
    expect(pickBestCandidate(query, [{ name: 'a b c d', salePrice: 1 }])?.score).toBe(0.4);
  });

  it('skips candidates without a price', () => {
    const best = pickBestCandidate('WIDGET', [
      { itemId: '1', name: 'Widget', salePrice: 0 },
      { itemId: '2', name: 'Widget Deluxe', salePrice: 9 },
    ]);
    expect(best?.candidate.itemId).toBe('2');
  });

  it('returns null when nothing is returned', () => {
    expect(pickBestCandidate('WIDGET', [])).toBeNull();
  });
});

describe('ProductSearchFallback', () => {
  it('prices from the best match and links its product page', async () => {
    const client = fakeSearchClient([
      { itemId: '555', name: 'Post Candy Canes', salePrice: 2.48 },
      { itemId: '556', name: 'Candy', salePrice: 1.0 },
    ]);
    const search = new ProductSearchFallback(client, { gate: new MinIntervalGate(0) });

    const match = await search.searchProductPrice('POST CANDY CANES 12CT BEST BY 12/25');

    expect(match).toEqual({ price: 2.48, url: 'https://www.walmart.com/ip/555' });
    expect(client.search).toHaveBeenCalledWith('POST CANDY CANES', 5);
  });

  it('links a search page when the match has no item id', async () => {
    const client = fakeSearchClient([{ name: 'Sparkling Water', salePrice: 4 }]);
    const search = new ProductSearchFallback(client, { gate: new MinIntervalGate(0) });

    const match = await search.searchProductPrice('SPARKLING WATER');

    expect(match.url).toBe('https://www.walmart.com/search?q=SPARKLING%20WATER');
  });

  it('searches once per cleaned query, matches and misses alike', async () => {
    const client = fakeSearchClient([{ itemId: '9', name: 'Unrelated Thing', salePrice: 3 }]);
    const search = new ProductSearchFallback(client, { gate: new MinIntervalGate(0) });

    await search.searchProductPrice('WIDGET 12CT');
    await search.searchProductPrice('widget 24CT');

    expect(client.search).toHaveBeenCalledTimes(1);
    expect(search.getCacheStats()).toEqual({ totalSearches: 1, matches: 0, misses: 1, hitRate: 0 });
  });

  it('spaces searches by the minimum interval', async () => {
    let now = 1000;
    const sleep = vi.fn(async (_ms: number) => {
      now += 150;
    });
    const client = fakeSearchClient([]);
    const search = new ProductSearchFallback(client, { gate: new MinIntervalGate(200, () => now, sleep) });

    await search.searchProductPrice('FIRST ITEM');
    now += 50;
    await search.searchProductPrice('SECOND ITEM');

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(150);
  });

  it('treats a failing search as no match', async () => {
    const logger = recordingLogger();
    const client = {
      search: vi.fn(async (_query: string, _numItems: number): Promise<SearchCandidate[]> => {
        throw new Error('503 Service Unavailable');
      }),
    };
    const search = new ProductSearchFallback(client, { gate: new MinIntervalGate(0), logger });

    expect(await search.resolve({ description: 'WIDGET' })).toEqual({
      status: 'miss',
      reason: 'no qualifying search result',
    });
    expect(logger.warn).toHaveBeenCalledWith("Search failed for 'WIDGET': 503 Service Unavailable");
  });

  it('is a no-op without a search client', async () => {
    const search = new ProductSearchFallback(null);

    expect(search.enabled).toBe(false);
    expect(await search.searchProductPrice('WIDGET')).toEqual({ price: 0, url: '' });
    expect(await search.resolve({ description: 'WIDGET' })).toEqual({ status: 'miss', reason: 'search disabled' });
  });

  it('reports a priced outcome through the source interface', async () => {
    const search = new ProductSearchFallback(fakeSearchClient([{ itemId: '7', name: 'Widget', salePrice: 10 }]), {
      gate: new MinIntervalGate(0),
    });

    expect(await search.resolve({ description: 'WIDGET' })).toEqual({
      status: 'priced',
      price: 10,
      url: 'https://www.walmart.com/ip/7',
    });
  });
});
