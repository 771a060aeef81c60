import { describe, expect, it, vi } from 'vitest';
import type { PriceQuery, PriceSource, SourceOutcome } from '../../../src/lookup/types.js';
import { NOT_FOUND, PriceResolver } from '../../../src/pricing/resolvePrice.js';
import { recordingLogger } from '../../helpers/fakes.js';

function stubSource(
  name: string,
  kind: PriceSource['kind'],
  requiresUpc: boolean,
  outcome: SourceOutcome | (() => Promise<SourceOutcome>)
) {
  return {
    name,
    kind,
    requiresUpc,
    resolve: vi.fn(async (_query: PriceQuery) => (typeof outcome === 'function' ? outcome() : outcome)),
  } satisfies PriceSource;
}

const MISS: SourceOutcome = { status: 'miss', reason: 'nothing' };

describe('PriceResolver', () => {
  it('returns the first priced answer and stops asking', async () => {
    const upc = stubSource('upc', 'CodeLookup', true, { status: 'priced', price: 9.99, url: 'https://a.example/1' });
    const search = stubSource('search', 'RetailerSearch', false, { status: 'priced', price: 5, url: 'https://b.example/2' });

    const result = await new PriceResolver([upc, search]).resolve('WIDGET', '0001');

    expect(result).toEqual({ price: 9.99, url: 'https://a.example/1', source: 'CodeLookup' });
    expect(search.resolve).not.toHaveBeenCalled();
  });

  it('passes description and UPC to each source', async () => {
    const upc = stubSource('upc', 'CodeLookup', true, MISS);
    await new PriceResolver([upc]).resolve('WIDGET', '0001');

    expect(upc.resolve).toHaveBeenCalledWith({ description: 'WIDGET', upc: '0001' });
  });

  it('skips UPC sources for rows without a UPC', async () => {
    const upc = stubSource('upc', 'CodeLookup', true, MISS);
    const direct = stubSource('direct', 'RetailerDirect', true, MISS);
    const search = stubSource('search', 'RetailerSearch', false, { status: 'priced', price: 4, url: 'https://b.example/4' });

    const result = await new PriceResolver([upc, direct, search]).resolve('WIDGET');

    expect(upc.resolve).not.toHaveBeenCalled();
    expect(direct.resolve).not.toHaveBeenCalled();
    expect(result.source).toBe('RetailerSearch');
  });

  it('falls through a miss to the next source', async () => {
    const upc = stubSource('upc', 'CodeLookup', true, MISS);
    const direct = stubSource('direct', 'RetailerDirect', true, { status: 'priced', price: 3.5, url: 'https://w.example/42' });

    expect(await new PriceResolver([upc, direct]).resolve('WIDGET', '0001')).toEqual({
      price: 3.5,
      url: 'https://w.example/42',
      source: 'RetailerDirect',
    });
  });

  it('keeps an unpriced link when nothing later finds a price', async () => {
    const upc = stubSource('upc', 'CodeLookup', true, { status: 'link', url: 'https://a.example/link' });
    const search = stubSource('search', 'RetailerSearch', false, MISS);

    const result = await new PriceResolver([upc, search]).resolve('WIDGET', '0001');

    expect(search.resolve).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ price: 0, url: 'https://a.example/link', source: 'CodeLookup' });
  });

  it('lets a later price beat an earlier link', async () => {
    const upc = stubSource('upc', 'CodeLookup', true, { status: 'link', url: 'https://a.example/link' });
    const search = stubSource('search', 'RetailerSearch', false, { status: 'priced', price: 6, url: 'https://b.example/6' });

    expect(await new PriceResolver([upc, search]).resolve('WIDGET', '0001')).toEqual({
      price: 6,
      url: 'https://b.example/6',
      source: 'RetailerSearch',
    });
  });

  it('moves past a source that throws', async () => {
    const logger = recordingLogger();
    const broken = stubSource('broken', 'CodeLookup', false, async () => {
      throw new Error('boom');
    });
    const search = stubSource('search', 'RetailerSearch', false, { status: 'priced', price: 2, url: 'https://b.example/2' });

    const result = await new PriceResolver([broken, search], logger).resolve('WIDGET');

    expect(result.price).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith('broken threw for "WIDGET": boom');
  });

  it('returns the not-found sentinel when every source misses', async () => {
    const result = await new PriceResolver([stubSource('search', 'RetailerSearch', false, MISS)]).resolve('WIDGET');

    expect(result).toBe(NOT_FOUND);
    expect(result).toEqual({ price: 0, url: '', source: 'None' });
  });

  it('hands back frozen results', async () => {
    const upc = stubSource('upc', 'CodeLookup', true, { status: 'priced', price: 1, url: '' });
    const result = await new PriceResolver([upc]).resolve('WIDGET', '0001');

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(NOT_FOUND)).toBe(true);
  });

  it('lists source names in priority order', () => {
    const resolver = new PriceResolver([
      stubSource('upc-offers', 'CodeLookup', true, MISS),
      stubSource('retailer-search', 'RetailerSearch', false, MISS),
    ]);
    expect(resolver.sourceNames).toEqual(['upc-offers', 'retailer-search']);
  });
});
