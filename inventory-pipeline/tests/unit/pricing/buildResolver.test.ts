import { rmSync } from 'fs';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { buildPricingPipeline } from '../../../src/pricing/buildResolver.js';
import { fakeFetch, jsonResponse, noSleep, recordingLogger, testConfig, writeTestKeyPair, WALMART_TEST_BASE } from '../../helpers/fakes.js';

describe('buildPricingPipeline', () => {
  let keys: ReturnType<typeof writeTestKeyPair>;

  beforeAll(() => {
    keys = writeTestKeyPair();
  });

  afterAll(() => {
    rmSync(keys.dir, { recursive: true, force: true });
  });

  it('uses UPC offers and a disabled search without Walmart credentials', () => {
    const logger = recordingLogger();
    const pipeline = buildPricingPipeline(testConfig(), { fetchImpl: fakeFetch(() => jsonResponse({})), logger });

    expect(pipeline.walmartClient).toBeNull();
    expect(pipeline.search.enabled).toBe(false);
    expect(pipeline.resolver.sourceNames).toEqual(['upc-offers', 'retailer-search']);
    expect(logger.info).toHaveBeenCalledWith('Price sources: upc-offers → retailer-search');
  });

  it('orders UPC offers, Walmart items, then search when Walmart is configured', () => {
    const pipeline = buildPricingPipeline(
      testConfig({
        walmart: {
          consumerId: 'consumer-test',
          privateKeyPath: keys.privateKeyPath,
          keyVersion: '1',
          apiBase: WALMART_TEST_BASE,
          timeoutMs: 10_000,
        },
      }),
      { fetchImpl: fakeFetch(() => jsonResponse({})), sleep: noSleep(), logger: recordingLogger() }
    );

    expect(pipeline.walmartClient).not.toBeNull();
    expect(pipeline.search.enabled).toBe(true);
    expect(pipeline.resolver.sourceNames).toEqual(['upc-offers', 'walmart-items', 'retailer-search']);
  });

  it('disables Walmart for the run when the key cannot be loaded', () => {
    const logger = recordingLogger();
    const pipeline = buildPricingPipeline(
      testConfig({
        walmart: {
          consumerId: 'consumer-test',
          privateKeyPath: path.join(keys.dir, 'missing.pem'),
          keyVersion: '1',
          apiBase: WALMART_TEST_BASE,
          timeoutMs: 10_000,
        },
      }),
      { fetchImpl: fakeFetch(() => jsonResponse({})), logger }
    );

    expect(pipeline.walmartClient).toBeNull();
    expect(pipeline.resolver.sourceNames).toEqual(['upc-offers', 'retailer-search']);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toMatch(/^Walmart API disabled for this run: WalmartCredentialError: /);
  });
});
