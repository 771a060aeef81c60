#!/usr/bin/env npx tsx
/**
 * ══════════════════════════════════════════════════════════════════════════════
 * FILE: probeLookups.ts
 * PURPOSE: Debug the price sources by hand
 *
 * Runs each configured source for the given UPCs and/or descriptions and
 * prints what came back. Useful for checking credentials and endpoints
 * before a full inventory run.
 *
 * Usage:
 *   npx tsx src/cli/probeLookups.ts --upc=83933263155,48001711044
 *   npx tsx src/cli/probeLookups.ts --search="KNORR MEXICAN CHICKEN BOUILLON 7.9oz"
 * ══════════════════════════════════════════════════════════════════════════════
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import * as dotenv from 'dotenv';
import { loadPipelineConfig } from '../config/env.js';
import { buildPricingPipeline } from '../pricing/buildResolver.js';
import { cleanProductName } from '../search/productSearch.js';
import { normalizeUpc } from '../utils/normalize.js';
import { setLogLevel } from '../utils/logger.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

// ============================================================================
// CLI Arguments
// ============================================================================

const args = process.argv.slice(2);
const upcArg = args.find(a => a.startsWith('--upc='))?.slice('--upc='.length) ?? '';
const searchArgs = args.filter(a => a.startsWith('--search=')).map(a => a.slice('--search='.length));

async function main() {
  const config = loadPipelineConfig();
  setLogLevel(config.logLevel === 'info' ? 'debug' : config.logLevel);

  const upcs = upcArg.split(',').map(s => s.trim()).filter(Boolean);
  if (upcs.length === 0 && searchArgs.length === 0) {
    console.log('Usage: probeLookups.ts --upc=<code>[,<code>...] [--search="<description>"]');
    return;
  }

  const pipeline = buildPricingPipeline(config);

  for (const raw of upcs) {
    console.log(`\n${'='.repeat(60)}\nUPC: ${raw}\n${'='.repeat(60)}`);
    const upc = normalizeUpc(raw);
    if (!upc) {
      console.log('   ❌ Not a usable UPC');
      continue;
    }

    const product = await pipeline.upcClient.lookup(upc);
    if (product) {
      console.log(`   UPC database: ${product.title || '(no title)'} [${product.brand || 'no brand'}]`);
      for (const offer of product.offers) {
        console.log(`      ${offer.domain || offer.merchant}: $${offer.price.toFixed(2)} ${offer.link}`);
      }
    } else {
      console.log('   UPC database: not found');
    }

    if (pipeline.walmartClient) {
      const item = await pipeline.walmartClient.lookupByUpc(upc);
      console.log(
        item
          ? `   Walmart: ${item.name} - $${item.salePrice.toFixed(2)} (item ${item.itemId ?? 'n/a'}, ${item.brandName ?? 'no brand'})`
          : '   Walmart: not found'
      );
    }

    const resolved = await pipeline.resolver.resolve(product?.title ?? '', upc);
    console.log(`   → Resolved: $${resolved.price.toFixed(2)} via ${resolved.source} ${resolved.url}`);
  }

  for (const description of searchArgs) {
    console.log(`\n${'='.repeat(60)}\nSearch: ${description}\n${'='.repeat(60)}`);
    console.log(`   Cleaned query: ${cleanProductName(description)}`);
    const match = await pipeline.search.searchProductPrice(description);
    console.log(match.price > 0 ? `   ✅ $${match.price.toFixed(2)} - ${match.url}` : '   No match found');
  }

  const stats = pipeline.search.getCacheStats();
  console.log('\nFuzzy Search Statistics:');
  console.log(`   Total searches: ${stats.totalSearches}`);
  console.log(`   Successful matches: ${stats.matches}`);
  console.log(`   Hit rate: ${(stats.hitRate * 100).toFixed(1)}%`);
}

main().catch((err) => {
  console.error('[probeLookups] Unhandled error:', err);
  process.exit(1);
});
