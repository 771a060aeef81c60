#!/usr/bin/env npx tsx
/**
 * ══════════════════════════════════════════════════════════════════════════════
 * FILE: analyzeInventory.ts
 * PURPOSE: Price a supplier inventory CSV against retail and categorize deals
 *
 * Usage:
 *   npx tsx src/cli/analyzeInventory.ts
 *   npx tsx src/cli/analyzeInventory.ts --input=inventory_data.csv --output=outputs/results.csv
 * ══════════════════════════════════════════════════════════════════════════════
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import * as dotenv from 'dotenv';
import { printReport, summarizeResults } from '../analysis/report.js';
import { InventoryFileMissingError, runInventoryAnalysis } from '../analysis/runAnalysis.js';
import { loadPipelineConfig } from '../config/env.js';
import { createLogger, setLogLevel } from '../utils/logger.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PACKAGE_ROOT = path.resolve(__dirname, '../..');

dotenv.config({ path: path.resolve(PACKAGE_ROOT, '.env') });

// ============================================================================
// CLI Arguments
// ============================================================================

const args = process.argv.slice(2);
const inputArg = args.find(a => a.startsWith('--input='))?.split('=')[1] || 'inventory_data.csv';
const outputArg = args.find(a => a.startsWith('--output='))?.split('=')[1] || 'inventory_analysis_results.csv';

const log = createLogger('analyzeInventory');

async function main() {
  const config = loadPipelineConfig();
  setLogLevel(config.logLevel);

  const inputPath = path.resolve(process.cwd(), inputArg);
  const outputPath = path.resolve(process.cwd(), outputArg);

  console.log('📦 Loading inventory data...');
  const { results, pipeline } = await runInventoryAnalysis({
    inputPath,
    outputPath,
    config,
    onProgress: (done, total, item) => {
      console.log(`   [${done}/${total}] ${item.inventoryId}`);
    },
  });

  printReport(summarizeResults(results));

  const upcStats = pipeline.upcClient.cacheStats();
  log.info(`UPC lookups: ${pipeline.upcClient.networkRequests} requests, ${upcStats.hits} found, ${upcStats.misses} not found`);
  if (pipeline.walmartClient) {
    const walmartStats = pipeline.walmartClient.cacheStats();
    log.info(`Walmart: ${pipeline.walmartClient.networkRequests} requests, ${walmartStats.hits} UPC items found`);
  }
  const searchStats = pipeline.search.getCacheStats();
  log.info(
    `Fuzzy search: ${searchStats.totalSearches} searches, ${searchStats.matches} matches (${(searchStats.hitRate * 100).toFixed(1)}%)`
  );

  console.log(`\n✅ Results saved to: ${outputPath}`);
}

main().catch((err) => {
  if (err instanceof InventoryFileMissingError) {
    log.error(err.message);
    process.exit(1);
  }
  console.error('[analyzeInventory] Unhandled error:', err);
  process.exit(1);
});
