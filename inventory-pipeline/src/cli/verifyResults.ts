#!/usr/bin/env npx tsx
/**
 * ══════════════════════════════════════════════════════════════════════════════
 * FILE: verifyResults.ts
 * PURPOSE: Check discounts and categories in an analysis results CSV
 *
 * Exits 1 when any row fails verification.
 *
 * Usage:
 *   npx tsx src/cli/verifyResults.ts
 *   npx tsx src/cli/verifyResults.ts --input=outputs/results.csv
 * ══════════════════════════════════════════════════════════════════════════════
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  analyzeBusinessLogic,
  formatIssue,
  parseResultRows,
  verifyResultRows,
  type ResultRow,
} from '../analysis/verifyResults.js';
import { readCsvSafe } from '../utils/csvSafeRead.js';

const args = process.argv.slice(2);
const inputArg = args.find(a => a.startsWith('--input='))?.split('=')[1] || 'inventory_analysis_results.csv';

function money(n: number): string {
  return `$${n.toFixed(2)}`;
}

function printRows(rows: ResultRow[], describe: (row: ResultRow) => string): void {
  for (const row of rows) {
    console.log(`      ${row.inventoryId}: ${describe(row)}`);
  }
}

function main(): boolean {
  const inputPath = path.resolve(process.cwd(), inputArg);
  if (!fs.existsSync(inputPath)) {
    console.error(`❌ Results file not found: ${inputPath}`);
    return false;
  }

  const csvRows = readCsvSafe(inputPath);

  console.log('VERIFYING PRICE CALCULATIONS AND CATEGORIZATIONS');
  console.log('='.repeat(60));

  const report = verifyResultRows(csvRows);
  console.log('VERIFICATION RESULTS:');
  console.log(`   Total items checked: ${report.total}`);
  console.log(`   Items verified correct: ${report.verified}`);
  console.log(`   Errors found: ${report.issues.length}`);

  if (report.issues.length > 0) {
    console.log('\nERRORS FOUND:');
    for (const issue of report.issues) {
      for (const line of formatIssue(issue)) console.log(line);
    }
  } else {
    console.log('\n✅ All calculations and categorizations are correct');
  }

  // ==========================================================================
  // Business logic
  // ==========================================================================

  const { rows } = parseResultRows(csvRows);
  const analysis = analyzeBusinessLogic(rows);

  console.log('\nBUSINESS LOGIC ANALYSIS:');
  console.log('='.repeat(60));
  console.log('Category Distribution:');
  for (const { category, count, share } of analysis.distribution) {
    console.log(`   ${category}: ${count} items (${(share * 100).toFixed(1)}%)`);
  }

  if (analysis.discountStats) {
    const { max, min, mean, median } = analysis.discountStats;
    console.log('\nDiscount Analysis (items with prices):');
    console.log(`   Highest discount: ${max.toFixed(1)}%`);
    console.log(`   Lowest discount: ${min.toFixed(1)}%`);
    console.log(`   Average discount: ${mean.toFixed(1)}%`);
    console.log(`   Median discount: ${median.toFixed(1)}%`);
  }

  console.log('\nPotential Issues:');
  if (analysis.suspicious.length > 0) {
    console.log(`   ⚠️  ${analysis.suspicious.length} items with supplier price < $1 but retail price > $50:`);
    printRows(analysis.suspicious, r => `${money(r.supplierPrice)} vs ${money(r.retailPrice)}`);
  }
  if (analysis.negativeMargin.length > 0) {
    console.log(`   ⚠️  ${analysis.negativeMargin.length} items where supplier price > retail price:`);
    printRows(analysis.negativeMargin, r => `Supplier ${money(r.supplierPrice)} > Retail ${money(r.retailPrice)}`);
  }
  if (analysis.extremeDiscounts.length > 0) {
    console.log(`   ℹ️  ${analysis.extremeDiscounts.length} items with >98% discount (verify these are real):`);
    printRows(
      analysis.extremeDiscounts,
      r => `${r.discountPercentage.toFixed(1)}% off (${money(r.supplierPrice)} vs ${money(r.retailPrice)})`
    );
  }
  if (analysis.suspicious.length === 0 && analysis.negativeMargin.length === 0) {
    console.log('   No obvious data issues found');
  }

  return report.issues.length === 0;
}

if (!main()) {
  process.exit(1);
}
