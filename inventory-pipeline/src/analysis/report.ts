/**
 * Run summary: category counts, where prices came from, best and worst deals.
 */

import { PRICE_CATEGORIES, type AnalysisResult, type PriceCategory, type PriceSourceKind } from '../types/Inventory.js';

export interface DealLine {
  inventoryId: string;
  description: string;
  supplierPrice: number;
  retailPrice: number;
  discountPercentage: number;
  category: PriceCategory;
}

export interface AnalysisSummary {
  total: number;
  byCategory: Record<PriceCategory, number>;
  bySource: Record<PriceSourceKind, number>;
  topDeals: DealLine[];
  worstDeals: DealLine[];
}

export const TOP_DEALS = 10;
export const WORST_DEALS = 5;

function toDealLine(result: AnalysisResult): DealLine {
  return {
    inventoryId: result.item.inventoryId,
    description: result.item.description,
    supplierPrice: result.supplierPrice,
    retailPrice: result.resolved.price,
    discountPercentage: result.discountPercentage,
    category: result.category,
  };
}

export function summarizeResults(results: AnalysisResult[]): AnalysisSummary {
  const byCategory: Record<PriceCategory, number> = {
    'Good Price': 0,
    'Okay Price': 0,
    'Bad Price': 0,
    'No Price Found': 0,
  };
  const bySource: Record<PriceSourceKind, number> = {
    CodeLookup: 0,
    RetailerDirect: 0,
    RetailerSearch: 0,
    None: 0,
  };

  for (const result of results) {
    byCategory[result.category]++;
    bySource[result.resolved.source]++;
  }

  // Stable sorts keep file order among equal discounts.
  const byDiscountDesc = [...results].sort((a, b) => b.discountPercentage - a.discountPercentage);
  const byDiscountAsc = [...results].sort((a, b) => a.discountPercentage - b.discountPercentage);

  return {
    total: results.length,
    byCategory,
    bySource,
    topDeals: byDiscountDesc.slice(0, TOP_DEALS).map(toDealLine),
    worstDeals: byDiscountAsc.slice(0, WORST_DEALS).map(toDealLine),
  };
}

function share(count: number, total: number): string {
  return total > 0 ? `${((count / total) * 100).toFixed(1)}%` : '0.0%';
}

const CATEGORY_LABELS: Record<PriceCategory, string> = {
  'Good Price': 'Good Price (>75% off)',
  'Okay Price': 'Okay Price (60-75% off)',
  'Bad Price': 'Bad Price (<60% off)',
  'No Price Found': 'No Price Found',
};

export function formatReport(summary: AnalysisSummary): string[] {
  const lines: string[] = [];
  lines.push('', '='.repeat(60), 'INVENTORY ANALYSIS REPORT', '='.repeat(60));
  lines.push(`Total Items Analyzed: ${summary.total}`);

  for (const category of PRICE_CATEGORIES) {
    const count = summary.byCategory[category];
    lines.push(`${CATEGORY_LABELS[category]}: ${count} (${share(count, summary.total)})`);
  }

  lines.push('', 'Price sources:');
  for (const [source, count] of Object.entries(summary.bySource)) {
    lines.push(`  ${source}: ${count}`);
  }

  lines.push('', `Top ${TOP_DEALS} Best Deals (Highest Discount %):`);
  for (const deal of summary.topDeals) {
    lines.push(`  ${deal.inventoryId}: ${deal.discountPercentage.toFixed(1)}% off - ${deal.category}`);
  }

  lines.push('', 'Worst Deals (Lowest Discount %):');
  for (const deal of summary.worstDeals) {
    lines.push(`  ${deal.inventoryId}: ${deal.discountPercentage.toFixed(1)}% off - ${deal.category}`);
  }

  return lines;
}

export function printReport(summary: AnalysisSummary): void {
  for (const line of formatReport(summary)) {
    console.log(line);
  }
}
