/**
 * ══════════════════════════════════════════════════════════════════════════════
 * FILE: verifyResults.ts
 * PURPOSE: Re-check a written analysis CSV
 *
 * Recomputes every row's discount from its supplier and retail prices and
 * re-derives the category from the stored discount, then looks for rows that
 * are arithmetically fine but commercially suspicious.
 * ══════════════════════════════════════════════════════════════════════════════
 */

import { calculateDiscount, categorizePrice } from '../pricing/discount.js';
import { PRICE_CATEGORIES, type PriceCategory } from '../types/Inventory.js';
import { getColumn, type CsvRow } from '../utils/csvSafeRead.js';

// ============================================================================
// Types
// ============================================================================

export const DISCOUNT_TOLERANCE = 0.1;

export interface ResultRow {
  inventoryId: string;
  supplierPrice: number;
  retailPrice: number;
  discountPercentage: number;
  category: string;
}

export type VerificationIssue =
  | {
      kind: 'discount';
      inventoryId: string;
      expected: number;
      actual: number;
      supplierPrice: number;
      retailPrice: number;
    }
  | {
      kind: 'category';
      inventoryId: string;
      discountPercentage: number;
      expected: PriceCategory;
      actual: string;
    }
  | {
      kind: 'unparseable';
      inventoryId: string;
      column: string;
      value: string;
    };

export interface VerificationReport {
  total: number;
  verified: number;
  issues: VerificationIssue[];
}

export interface DiscountStats {
  max: number;
  min: number;
  mean: number;
  median: number;
}

export interface BusinessLogicReport {
  distribution: Array<{ category: string; count: number; share: number }>;
  discountStats: DiscountStats | null;
  /** supplier < $1 while retail > $50 */
  suspicious: ResultRow[];
  /** supplier dearer than a found retail price */
  negativeMargin: ResultRow[];
  /** > 98% off */
  extremeDiscounts: ResultRow[];
}

// ============================================================================
// Parsing
// ============================================================================

function parseNumberCell(value: string): number | undefined {
  if (value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Read one output row. Numeric cells that do not parse are reported instead
 * of being treated as zero.
 */
export function parseResultRow(row: CsvRow): ResultRow | VerificationIssue {
  const inventoryId = getColumn(row, 'Inventory ID');
  const numeric: Array<[string, number | undefined]> = [
    ['Supplier_Price', parseNumberCell(getColumn(row, 'Supplier_Price'))],
    ['Retail_Price', parseNumberCell(getColumn(row, 'Retail_Price'))],
    ['Discount_Percentage', parseNumberCell(getColumn(row, 'Discount_Percentage'))],
  ];

  const values: number[] = [];
  for (const [column, value] of numeric) {
    if (value === undefined) {
      return { kind: 'unparseable', inventoryId, column, value: getColumn(row, column) };
    }
    values.push(value);
  }

  const [supplierPrice = 0, retailPrice = 0, discountPercentage = 0] = values;
  return {
    inventoryId,
    supplierPrice,
    retailPrice,
    discountPercentage,
    category: getColumn(row, 'Price_Category'),
  };
}

function isIssue(value: ResultRow | VerificationIssue): value is VerificationIssue {
  return 'kind' in value;
}

export function parseResultRows(rows: CsvRow[]): { rows: ResultRow[]; issues: VerificationIssue[] } {
  const parsed: ResultRow[] = [];
  const issues: VerificationIssue[] = [];
  for (const row of rows) {
    const result = parseResultRow(row);
    if (isIssue(result)) issues.push(result);
    else parsed.push(result);
  }
  return { rows: parsed, issues };
}

// ============================================================================
// Verification
// ============================================================================

export function verifyResultRow(row: ResultRow): VerificationIssue | null {
  const expectedDiscount = calculateDiscount(row.supplierPrice, row.retailPrice);
  if (Math.abs(row.discountPercentage - expectedDiscount) > DISCOUNT_TOLERANCE) {
    return {
      kind: 'discount',
      inventoryId: row.inventoryId,
      expected: expectedDiscount,
      actual: row.discountPercentage,
      supplierPrice: row.supplierPrice,
      retailPrice: row.retailPrice,
    };
  }

  const expectedCategory = categorizePrice(row.discountPercentage, row.retailPrice);
  if (row.category !== expectedCategory) {
    return {
      kind: 'category',
      inventoryId: row.inventoryId,
      discountPercentage: row.discountPercentage,
      expected: expectedCategory,
      actual: row.category,
    };
  }

  return null;
}

export function verifyResultRows(csvRows: CsvRow[]): VerificationReport {
  const { rows, issues } = parseResultRows(csvRows);

  let verified = 0;
  for (const row of rows) {
    const issue = verifyResultRow(row);
    if (issue) issues.push(issue);
    else verified++;
  }

  return { total: csvRows.length, verified, issues };
}

export function formatIssue(issue: VerificationIssue): string[] {
  switch (issue.kind) {
    case 'discount':
      return [
        `ERROR ${issue.inventoryId}: Discount calculation error`,
        `   Expected: ${issue.expected.toFixed(1)}%, Got: ${issue.actual.toFixed(1)}%`,
        `   Supplier: $${issue.supplierPrice}, Retail: $${issue.retailPrice}`,
      ];
    case 'category':
      return [
        `ERROR ${issue.inventoryId}: Category error`,
        `   Discount: ${issue.discountPercentage.toFixed(1)}%, Expected: ${issue.expected}, Got: ${issue.actual}`,
      ];
    case 'unparseable':
      return [`ERROR ${issue.inventoryId}: ${issue.column} is not a number ("${issue.value}")`];
  }
}

// ============================================================================
// Business logic checks
// ============================================================================

function median(sorted: number[]): number {
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2;
}

export function computeDiscountStats(discounts: number[]): DiscountStats | null {
  if (discounts.length === 0) return null;
  const sorted = [...discounts].sort((a, b) => a - b);
  const total = sorted.reduce((sum, d) => sum + d, 0);
  return {
    max: sorted[sorted.length - 1] ?? 0,
    min: sorted[0] ?? 0,
    mean: total / sorted.length,
    median: median(sorted),
  };
}

export function analyzeBusinessLogic(rows: ResultRow[]): BusinessLogicReport {
  const counts = new Map<string, number>();
  for (const row of rows) {
    counts.set(row.category, (counts.get(row.category) ?? 0) + 1);
  }

  // Known categories first in their usual order, anything unexpected after.
  const known: readonly string[] = PRICE_CATEGORIES;
  const order = [...known, ...[...counts.keys()].filter(c => !known.includes(c))];
  const distribution = order
    .filter(category => counts.has(category))
    .map(category => {
      const count = counts.get(category) ?? 0;
      return { category, count, share: rows.length > 0 ? count / rows.length : 0 };
    });

  const priced = rows.filter(r => r.retailPrice > 0);

  return {
    distribution,
    discountStats: computeDiscountStats(priced.map(r => r.discountPercentage)),
    suspicious: rows.filter(r => r.supplierPrice < 1.0 && r.retailPrice > 50.0),
    negativeMargin: priced.filter(r => r.supplierPrice > r.retailPrice),
    extremeDiscounts: rows.filter(r => r.discountPercentage > 98.0),
  };
}
