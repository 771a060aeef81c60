/**
 * Supplier inventory CSV ↔ pipeline records.
 */

import type { AnalysisResult, InventoryItem } from '../types/Inventory.js';
import { getColumn, type CsvRow } from '../utils/csvSafeRead.js';

// ============================================================================
// Columns
// ============================================================================

export const INPUT_COLUMNS = {
  inventoryId: ['Inventory ID', 'inventory_id', 'InventoryID', 'Item ID', 'id'],
  description: ['Description', 'description', 'Item Description', 'Name'],
  quantity: ['Qty. Available', 'Qty Available', 'qty_available', 'Quantity', 'quantity'],
  upc: ['ITEM UPC', 'Item UPC', 'UPC', 'upc'],
  price: ['Default Price', 'default_price', 'Price', 'price'],
} as const;

export const OUTPUT_COLUMNS = [
  'Inventory ID',
  'Description',
  'Qty. Available',
  'ITEM UPC',
  'Default Price',
  'Supplier_Price',
  'Market_Comp',
  'Retail_Price',
  'Discount_Percentage',
  'Price_Category',
  'Price_Source',
] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

// ============================================================================
// Rows → items
// ============================================================================

export function rowToInventoryItem(row: CsvRow, rowIndex: number): InventoryItem {
  const upc = getColumn(row, ...INPUT_COLUMNS.upc);
  return {
    inventoryId: getColumn(row, ...INPUT_COLUMNS.inventoryId) || `row-${rowIndex + 1}`,
    description: getColumn(row, ...INPUT_COLUMNS.description),
    quantity: getColumn(row, ...INPUT_COLUMNS.quantity),
    rawUpc: upc === '' ? null : upc,
    rawPrice: getColumn(row, ...INPUT_COLUMNS.price),
  };
}

export function rowsToInventoryItems(rows: CsvRow[]): InventoryItem[] {
  return rows.map(rowToInventoryItem);
}

// ============================================================================
// Results → rows
// ============================================================================

export function resultToRow(result: AnalysisResult): Record<OutputColumn, string> {
  const { item, resolved } = result;
  return {
    'Inventory ID': item.inventoryId,
    Description: item.description,
    'Qty. Available': item.quantity,
    'ITEM UPC': item.rawUpc ?? '',
    'Default Price': item.rawPrice,
    Supplier_Price: result.supplierPrice.toFixed(2),
    Market_Comp: resolved.url,
    Retail_Price: resolved.price.toFixed(2),
    Discount_Percentage: result.discountPercentage.toFixed(1),
    Price_Category: result.category,
    Price_Source: resolved.source,
  };
}
