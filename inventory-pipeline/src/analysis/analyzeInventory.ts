/**
 * Batch analysis of a supplier inventory.
 *
 * Items are processed one at a time, in file order. A lookup failure on one
 * item only costs that item its retail price.
 */

import { evaluateDeal } from '../pricing/discount.js';
import type { PriceResolver } from '../pricing/resolvePrice.js';
import type { AnalysisResult, InventoryItem } from '../types/Inventory.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { cleanPrice, normalizeUpc } from '../utils/normalize.js';

export type ProgressCallback = (done: number, total: number, item: InventoryItem) => void;

export class InventoryAnalyzer {
  private readonly log: Logger;

  constructor(private readonly resolver: PriceResolver, logger?: Logger) {
    this.log = logger ?? createLogger('analyze');
  }

  async analyzeItem(item: InventoryItem): Promise<AnalysisResult> {
    const supplierPrice = cleanPrice(item.rawPrice);
    const upc = normalizeUpc(item.rawUpc);

    const resolved = await this.resolver.resolve(item.description, upc);
    const { discountPercentage, category } = evaluateDeal(supplierPrice, resolved.price);

    const result: AnalysisResult = {
      item,
      supplierPrice,
      resolved,
      discountPercentage,
      category,
    };
    if (upc) result.upc = upc;
    return result;
  }

  async analyzeInventory(items: InventoryItem[], onProgress?: ProgressCallback): Promise<AnalysisResult[]> {
    this.log.info(`Analyzing ${items.length} inventory items...`);

    const results: AnalysisResult[] = [];
    for (const [index, item] of items.entries()) {
      this.log.debug(`Processing item ${index + 1}/${items.length}: ${item.inventoryId}`);
      results.push(await this.analyzeItem(item));
      onProgress?.(index + 1, items.length, item);
    }
    return results;
  }
}
