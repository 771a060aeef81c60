export { InventoryAnalyzer, type ProgressCallback } from './analysis/analyzeInventory.js';
export { InventoryFileMissingError, runInventoryAnalysis, type AnalysisRun } from './analysis/runAnalysis.js';
export { OUTPUT_COLUMNS, resultToRow, rowToInventoryItem, rowsToInventoryItems } from './analysis/inventoryCsv.js';
export { formatReport, printReport, summarizeResults, type AnalysisSummary } from './analysis/report.js';
export { analyzeBusinessLogic, verifyResultRows, type VerificationReport } from './analysis/verifyResults.js';
export { loadPipelineConfig, type PipelineConfig } from './config/env.js';
export { LookupCache, type CacheEntry } from './lookup/lookupCache.js';
export type { PriceQuery, PriceSource, SourceOutcome } from './lookup/types.js';
export { buildPricingPipeline, type PricingPipeline } from './pricing/buildResolver.js';
export { calculateDiscount, categorizePrice, evaluateDeal, roundDiscount } from './pricing/discount.js';
export { NOT_FOUND, PriceResolver } from './pricing/resolvePrice.js';
export { UpcOfferSource, WalmartItemSource } from './pricing/sources.js';
export { cleanProductName, pickBestCandidate, ProductSearchFallback } from './search/productSearch.js';
export * from './types/Inventory.js';
export { UpcLookupClient, type UpcOffer, type UpcProduct } from './upc/client.js';
export { cleanPrice, normalizeUpc } from './utils/normalize.js';
export { WalmartAuth, WalmartCredentialError } from './walmart/auth.js';
export { WalmartClient, type WalmartItem } from './walmart/client.js';
