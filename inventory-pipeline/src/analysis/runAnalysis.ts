/**
 * One inventory run: read the supplier CSV, price every row, write the
 * results CSV. An input with no rows still produces a results file (header
 * only); only a missing input file stops the run.
 */

import { existsSync } from 'fs';
import type { PipelineConfig } from '../config/env.js';
import { buildPricingPipeline, type PipelineDeps, type PricingPipeline } from '../pricing/buildResolver.js';
import type { AnalysisResult } from '../types/Inventory.js';
import { readCsvSafe } from '../utils/csvSafeRead.js';
import { writeCsv } from '../utils/csvWrite.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { InventoryAnalyzer, type ProgressCallback } from './analyzeInventory.js';
import { OUTPUT_COLUMNS, resultToRow, rowsToInventoryItems } from './inventoryCsv.js';

export class InventoryFileMissingError extends Error {
  constructor(readonly inputPath: string) {
    super(`Inventory file not found: ${inputPath}`);
    this.name = 'InventoryFileMissingError';
  }
}

export interface AnalysisRunOptions {
  inputPath: string;
  outputPath: string;
  config: PipelineConfig;
  deps?: PipelineDeps;
  onProgress?: ProgressCallback;
  logger?: Logger;
}

export interface AnalysisRun {
  results: AnalysisResult[];
  pipeline: PricingPipeline;
}

export async function runInventoryAnalysis(options: AnalysisRunOptions): Promise<AnalysisRun> {
  const log = options.logger ?? createLogger('run');

  if (!existsSync(options.inputPath)) {
    throw new InventoryFileMissingError(options.inputPath);
  }

  const items = rowsToInventoryItems(readCsvSafe(options.inputPath));
  if (items.length === 0) {
    log.warn(`No inventory rows read from ${options.inputPath}; writing header only`);
  }

  const pipeline = buildPricingPipeline(options.config, options.deps);
  const analyzer = new InventoryAnalyzer(pipeline.resolver);
  const results = await analyzer.analyzeInventory(items, options.onProgress);

  writeCsv(options.outputPath, OUTPUT_COLUMNS, results.map(resultToRow));
  return { results, pipeline };
}
