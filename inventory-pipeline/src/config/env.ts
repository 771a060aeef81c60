/**
 * Pipeline configuration
 *
 * Everything the lookup clients need comes from environment variables
 * (loaded from inventory-pipeline/.env by the CLI entry points). Walmart is
 * optional: without a consumer id and key path the run uses UPC offers and
 * nothing else.
 */

import { parseLogLevel, type LogLevel } from '../utils/logger.js';

export interface UpcLookupConfig {
  baseUrl: string;
  timeoutMs: number;
  delayMs: number;
  userAgent: string;
}

export interface WalmartConfig {
  consumerId: string;
  privateKeyPath: string;
  keyVersion: string;
  apiBase: string;
  timeoutMs: number;
}

export interface SearchConfig {
  minIntervalMs: number;
  maxResults: number;
}

export interface PipelineConfig {
  upcLookup: UpcLookupConfig;
  walmart: WalmartConfig | null;
  search: SearchConfig;
  primaryRetailerDomain: string;
  logLevel: LogLevel;
}

export type EnvSource = Record<string, string | undefined>;

export const DEFAULT_UPC_LOOKUP_URL = 'https://api.upcitemdb.com/prod/trial/lookup';
export const DEFAULT_WALMART_API_BASE = 'https://developer.api.walmart.com/api-proxy/service/affil/product/v2';

function readInt(env: EnvSource, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`[config] ${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readText(env: EnvSource, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

export function loadPipelineConfig(env: EnvSource = process.env): PipelineConfig {
  const consumerId = readText(env, 'WALMART_CONSUMER_ID');
  const privateKeyPath = readText(env, 'WALMART_PRIVATE_KEY_PATH');

  let walmart: WalmartConfig | null = null;
  if (consumerId && privateKeyPath) {
    walmart = {
      consumerId,
      privateKeyPath,
      keyVersion: readText(env, 'WALMART_KEY_VERSION') ?? '1',
      apiBase: (readText(env, 'WALMART_API_BASE') ?? DEFAULT_WALMART_API_BASE).replace(/\/$/, ''),
      timeoutMs: readInt(env, 'WALMART_TIMEOUT_MS', 10_000),
    };
  } else if (consumerId || privateKeyPath) {
    console.warn('[config] WALMART_CONSUMER_ID and WALMART_PRIVATE_KEY_PATH must both be set; Walmart lookups disabled');
  }

  const logLevelRaw = readText(env, 'LOG_LEVEL');
  const logLevel = parseLogLevel(logLevelRaw);
  if (logLevelRaw && !logLevel) {
    throw new Error(`[config] LOG_LEVEL must be one of debug, info, warn, error, silent; got "${logLevelRaw}"`);
  }

  return {
    upcLookup: {
      baseUrl: readText(env, 'UPC_LOOKUP_URL') ?? DEFAULT_UPC_LOOKUP_URL,
      timeoutMs: readInt(env, 'UPC_LOOKUP_TIMEOUT_MS', 5_000),
      delayMs: readInt(env, 'UPC_LOOKUP_DELAY_MS', 100),
      userAgent: readText(env, 'UPC_LOOKUP_USER_AGENT') ?? 'InventoryAnalyzer/1.0',
    },
    walmart,
    search: {
      minIntervalMs: readInt(env, 'SEARCH_MIN_INTERVAL_MS', 200),
      maxResults: readInt(env, 'SEARCH_MAX_RESULTS', 5),
    },
    primaryRetailerDomain: readText(env, 'PRIMARY_RETAILER_DOMAIN') ?? 'walmart.com',
    logLevel: logLevel ?? 'info',
  };
}
