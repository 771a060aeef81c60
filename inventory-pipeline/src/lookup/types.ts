import type { PriceSourceKind } from '../types/Inventory.js';

export interface PriceQuery {
  description: string;
  upc?: string;
}

export type SourceOutcome =
  | { status: 'priced'; price: number; url: string }
  /** Browsable product page without a usable price */
  | { status: 'link'; url: string }
  | { status: 'miss'; reason: string };

/**
 * One place a retail price can come from. Implementations swallow their own
 * failures and report them as `miss`.
 */
export interface PriceSource {
  readonly name: string;
  readonly kind: Exclude<PriceSourceKind, 'None'>;
  /** Skipped entirely for rows without a usable UPC */
  readonly requiresUpc: boolean;
  resolve(query: PriceQuery): Promise<SourceOutcome>;
}

export function miss(reason: string): SourceOutcome {
  return { status: 'miss', reason };
}
