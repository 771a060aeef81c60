/**
 * ══════════════════════════════════════════════════════════════════════════════
 * FILE: resolvePrice.ts
 * PURPOSE: Turn one inventory row into one retail comparison price
 *
 * Sources are tried in priority order (exact UPC sources before fuzzy text
 * search); the first priced answer wins. A browsable link without a price is
 * kept and returned only if nothing later produces a price.
 * ══════════════════════════════════════════════════════════════════════════════
 */

import type { PriceSource, SourceOutcome } from '../lookup/types.js';
import type { PriceSourceKind, ResolvedPrice } from '../types/Inventory.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';

export const NOT_FOUND: ResolvedPrice = Object.freeze({ price: 0, url: '', source: 'None' });

function resolved(price: number, url: string, source: PriceSourceKind): ResolvedPrice {
  return Object.freeze({ price, url, source });
}

export class PriceResolver {
  private readonly log: Logger;

  constructor(private readonly sources: readonly PriceSource[], logger?: Logger) {
    this.log = logger ?? createLogger('resolve');
  }

  get sourceNames(): string[] {
    return this.sources.map(s => s.name);
  }

  async resolve(description: string, upc?: string): Promise<ResolvedPrice> {
    if (!upc) {
      this.log.debug(`No usable UPC for "${description.slice(0, 40)}"; skipping UPC sources`);
    }

    let fallbackLink: { url: string; source: PriceSourceKind } | null = null;

    for (const source of this.sources) {
      if (source.requiresUpc && !upc) continue;

      let outcome: SourceOutcome;
      try {
        outcome = await source.resolve({ description, upc });
      } catch (err) {
        // Sources handle their own failures; this only guards a broken one.
        this.log.warn(`${source.name} threw for "${description.slice(0, 40)}": ${describeError(err)}`);
        continue;
      }

      switch (outcome.status) {
        case 'priced':
          this.log.debug(`${source.name}: $${outcome.price.toFixed(2)} for "${description.slice(0, 40)}"`);
          return resolved(outcome.price, outcome.url, source.kind);
        case 'link':
          if (!fallbackLink) fallbackLink = { url: outcome.url, source: source.kind };
          break;
        case 'miss':
          this.log.debug(`${source.name}: ${outcome.reason}`);
          break;
      }
    }

    if (fallbackLink) {
      return resolved(0, fallbackLink.url, fallbackLink.source);
    }
    return NOT_FOUND;
  }
}
