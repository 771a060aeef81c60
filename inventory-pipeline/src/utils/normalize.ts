/**
 * Field normalizers for supplier spreadsheet rows.
 *
 * Both are total: malformed input collapses to a sentinel (0 / undefined)
 * instead of throwing, so one dirty row never stops a batch.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Prices
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse a supplier price like "$1,234.50" into a number.
 * Empty, missing, negative or unparseable values come back as 0.
 */
export function cleanPrice(raw: string | number | null | undefined): number {
  if (raw === null || raw === undefined) return 0;
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw > 0 ? raw : 0;
  }

  const cleaned = raw.replace(/[$,]/g, '').trim();
  if (!cleaned || !/^[+-]?(\d+\.?\d*|\.\d+)$/.test(cleaned)) return 0;

  const value = Number(cleaned);
  return Number.isFinite(value) && value > 0 ? value : 0;
}

// ─────────────────────────────────────────────────────────────────────────────
// UPC codes
// ─────────────────────────────────────────────────────────────────────────────

const MISSING_UPC_SENTINELS = new Set(['', 'nan', 'none', 'null']);

/**
 * Canonicalize a raw ITEM UPC cell.
 * Spreadsheet exports turn 83933263155 into "83933263155.0"; the float tail
 * is dropped. Anything that is not all digits afterwards is not a UPC.
 */
export function normalizeUpc(raw: string | number | null | undefined): string | undefined {
  if (raw === null || raw === undefined) return undefined;

  const trimmed = String(raw).trim();
  if (MISSING_UPC_SENTINELS.has(trimmed.toLowerCase())) return undefined;

  const withoutFloatTail = trimmed.replace(/\.0+$/, '');
  if (!/^\d+$/.test(withoutFloatTail)) return undefined;

  return withoutFloatTail;
}
