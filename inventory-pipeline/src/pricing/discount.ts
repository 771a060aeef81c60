import type { PriceCategory } from '../types/Inventory.js';

export const GOOD_PRICE_THRESHOLD = 75;
export const OKAY_PRICE_THRESHOLD = 60;

/**
 * Discount off retail: (retail - supplier) / retail * 100.
 * 0 when there is no retail price. Negative when the supplier is dearer.
 */
export function calculateDiscount(supplierPrice: number, retailPrice: number): number {
  if (retailPrice <= 0) return 0;
  return ((retailPrice - supplierPrice) / retailPrice) * 100;
}

export function roundDiscount(discount: number): number {
  const rounded = Math.round(discount * 10) / 10;
  return Object.is(rounded, -0) ? 0 : rounded;
}

export function categorizePrice(discountPercentage: number, retailPrice: number): PriceCategory {
  if (retailPrice <= 0) return 'No Price Found';
  if (discountPercentage >= GOOD_PRICE_THRESHOLD) return 'Good Price';
  if (discountPercentage >= OKAY_PRICE_THRESHOLD) return 'Okay Price';
  return 'Bad Price';
}

/**
 * Category from the exact discount; the discount itself is rounded for output.
 */
export function evaluateDeal(
  supplierPrice: number,
  retailPrice: number
): { discountPercentage: number; category: PriceCategory } {
  const discount = calculateDiscount(supplierPrice, retailPrice);
  return {
    discountPercentage: roundDiscount(discount),
    category: categorizePrice(discount, retailPrice),
  };
}
