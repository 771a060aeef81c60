import { describe, expect, it } from 'vitest';
import { calculateDiscount, categorizePrice, evaluateDeal, roundDiscount } from '../../../src/pricing/discount.js';
import type { PriceCategory } from '../../../src/types/Inventory.js';

const GRADES: Array<[number, PriceCategory]> = [
  [75, 'Good Price'],
  [99.9, 'Good Price'],
  [74.9, 'Okay Price'],
  [60, 'Okay Price'],
  [59.9, 'Bad Price'],
  [0, 'Bad Price'],
  [-20, 'Bad Price'],
];

describe('calculateDiscount', () => {
  it('computes percentage off retail', () => {
    expect(calculateDiscount(2, 10)).toBe(80);
    expect(calculateDiscount(5, 20)).toBe(75);
  });

  it('is 0 without a retail price', () => {
    expect(calculateDiscount(2, 0)).toBe(0);
    expect(calculateDiscount(2, -1)).toBe(0);
  });

  it('goes negative when the supplier is dearer', () => {
    expect(calculateDiscount(15, 10)).toBe(-50);
  });
});

describe('roundDiscount', () => {
  it('rounds to one decimal place', () => {
    expect(roundDiscount(79.97997997997998)).toBe(80);
    expect(roundDiscount(66.66666666666667)).toBe(66.7);
  });

  it('never yields negative zero', () => {
    expect(Object.is(roundDiscount(-0.01), 0)).toBe(true);
  });
});

describe('categorizePrice', () => {
  it.each(GRADES)('%s%% off is %s', (discount, category) => {
    expect(categorizePrice(discount, 10)).toBe(category);
  });

  it('is No Price Found whenever there is no retail price', () => {
    expect(categorizePrice(0, 0)).toBe('No Price Found');
    expect(categorizePrice(90, 0)).toBe('No Price Found');
  });
});

describe('evaluateDeal', () => {
  it('categorizes from the exact discount, not the rounded one', () => {
    // 74.96% is written as 75.0 but is still short of a good price
    expect(evaluateDeal(2.504, 10)).toEqual({ discountPercentage: 75, category: 'Okay Price' });
    // 74.97%
    expect(evaluateDeal(2.5, 9.99)).toEqual({ discountPercentage: 75, category: 'Okay Price' });
  });

  it('grades an exact 75% as a good price', () => {
    expect(evaluateDeal(2.5, 10)).toEqual({ discountPercentage: 75, category: 'Good Price' });
  });

  it('reports 0% and No Price Found without a retail price', () => {
    expect(evaluateDeal(3, 0)).toEqual({ discountPercentage: 0, category: 'No Price Found' });
  });
});
