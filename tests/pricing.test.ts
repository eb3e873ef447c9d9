import * as fc from 'fast-check';
import { calculatePricing, DELIVERY_FEE, unitPrice, type PricingInput } from '../src/pricing';
import type { Promotion } from '../src/promotions';
import type { Fulfilment } from '../src/types';
import { makeProduct } from './helpers';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const TEN_PERCENT: Promotion = { code: 'TEN', description: '10% off', percent: 10, rule: { kind: 'any' } };

function input(overrides: Partial<PricingInput> = {}): PricingInput {
  return {
    lines: [{ product: makeProduct(), quantity: 2 }],
    vipPricing: false,
    isStudent: false,
    fulfilment: 'DELIVERY',
    promotion: null,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Line items
// ---------------------------------------------------------------------------

test('unit price follows VIP status', () => {
  const product = makeProduct({ price: 500, vipPrice: 450 });

  expect(unitPrice(product, false)).toBe(500);
  expect(unitPrice(product, true)).toBe(450);
});

test('subtotal sums every line at its unit price', () => {
  const result = calculatePricing(
    input({
      lines: [
        { product: makeProduct({ sku: 'A', price: 250, vipPrice: 200 }), quantity: 3 },
        { product: makeProduct({ sku: 'B', price: 1000, vipPrice: 900 }), quantity: 1 },
      ],
      vipPricing: true,
    }),
  );

  expect(result.items.map((item) => [item.sku, item.unitPrice, item.lineTotal])).toEqual([
    ['A', 200, 600],
    ['B', 900, 900],
  ]);
  expect(result.subtotal).toBe(1500);
});

// ---------------------------------------------------------------------------
// Fees and discounts
// ---------------------------------------------------------------------------

test('delivery fee applies to non-students only', () => {
  expect(calculatePricing(input()).deliveryFee).toBe(DELIVERY_FEE);
  expect(calculatePricing(input({ isStudent: true })).deliveryFee).toBe(0);
  expect(calculatePricing(input({ fulfilment: 'PICKUP' })).deliveryFee).toBe(0);
});

test('student discount needs both a student and pickup', () => {
  expect(calculatePricing(input({ isStudent: true, fulfilment: 'PICKUP' })).studentDiscount).toBe(200);
  expect(calculatePricing(input({ isStudent: true, fulfilment: 'DELIVERY' })).studentDiscount).toBe(0);
  expect(calculatePricing(input({ isStudent: false, fulfilment: 'PICKUP' })).studentDiscount).toBe(0);
});

test('student pickup keeps the student discount and ignores a promotion', () => {
  const result = calculatePricing(input({ isStudent: true, fulfilment: 'PICKUP', promotion: TEN_PERCENT }));

  expect(result.studentDiscount).toBe(200);
  expect(result.promoDiscount).toBe(0);
  expect(result.total).toBe(3798);
});

test('a student delivery order still takes the promotion', () => {
  const result = calculatePricing(input({ isStudent: true, fulfilment: 'DELIVERY', promotion: TEN_PERCENT }));

  expect(result.studentDiscount).toBe(0);
  expect(result.promoDiscount).toBe(400); // 10% of 3998 = 399.8
  expect(result.total).toBe(3598);
});

test('promotion discount never touches the delivery fee', () => {
  const result = calculatePricing(input({ promotion: TEN_PERCENT }));

  expect(result.promoDiscount).toBe(400);
  expect(result.total).toBe(3998 - 400 + 2000);
});

test('percentages round half up to the cent', () => {
  // 5% of 1010 = 50.5
  const result = calculatePricing(
    input({ lines: [{ product: makeProduct({ price: 1010, vipPrice: 1010 }), quantity: 1 }], isStudent: true, fulfilment: 'PICKUP' }),
  );

  expect(result.studentDiscount).toBe(51);
  expect(result.total).toBe(959);
});

test('total is floored at zero and discounts are capped at the subtotal', () => {
  const everything: Promotion = { ...TEN_PERCENT, percent: 150 };
  const result = calculatePricing(input({ fulfilment: 'PICKUP', promotion: everything }));

  expect(result.promoDiscount).toBe(3998);
  expect(result.total).toBe(0);
});

test('empty lines price to zero', () => {
  const result = calculatePricing(input({ lines: [], fulfilment: 'PICKUP' }));

  expect(result).toEqual({ items: [], subtotal: 0, studentDiscount: 0, promoDiscount: 0, deliveryFee: 0, total: 0 });
});

// ---------------------------------------------------------------------------
// Property: totals reconcile for any basket
// ---------------------------------------------------------------------------

test('total always equals subtotal less discounts plus fee, never negative', () => {
  const line = fc
    .record({
      price: fc.integer({ min: 1, max: 50000 }),
      discount: fc.integer({ min: 0, max: 100 }),
      quantity: fc.integer({ min: 1, max: 10 }),
    })
    .map(({ price, discount, quantity }) => ({
      product: makeProduct({ price, vipPrice: Math.max(1, price - discount) }),
      quantity,
    }));
  const promotion = fc.option(
    fc.integer({ min: 1, max: 100 }).map((percent): Promotion => ({ ...TEN_PERCENT, percent })),
  );

  fc.assert(
    fc.property(
      fc.array(line, { maxLength: 5 }),
      fc.boolean(),
      fc.boolean(),
      fc.constantFrom<Fulfilment>('DELIVERY', 'PICKUP'),
      promotion,
      (lines, vipPricing, isStudent, fulfilment, promo) => {
        const result = calculatePricing({ lines, vipPricing, isStudent, fulfilment, promotion: promo });

        expect(result.total).toBeGreaterThanOrEqual(0);
        expect(result.total).toBe(
          Math.max(0, result.subtotal - result.studentDiscount - result.promoDiscount + result.deliveryFee),
        );
        expect(result.studentDiscount > 0 && result.promoDiscount > 0).toBe(false);
      },
    ),
  );
});
