import { percentOf } from './money';
import type { Promotion } from './promotions';
import type { Fulfilment, OrderLine, Product } from './types';

export const DELIVERY_FEE = 2000;                  // cents
export const STUDENT_PICKUP_DISCOUNT_PERCENT = 5;

export interface PricingLine {
  product: Product;
  quantity: number;
}

export interface PricingInput {
  lines: readonly PricingLine[];
  vipPricing: boolean;
  isStudent: boolean;
  fulfilment: Fulfilment;
  promotion: Promotion | null;
}

export interface PricingResult {
  items: OrderLine[];
  subtotal: number;
  studentDiscount: number;
  promoDiscount: number;
  deliveryFee: number;
  total: number;
}

export function unitPrice(product: Product, vipPricing: boolean): number {
  return vipPricing ? product.vipPrice : product.price;
}

/**
 * Prices a set of lines. All amounts are integer cents; percentage amounts
 * are rounded to the nearest cent.
 */
export function calculatePricing(input: PricingInput): PricingResult {
  const items: OrderLine[] = input.lines.map(({ product, quantity }) => {
    const price = unitPrice(product, input.vipPricing);
    return {
      sku: product.sku,
      name: product.name,
      quantity,
      unitPrice: price,
      lineTotal: price * quantity,
    };
  });

  const subtotal = items.reduce((sum, item) => sum + item.lineTotal, 0);

  // delivery is free for students; pickup never has a fee
  const deliveryFee = input.fulfilment === 'DELIVERY' && !input.isStudent ? DELIVERY_FEE : 0;

  // student pickup keeps its discount and a promotion is not applied on top
  const studentPickup = input.fulfilment === 'PICKUP' && input.isStudent;
  const studentDiscount = studentPickup ? percentOf(subtotal, STUDENT_PICKUP_DISCOUNT_PERCENT) : 0;

  const promoDiscount = input.promotion && !studentPickup
    ? Math.min(percentOf(subtotal, input.promotion.percent), subtotal)
    : 0;

  const total = Math.max(0, subtotal - studentDiscount - promoDiscount + deliveryFee);

  return { items, subtotal, studentDiscount, promoDiscount, deliveryFee, total };
}
