import { InvalidPromoError } from './errors';
import type { Customer, Fulfilment, Order } from './types';

export type EligibilityRule =
  | { kind: 'any' }
  | { kind: 'firstOrder' }
  | { kind: 'firstPickupOrder' }
  | { kind: 'staffOnly'; emailDomain: string }
  | { kind: 'fulfilment'; mode: Fulfilment };

export interface Promotion {
  code: string;         // upper-case
  description: string;
  percent: number;      // of the products subtotal, never the delivery fee
  rule: EligibilityRule;
}

export interface PromotionContext {
  customer: Customer;
  fulfilment: Fulfilment;
  previousOrders: readonly Order[];
}

export type PromotionCheck =
  | { ok: true; promotion: Promotion }
  | { ok: false; error: InvalidPromoError };

function emailDomain(email: string): string {
  return email.slice(email.lastIndexOf('@') + 1).toLowerCase();
}

/** Returns why the rule rejects the context, or null when it is satisfied. */
export function ruleViolation(rule: EligibilityRule, ctx: PromotionContext): string | null {
  switch (rule.kind) {
    case 'any':
      return null;
    case 'firstOrder':
      return ctx.previousOrders.length === 0 ? null : 'only valid on your first order';
    case 'firstPickupOrder':
      if (ctx.fulfilment !== 'PICKUP') return 'only valid for PICKUP orders';
      return ctx.previousOrders.some((order) => order.fulfilment === 'PICKUP')
        ? 'only valid for your first PICKUP order'
        : null;
    case 'staffOnly':
      return emailDomain(ctx.customer.email) === rule.emailDomain.toLowerCase()
        ? null
        : 'only available to staff accounts';
    case 'fulfilment':
      return ctx.fulfilment === rule.mode ? null : `only valid for ${rule.mode} orders`;
  }
}

export function describeRule(rule: EligibilityRule): string {
  switch (rule.kind) {
    case 'any':
      return 'Available on all orders';
    case 'firstOrder':
      return 'Your first order only';
    case 'firstPickupOrder':
      return 'Your first PICKUP order only (not available for delivery)';
    case 'staffOnly':
      return `Staff accounts (@${rule.emailDomain}) only`;
    case 'fulfilment':
      return `${rule.mode} orders only`;
  }
}

export class PromotionCatalog {
  private readonly byCode = new Map<string, Promotion>();

  constructor(promotions: readonly Promotion[]) {
    for (const promotion of promotions) {
      this.byCode.set(promotion.code.toUpperCase(), promotion);
    }
  }

  find(code: string): Promotion | null {
    return this.byCode.get(code.trim().toUpperCase()) ?? null;
  }

  list(): Promotion[] {
    return [...this.byCode.values()];
  }

  /**
   * Validates a code for an order. Student pickup orders already carry the
   * student discount, and the two never stack.
   */
  check(code: string, ctx: PromotionContext): PromotionCheck {
    const normalized = code.trim().toUpperCase();
    const promotion = this.find(normalized);
    if (!promotion) {
      return { ok: false, error: new InvalidPromoError(normalized, 'unknown promotion code') };
    }
    if (ctx.customer.isStudent && ctx.fulfilment === 'PICKUP') {
      return {
        ok: false,
        error: new InvalidPromoError(promotion.code, 'cannot be combined with the student pickup discount'),
      };
    }
    const violation = ruleViolation(promotion.rule, ctx);
    if (violation !== null) {
      return { ok: false, error: new InvalidPromoError(promotion.code, violation) };
    }
    return { ok: true, promotion };
  }
}

export function defaultPromotions(staffEmailDomain: string): Promotion[] {
  return [
    {
      code: 'NEWPICKUP20',
      description: '20% off products subtotal on your first pickup order',
      percent: 20,
      rule: { kind: 'firstPickupOrder' },
    },
    {
      code: 'STAFF5',
      description: '5% off products subtotal for staff',
      percent: 5,
      rule: { kind: 'staffOnly', emailDomain: staffEmailDomain },
    },
  ];
}
