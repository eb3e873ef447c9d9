import { randomUUID } from 'crypto';
import {
  EmptyCartError,
  InsufficientFundsError,
  InvalidAddressError,
  OutOfStockError,
  ShopError,
  UnknownProductError,
  UnknownStoreError,
  getErrorMessage,
  type InvalidPromoError,
} from './errors';
import { log } from './log';
import { isVipActive } from './membership';
import { calculatePricing, type PricingLine, type PricingResult } from './pricing';
import type { Promotion, PromotionCatalog } from './promotions';
import type { AppendLog, Store } from './repository';
import { loadCustomer, today, type Session } from './session';
import type { CheckoutRequest, Customer, Order, PickupStore, Product, User } from './types';

export interface CheckoutDeps {
  products: Store<Product>;
  users: Store<User>;
  orders: AppendLog<Order>;
  pickupStores: Pick<Store<PickupStore>, 'findByKey'>;
  promotions: PromotionCatalog;
  newOrderId?: (() => string) | undefined;
}

export interface Quote {
  request: CheckoutRequest;
  customer: Customer;
  lines: PricingLine[];
  vipPricing: boolean;
  pricing: PricingResult;
  /** Code whose discount is included in the pricing, if any. */
  promoCode: string | null;
  /** Why a requested code was not applied; checkout continues without it. */
  promoRejection: InvalidPromoError | null;
}

function defaultOrderId(): string {
  return `ORD-${randomUUID().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}

/**
 * Prices the session's cart and commits orders against the stores.
 *
 * {@link CheckoutEngine.quote} validates and prices without side effects.
 * {@link CheckoutEngine.confirm} repeats the same checks against live records
 * and then applies every mutation or none.
 */
export class CheckoutEngine {
  constructor(private readonly deps: CheckoutDeps) {}

  async quote(session: Session, request: CheckoutRequest): Promise<Quote> {
    // 1. Who is buying, with up-to-date funds and membership
    const customer = await loadCustomer(session, this.deps.users);

    // 2. Cart and fulfilment details
    const cartLines = session.cart.list();
    if (cartLines.length === 0) {
      throw new EmptyCartError();
    }
    if (request.fulfilment === 'DELIVERY' && !request.deliveryAddress?.trim()) {
      throw new InvalidAddressError();
    }
    const storeId = request.fulfilment === 'PICKUP' ? request.storeId?.trim().toUpperCase() : undefined;
    if (storeId && !(await this.deps.pickupStores.findByKey(storeId))) {
      throw new UnknownStoreError(storeId);
    }

    // 3. Live products and stock
    const lines: PricingLine[] = [];
    for (const line of cartLines) {
      const product = await this.deps.products.findByKey(line.sku);
      if (!product) {
        throw new UnknownProductError(line.sku);
      }
      if (line.quantity > product.stock) {
        throw new OutOfStockError(line.sku, line.quantity, product.stock);
      }
      lines.push({ product, quantity: line.quantity });
    }

    // 4. Promotion, reported rather than thrown when it does not apply
    let promoRejection: InvalidPromoError | null = null;
    let promotion: Promotion | null = null;
    const code = request.promoCode?.trim();
    if (code) {
      const previousOrders = (await this.deps.orders.loadAll()).filter((o) => o.email === customer.email);
      const check = this.deps.promotions.check(code, {
        customer,
        fulfilment: request.fulfilment,
        previousOrders,
      });
      if (check.ok) {
        promotion = check.promotion;
      } else {
        promoRejection = check.error;
        log({ level: 'warn', action: 'promo.rejected', email: customer.email, promoCode: check.error.promoCode, reason: check.error.reason });
      }
    }

    // 5. Price
    const vipPricing = isVipActive(customer, today(session));
    const pricing = calculatePricing({
      lines,
      vipPricing,
      isStudent: customer.isStudent,
      fulfilment: request.fulfilment,
      promotion,
    });

    // 6. Funds, no partial payment
    if (customer.funds < pricing.total) {
      throw new InsufficientFundsError(pricing.total, customer.funds);
    }

    log({ level: 'info', action: 'checkout.quote', email: customer.email, total: pricing.total });

    return {
      request: { ...request, storeId },
      customer,
      lines,
      vipPricing,
      pricing,
      promoCode: promotion?.code ?? null,
      promoRejection,
    };
  }

  /**
   * Places the order: stock decremented, funds debited, order appended, cart
   * cleared. On any failure nothing changes and the cart is kept.
   */
  async confirm(session: Session, request: CheckoutRequest): Promise<Order> {
    const start = Date.now();
    const email = session.user.email;

    try {
      const quote = await this.quote(session, request);
      const order = await this.commit(session, quote);
      session.cart.clear();
      log({ level: 'info', action: 'checkout.complete', email, orderId: order.orderId, total: order.total, durationMs: Date.now() - start });
      return order;
    } catch (err) {
      if (err instanceof ShopError) {
        log({ level: 'warn', action: 'checkout.rejected', email, code: err.code, error: err.message, durationMs: Date.now() - start });
      } else {
        log({ level: 'error', action: 'checkout.error', email, error: getErrorMessage(err), durationMs: Date.now() - start });
      }
      throw err;
    }
  }

  private async commit(session: Session, quote: Quote): Promise<Order> {
    const { customer, pricing } = quote;

    // Check every decrement before applying any of them
    const previousProducts: Product[] = [];
    const updatedProducts: Product[] = [];
    for (const { product, quantity } of quote.lines) {
      const live = await this.deps.products.findByKey(product.sku);
      if (!live) {
        throw new UnknownProductError(product.sku);
      }
      if (live.stock - quantity < 0) {
        throw new OutOfStockError(product.sku, quantity, live.stock);
      }
      previousProducts.push(live);
      updatedProducts.push({ ...live, stock: live.stock - quantity });
    }

    const updatedCustomer: Customer = { ...customer, funds: customer.funds - pricing.total };
    const order: Order = {
      orderId: (this.deps.newOrderId ?? defaultOrderId)(),
      email: customer.email,
      createdAt: session.now().toISOString(),
      fulfilment: quote.request.fulfilment,
      deliveryAddress: quote.request.fulfilment === 'DELIVERY' ? (quote.request.deliveryAddress ?? '').trim() : '',
      storeId: quote.request.storeId ?? '',
      promoCode: quote.promoCode ?? '',
      vipPricing: quote.vipPricing,
      lines: pricing.items,
      subtotal: pricing.subtotal,
      studentDiscount: pricing.studentDiscount,
      promoDiscount: pricing.promoDiscount,
      deliveryFee: pricing.deliveryFee,
      total: pricing.total,
    };

    try {
      for (const product of updatedProducts) {
        await this.deps.products.upsert(product);
      }
      await this.deps.users.upsert(updatedCustomer);
      await this.deps.products.saveAll();
      await this.deps.users.saveAll();
      await this.deps.orders.append(order);
    } catch (err) {
      await this.rollback(previousProducts, customer).catch((rollbackErr: unknown) => {
        log({ level: 'error', action: 'checkout.rollback_failed', email: customer.email, error: getErrorMessage(rollbackErr) });
      });
      throw err;
    }

    session.user = updatedCustomer;
    return order;
  }

  private async rollback(products: readonly Product[], customer: Customer): Promise<void> {
    for (const product of products) {
      await this.deps.products.upsert(product);
    }
    await this.deps.users.upsert(customer);
    await this.deps.products.saveAll();
    await this.deps.users.saveAll();
  }
}
