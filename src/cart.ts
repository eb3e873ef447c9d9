import { CartLimitError, CartLineNotFoundError, InputValidationError, UnknownProductError } from './errors';
import { log } from './log';
import type { Store } from './repository';
import type { CartLine, Product } from './types';

export const MAX_LINE_QUANTITY = 10;
export const MAX_CART_UNITS = 20;

export type ProductLookup = Pick<Store<Product>, 'findByKey'>;

function normalizeSku(sku: string): string {
  return sku.trim().toUpperCase();
}

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new InputValidationError('Quantity must be a whole number of at least 1', 'quantity');
  }
}

/**
 * Per-session cart of SKU references. Stock is not checked here; checkout
 * validates quantities against live stock.
 */
export class Cart {
  private lines: CartLine[] = [];

  constructor(private readonly catalog: ProductLookup) {}

  async add(sku: string, quantity: number): Promise<CartLine> {
    assertQuantity(quantity);
    const key = normalizeSku(sku);
    const product = await this.catalog.findByKey(key);
    if (!product) {
      throw new UnknownProductError(key);
    }

    const existing = this.lines.find((line) => line.sku === key);
    const lineQuantity = (existing?.quantity ?? 0) + quantity;
    this.checkLimits(key, lineQuantity, this.totalUnits() + quantity);

    let line: CartLine;
    if (existing) {
      existing.quantity = lineQuantity;
      line = existing;
    } else {
      line = { sku: key, quantity };
      this.lines.push(line);
    }
    log({ level: 'info', action: 'cart.add', sku: key, quantity: line.quantity });
    return { ...line };
  }

  updateQuantity(sku: string, quantity: number): CartLine {
    assertQuantity(quantity);
    const key = normalizeSku(sku);
    const line = this.lines.find((l) => l.sku === key);
    if (!line) {
      throw new CartLineNotFoundError(key);
    }
    this.checkLimits(key, quantity, this.totalUnits() - line.quantity + quantity);
    line.quantity = quantity;
    return { ...line };
  }

  remove(sku: string): void {
    const key = normalizeSku(sku);
    const index = this.lines.findIndex((line) => line.sku === key);
    if (index === -1) {
      throw new CartLineNotFoundError(key);
    }
    this.lines.splice(index, 1);
  }

  clear(): void {
    this.lines = [];
  }

  /** Lines in the order they were first added. */
  list(): CartLine[] {
    return this.lines.map((line) => ({ ...line }));
  }

  totalUnits(): number {
    return this.lines.reduce((sum, line) => sum + line.quantity, 0);
  }

  isEmpty(): boolean {
    return this.lines.length === 0;
  }

  private checkLimits(sku: string, lineQuantity: number, cartUnits: number): void {
    if (lineQuantity > MAX_LINE_QUANTITY) {
      throw new CartLimitError(
        `At most ${MAX_LINE_QUANTITY} units of ${sku} per order`,
        { sku, lineQuantity, limit: MAX_LINE_QUANTITY },
      );
    }
    if (cartUnits > MAX_CART_UNITS) {
      const room = MAX_CART_UNITS - this.totalUnits();
      throw new CartLimitError(
        room > 0
          ? `Cart limit: only ${room} more item(s) allowed (max ${MAX_CART_UNITS})`
          : `Cart is full (max ${MAX_CART_UNITS} items)`,
        { sku, cartUnits, limit: MAX_CART_UNITS },
      );
    }
  }
}
