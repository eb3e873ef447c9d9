/**
 * Error classes for the market.
 *
 * Three families: {@link InputValidationError} for malformed input the caller
 * can re-prompt for, {@link DomainRuleViolation} for business rules that
 * reject an operation while leaving state unchanged, and
 * {@link PersistenceError} for data files that cannot be read or written.
 *
 * @example
 * ```typescript
 * try {
 *   await engine.confirm(session, request);
 * } catch (error) {
 *   if (error instanceof OutOfStockError) {
 *     console.log(`Only ${error.available} of ${error.sku} left`);
 *   } else if (error instanceof ShopError) {
 *     console.log(`[${error.code}] ${error.message}`);
 *   }
 * }
 * ```
 */

import { formatMoney } from './money';

/**
 * Base class for every error the market raises on purpose.
 */
export class ShopError extends Error {
  /** Error code for categorization (e.g. 'OUT_OF_STOCK') */
  readonly code: string;
  /** Additional context about the error */
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ShopError';
    this.code = code;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Malformed input: a quantity that is not a number, a bad email, a blank field.
 */
export class InputValidationError extends ShopError {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message, 'INPUT_INVALID', { field });
    this.name = 'InputValidationError';
    this.field = field;
  }
}

/**
 * A business rule refused the operation. Nothing was mutated.
 */
export class DomainRuleViolation extends ShopError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'DomainRuleViolation';
  }
}

export class EmptyCartError extends DomainRuleViolation {
  constructor() {
    super('Your cart is empty', 'EMPTY_CART');
    this.name = 'EmptyCartError';
  }
}

export class OutOfStockError extends DomainRuleViolation {
  readonly sku: string;
  readonly requested: number;
  readonly available: number;

  constructor(sku: string, requested: number, available: number) {
    super(
      available === 0
        ? `${sku} is out of stock`
        : `Only ${available} unit(s) of ${sku} available, ${requested} requested`,
      'OUT_OF_STOCK',
      { sku, requested, available },
    );
    this.name = 'OutOfStockError';
    this.sku = sku;
    this.requested = requested;
    this.available = available;
  }
}

export class InsufficientFundsError extends DomainRuleViolation {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super(
      `Insufficient funds: need ${formatMoney(required)}, have ${formatMoney(available)}`,
      'INSUFFICIENT_FUNDS',
      { required, available },
    );
    this.name = 'InsufficientFundsError';
    this.required = required;
    this.available = available;
  }
}

/**
 * A promotion code that does not exist or does not apply to this order.
 * Checkout reports it alongside the quote instead of failing.
 */
export class InvalidPromoError extends DomainRuleViolation {
  readonly promoCode: string;
  readonly reason: string;

  constructor(promoCode: string, reason: string) {
    super(`Promotion ${promoCode} not applied: ${reason}`, 'INVALID_PROMO', { promoCode, reason });
    this.name = 'InvalidPromoError';
    this.promoCode = promoCode;
    this.reason = reason;
  }
}

export class InvalidAddressError extends DomainRuleViolation {
  constructor() {
    super('A delivery address is required for delivery orders', 'INVALID_ADDRESS');
    this.name = 'InvalidAddressError';
  }
}

export class UnknownStoreError extends DomainRuleViolation {
  readonly storeId: string;

  constructor(storeId: string) {
    super(`Unknown pickup store: ${storeId}`, 'UNKNOWN_STORE', { storeId });
    this.name = 'UnknownStoreError';
    this.storeId = storeId;
  }
}

export class CartLimitError extends DomainRuleViolation {
  constructor(message: string, context: Record<string, unknown>) {
    super(message, 'CART_LIMIT', context);
    this.name = 'CartLimitError';
  }
}

export class CartLineNotFoundError extends DomainRuleViolation {
  readonly sku: string;

  constructor(sku: string) {
    super(`${sku} is not in your cart`, 'CART_LINE_NOT_FOUND', { sku });
    this.name = 'CartLineNotFoundError';
    this.sku = sku;
  }
}

export class UnknownProductError extends DomainRuleViolation {
  readonly sku: string;

  constructor(sku: string) {
    super(`No product with SKU ${sku}`, 'UNKNOWN_PRODUCT', { sku });
    this.name = 'UnknownProductError';
    this.sku = sku;
  }
}

export class DuplicateProductError extends DomainRuleViolation {
  readonly sku: string;

  constructor(sku: string) {
    super(`A product with SKU ${sku} already exists`, 'DUPLICATE_PRODUCT', { sku });
    this.name = 'DuplicateProductError';
    this.sku = sku;
  }
}

export class ProductNotFoundError extends DomainRuleViolation {
  readonly sku: string;

  constructor(sku: string) {
    super(`Product ${sku} not found`, 'PRODUCT_NOT_FOUND', { sku });
    this.name = 'ProductNotFoundError';
    this.sku = sku;
  }
}

export class MembershipError extends DomainRuleViolation {
  constructor(message: string) {
    super(message, 'MEMBERSHIP_ERROR');
    this.name = 'MembershipError';
  }
}

export class AuthenticationError extends DomainRuleViolation {
  constructor() {
    super('Invalid email or password', 'AUTHENTICATION_FAILED');
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends DomainRuleViolation {
  readonly requiredRole: string;

  constructor(requiredRole: string) {
    super(
      `This action requires ${requiredRole === 'ADMIN' ? 'an administrator' : 'a customer'} account`,
      'NOT_AUTHORIZED',
      { requiredRole },
    );
    this.name = 'AuthorizationError';
    this.requiredRole = requiredRole;
  }
}

/**
 * A data file could not be read, parsed or written.
 */
export class PersistenceError extends ShopError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', { filePath, cause: cause?.message });
    this.name = 'PersistenceError';
    this.filePath = filePath;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Returns a human-readable message for any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrows an unknown thrown value to an Error, wrapping non-Error values.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
