import { CheckoutEngine } from '../src/checkout';
import { PromotionCatalog, defaultPromotions } from '../src/promotions';
import { MemoryLog, MemoryStore } from '../src/repository';
import { startSession, type Session } from '../src/session';
import type { Administrator, Customer, MembershipEvent, Order, PickupStore, Product, User } from '../src/types';

// ---------------------------------------------------------------------------
// Shared fixtures
// ---------------------------------------------------------------------------

export const STAFF_DOMAIN = 'campus.test';
export const NOW = new Date('2026-01-15T10:00:00Z');
export const clock = () => NOW;

export function makeProduct(overrides: Partial<Product> = {}): Product {
  return {
    sku: 'MILK-1',
    name: 'Full Cream Milk 2L',
    brand: 'Dairyland',
    description: 'Fresh full cream milk',
    category: 'Dairy',
    subcategory: 'Milk',
    price: 1999,
    vipPrice: 1799,
    stock: 5,
    perishable: null,
    ...overrides,
  };
}

export function makeCustomer(overrides: Partial<Customer> = {}): Customer {
  return {
    role: 'CUSTOMER',
    email: 'shopper@example.test',
    passwordHash: 'scrypt$00$00',
    firstName: 'Casey',
    lastName: 'Shopper',
    mobile: '0400 111 222',
    address: '12 Test Street',
    funds: 10000,
    isStudent: false,
    vipExpiry: null,
    vipYears: 0,
    ...overrides,
  };
}

export function makeAdmin(overrides: Partial<Administrator> = {}): Administrator {
  return {
    role: 'ADMIN',
    email: `admin@${STAFF_DOMAIN}`,
    passwordHash: 'scrypt$00$00',
    firstName: 'Alex',
    lastName: 'Admin',
    mobile: '0400 333 444',
    ...overrides,
  };
}

export const PICKUP_STORES: PickupStore[] = [
  { storeId: 'S1', name: 'North Campus', address: '1 North Road', phone: '03 0000 0001', hours: '9-5' },
];

export function productStore(products: Product[] = [makeProduct()]): MemoryStore<Product> {
  return new MemoryStore<Product>((p) => p.sku, products);
}

export function userStore(users: User[]): MemoryStore<User> {
  return new MemoryStore<User>((u) => u.email, users);
}

export interface Market {
  products: MemoryStore<Product>;
  users: MemoryStore<User>;
  orders: MemoryLog<Order>;
  memberships: MemoryLog<MembershipEvent>;
  pickupStores: MemoryStore<PickupStore>;
  promotions: PromotionCatalog;
  engine: CheckoutEngine;
  session: Session;
}

export interface MarketOptions {
  user?: User;
  products?: Product[];
  orders?: Order[];
  users?: MemoryStore<User>;
}

/** In-memory market with a logged-in session on the fixed clock. */
export function createMarket(options: MarketOptions = {}): Market {
  const user = options.user ?? makeCustomer();
  const products = productStore(options.products);
  const users = options.users ?? userStore([user]);
  const orders = new MemoryLog<Order>(options.orders);
  const memberships = new MemoryLog<MembershipEvent>();
  const pickupStores = new MemoryStore<PickupStore>((s) => s.storeId, PICKUP_STORES);
  const promotions = new PromotionCatalog(defaultPromotions(STAFF_DOMAIN));
  let sequence = 0;
  const engine = new CheckoutEngine({
    products,
    users,
    orders,
    pickupStores,
    promotions,
    newOrderId: () => `ORD-TEST000${++sequence}`,
  });
  return {
    products,
    users,
    orders,
    memberships,
    pickupStores,
    promotions,
    engine,
    session: startSession(user, products, clock),
  };
}

export function makeOrder(overrides: Partial<Order> = {}): Order {
  return {
    orderId: 'ORD-PAST0001',
    email: 'shopper@example.test',
    createdAt: '2026-01-01T09:00:00.000Z',
    fulfilment: 'PICKUP',
    deliveryAddress: '',
    storeId: '',
    promoCode: '',
    vipPricing: false,
    lines: [{ sku: 'MILK-1', name: 'Full Cream Milk 2L', quantity: 1, unitPrice: 1999, lineTotal: 1999 }],
    subtotal: 1999,
    studentDiscount: 0,
    promoDiscount: 0,
    deliveryFee: 0,
    total: 1999,
    ...overrides,
  };
}
