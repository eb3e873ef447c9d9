import { authenticate, orderHistory, topUpFunds, updateContact, MAX_TOP_UP } from './accounts';
import { MAX_CART_UNITS } from './cart';
import {
  addProduct,
  deleteProduct,
  distinctValues,
  editProduct,
  listAllOrders,
  listProducts,
  parseAvailability,
  type ProductFilter,
  type ProductPatch,
} from './catalog';
import type { CheckoutEngine } from './checkout';
import type { MarketData } from './data';
import { InputValidationError, ProductNotFoundError, ShopError } from './errors';
import { log } from './log';
import { cancelVip, isVipActive, membershipHistory, purchaseVip, vipStatus, VIP_COST_PER_YEAR } from './membership';
import { formatMoney, parseMoney } from './money';
import { describeRule, type PromotionCatalog } from './promotions';
import { startSession, today, type Clock, type Session } from './session';
import type { Customer, Fulfilment, Order, PerishableInfo, Product } from './types';

// ---------------------------------------------------------------------------
// Terminal abstraction
// ---------------------------------------------------------------------------

export interface Terminal {
  ask(question: string): Promise<string>;
  print(line?: string): void;
}

/** Raised by a Terminal whose input has ended (Ctrl-D, closed pipe). */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export interface MarketServices {
  data: MarketData;
  engine: CheckoutEngine;
  promotions: PromotionCatalog;
  now?: Clock | undefined;
}

/** Where a submenu wants to go when it returns. */
type Nav = 'back' | 'main';

const WIDTH = 72;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function banner(t: Terminal, title: string): void {
  t.print('='.repeat(WIDTH));
  t.print(title.padStart(Math.floor((WIDTH + title.length) / 2)));
  t.print('='.repeat(WIDTH));
}

function rule(t: Terminal): void {
  t.print('-'.repeat(WIDTH));
}

function parseWhole(input: string, field: string): number {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InputValidationError(`Please enter a whole number for ${field}`, field);
  }
  return Number(trimmed);
}

function optionalMoney(input: string): number | undefined {
  return input.trim() === '' ? undefined : parseMoney(input);
}

/**
 * Runs one menu action. Market errors are shown and the menu carries on;
 * anything else propagates.
 */
async function attempt(t: Terminal, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (err instanceof ShopError) {
      t.print(`✗ ${err.message}`);
      return;
    }
    throw err;
  }
}

function renderProducts(t: Terminal, products: readonly Product[], vip: boolean): void {
  if (products.length === 0) {
    t.print('No products found.');
    return;
  }
  t.print(`${'SKU'.padEnd(10)} ${'Name'.padEnd(26)} ${'Brand'.padEnd(12)} ${'Price'.padStart(9)} ${'VIP'.padStart(9)} ${'Stock'.padStart(5)}`);
  for (const p of products) {
    const marker = vip ? '*' : ' ';
    t.print(
      `${p.sku.padEnd(10)} ${p.name.slice(0, 26).padEnd(26)} ${p.brand.slice(0, 12).padEnd(12)} ` +
        `${formatMoney(p.price).padStart(9)} ${formatMoney(p.vipPrice).padStart(8)}${marker} ${String(p.stock).padStart(5)}`,
    );
    if (p.perishable) {
      t.print(`${''.padEnd(10)} expires ${p.perishable.expiryDate}; allergens: ${p.perishable.allergens || 'none'}`);
    }
  }
}

function renderOrder(t: Terminal, order: Order): void {
  t.print(`Order ${order.orderId}  ${order.createdAt}  ${order.fulfilment}`);
  for (const line of order.lines) {
    t.print(`  ${line.sku.padEnd(10)} ${line.name.slice(0, 26).padEnd(26)} x${String(line.quantity).padStart(2)}  ${formatMoney(line.lineTotal).padStart(9)}`);
  }
  t.print(`  Subtotal:         ${formatMoney(order.subtotal)}`);
  if (order.studentDiscount > 0) t.print(`  Student discount: -${formatMoney(order.studentDiscount)}`);
  if (order.promoCode) t.print(`  Promo ${order.promoCode}:     -${formatMoney(order.promoDiscount)}`);
  if (order.fulfilment === 'DELIVERY') t.print(`  Delivery fee:     ${formatMoney(order.deliveryFee)}`);
  t.print(`  Total:            ${formatMoney(order.total)}`);
}

function vipLine(customer: Customer, onDate: string): string {
  const status = vipStatus(customer, onDate);
  switch (status.state) {
    case 'NONE':
      return 'No VIP membership';
    case 'EXPIRED':
      return `VIP expired ${status.expiry ?? ''}`;
    case 'ACTIVE':
      return `Active VIP (expires ${status.expiry ?? ''}, ${status.daysRemaining} days left)`;
  }
}

// ---------------------------------------------------------------------------
// Customer: browse and cart
// ---------------------------------------------------------------------------

async function browseMenu(t: Terminal, session: Session, svc: MarketServices): Promise<Nav> {
  for (;;) {
    banner(t, 'BROWSE & SHOP');
    t.print('1) List all   2) Filter   3) Add to cart');
    t.print('0) Back   M) Main Menu');
    const choice = (await t.ask('> ')).trim().toLowerCase();
    if (choice === '0') return 'back';
    if (choice === 'm') return 'main';

    const vip = session.user.role === 'CUSTOMER' && isVipActive(session.user, today(session));
    if (choice === '1') {
      await attempt(t, async () => {
        renderProducts(t, await listProducts(svc.data.products), vip);
      });
    } else if (choice === '2') {
      await attempt(t, async () => {
        const { products } = svc.data;
        t.print(`Categories: ${(await distinctValues(products, 'category')).join(', ')}`);
        const category = (await t.ask('Category (blank for any): ')).trim() || undefined;
        t.print(`Subcategories: ${(await distinctValues(products, 'subcategory')).join(', ')}`);
        const subcategory = (await t.ask('Subcategory (blank for any): ')).trim() || undefined;
        t.print(`Brands: ${(await distinctValues(products, 'brand')).join(', ')}`);
        const filter: ProductFilter = {
          category,
          subcategory,
          brand: (await t.ask('Brand (blank for any): ')).trim() || undefined,
          minPrice: optionalMoney(await t.ask('Min price (blank for none): $')),
          maxPrice: optionalMoney(await t.ask('Max price (blank for none): $')),
          availability: parseAvailability(await t.ask('Availability [in/out] (blank for any): ')),
          search: (await t.ask('Search text (blank for none): ')).trim() || undefined,
        };
        renderProducts(t, await listProducts(svc.data.products, filter), vip);
      });
    } else if (choice === '3') {
      await attempt(t, async () => {
        const sku = await t.ask('SKU: ');
        const quantity = parseWhole(await t.ask('Quantity: '), 'quantity');
        const line = await session.cart.add(sku, quantity);
        t.print(`✓ ${line.sku} x${line.quantity} in cart (${session.cart.totalUnits()}/${MAX_CART_UNITS} items)`);
      });
    } else {
      t.print('Invalid option.');
    }
  }
}

async function renderCart(t: Terminal, session: Session, svc: MarketServices): Promise<void> {
  const lines = session.cart.list();
  if (lines.length === 0) {
    t.print('Your cart is empty.');
    return;
  }
  const vip = session.user.role === 'CUSTOMER' && isVipActive(session.user, today(session));
  let subtotal = 0;
  for (const line of lines) {
    const product = await svc.data.products.findByKey(line.sku);
    if (!product) {
      t.print(`${line.sku.padEnd(10)} (no longer available) x${line.quantity}`);
      continue;
    }
    const unit = vip ? product.vipPrice : product.price;
    subtotal += unit * line.quantity;
    t.print(`${line.sku.padEnd(10)} ${product.name.slice(0, 26).padEnd(26)} x${String(line.quantity).padStart(2)} ${formatMoney(unit).padStart(9)} ${formatMoney(unit * line.quantity).padStart(10)}`);
  }
  rule(t);
  t.print(`Items: ${session.cart.totalUnits()}/${MAX_CART_UNITS}   Subtotal${vip ? ' (VIP)' : ''}: ${formatMoney(subtotal)}`);
}

/** Asks until a listed store is chosen; undefined when the customer cancels with 0. */
async function askPickupStore(t: Terminal, svc: MarketServices): Promise<string | undefined> {
  const { pickupStores } = svc.data;
  for (const store of await pickupStores.loadAll()) {
    t.print(`  ${store.storeId}) ${store.name}, ${store.address} (${store.hours})`);
  }
  for (;;) {
    const entered = (await t.ask('Pickup store ID (0 to cancel): ')).trim().toUpperCase();
    if (entered === '0') return undefined;
    const store = entered ? await pickupStores.findByKey(entered) : null;
    if (store) return store.storeId;
    t.print(`✗ Unknown pickup store: ${entered || '(blank)'}`);
  }
}

async function checkoutFlow(t: Terminal, session: Session, svc: MarketServices): Promise<void> {
  const customer = session.user.role === 'CUSTOMER' ? session.user : null;
  if (!customer) return;

  const mode = (await t.ask('Fulfilment: 1) Delivery  2) Pickup > ')).trim();
  let fulfilment: Fulfilment;
  let deliveryAddress: string | undefined;
  let storeId: string | undefined;
  if (mode === '1') {
    fulfilment = 'DELIVERY';
    const entered = (await t.ask(`Delivery address [${customer.address}]: `)).trim();
    deliveryAddress = entered || customer.address;
  } else if (mode === '2') {
    fulfilment = 'PICKUP';
    storeId = await askPickupStore(t, svc);
    if (storeId === undefined) {
      t.print('Checkout cancelled.');
      return;
    }
  } else {
    throw new InputValidationError('Choose 1 for delivery or 2 for pickup', 'fulfilment');
  }

  for (const promotion of svc.promotions.list()) {
    t.print(`  ${promotion.code}: ${promotion.description} (${describeRule(promotion.rule)})`);
  }
  const promoCode = (await t.ask('Promo code (blank for none): ')).trim() || undefined;

  const request = { fulfilment, deliveryAddress, storeId, promoCode };
  const quote = await svc.engine.quote(session, request);
  const { pricing } = quote;

  banner(t, 'ORDER SUMMARY');
  for (const item of pricing.items) {
    t.print(`${item.sku.padEnd(10)} ${item.name.slice(0, 26).padEnd(26)} x${String(item.quantity).padStart(2)} ${formatMoney(item.lineTotal).padStart(10)}`);
  }
  rule(t);
  t.print(`Subtotal${quote.vipPricing ? ' (VIP prices)' : ''}: ${formatMoney(pricing.subtotal)}`);
  if (pricing.studentDiscount > 0) t.print(`Student pickup discount: -${formatMoney(pricing.studentDiscount)}`);
  if (quote.promoCode) t.print(`Promo ${quote.promoCode}: -${formatMoney(pricing.promoDiscount)}`);
  if (quote.promoRejection) t.print(`✗ ${quote.promoRejection.message}`);
  if (fulfilment === 'DELIVERY') t.print(`Delivery fee: ${formatMoney(pricing.deliveryFee)}`);
  t.print(`Total: ${formatMoney(pricing.total)}   (funds ${formatMoney(quote.customer.funds)})`);

  const confirm = (await t.ask('Confirm order? (y/n): ')).trim().toLowerCase();
  if (confirm !== 'y') {
    t.print('Order not placed; your cart is unchanged.');
    return;
  }
  const order = await svc.engine.confirm(session, request);
  t.print(`✓ Order ${order.orderId} placed. Total charged ${formatMoney(order.total)}.`);
  if (session.user.role === 'CUSTOMER') {
    t.print(`Remaining funds: ${formatMoney(session.user.funds)}`);
  }
}

async function cartMenu(t: Terminal, session: Session, svc: MarketServices): Promise<Nav> {
  for (;;) {
    banner(t, 'CART');
    await attempt(t, () => renderCart(t, session, svc));
    t.print('1) Update quantity   2) Remove item   3) Clear cart   4) Checkout');
    t.print('0) Back   M) Main Menu');
    const choice = (await t.ask('> ')).trim().toLowerCase();
    if (choice === '0') return 'back';
    if (choice === 'm') return 'main';

    if (choice === '1') {
      await attempt(t, async () => {
        const sku = await t.ask('SKU: ');
        const quantity = parseWhole(await t.ask('New quantity: '), 'quantity');
        session.cart.updateQuantity(sku, quantity);
      });
    } else if (choice === '2') {
      await attempt(t, async () => {
        session.cart.remove(await t.ask('SKU: '));
      });
    } else if (choice === '3') {
      session.cart.clear();
      t.print('Cart cleared.');
    } else if (choice === '4') {
      await attempt(t, () => checkoutFlow(t, session, svc));
    } else {
      t.print('Invalid option.');
    }
  }
}

// ---------------------------------------------------------------------------
// Customer: profile and membership
// ---------------------------------------------------------------------------

async function profileMenu(t: Terminal, session: Session, svc: MarketServices): Promise<Nav> {
  const { users, orders, memberships } = svc.data;
  for (;;) {
    const customer = session.user.role === 'CUSTOMER' ? session.user : null;
    if (!customer) return 'main';

    banner(t, 'PROFILE & MEMBERSHIP');
    t.print(`Name: ${customer.firstName} ${customer.lastName}`);
    t.print(`Email: ${customer.email}`);
    t.print(`Mobile: ${customer.mobile}`);
    t.print(`Address: ${customer.address}`);
    t.print(`Student: ${customer.isStudent ? 'Yes' : 'No'}`);
    t.print(`VIP: ${vipLine(customer, today(session))}`);
    t.print(`Funds: ${formatMoney(customer.funds)}`);
    rule(t);
    t.print('1) Top up funds');
    t.print(`2) Buy/Renew VIP (${formatMoney(VIP_COST_PER_YEAR)}/year)`);
    t.print('3) View order history');
    t.print('4) Update mobile / address');
    t.print('5) View membership history');
    t.print('6) Cancel VIP (non-refundable)');
    t.print('0) Back   M) Main Menu');
    const choice = (await t.ask('> ')).trim().toLowerCase();
    if (choice === '0') return 'back';
    if (choice === 'm') return 'main';

    if (choice === '1') {
      await attempt(t, async () => {
        const amount = parseMoney(await t.ask(`Amount to top up (max ${formatMoney(MAX_TOP_UP)}): $`));
        const updated = await topUpFunds(session, users, amount);
        t.print(`✓ New balance: ${formatMoney(updated.funds)}`);
      });
    } else if (choice === '2') {
      await attempt(t, async () => {
        const years = parseWhole(await t.ask('Years of VIP to buy: '), 'years');
        const event = await purchaseVip(session, { users, history: memberships }, years);
        t.print(`✓ VIP ${event.action === 'RENEW' ? 'renewed' : 'purchased'}. Expires ${event.expiry ?? ''}.`);
      });
    } else if (choice === '3') {
      await attempt(t, async () => {
        const history = await orderHistory(session, orders);
        if (history.length === 0) t.print('No past orders found.');
        for (const order of history) renderOrder(t, order);
      });
    } else if (choice === '4') {
      await attempt(t, async () => {
        const mobile = await t.ask(`Mobile [${customer.mobile}]: `);
        const address = await t.ask(`Address [${customer.address}]: `);
        await updateContact(session, users, { mobile, address });
        t.print('✓ Contact information updated.');
      });
    } else if (choice === '5') {
      await attempt(t, async () => {
        const events = await membershipHistory(session, memberships);
        if (events.length === 0) t.print('No membership history.');
        for (const e of events) {
          t.print(`${e.at}  ${e.action.padEnd(6)} ${String(e.years).padStart(2)}y  ${formatMoney(e.amount).padStart(8)}  ${e.expiry ?? '-'}`);
        }
      });
    } else if (choice === '6') {
      await attempt(t, async () => {
        const sure = (await t.ask('Confirm cancel VIP? (y/n): ')).trim().toLowerCase();
        if (sure !== 'y') return;
        await cancelVip(session, { users, history: memberships });
        t.print('✓ VIP membership cancelled (non-refundable).');
      });
    } else {
      t.print('Invalid option.');
    }
  }
}

// ---------------------------------------------------------------------------
// Administrator
// ---------------------------------------------------------------------------

async function askProductFields(t: Terminal, current: Product | null): Promise<ProductPatch> {
  const keep = (value: string) => (current ? ` [${value}]` : '');
  const text = async (label: string, value: string) => (await t.ask(`${label}${keep(value)}: `)).trim();

  const name = await text('Name', current?.name ?? '');
  const brand = await text('Brand', current?.brand ?? '');
  const description = await text('Description', current?.description ?? '');
  const category = await text('Category', current?.category ?? '');
  const subcategory = await text('Subcategory', current?.subcategory ?? '');
  const price = await text('Price $', current ? formatMoney(current.price) : '');
  const vipPrice = await text('VIP price $', current ? formatMoney(current.vipPrice) : '');
  const stock = await text('Stock', current ? String(current.stock) : '');
  const food = await text('Perishable? (y/n)', current ? (current.perishable ? 'y' : 'n') : '');

  let perishable: PerishableInfo | null | undefined;
  if (food.toLowerCase() === 'y') {
    perishable = {
      expiryDate: await text('Expiry date (YYYY-MM-DD)', current?.perishable?.expiryDate ?? ''),
      ingredients: await text('Ingredients', current?.perishable?.ingredients ?? ''),
      storage: await text('Storage', current?.perishable?.storage ?? ''),
      allergens: await text('Allergens', current?.perishable?.allergens ?? ''),
    };
  } else if (food.toLowerCase() === 'n') {
    perishable = null;
  }

  const patch: ProductPatch = {};
  if (name) patch.name = name;
  if (brand) patch.brand = brand;
  if (description) patch.description = description;
  if (category) patch.category = category;
  if (subcategory) patch.subcategory = subcategory;
  if (price) patch.price = parseMoney(price);
  if (vipPrice) patch.vipPrice = parseMoney(vipPrice);
  if (stock) patch.stock = parseWhole(stock, 'stock');
  if (perishable !== undefined) patch.perishable = perishable;
  return patch;
}

async function adminProductsMenu(t: Terminal, session: Session, svc: MarketServices): Promise<Nav> {
  const { products } = svc.data;
  for (;;) {
    banner(t, 'ADMIN: PRODUCTS');
    t.print('1) List products   2) Add product   3) Edit product   4) Delete product');
    t.print('0) Back   M) Main Menu');
    const choice = (await t.ask('> ')).trim().toLowerCase();
    if (choice === '0') return 'back';
    if (choice === 'm') return 'main';

    if (choice === '1') {
      await attempt(t, async () => {
        renderProducts(t, await listProducts(products), false);
      });
    } else if (choice === '2') {
      await attempt(t, async () => {
        const sku = (await t.ask('SKU: ')).trim();
        const fields = await askProductFields(t, null);
        const product = await addProduct(session, products, {
          sku,
          name: fields.name ?? '',
          brand: fields.brand ?? '',
          description: fields.description ?? '',
          category: fields.category ?? '',
          subcategory: fields.subcategory ?? '',
          price: fields.price ?? 0,
          vipPrice: fields.vipPrice ?? fields.price ?? 0,
          stock: fields.stock ?? 0,
          perishable: fields.perishable ?? null,
        });
        t.print(`✓ Added ${product.sku}.`);
      });
    } else if (choice === '3') {
      await attempt(t, async () => {
        const sku = (await t.ask('SKU to edit: ')).trim().toUpperCase();
        const current = await products.findByKey(sku);
        if (!current) {
          throw new ProductNotFoundError(sku);
        }
        t.print('Press Enter to keep the value in brackets.');
        const patch = await askProductFields(t, current);
        const updated = await editProduct(session, products, sku, patch);
        t.print(`✓ Updated ${updated.sku}.`);
      });
    } else if (choice === '4') {
      await attempt(t, async () => {
        const sku = await t.ask('SKU to delete: ');
        const sure = (await t.ask(`Delete ${sku.trim().toUpperCase()}? (y/n): `)).trim().toLowerCase();
        if (sure !== 'y') return;
        const removed = await deleteProduct(session, products, sku);
        t.print(`✓ Deleted ${removed.sku}.`);
      });
    } else {
      t.print('Invalid option.');
    }
  }
}

// ---------------------------------------------------------------------------
// Session loop
// ---------------------------------------------------------------------------

async function customerMain(t: Terminal, session: Session, svc: MarketServices): Promise<void> {
  for (;;) {
    const customer = session.user.role === 'CUSTOMER' ? session.user : null;
    if (!customer) return;
    banner(t, 'MAIN MENU');
    t.print(`Logged in as: ${customer.firstName} ${customer.lastName} (CUSTOMER)`);
    t.print(`Funds: ${formatMoney(customer.funds)}  |  ${vipLine(customer, today(session))}`);
    rule(t);
    t.print('1) Browse & Shop');
    t.print('2) View Cart / Checkout');
    t.print('3) Profile & Membership');
    t.print('9) Logout');
    const choice = (await t.ask('> ')).trim().toLowerCase();
    if (choice === '1') await browseMenu(t, session, svc);
    else if (choice === '2') await cartMenu(t, session, svc);
    else if (choice === '3') await profileMenu(t, session, svc);
    else if (choice === '9') return;
    else if (choice !== 'm') t.print('Invalid option.');
  }
}

async function adminMain(t: Terminal, session: Session, svc: MarketServices): Promise<void> {
  for (;;) {
    banner(t, 'MAIN MENU');
    t.print(`Logged in as: ${session.user.firstName} ${session.user.lastName} (ADMIN)`);
    rule(t);
    t.print('1) Products & Inventory');
    t.print('2) All orders');
    t.print('9) Logout');
    const choice = (await t.ask('> ')).trim().toLowerCase();
    if (choice === '1') {
      await adminProductsMenu(t, session, svc);
    } else if (choice === '2') {
      await attempt(t, async () => {
        const all = await listAllOrders(session, svc.data.orders);
        if (all.length === 0) t.print('No orders yet.');
        for (const order of all) {
          t.print(`${order.email}`);
          renderOrder(t, order);
        }
      });
    } else if (choice === '9') {
      return;
    } else if (choice !== 'm') {
      t.print('Invalid option.');
    }
  }
}

async function login(t: Terminal, svc: MarketServices): Promise<Session | null> {
  for (;;) {
    banner(t, 'LOGIN');
    t.print('1) Login');
    t.print('0) Exit');
    const choice = (await t.ask('> ')).trim();
    if (choice === '0') return null;
    if (choice !== '1') {
      t.print('Invalid option.');
      continue;
    }
    const email = await t.ask('Email: ');
    const password = await t.ask('Password: ');
    try {
      const user = await authenticate(svc.data.users, email, password);
      t.print(`Welcome, ${user.firstName}!`);
      return startSession(user, svc.data.products, svc.now);
    } catch (err) {
      if (!(err instanceof ShopError)) throw err;
      t.print(`✗ ${err.message}`);
    }
  }
}

/**
 * Runs login and menus until the user exits or input ends.
 */
export async function runCli(t: Terminal, svc: MarketServices): Promise<void> {
  try {
    for (;;) {
      const session = await login(t, svc);
      if (!session) break;
      if (session.user.role === 'ADMIN') {
        await adminMain(t, session, svc);
      } else {
        await customerMain(t, session, svc);
      }
      log({ level: 'info', action: 'auth.logout', email: session.user.email });
      t.print('Logged out.');
    }
  } catch (err) {
    if (!(err instanceof InputClosedError)) throw err;
  }
  t.print('Goodbye!');
}
