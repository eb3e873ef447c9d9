import { z } from 'zod';
import { parseMoney, toDecimal } from './money';
import type {
  Customer,
  MembershipEvent,
  Order,
  PickupStore,
  Product,
  User,
} from './types';

// ---------------------------------------------------------------------------
// Codec contract
// ---------------------------------------------------------------------------

export type Row = Record<string, string>;

export interface RecordCodec<T> {
  headers: readonly string[];
  keyOf: (record: T) => string;
  /** Throws a ZodError when the row is malformed. */
  decode: (row: Row) => T;
  encode: (record: T) => Row;
}

// ---------------------------------------------------------------------------
// Column types
// ---------------------------------------------------------------------------

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

const text = z.string().default('');
const money = z
  .string()
  .regex(/^\d+(\.\d{1,2})?$/, 'expected a decimal amount')
  .transform((value) => parseMoney(value));
const count = z
  .string()
  .regex(/^\d+$/, 'expected a whole number')
  .transform(Number);
const flag = z
  .enum(['0', '1', 'true', 'false', ''])
  .transform((value) => value === '1' || value === 'true');
const optionalDate = z
  .string()
  .refine((value) => value === '' || DATE_RE.test(value), 'expected YYYY-MM-DD')
  .transform((value) => (value === '' ? null : value));

// ---------------------------------------------------------------------------
// Products
// ---------------------------------------------------------------------------

const productRow = z.object({
  sku: z.string().min(1),
  name: z.string().min(1),
  brand: text,
  description: text,
  category: text,
  subcategory: text,
  price: money,
  vip_price: money,
  stock: count,
  is_food: flag,
  expiry_date: text,
  ingredients: text,
  storage: text,
  allergens: text,
});

export const productCodec: RecordCodec<Product> = {
  headers: [
    'sku', 'name', 'brand', 'description', 'category', 'subcategory',
    'price', 'vip_price', 'stock', 'is_food',
    'expiry_date', 'ingredients', 'storage', 'allergens',
  ],
  keyOf: (product) => product.sku,
  decode(row) {
    const r = productRow.parse(row);
    return {
      sku: r.sku.trim().toUpperCase(),
      name: r.name,
      brand: r.brand,
      description: r.description,
      category: r.category,
      subcategory: r.subcategory,
      price: r.price,
      vipPrice: r.vip_price,
      stock: r.stock,
      perishable: r.is_food
        ? { expiryDate: r.expiry_date, ingredients: r.ingredients, storage: r.storage, allergens: r.allergens }
        : null,
    };
  },
  encode(product) {
    return {
      sku: product.sku,
      name: product.name,
      brand: product.brand,
      description: product.description,
      category: product.category,
      subcategory: product.subcategory,
      price: toDecimal(product.price),
      vip_price: toDecimal(product.vipPrice),
      stock: String(product.stock),
      is_food: product.perishable ? '1' : '0',
      expiry_date: product.perishable?.expiryDate ?? '',
      ingredients: product.perishable?.ingredients ?? '',
      storage: product.perishable?.storage ?? '',
      allergens: product.perishable?.allergens ?? '',
    };
  },
};

// ---------------------------------------------------------------------------
// Users
// ---------------------------------------------------------------------------

const userRow = z.object({
  email: z.string().min(3),
  password_hash: z.string().min(1),
  role: z.enum(['CUSTOMER', 'ADMIN']),
  first_name: text,
  last_name: text,
  mobile: text,
  address: text,
  is_student: flag,
  vip_years: z.union([count, z.literal('').transform(() => 0)]),
  vip_expires: optionalDate,
  funds: z.union([money, z.literal('').transform(() => 0)]),
});

export const userCodec: RecordCodec<User> = {
  headers: [
    'email', 'password_hash', 'role',
    'first_name', 'last_name', 'mobile', 'address',
    'is_student', 'vip_years', 'vip_expires', 'funds',
  ],
  keyOf: (user) => user.email,
  decode(row) {
    const r = userRow.parse(row);
    const base = {
      email: r.email.trim().toLowerCase(),
      passwordHash: r.password_hash,
      firstName: r.first_name,
      lastName: r.last_name,
      mobile: r.mobile,
    };
    if (r.role === 'ADMIN') {
      return { ...base, role: 'ADMIN' };
    }
    const customer: Customer = {
      ...base,
      role: 'CUSTOMER',
      address: r.address,
      funds: r.funds,
      isStudent: r.is_student,
      vipExpiry: r.vip_expires,
      vipYears: r.vip_years,
    };
    return customer;
  },
  encode(user) {
    const common = {
      email: user.email,
      password_hash: user.passwordHash,
      role: user.role,
      first_name: user.firstName,
      last_name: user.lastName,
      mobile: user.mobile,
    };
    if (user.role === 'ADMIN') {
      return { ...common, address: '', is_student: '0', vip_years: '0', vip_expires: '', funds: '0.00' };
    }
    return {
      ...common,
      address: user.address,
      is_student: user.isStudent ? '1' : '0',
      vip_years: String(user.vipYears),
      vip_expires: user.vipExpiry ?? '',
      funds: toDecimal(user.funds),
    };
  },
};

// ---------------------------------------------------------------------------
// Orders
// ---------------------------------------------------------------------------

// line amounts in lines_json are integer cents
const orderLine = z.object({
  sku: z.string(),
  name: z.string(),
  quantity: z.number().int().positive(),
  unitPrice: z.number().int().nonnegative(),
  lineTotal: z.number().int().nonnegative(),
});

const jsonColumn = z.string().transform((value, ctx): unknown => {
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid JSON' });
    return z.NEVER;
  }
});

const orderRow = z.object({
  order_id: z.string().min(1),
  email: z.string().min(1),
  created_at: z.string().min(1),
  fulfilment: z.enum(['DELIVERY', 'PICKUP']),
  delivery_address: text,
  store_id: text,
  promo_code: text,
  vip_pricing: flag,
  subtotal: money,
  student_discount: money,
  promo_discount: money,
  delivery_fee: money,
  total: money,
  lines_json: jsonColumn.pipe(z.array(orderLine)),
});

export const orderCodec: RecordCodec<Order> = {
  headers: [
    'order_id', 'email', 'created_at', 'fulfilment', 'delivery_address',
    'store_id', 'promo_code', 'vip_pricing', 'subtotal', 'student_discount',
    'promo_discount', 'delivery_fee', 'total', 'lines_json',
  ],
  keyOf: (order) => order.orderId,
  decode(row) {
    const r = orderRow.parse(row);
    return {
      orderId: r.order_id,
      email: r.email,
      createdAt: r.created_at,
      fulfilment: r.fulfilment,
      deliveryAddress: r.delivery_address,
      storeId: r.store_id,
      promoCode: r.promo_code,
      vipPricing: r.vip_pricing,
      lines: r.lines_json,
      subtotal: r.subtotal,
      studentDiscount: r.student_discount,
      promoDiscount: r.promo_discount,
      deliveryFee: r.delivery_fee,
      total: r.total,
    };
  },
  encode(order) {
    return {
      order_id: order.orderId,
      email: order.email,
      created_at: order.createdAt,
      fulfilment: order.fulfilment,
      delivery_address: order.deliveryAddress,
      store_id: order.storeId,
      promo_code: order.promoCode,
      vip_pricing: order.vipPricing ? '1' : '0',
      subtotal: toDecimal(order.subtotal),
      student_discount: toDecimal(order.studentDiscount),
      promo_discount: toDecimal(order.promoDiscount),
      delivery_fee: toDecimal(order.deliveryFee),
      total: toDecimal(order.total),
      lines_json: JSON.stringify(order.lines),
    };
  },
};

// ---------------------------------------------------------------------------
// Pickup stores
// ---------------------------------------------------------------------------

const storeRow = z.object({
  store_id: z.string().min(1),
  name: z.string().min(1),
  address: text,
  phone: text,
  hours: text,
});

export const pickupStoreCodec: RecordCodec<PickupStore> = {
  headers: ['store_id', 'name', 'address', 'phone', 'hours'],
  keyOf: (store) => store.storeId,
  decode(row) {
    const r = storeRow.parse(row);
    return { storeId: r.store_id.toUpperCase(), name: r.name, address: r.address, phone: r.phone, hours: r.hours };
  },
  encode(store) {
    return {
      store_id: store.storeId,
      name: store.name,
      address: store.address,
      phone: store.phone,
      hours: store.hours,
    };
  },
};

// ---------------------------------------------------------------------------
// Membership history
// ---------------------------------------------------------------------------

const membershipRow = z.object({
  email: z.string().min(1),
  action: z.enum(['BUY', 'RENEW', 'CANCEL']),
  years: count,
  amount: money,
  at: z.string().min(1),
  expiry: optionalDate,
});

export const membershipCodec: RecordCodec<MembershipEvent> = {
  headers: ['email', 'action', 'years', 'amount', 'at', 'expiry'],
  keyOf: (event) => `${event.email}@${event.at}`,
  decode(row) {
    const r = membershipRow.parse(row);
    return { email: r.email, action: r.action, years: r.years, amount: r.amount, at: r.at, expiry: r.expiry };
  },
  encode(event) {
    return {
      email: event.email,
      action: event.action,
      years: String(event.years),
      amount: toDecimal(event.amount),
      at: event.at,
      expiry: event.expiry ?? '',
    };
  },
};
