export type Fulfilment = 'DELIVERY' | 'PICKUP';

export interface PerishableInfo {
  expiryDate: string;   // YYYY-MM-DD
  ingredients: string;
  storage: string;
  allergens: string;
}

export interface Product {
  sku: string;          // unique, upper-case
  name: string;
  brand: string;
  description: string;
  category: string;
  subcategory: string;
  price: number;        // cents, > 0
  vipPrice: number;     // cents, 0 < vipPrice <= price
  stock: number;        // integer >= 0
  perishable: PerishableInfo | null;
}

interface UserBase {
  email: string;        // unique, lower-case
  passwordHash: string; // scrypt$<salt>$<hash>
  firstName: string;
  lastName: string;
  mobile: string;
}

export interface Customer extends UserBase {
  role: 'CUSTOMER';
  address: string;
  funds: number;        // cents, >= 0
  isStudent: boolean;
  vipExpiry: string | null; // YYYY-MM-DD, inclusive
  vipYears: number;     // total years ever purchased
}

export interface Administrator extends UserBase {
  role: 'ADMIN';
}

export type User = Customer | Administrator;

export interface CartLine {
  sku: string;
  quantity: number;     // 1..10
}

export interface CheckoutRequest {
  fulfilment: Fulfilment;
  deliveryAddress?: string | undefined; // required for DELIVERY
  storeId?: string | undefined;         // optional pickup location
  promoCode?: string | undefined;
}

export interface OrderLine {
  sku: string;
  name: string;
  quantity: number;
  unitPrice: number;    // cents, snapshot at confirmation
  lineTotal: number;    // unitPrice * quantity
}

export interface Order {
  orderId: string;      // ORD-XXXXXXXX, generated
  email: string;
  createdAt: string;    // ISO 8601 timestamp
  fulfilment: Fulfilment;
  deliveryAddress: string; // empty for PICKUP
  storeId: string;      // empty unless a pickup store was chosen
  promoCode: string;    // empty when no promotion applied
  vipPricing: boolean;
  lines: OrderLine[];
  subtotal: number;     // sum of lineTotals, cents
  studentDiscount: number;
  promoDiscount: number;
  deliveryFee: number;
  total: number;        // subtotal - discounts + deliveryFee, >= 0
}

export interface PickupStore {
  storeId: string;
  name: string;
  address: string;
  phone: string;
  hours: string;
}

export type MembershipAction = 'BUY' | 'RENEW' | 'CANCEL';

export interface MembershipEvent {
  email: string;
  action: MembershipAction;
  years: number;
  amount: number;       // cents charged, 0 for CANCEL
  at: string;           // ISO 8601 timestamp
  expiry: string | null; // expiry after the event
}
