import { randomBytes, scryptSync, timingSafeEqual } from 'crypto';
import { AuthenticationError, InputValidationError } from './errors';
import { log } from './log';
import { formatMoney } from './money';
import type { AppendLog, Store } from './repository';
import { loadCustomer, requireCustomer, saveCustomer, type Session } from './session';
import type { Customer, Order, User } from './types';

export const MAX_TOP_UP = 100000; // cents per transaction

const KEY_LENGTH = 32;
const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const MOBILE_RE = /^[\d ]+$/;

export function hashPassword(password: string, salt: Buffer = randomBytes(16)): string {
  const hash = scryptSync(password, salt, KEY_LENGTH);
  return `scrypt$${salt.toString('hex')}$${hash.toString('hex')}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [scheme, saltHex, hashHex] = stored.split('$');
  if (scheme !== 'scrypt' || !saltHex || !hashHex) return false;
  const expected = Buffer.from(hashHex, 'hex');
  const actual = scryptSync(password, Buffer.from(saltHex, 'hex'), expected.length);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

export function normalizeEmail(email: string): string {
  const normalized = email.trim().toLowerCase();
  if (!EMAIL_RE.test(normalized)) {
    throw new InputValidationError(`Invalid email address: "${email.trim()}"`, 'email');
  }
  return normalized;
}

/**
 * Looks up a user by email and checks the password. Unknown emails and wrong
 * passwords fail with the same error.
 */
export async function authenticate(users: Store<User>, email: string, password: string): Promise<User> {
  const key = normalizeEmail(email);
  const user = await users.findByKey(key);
  if (!user || !verifyPassword(password, user.passwordHash)) {
    log({ level: 'warn', action: 'auth.failed', email: key });
    throw new AuthenticationError();
  }
  log({ level: 'info', action: 'auth.login', email: key, role: user.role });
  return user;
}

export async function topUpFunds(session: Session, users: Store<User>, amount: number): Promise<Customer> {
  if (!Number.isInteger(amount) || amount <= 0 || amount > MAX_TOP_UP) {
    throw new InputValidationError(
      `Top-up must be more than $0.00 and at most ${formatMoney(MAX_TOP_UP)}`,
      'amount',
    );
  }
  const customer = await loadCustomer(session, users);
  const updated = await saveCustomer(session, users, { ...customer, funds: customer.funds + amount });
  log({ level: 'info', action: 'funds.topup', email: customer.email, amount, balance: updated.funds });
  return updated;
}

export interface ContactUpdate {
  mobile?: string | undefined;
  address?: string | undefined;
}

/** Only mobile and address may change; blank fields are left as they are. */
export async function updateContact(session: Session, users: Store<User>, patch: ContactUpdate): Promise<Customer> {
  const customer = await loadCustomer(session, users);
  const mobile = patch.mobile?.trim();
  const address = patch.address?.trim();

  if (mobile) {
    const digits = mobile.replace(/ /g, '').length;
    if (!MOBILE_RE.test(mobile) || digits < 8 || digits > 15) {
      throw new InputValidationError('Mobile must contain 8 to 15 digits (spaces allowed)', 'mobile');
    }
  }

  return saveCustomer(session, users, {
    ...customer,
    mobile: mobile || customer.mobile,
    address: address || customer.address,
  });
}

/** The customer's orders, newest first. */
export async function orderHistory(session: Session, orders: AppendLog<Order>): Promise<Order[]> {
  const customer = requireCustomer(session);
  const all = await orders.loadAll();
  return all
    .filter((order) => order.email === customer.email)
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}
