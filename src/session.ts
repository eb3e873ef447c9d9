import { Cart, type ProductLookup } from './cart';
import { AuthorizationError } from './errors';
import type { Store } from './repository';
import type { Administrator, Customer, User } from './types';

export type Clock = () => Date;

/**
 * Everything an operation needs to know about who is acting. Passed
 * explicitly; there is no process-wide "current user".
 */
export interface Session {
  user: User;
  cart: Cart;
  now: Clock;
}

export function startSession(user: User, catalog: ProductLookup, now: Clock = () => new Date()): Session {
  return { user, cart: new Cart(catalog), now };
}

export function requireCustomer(session: Session): Customer {
  if (session.user.role !== 'CUSTOMER') {
    throw new AuthorizationError('CUSTOMER');
  }
  return session.user;
}

export function requireAdmin(session: Session): Administrator {
  if (session.user.role !== 'ADMIN') {
    throw new AuthorizationError('ADMIN');
  }
  return session.user;
}

/**
 * Calendar date as YYYY-MM-DD, always in UTC. VIP expiry checks use this, so
 * the day rolls over at midnight UTC whatever the host's time zone.
 */
export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function today(session: Session): string {
  return isoDate(session.now());
}

/** The session's customer as currently stored, so funds and VIP are fresh. */
export async function loadCustomer(session: Session, users: Store<User>): Promise<Customer> {
  const customer = requireCustomer(session);
  const stored = await users.findByKey(customer.email);
  return stored?.role === 'CUSTOMER' ? stored : customer;
}

/**
 * Writes an updated customer and refreshes the session. A failed write puts
 * the previous record back in the store.
 */
export async function saveCustomer(session: Session, users: Store<User>, updated: Customer): Promise<Customer> {
  const previous = await users.findByKey(updated.email);
  await users.upsert(updated);
  try {
    await users.saveAll();
  } catch (err) {
    if (previous) await users.upsert(previous);
    throw err;
  }
  session.user = updated;
  return updated;
}
