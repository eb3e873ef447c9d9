import { getErrorMessage, InputValidationError, InsufficientFundsError, MembershipError } from './errors';
import { log } from './log';
import type { AppendLog, Store } from './repository';
import { loadCustomer, requireCustomer, saveCustomer, today, type Session } from './session';
import type { Customer, MembershipAction, MembershipEvent, User } from './types';

export const VIP_COST_PER_YEAR = 2000; // cents

export type VipState = 'NONE' | 'ACTIVE' | 'EXPIRED';

export interface VipStatus {
  state: VipState;
  expiry: string | null;
  daysRemaining: number;
}

export interface MembershipDeps {
  users: Store<User>;
  history: AppendLog<MembershipEvent>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function parseDate(date: string): Date {
  return new Date(`${date}T00:00:00Z`);
}

/** Adds calendar years to a YYYY-MM-DD date; 29 Feb rolls to 1 Mar. */
export function addYears(date: string, years: number): string {
  const d = parseDate(date);
  d.setUTCFullYear(d.getUTCFullYear() + years);
  return d.toISOString().slice(0, 10);
}

export function isVipActive(customer: Customer, onDate: string): boolean {
  return customer.vipExpiry !== null && customer.vipExpiry >= onDate;
}

export function vipStatus(customer: Customer, onDate: string): VipStatus {
  if (customer.vipExpiry === null) {
    return { state: 'NONE', expiry: null, daysRemaining: 0 };
  }
  if (!isVipActive(customer, onDate)) {
    return { state: 'EXPIRED', expiry: customer.vipExpiry, daysRemaining: 0 };
  }
  const days = Math.round((parseDate(customer.vipExpiry).getTime() - parseDate(onDate).getTime()) / DAY_MS);
  return { state: 'ACTIVE', expiry: customer.vipExpiry, daysRemaining: days };
}

/**
 * Saves the customer, then records the event. If the event cannot be written
 * the previous customer record is put back.
 */
async function commit(
  session: Session,
  deps: MembershipDeps,
  previous: Customer,
  updated: Customer,
  event: MembershipEvent,
): Promise<void> {
  await saveCustomer(session, deps.users, updated);
  try {
    await deps.history.append(event);
  } catch (err) {
    await deps.users.upsert(previous);
    session.user = previous;
    await deps.users.saveAll().catch((restoreErr: unknown) => {
      log({ level: 'error', action: 'vip.rollback_failed', email: previous.email, error: getErrorMessage(restoreErr) });
    });
    throw err;
  }
}

/**
 * Buys or renews VIP at {@link VIP_COST_PER_YEAR} per year, paid from funds.
 * An active membership is extended from its current expiry; otherwise the new
 * term starts today.
 */
export async function purchaseVip(session: Session, deps: MembershipDeps, years: number): Promise<MembershipEvent> {
  if (!Number.isInteger(years) || years < 1) {
    throw new InputValidationError('Years must be a whole number of at least 1', 'years');
  }

  const customer = await loadCustomer(session, deps.users);
  const cost = VIP_COST_PER_YEAR * years;
  if (customer.funds < cost) {
    throw new InsufficientFundsError(cost, customer.funds);
  }

  const onDate = today(session);
  const activeExpiry = isVipActive(customer, onDate) ? customer.vipExpiry : null;
  const expiry = addYears(activeExpiry ?? onDate, years);
  const action: MembershipAction = activeExpiry ? 'RENEW' : 'BUY';

  const updated: Customer = {
    ...customer,
    funds: customer.funds - cost,
    vipExpiry: expiry,
    vipYears: customer.vipYears + years,
  };
  const event: MembershipEvent = {
    email: customer.email,
    action,
    years,
    amount: cost,
    at: session.now().toISOString(),
    expiry,
  };

  await commit(session, deps, customer, updated, event);
  log({ level: 'info', action: 'vip.purchase', email: customer.email, kind: action, years, expiry });
  return event;
}

/**
 * Cancels an active membership. Non-refundable; VIP pricing stops at once.
 */
export async function cancelVip(session: Session, deps: MembershipDeps): Promise<MembershipEvent> {
  const customer = await loadCustomer(session, deps.users);
  if (!isVipActive(customer, today(session))) {
    throw new MembershipError('No active VIP membership to cancel');
  }

  const updated: Customer = { ...customer, vipExpiry: null };
  const event: MembershipEvent = {
    email: customer.email,
    action: 'CANCEL',
    years: 0,
    amount: 0,
    at: session.now().toISOString(),
    expiry: null,
  };

  await commit(session, deps, customer, updated, event);
  log({ level: 'info', action: 'vip.cancel', email: customer.email });
  return event;
}

export async function membershipHistory(session: Session, history: AppendLog<MembershipEvent>): Promise<MembershipEvent[]> {
  const customer = requireCustomer(session);
  const events = await history.loadAll();
  return events.filter((event) => event.email === customer.email);
}
