import {
  authenticate,
  hashPassword,
  normalizeEmail,
  orderHistory,
  topUpFunds,
  updateContact,
  verifyPassword,
} from '../src/accounts';
import { AuthenticationError, InputValidationError } from '../src/errors';
import { setLogSink } from '../src/log';
import { MemoryLog } from '../src/repository';
import { startSession } from '../src/session';
import type { Order } from '../src/types';
import { clock, makeCustomer, makeOrder, productStore, userStore } from './helpers';

beforeAll(() => {
  setLogSink(() => undefined);
});

afterAll(() => {
  setLogSink();
});

// ---------------------------------------------------------------------------
// Passwords and login
// ---------------------------------------------------------------------------

test('password hashes verify only the original password', () => {
  const stored = hashPassword('test-secret');

  expect(stored).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{64}$/);
  expect(verifyPassword('test-secret', stored)).toBe(true);
  expect(verifyPassword('wrong', stored)).toBe(false);
  expect(verifyPassword('test-secret', 'plain-text')).toBe(false);
});

test('the same password hashes differently with a fresh salt', () => {
  expect(hashPassword('test-secret')).not.toBe(hashPassword('test-secret'));
});

test('normalizeEmail lower-cases and rejects malformed addresses', () => {
  expect(normalizeEmail('  Casey@Example.TEST ')).toBe('casey@example.test');
  expect(() => normalizeEmail('not-an-email')).toThrow(InputValidationError);
});

test('authenticate accepts the right password for any email casing', async () => {
  const users = userStore([makeCustomer({ passwordHash: hashPassword('test-secret') })]);

  const user = await authenticate(users, 'Shopper@Example.test', 'test-secret');

  expect(user.email).toBe('shopper@example.test');
});

test('unknown email and wrong password fail the same way', async () => {
  const users = userStore([makeCustomer({ passwordHash: hashPassword('test-secret') })]);

  await expect(authenticate(users, 'shopper@example.test', 'wrong')).rejects.toThrow('Invalid email or password');
  await expect(authenticate(users, 'nobody@example.test', 'test-secret')).rejects.toBeInstanceOf(AuthenticationError);
});

// ---------------------------------------------------------------------------
// Funds
// ---------------------------------------------------------------------------

test('top-up adds to funds and persists', async () => {
  const customer = makeCustomer({ funds: 1000 });
  const users = userStore([customer]);
  const session = startSession(customer, productStore(), clock);

  const updated = await topUpFunds(session, users, 2550);

  expect(updated.funds).toBe(3550);
  expect(await users.findByKey(customer.email)).toMatchObject({ funds: 3550 });
  expect(users.saveCount).toBe(1);
});

test.each([0, -100, 100001, 12.5])('top-up of %p cents is rejected', async (amount) => {
  const customer = makeCustomer();
  const session = startSession(customer, productStore(), clock);

  await expect(topUpFunds(session, userStore([customer]), amount)).rejects.toThrow(
    'Top-up must be more than $0.00 and at most $1000.00',
  );
});

// ---------------------------------------------------------------------------
// Contact details and history
// ---------------------------------------------------------------------------

test('updateContact changes mobile and address, keeping blanks as they were', async () => {
  const customer = makeCustomer();
  const users = userStore([customer]);
  const session = startSession(customer, productStore(), clock);

  const updated = await updateContact(session, users, { mobile: '0411 222 333', address: '  ' });

  expect(updated.mobile).toBe('0411 222 333');
  expect(updated.address).toBe('12 Test Street');
});

test.each(['12345', '0400-111-222', '1234567890123456'])('mobile %p is rejected', async (mobile) => {
  const customer = makeCustomer();
  const session = startSession(customer, productStore(), clock);

  await expect(updateContact(session, userStore([customer]), { mobile })).rejects.toBeInstanceOf(InputValidationError);
});

test('order history is the customer’s own orders, newest first', async () => {
  const customer = makeCustomer();
  const session = startSession(customer, productStore(), clock);
  const orders = new MemoryLog<Order>([
    makeOrder({ orderId: 'ORD-A', createdAt: '2026-01-01T09:00:00.000Z' }),
    makeOrder({ orderId: 'ORD-B', createdAt: '2026-01-10T09:00:00.000Z' }),
    makeOrder({ orderId: 'ORD-C', email: 'other@example.test' }),
  ]);

  const history = await orderHistory(session, orders);

  expect(history.map((o) => o.orderId)).toEqual(['ORD-B', 'ORD-A']);
});
