import { promises as fs } from 'fs';
import path from 'path';
import { hashPassword } from './accounts';
import { CsvLog, CsvStore, writeCsv } from './csv-store';
import { PersistenceError, getErrorMessage, toError } from './errors';
import { log } from './log';
import {
  membershipCodec,
  orderCodec,
  pickupStoreCodec,
  productCodec,
  userCodec,
  type RecordCodec,
} from './records';
import type { AppendLog, Store } from './repository';
import type { MembershipEvent, Order, PickupStore, Product, User } from './types';

export interface MarketData {
  products: Store<Product>;
  users: Store<User>;
  pickupStores: Store<PickupStore>;
  orders: AppendLog<Order>;
  memberships: AppendLog<MembershipEvent>;
}

export const DATA_FILES = {
  products: 'products.csv',
  users: 'users.csv',
  orders: 'orders.csv',
  pickupStores: 'stores.csv',
  memberships: 'membership.csv',
} as const;

/**
 * Accounts provisioned when users.csv is missing or empty. The passwords are
 * placeholders for trying the app locally.
 */
export function seedUsers(staffEmailDomain: string): User[] {
  return [
    {
      role: 'CUSTOMER',
      email: `student@student.${staffEmailDomain}`,
      passwordHash: hashPassword('student-pass'),
      firstName: 'Sam',
      lastName: 'Student',
      mobile: '0400 000 001',
      address: '8 College Walk',
      funds: 100000,
      isStudent: true,
      vipExpiry: null,
      vipYears: 0,
    },
    {
      role: 'CUSTOMER',
      email: `staff@${staffEmailDomain}`,
      passwordHash: hashPassword('staff-pass'),
      firstName: 'Stella',
      lastName: 'Staff',
      mobile: '0400 000 002',
      address: '1 Main Road',
      funds: 100000,
      isStudent: false,
      vipExpiry: null,
      vipYears: 0,
    },
    {
      role: 'ADMIN',
      email: `admin@${staffEmailDomain}`,
      passwordHash: hashPassword('admin-pass'),
      firstName: 'Ada',
      lastName: 'Admin',
      mobile: '0400 000 003',
    },
  ];
}

export const SEED_PICKUP_STORES: readonly PickupStore[] = [
  { storeId: 'S1', name: 'North Campus', address: '900 North Road', phone: '03 9999 9999', hours: '9-5 Mon-Fri' },
  { storeId: 'S2', name: 'South Campus', address: '20 South Road', phone: '03 8888 8888', hours: '9-5 Mon-Fri' },
];

async function ensureFile<T>(filePath: string, codec: RecordCodec<T>): Promise<void> {
  try {
    await fs.access(filePath);
  } catch {
    await writeCsv(filePath, codec, []);
  }
}

async function seedIfEmpty<T>(store: Store<T>, records: () => readonly T[], file: string): Promise<void> {
  if ((await store.loadAll()).length > 0) return;
  const seeded = records();
  for (const record of seeded) {
    await store.upsert(record);
  }
  await store.saveAll();
  log({ level: 'info', action: 'data.seed', file, records: seeded.length });
}

/**
 * Creates the data directory and any missing CSV files, seeds default
 * accounts and pickup stores, and returns the stores backed by those files.
 * Any failure here is a PersistenceError the caller treats as fatal.
 */
export async function openMarketData(dataDir: string, staffEmailDomain: string): Promise<MarketData> {
  const file = (name: string) => path.join(dataDir, name);

  try {
    await fs.mkdir(dataDir, { recursive: true });
  } catch (err) {
    throw new PersistenceError(`Cannot create data directory: ${getErrorMessage(err)}`, dataDir, toError(err));
  }

  await ensureFile(file(DATA_FILES.products), productCodec);
  await ensureFile(file(DATA_FILES.users), userCodec);
  await ensureFile(file(DATA_FILES.orders), orderCodec);
  await ensureFile(file(DATA_FILES.pickupStores), pickupStoreCodec);
  await ensureFile(file(DATA_FILES.memberships), membershipCodec);

  const data: MarketData = {
    products: new CsvStore(file(DATA_FILES.products), productCodec),
    users: new CsvStore(file(DATA_FILES.users), userCodec),
    pickupStores: new CsvStore(file(DATA_FILES.pickupStores), pickupStoreCodec),
    orders: new CsvLog(file(DATA_FILES.orders), orderCodec),
    memberships: new CsvLog(file(DATA_FILES.memberships), membershipCodec),
  };

  await seedIfEmpty(data.users, () => seedUsers(staffEmailDomain), DATA_FILES.users);
  await seedIfEmpty(data.pickupStores, () => SEED_PICKUP_STORES, DATA_FILES.pickupStores);

  return data;
}
