import {
  addProduct,
  deleteProduct,
  distinctValues,
  editProduct,
  listAllOrders,
  listProducts,
  parseAvailability,
  validateProduct,
} from '../src/catalog';
import {
  AuthorizationError,
  DuplicateProductError,
  InputValidationError,
  ProductNotFoundError,
} from '../src/errors';
import { setLogSink } from '../src/log';
import { MemoryLog, MemoryStore } from '../src/repository';
import { startSession } from '../src/session';
import type { Order, Product } from '../src/types';
import { clock, makeAdmin, makeCustomer, makeOrder, makeProduct, productStore } from './helpers';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function shelf(): MemoryStore<Product> {
  return productStore([
    makeProduct(),
    makeProduct({ sku: 'BREAD-1', name: 'Sourdough Loaf', brand: 'Baker St', category: 'Bakery', subcategory: 'Bread', price: 650, vipPrice: 600, description: 'Crusty sourdough' }),
    makeProduct({ sku: 'YOG-1', name: 'Greek Yoghurt', category: 'Dairy', subcategory: 'Yoghurt', price: 450, vipPrice: 400, stock: 0 }),
  ]);
}

const adminSession = (products: MemoryStore<Product>) => startSession(makeAdmin(), products, clock);

beforeAll(() => {
  setLogSink(() => undefined);
});

afterAll(() => {
  setLogSink();
});

// ---------------------------------------------------------------------------
// Browsing
// ---------------------------------------------------------------------------

test('filters combine', async () => {
  const products = shelf();

  const dairy = await listProducts(products, { category: 'dairy' });
  expect(dairy.map((p) => p.sku)).toEqual(['MILK-1', 'YOG-1']);

  const cheapDairy = await listProducts(products, { category: 'Dairy', maxPrice: 500 });
  expect(cheapDairy.map((p) => p.sku)).toEqual(['YOG-1']);

  const inStock = await listProducts(products, { category: 'Dairy', availability: 'IN_STOCK' });
  expect(inStock.map((p) => p.sku)).toEqual(['MILK-1']);
});

test('subcategory and out-of-stock filters', async () => {
  const products = shelf();

  expect((await listProducts(products, { subcategory: 'yoghurt' })).map((p) => p.sku)).toEqual(['YOG-1']);
  expect((await listProducts(products, { availability: 'OUT_OF_STOCK' })).map((p) => p.sku)).toEqual(['YOG-1']);
  expect(await listProducts(products, { subcategory: 'Bread', availability: 'OUT_OF_STOCK' })).toEqual([]);
});

test('listing puts in-stock products first, then sorts by name', async () => {
  const products = productStore([
    makeProduct({ sku: 'JUICE-1', name: 'Apple Juice', stock: 0 }),
    makeProduct({ sku: 'ZUC-1', name: 'Zucchini', stock: 3 }),
    makeProduct({ sku: 'BAN-1', name: 'banana', stock: 2 }),
  ]);

  expect((await listProducts(products)).map((p) => p.sku)).toEqual(['BAN-1', 'ZUC-1', 'JUICE-1']);
});

test.each<[string, string | undefined]>([
  ['', undefined],
  ['In', 'IN_STOCK'],
  [' out ', 'OUT_OF_STOCK'],
])('parseAvailability(%p)', (input, expected) => {
  expect(parseAvailability(input)).toBe(expected);
});

test('parseAvailability rejects anything else', () => {
  expect(() => parseAvailability('maybe')).toThrow('Availability must be "in" or "out"');
});

test('search matches name and description', async () => {
  const products = shelf();

  expect((await listProducts(products, { search: 'CRUSTY' })).map((p) => p.sku)).toEqual(['BREAD-1']);
  expect((await listProducts(products, { search: 'yoghurt' })).map((p) => p.sku)).toEqual(['YOG-1']);
});

test('price range bounds are inclusive and must be ordered', async () => {
  const products = shelf();

  expect((await listProducts(products, { minPrice: 650, maxPrice: 650 })).map((p) => p.sku)).toEqual(['BREAD-1']);
  await expect(listProducts(products, { minPrice: 1000, maxPrice: 100 })).rejects.toBeInstanceOf(InputValidationError);
});

test('distinctValues is sorted and unique', async () => {
  expect(await distinctValues(shelf(), 'category')).toEqual(['Bakery', 'Dairy']);
  expect(await distinctValues(shelf(), 'subcategory')).toEqual(['Bread', 'Milk', 'Yoghurt']);
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

test('validateProduct normalizes the SKU', () => {
  expect(validateProduct(makeProduct({ sku: ' tea-2 ' })).sku).toBe('TEA-2');
});

test.each<[string, Partial<Product>]>([
  ['sku', { sku: 'BAD SKU' }],
  ['name', { name: ' ' }],
  ['category', { category: '' }],
  ['price', { price: 0 }],
  ['vipPrice', { vipPrice: 2500 }],
  ['stock', { stock: -1 }],
  ['expiryDate', { perishable: { expiryDate: '15/01/2026', ingredients: '', storage: '', allergens: '' } }],
])('invalid %s is rejected', (field, overrides) => {
  try {
    validateProduct(makeProduct(overrides));
    throw new Error('expected validation to fail');
  } catch (err) {
    expect(err).toBeInstanceOf(InputValidationError);
    expect(err).toMatchObject({ field });
  }
});

// ---------------------------------------------------------------------------
// Admin CRUD
// ---------------------------------------------------------------------------

test('add, edit and delete a product', async () => {
  const products = shelf();
  const session = adminSession(products);

  await addProduct(session, products, makeProduct({ sku: 'tea-1', name: 'Green Tea', price: 500, vipPrice: 450 }));
  expect(await products.findByKey('TEA-1')).toMatchObject({ name: 'Green Tea', price: 500 });

  const edited = await editProduct(session, products, 'tea-1', { stock: 40, price: 550 });
  expect(edited).toMatchObject({ sku: 'TEA-1', stock: 40, price: 550, vipPrice: 450 });

  await deleteProduct(session, products, 'TEA-1');
  expect(await products.findByKey('TEA-1')).toBeNull();
  expect(products.saveCount).toBe(3);
});

test('duplicate and missing SKUs are rejected', async () => {
  const products = shelf();
  const session = adminSession(products);

  await expect(addProduct(session, products, makeProduct())).rejects.toBeInstanceOf(DuplicateProductError);
  await expect(editProduct(session, products, 'nope', {})).rejects.toThrow('Product NOPE not found');
  await expect(deleteProduct(session, products, 'nope')).rejects.toBeInstanceOf(ProductNotFoundError);
});

test('an edit that fails validation leaves the product as it was', async () => {
  const products = shelf();
  const session = adminSession(products);

  await expect(editProduct(session, products, 'MILK-1', { vipPrice: 5000 })).rejects.toBeInstanceOf(InputValidationError);
  expect(await products.findByKey('MILK-1')).toMatchObject({ vipPrice: 1799 });
});

test('a failed save restores the previous product', async () => {
  class FailingSaveStore extends MemoryStore<Product> {
    override async saveAll(): Promise<void> {
      throw new Error('disk full');
    }
  }
  const products = new FailingSaveStore((p) => p.sku, [makeProduct()]);
  const session = adminSession(products);

  await expect(editProduct(session, products, 'MILK-1', { stock: 99 })).rejects.toThrow('disk full');
  expect(await products.findByKey('MILK-1')).toMatchObject({ stock: 5 });

  await expect(deleteProduct(session, products, 'MILK-1')).rejects.toThrow('disk full');
  expect(await products.findByKey('MILK-1')).not.toBeNull();
});

test('customers cannot manage products or see all orders', async () => {
  const products = shelf();
  const session = startSession(makeCustomer(), products, clock);

  await expect(deleteProduct(session, products, 'MILK-1')).rejects.toBeInstanceOf(AuthorizationError);
  await expect(listAllOrders(session, new MemoryLog<Order>())).rejects.toThrow('This action requires an administrator account');
});

test('admins see every order', async () => {
  const products = shelf();
  const orders = new MemoryLog<Order>([makeOrder(), makeOrder({ orderId: 'ORD-2', email: 'other@example.test' })]);

  expect(await listAllOrders(adminSession(products), orders)).toHaveLength(2);
});
