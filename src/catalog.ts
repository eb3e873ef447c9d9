import { DuplicateProductError, InputValidationError, ProductNotFoundError } from './errors';
import { log } from './log';
import type { AppendLog, Store } from './repository';
import { requireAdmin, type Session } from './session';
import type { Order, Product } from './types';

// ---------------------------------------------------------------------------
// Browsing
// ---------------------------------------------------------------------------

export type Availability = 'IN_STOCK' | 'OUT_OF_STOCK';

export interface ProductFilter {
  category?: string | undefined;
  subcategory?: string | undefined;
  brand?: string | undefined;
  minPrice?: number | undefined;   // cents, inclusive, on the regular price
  maxPrice?: number | undefined;
  search?: string | undefined;     // matched against name and description
  availability?: Availability | undefined;
}

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/** Reads "in" / "out" (any case); blank means either. */
export function parseAvailability(input: string): Availability | undefined {
  switch (input.trim().toLowerCase()) {
    case '':
      return undefined;
    case 'in':
      return 'IN_STOCK';
    case 'out':
      return 'OUT_OF_STOCK';
    default:
      throw new InputValidationError('Availability must be "in" or "out"', 'availability');
  }
}

export function matchesFilter(product: Product, filter: ProductFilter): boolean {
  if (filter.category && !sameText(product.category, filter.category)) return false;
  if (filter.subcategory && !sameText(product.subcategory, filter.subcategory)) return false;
  if (filter.brand && !sameText(product.brand, filter.brand)) return false;
  if (filter.minPrice !== undefined && product.price < filter.minPrice) return false;
  if (filter.maxPrice !== undefined && product.price > filter.maxPrice) return false;
  if (filter.availability === 'IN_STOCK' && product.stock === 0) return false;
  if (filter.availability === 'OUT_OF_STOCK' && product.stock > 0) return false;
  if (filter.search) {
    const needle = filter.search.trim().toLowerCase();
    const haystack = `${product.name} ${product.description}`.toLowerCase();
    if (!haystack.includes(needle)) return false;
  }
  return true;
}

/** In-stock products first, then by name. */
export function compareForDisplay(a: Product, b: Product): number {
  const stocked = Number(b.stock > 0) - Number(a.stock > 0);
  return stocked !== 0 ? stocked : a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

export async function listProducts(products: Store<Product>, filter: ProductFilter = {}): Promise<Product[]> {
  if (filter.minPrice !== undefined && filter.maxPrice !== undefined && filter.minPrice > filter.maxPrice) {
    throw new InputValidationError('Minimum price cannot exceed maximum price', 'price');
  }
  const all = await products.loadAll();
  return all.filter((product) => matchesFilter(product, filter)).sort(compareForDisplay);
}

/** Distinct non-blank values of a field, sorted, for the filter prompts. */
export async function distinctValues(
  products: Store<Product>,
  field: 'category' | 'subcategory' | 'brand',
): Promise<string[]> {
  const values = new Set((await products.loadAll()).map((product) => product[field]).filter((v) => v !== ''));
  return [...values].sort((a, b) => a.localeCompare(b));
}

// ---------------------------------------------------------------------------
// Admin CRUD
// ---------------------------------------------------------------------------

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function normalizeSku(sku: string): string {
  return sku.trim().toUpperCase();
}

/**
 * Checks a product's fields and returns it with the SKU normalized.
 */
export function validateProduct(product: Product): Product {
  const sku = normalizeSku(product.sku);
  if (!/^[A-Z0-9-]+$/.test(sku)) {
    throw new InputValidationError('SKU must contain only letters, digits and dashes', 'sku');
  }
  if (!product.name.trim()) {
    throw new InputValidationError('Name is required', 'name');
  }
  if (!product.category.trim()) {
    throw new InputValidationError('Category is required', 'category');
  }
  if (!Number.isInteger(product.price) || product.price <= 0) {
    throw new InputValidationError('Price must be greater than zero', 'price');
  }
  if (!Number.isInteger(product.vipPrice) || product.vipPrice <= 0 || product.vipPrice > product.price) {
    throw new InputValidationError('VIP price must be greater than zero and no more than the price', 'vipPrice');
  }
  if (!Number.isInteger(product.stock) || product.stock < 0) {
    throw new InputValidationError('Stock must be a whole number of zero or more', 'stock');
  }
  if (product.perishable && !DATE_RE.test(product.perishable.expiryDate)) {
    throw new InputValidationError('Expiry date must be YYYY-MM-DD', 'expiryDate');
  }
  return { ...product, sku, name: product.name.trim(), category: product.category.trim() };
}

async function persist(products: Store<Product>, key: string, previous: Product | null): Promise<void> {
  try {
    await products.saveAll();
  } catch (err) {
    if (previous) {
      await products.upsert(previous);
    } else {
      await products.remove(key);
    }
    throw err;
  }
}

export async function addProduct(session: Session, products: Store<Product>, input: Product): Promise<Product> {
  const admin = requireAdmin(session);
  const product = validateProduct(input);
  if (await products.findByKey(product.sku)) {
    throw new DuplicateProductError(product.sku);
  }
  await products.upsert(product);
  await persist(products, product.sku, null);
  log({ level: 'info', action: 'catalog.add', email: admin.email, sku: product.sku });
  return product;
}

export type ProductPatch = Partial<Omit<Product, 'sku'>>;

export async function editProduct(
  session: Session,
  products: Store<Product>,
  sku: string,
  patch: ProductPatch,
): Promise<Product> {
  const admin = requireAdmin(session);
  const key = normalizeSku(sku);
  const existing = await products.findByKey(key);
  if (!existing) {
    throw new ProductNotFoundError(key);
  }
  const updated = validateProduct({ ...existing, ...patch, sku: key });
  await products.upsert(updated);
  await persist(products, key, existing);
  log({ level: 'info', action: 'catalog.edit', email: admin.email, sku: key, fields: Object.keys(patch) });
  return updated;
}

/** Orders already placed keep their own price snapshots. */
export async function deleteProduct(session: Session, products: Store<Product>, sku: string): Promise<Product> {
  const admin = requireAdmin(session);
  const key = normalizeSku(sku);
  const existing = await products.findByKey(key);
  if (!existing) {
    throw new ProductNotFoundError(key);
  }
  await products.remove(key);
  await persist(products, key, existing);
  log({ level: 'info', action: 'catalog.delete', email: admin.email, sku: key });
  return existing;
}

export async function listAllOrders(session: Session, orders: AppendLog<Order>): Promise<Order[]> {
  requireAdmin(session);
  return orders.loadAll();
}
