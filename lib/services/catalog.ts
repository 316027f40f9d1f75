import { auditPriceChange, auditStockChange } from '@/lib/audit-log';
import {
  DuplicateRecordError,
  InsufficientStockError,
  NotFoundError,
  ProtectedRecordError,
  StockConflictError,
  ValidationError,
} from '@/lib/errors';
import { getErrorMessage } from '@/lib/logger';
import { nowIso, type ShopContext } from '@/lib/shop-context';
import type { Category, ID, Product } from '@/lib/shop-types';
import type { ProductPatch } from '@/lib/store/types';
import {
  categoryInputSchema,
  idField,
  parseInput,
  productInputSchema,
  productUpdateSchema,
  stockScanSchema,
} from '@/lib/validation';

// Restores run after a failure elsewhere and must land even if a concurrent write bumped the version.
const RESTORE_ATTEMPTS = 5;

export function isLowStock(product: Pick<Product, 'stock_quantity' | 'reorder_threshold'>) {
  return product.stock_quantity <= product.reorder_threshold;
}

/* ===========================
   Categories
   =========================== */

export async function listCategories(ctx: ShopContext) {
  return ctx.store.categories.list();
}

async function assertCategoryNameFree(ctx: ShopContext, name: string, ownId?: ID) {
  const existing = await ctx.store.categories.getByName(name);
  if (existing && existing.id !== ownId) {
    throw new DuplicateRecordError('name', `Category "${existing.name}" already exists.`);
  }
}

export async function createCategory(ctx: ShopContext, raw: unknown): Promise<Category> {
  const input = parseInput(categoryInputSchema, raw);
  await assertCategoryNameFree(ctx, input.name);
  const category = await ctx.store.categories.insert({ ...input, created_at: nowIso(ctx) });
  ctx.logger.info('category_created', { requestId: ctx.requestId, categoryId: category.id });
  return category;
}

export async function updateCategory(ctx: ShopContext, raw: unknown): Promise<Category> {
  const input = parseInput(categoryInputSchema.partial().extend({ id: idField('id') }), raw);
  const { id, ...patch } = input;
  if (patch.name !== undefined) await assertCategoryNameFree(ctx, patch.name, id);
  const updated = await ctx.store.categories.update(id, patch);
  if (!updated) throw new NotFoundError('Category', id);
  return updated;
}

/** Products of a deleted category stay in the catalog, uncategorised. */
export async function deleteCategory(ctx: ShopContext, id: ID) {
  const category = await ctx.store.categories.getById(id);
  if (!category) throw new NotFoundError('Category', id);
  await ctx.store.products.clearCategory(id);
  await ctx.store.categories.delete(id);
  ctx.logger.info('category_deleted', { requestId: ctx.requestId, categoryId: id });
}

/* ===========================
   Products
   =========================== */

export interface ProductListOptions {
  query?: string;
  categoryId?: ID;
  activeOnly?: boolean;
  lowStockOnly?: boolean;
}

export async function listProducts(ctx: ShopContext, options: ProductListOptions = {}) {
  const products = await ctx.store.products.list({
    query: options.query,
    categoryId: options.categoryId,
    activeOnly: options.activeOnly,
  });
  return options.lowStockOnly ? products.filter(isLowStock) : products;
}

export async function getProduct(ctx: ShopContext, id: ID): Promise<Product> {
  const product = await ctx.store.products.getById(id);
  if (!product) throw new NotFoundError('Product', id);
  return product;
}

async function assertCategoryExists(ctx: ShopContext, categoryId: ID | null | undefined) {
  if (categoryId === null || categoryId === undefined) return;
  const category = await ctx.store.categories.getById(categoryId);
  if (!category) throw ValidationError.single('category_id', 'Category does not exist');
}

async function assertBarcodeFree(ctx: ShopContext, barcode: string | null | undefined, ownId?: ID) {
  if (!barcode) return;
  const existing = await ctx.store.products.getByBarcode(barcode);
  if (existing && existing.id !== ownId) {
    throw new DuplicateRecordError('barcode', `Barcode ${barcode} is already used by ${existing.name}.`);
  }
}

export async function createProduct(ctx: ShopContext, raw: unknown): Promise<Product> {
  const input = parseInput(productInputSchema, raw);
  await assertCategoryExists(ctx, input.category_id);
  await assertBarcodeFree(ctx, input.barcode);

  const timestamp = nowIso(ctx);
  const product = await ctx.store.products.insert({
    ...input,
    version: 0,
    created_at: timestamp,
    updated_at: timestamp,
  });
  ctx.logger.info('product_created', { requestId: ctx.requestId, productId: product.id });
  return product;
}

export async function updateProduct(ctx: ShopContext, raw: unknown): Promise<Product> {
  const { id, ...changes } = parseInput(productUpdateSchema, raw);
  const current = await getProduct(ctx, id);

  const sellingPrice = changes.selling_price ?? current.selling_price;
  const discount = changes.discount ?? current.discount;
  if (discount > sellingPrice) {
    throw ValidationError.single('discount', 'discount must not exceed selling_price');
  }
  await assertCategoryExists(ctx, changes.category_id);
  await assertBarcodeFree(ctx, changes.barcode, id);

  const patch: ProductPatch = { ...changes, updated_at: nowIso(ctx) };
  const updated = await ctx.store.products.update(id, patch);
  if (!updated) throw new NotFoundError('Product', id);

  await auditPriceChange(ctx, id, current.selling_price, updated.selling_price);
  return updated;
}

/**
 * Sold or purchased products keep their history, so they can only be deactivated.
 * Credit entries that named the product keep their item text.
 */
export async function deleteProduct(ctx: ShopContext, id: ID) {
  const product = await getProduct(ctx, id);
  const [lineCount, purchaseCount] = await Promise.all([
    ctx.store.orders.countLinesForProduct(id),
    ctx.store.purchases.countForProduct(id),
  ]);
  if (lineCount > 0 || purchaseCount > 0) {
    throw new ProtectedRecordError(
      `${product.name} appears in ${lineCount} order line(s) and ${purchaseCount} purchase(s). Deactivate it instead.`
    );
  }
  await ctx.store.products.delete(id);
  await ctx.store.credits.clearProduct(id);
  ctx.logger.info('product_deleted', { requestId: ctx.requestId, productId: id });
}

export async function listLowStock(ctx: ShopContext) {
  const products = await ctx.store.products.list({ activeOnly: true });
  return products
    .filter(isLowStock)
    .sort((a, b) => a.stock_quantity - b.stock_quantity || a.name.localeCompare(b.name));
}

/** Barcode first, then a numeric product id. */
export async function findProductByCode(ctx: ShopContext, code: string): Promise<Product> {
  const trimmed = code.trim();
  if (trimmed) {
    const byBarcode = await ctx.store.products.getByBarcode(trimmed);
    if (byBarcode) return byBarcode;
    if (/^\d+$/.test(trimmed)) {
      const byId = await ctx.store.products.getById(Number(trimmed));
      if (byId) return byId;
    }
  }
  throw new NotFoundError('Product', trimmed);
}

/* ===========================
   Stock movements
   =========================== */

/**
 * Writes `product.stock_quantity - quantity` against the version that was read.
 * Throws when stock is short or when another request changed the row first.
 */
export async function decrementStock(ctx: ShopContext, product: Product, quantity: number): Promise<Product> {
  if (quantity > product.stock_quantity) {
    throw new InsufficientStockError([
      {
        productId: product.id,
        productName: product.name,
        requested: quantity,
        available: product.stock_quantity,
      },
    ]);
  }
  const updated = await ctx.store.products.setStock(
    product.id,
    product.stock_quantity - quantity,
    product.version
  );
  if (!updated) throw new StockConflictError(product.id);
  return updated;
}

/** Adds stock back on a fresh read, retrying when the version moved on in between. */
export async function restoreStock(ctx: ShopContext, productId: ID, quantity: number): Promise<Product> {
  for (let attempt = 1; attempt <= RESTORE_ATTEMPTS; attempt += 1) {
    const current = await getProduct(ctx, productId);
    const updated = await ctx.store.products.setStock(
      productId,
      current.stock_quantity + quantity,
      current.version
    );
    if (updated) return updated;
    ctx.logger.warn('stock_restore_retry', { requestId: ctx.requestId, productId, attempt });
  }
  throw new StockConflictError(productId);
}

/** Adjusts stock by `delta` on a fresh read and records the change. */
export async function adjustStock(ctx: ShopContext, productId: ID, delta: number): Promise<Product> {
  const current = await getProduct(ctx, productId);
  const updated =
    delta < 0
      ? await decrementStock(ctx, current, -delta)
      : await restoreStock(ctx, productId, delta);
  await auditStockChange(ctx, productId, updated.stock_quantity - delta, updated.stock_quantity);
  return updated;
}

export async function scanStockIncrement(ctx: ShopContext, raw: unknown): Promise<Product> {
  const input = parseInput(stockScanSchema, raw);
  const product = await findProductByCode(ctx, input.code);
  const updated = await adjustStock(ctx, product.id, input.delta);
  ctx.logger.info('stock_scanned', {
    requestId: ctx.requestId,
    productId: product.id,
    delta: input.delta,
    stock: updated.stock_quantity,
  });
  return updated;
}

/** Puts back stock taken by a failed multi-step write; errors are logged so the original failure surfaces. */
export async function compensateStock(ctx: ShopContext, applied: Array<{ productId: ID; quantity: number }>) {
  for (const entry of [...applied].reverse()) {
    try {
      await restoreStock(ctx, entry.productId, entry.quantity);
    } catch (error) {
      ctx.logger.error('stock_compensation_failed', {
        requestId: ctx.requestId,
        productId: entry.productId,
        quantity: entry.quantity,
        message: getErrorMessage(error),
      });
    }
  }
}
