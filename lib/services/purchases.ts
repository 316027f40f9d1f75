import { auditPriceChange, auditStockChange } from '@/lib/audit-log';
import { NotFoundError, ProtectedRecordError } from '@/lib/errors';
import { getErrorMessage } from '@/lib/logger';
import { lineSubtotal } from '@/lib/money';
import { nowIso, todayIso, type ShopContext } from '@/lib/shop-context';
import type { ID, Product, Purchase, Wholesaler } from '@/lib/shop-types';
import { decrementStock, getProduct, restoreStock } from '@/lib/services/catalog';
import { parseInput, purchaseInputSchema, wholesalerInputSchema, type PurchaseInput } from '@/lib/validation';

export interface PurchaseRow extends Purchase {
  wholesaler_name: string;
  product_name: string;
  total_cost: number;
}

/* ===========================
   Wholesalers
   =========================== */

export async function listWholesalers(ctx: ShopContext) {
  return ctx.store.wholesalers.list();
}

export async function createWholesaler(ctx: ShopContext, raw: unknown): Promise<Wholesaler> {
  const input = parseInput(wholesalerInputSchema, raw);
  const wholesaler = await ctx.store.wholesalers.insert({ ...input, created_at: nowIso(ctx) });
  ctx.logger.info('wholesaler_created', { requestId: ctx.requestId, wholesalerId: wholesaler.id });
  return wholesaler;
}

export async function deleteWholesaler(ctx: ShopContext, id: ID) {
  const wholesaler = await ctx.store.wholesalers.getById(id);
  if (!wholesaler) throw new NotFoundError('Wholesaler', id);
  const purchases = await ctx.store.purchases.countForWholesaler(id);
  if (purchases > 0) {
    throw new ProtectedRecordError(`${wholesaler.name} has ${purchases} recorded purchase(s) and cannot be deleted.`);
  }
  await ctx.store.wholesalers.delete(id);
}

/* ===========================
   Purchases
   =========================== */

async function resolveWholesaler(ctx: ShopContext, input: PurchaseInput): Promise<Wholesaler> {
  if (input.wholesaler_id !== undefined) {
    const wholesaler = await ctx.store.wholesalers.getById(input.wholesaler_id);
    if (!wholesaler) throw new NotFoundError('Wholesaler', input.wholesaler_id);
    return wholesaler;
  }
  const name = input.wholesaler_name ?? '';
  const existing = await ctx.store.wholesalers.getByName(name);
  if (existing) return existing;
  return ctx.store.wholesalers.insert({
    name,
    phone: input.wholesaler_phone,
    email: '',
    address: '',
    created_at: nowIso(ctx),
  });
}

async function resolveProduct(ctx: ShopContext, input: PurchaseInput): Promise<Product> {
  if (input.product_id !== undefined) return getProduct(ctx, input.product_id);
  const timestamp = nowIso(ctx);
  return ctx.store.products.insert({
    category_id: null,
    name: input.new_product_name ?? '',
    description: '',
    image_url: null,
    cost_price: input.unit_cost,
    selling_price: input.selling_price,
    discount: 0,
    stock_quantity: 0,
    reorder_threshold: 5,
    tax_rate_percent: 0,
    expiry_date: input.expiry_date,
    barcode: null,
    unit: 'piece',
    is_active: true,
    version: 0,
    created_at: timestamp,
    updated_at: timestamp,
  });
}

/**
 * Adds the purchased quantity to stock, refreshes the product's cost and
 * selling price, then stores the purchase. Stock is taken back out if the
 * purchase row cannot be written.
 */
export async function recordPurchase(ctx: ShopContext, raw: unknown): Promise<Purchase> {
  const input = parseInput(purchaseInputSchema, raw);
  const wholesaler = await resolveWholesaler(ctx, input);
  const product = await resolveProduct(ctx, input);

  const restocked = await restoreStock(ctx, product.id, input.quantity);
  await auditStockChange(ctx, product.id, restocked.stock_quantity - input.quantity, restocked.stock_quantity);

  let purchase: Purchase;
  try {
    purchase = await ctx.store.purchases.insert({
      wholesaler_id: wholesaler.id,
      product_id: product.id,
      quantity: input.quantity,
      unit_cost: input.unit_cost,
      selling_price: input.selling_price,
      expiry_date: input.expiry_date,
      date: input.date ?? todayIso(ctx),
      created_at: nowIso(ctx),
    });
  } catch (error) {
    ctx.logger.warn('purchase_rolled_back', {
      requestId: ctx.requestId,
      productId: product.id,
      message: getErrorMessage(error),
    });
    await decrementStock(ctx, await getProduct(ctx, product.id), input.quantity);
    throw error;
  }

  const repriced = await ctx.store.products.update(product.id, {
    cost_price: input.unit_cost,
    selling_price: input.selling_price,
    discount: Math.min(restocked.discount, input.selling_price),
    updated_at: nowIso(ctx),
  });
  if (!repriced) throw new NotFoundError('Product', product.id);
  await auditPriceChange(ctx, product.id, product.selling_price, repriced.selling_price);

  ctx.logger.info('purchase_recorded', {
    requestId: ctx.requestId,
    purchaseId: purchase.id,
    wholesalerId: wholesaler.id,
    productId: product.id,
    quantity: input.quantity,
  });
  return purchase;
}

export async function listPurchases(ctx: ShopContext, options: { startDate?: string; endDate?: string; limit?: number } = {}) {
  const [purchases, wholesalers, products] = await Promise.all([
    ctx.store.purchases.list({ limit: 50, ...options }),
    ctx.store.wholesalers.list(),
    ctx.store.products.list(),
  ]);
  const wholesalerNames = new Map(wholesalers.map((row) => [row.id, row.name]));
  const productNames = new Map(products.map((row) => [row.id, row.name]));

  return purchases.map<PurchaseRow>((purchase) => ({
    ...purchase,
    wholesaler_name: wholesalerNames.get(purchase.wholesaler_id) ?? '',
    product_name: productNames.get(purchase.product_id) ?? '',
    total_cost: lineSubtotal(purchase.unit_cost, purchase.quantity),
  }));
}
