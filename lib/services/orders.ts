import { auditStockChange } from '@/lib/audit-log';
import {
  BusinessRuleError,
  InsufficientStockError,
  InvalidTransitionError,
  NotFoundError,
  type StockShortage,
} from '@/lib/errors';
import { getErrorMessage } from '@/lib/logger';
import { effectiveUnitPrice, lineSubtotal, sumMoney } from '@/lib/money';
import { assertTransition } from '@/lib/order-workflow';
import { actorLabel, nowIso, type ShopContext } from '@/lib/shop-context';
import type { ID, NewRecord, Order, OrderLine, OrderStatus, OrderWithLines, Product } from '@/lib/shop-types';
import type { OrderFilter } from '@/lib/store/types';
import { compensateStock, decrementStock, restoreStock } from '@/lib/services/catalog';
import { orderInputSchema, orderStatusChangeSchema, parseInput, type OrderInput } from '@/lib/validation';

type PricedLine = Omit<NewRecord<OrderLine>, 'order_id'> & { product: Product };

/** Repeated products collapse into one line, keeping the order they were first added in. */
export function mergeOrderLines(lines: OrderInput['lines']) {
  const merged = new Map<ID, number>();
  for (const line of lines) {
    merged.set(line.product_id, (merged.get(line.product_id) ?? 0) + line.quantity);
  }
  return Array.from(merged.entries()).map(([product_id, quantity]) => ({ product_id, quantity }));
}

async function priceLines(ctx: ShopContext, input: OrderInput): Promise<PricedLine[]> {
  const requested = mergeOrderLines(input.lines);
  const products = await ctx.store.products.getByIds(requested.map((line) => line.product_id));
  const byId = new Map(products.map((product) => [product.id, product]));

  const priced: PricedLine[] = [];
  const shortages: StockShortage[] = [];

  for (const line of requested) {
    const product = byId.get(line.product_id);
    if (!product) throw new NotFoundError('Product', line.product_id);
    if (!product.is_active) {
      throw new BusinessRuleError(`${product.name} is not available for sale.`, 'PRODUCT_INACTIVE');
    }
    if (line.quantity > product.stock_quantity) {
      shortages.push({
        productId: product.id,
        productName: product.name,
        requested: line.quantity,
        available: product.stock_quantity,
      });
    }
    const unitPrice = effectiveUnitPrice(product);
    priced.push({
      product,
      product_id: product.id,
      product_name: product.name,
      quantity: line.quantity,
      unit_price: unitPrice,
      unit_cost: product.cost_price,
      tax_rate_percent: product.tax_rate_percent,
      subtotal: lineSubtotal(unitPrice, line.quantity),
    });
  }

  if (shortages.length > 0) throw new InsufficientStockError(shortages);
  return priced;
}

/**
 * Checks every line against stock before writing, then takes stock line by line
 * and persists the order. Any failure after the first write puts back what was
 * taken and removes the half-written order.
 */
export async function createOrder(ctx: ShopContext, raw: unknown): Promise<OrderWithLines> {
  const input = parseInput(orderInputSchema, raw);
  const priced = await priceLines(ctx, input);
  const total = sumMoney(priced.map((line) => line.subtotal));
  const timestamp = nowIso(ctx);

  const applied: Array<{ productId: ID; quantity: number; before: number; after: number }> = [];
  let order: Order | null = null;

  try {
    for (const line of priced) {
      const updated = await decrementStock(ctx, line.product, line.quantity);
      applied.push({
        productId: line.product_id,
        quantity: line.quantity,
        before: line.product.stock_quantity,
        after: updated.stock_quantity,
      });
    }

    order = await ctx.store.orders.insert({
      status: input.complete ? 'completed' : 'pending',
      payment_method: input.payment_method,
      total_amount: total,
      customer_name: input.customer_name,
      customer_phone: input.customer_phone,
      return_reason: null,
      created_by: actorLabel(ctx),
      created_at: timestamp,
      completed_at: input.complete ? timestamp : null,
      returned_at: null,
    });

    const orderId = order.id;
    const lines = await ctx.store.orders.insertLines(
      priced.map(({ product: _product, ...line }) => ({ ...line, order_id: orderId }))
    );

    for (const entry of applied) {
      await auditStockChange(ctx, entry.productId, entry.before, entry.after);
    }
    ctx.logger.info('order_created', {
      requestId: ctx.requestId,
      orderId,
      status: order.status,
      total,
      lineCount: lines.length,
    });
    return { ...order, lines };
  } catch (error) {
    ctx.logger.warn('order_create_rolled_back', {
      requestId: ctx.requestId,
      appliedLines: applied.length,
      message: getErrorMessage(error),
    });
    if (order) {
      const orderId = order.id;
      try {
        await ctx.store.orders.deleteLines(orderId);
        await ctx.store.orders.delete(orderId);
      } catch (cleanupError) {
        ctx.logger.error('order_cleanup_failed', {
          requestId: ctx.requestId,
          orderId,
          message: getErrorMessage(cleanupError),
        });
      }
    }
    await compensateStock(ctx, applied);
    throw error;
  }
}

export async function getOrder(ctx: ShopContext, id: ID): Promise<OrderWithLines> {
  const order = await ctx.store.orders.getById(id);
  if (!order) throw new NotFoundError('Order', id);
  const lines = await ctx.store.orders.getLines(id);
  return { ...order, lines };
}

export async function listOrders(ctx: ShopContext, filter: OrderFilter = {}): Promise<OrderWithLines[]> {
  const orders = await ctx.store.orders.list(filter);
  if (orders.length === 0) return [];
  const lines = await ctx.store.orders.listLines(orders.map((order) => order.id));
  const linesByOrder = new Map<ID, OrderLine[]>();
  for (const line of lines) {
    const bucket = linesByOrder.get(line.order_id) ?? [];
    bucket.push(line);
    linesByOrder.set(line.order_id, bucket);
  }
  return orders.map((order) => ({ ...order, lines: linesByOrder.get(order.id) ?? [] }));
}

async function transitionConflict(ctx: ShopContext, id: ID, to: OrderStatus): Promise<never> {
  const latest = await ctx.store.orders.getById(id);
  if (!latest) throw new NotFoundError('Order', id);
  throw new InvalidTransitionError(latest.status, to);
}

export async function completeOrder(ctx: ShopContext, id: ID): Promise<OrderWithLines> {
  const order = await getOrder(ctx, id);
  assertTransition(order.status, 'completed');

  const updated = await ctx.store.orders.changeStatus(id, order.status, {
    status: 'completed',
    completed_at: nowIso(ctx),
  });
  if (!updated) return transitionConflict(ctx, id, 'completed');

  ctx.logger.info('order_completed', { requestId: ctx.requestId, orderId: id });
  return { ...updated, lines: order.lines };
}

/**
 * Claims the transition first so only one request restores stock, then puts
 * back every line. A failed restore undoes the lines already restored and
 * reverts the status.
 */
export async function returnOrder(ctx: ShopContext, id: ID, reason: string | null = null): Promise<OrderWithLines> {
  const order = await getOrder(ctx, id);
  assertTransition(order.status, 'returned');

  const updated = await ctx.store.orders.changeStatus(id, order.status, {
    status: 'returned',
    returned_at: nowIso(ctx),
    return_reason: reason,
  });
  if (!updated) return transitionConflict(ctx, id, 'returned');

  const restored: Array<{ productId: ID; quantity: number }> = [];
  try {
    for (const line of order.lines) {
      const product = await restoreStock(ctx, line.product_id, line.quantity);
      restored.push({ productId: line.product_id, quantity: line.quantity });
      await auditStockChange(ctx, line.product_id, product.stock_quantity - line.quantity, product.stock_quantity);
    }
  } catch (error) {
    ctx.logger.error('order_return_rolled_back', {
      requestId: ctx.requestId,
      orderId: id,
      restoredLines: restored.length,
      message: getErrorMessage(error),
    });
    for (const entry of restored.reverse()) {
      try {
        const product = await ctx.store.products.getById(entry.productId);
        if (product) await decrementStock(ctx, product, entry.quantity);
      } catch (undoError) {
        ctx.logger.error('order_return_undo_failed', {
          requestId: ctx.requestId,
          orderId: id,
          productId: entry.productId,
          quantity: entry.quantity,
          message: getErrorMessage(undoError),
        });
      }
    }
    await ctx.store.orders.changeStatus(id, 'returned', {
      status: order.status,
      returned_at: null,
      return_reason: null,
    });
    throw error;
  }

  ctx.logger.info('order_returned', { requestId: ctx.requestId, orderId: id, from: order.status });
  return { ...updated, lines: order.lines };
}

export async function changeOrderStatus(ctx: ShopContext, id: ID, raw: unknown): Promise<OrderWithLines> {
  const input = parseInput(orderStatusChangeSchema, raw);
  switch (input.status) {
    case 'completed':
      return completeOrder(ctx, id);
    case 'returned':
      return returnOrder(ctx, id, input.reason);
    case 'pending': {
      const order = await getOrder(ctx, id);
      throw new InvalidTransitionError(order.status, 'pending');
    }
  }
}

/** A pending order still holds its stock, so that stock goes back before the rows are removed. */
export async function deleteOrder(ctx: ShopContext, id: ID) {
  const order = await getOrder(ctx, id);
  if (order.status === 'pending') {
    for (const line of order.lines) {
      const product = await restoreStock(ctx, line.product_id, line.quantity);
      await auditStockChange(ctx, line.product_id, product.stock_quantity - line.quantity, product.stock_quantity);
    }
  }
  await ctx.store.orders.deleteLines(id);
  await ctx.store.orders.delete(id);
  ctx.logger.info('order_deleted', { requestId: ctx.requestId, orderId: id, status: order.status });
}
