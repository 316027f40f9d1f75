import { roundMoney, sumMoney } from '@/lib/money';
import {
  addDays,
  aggregateDailyRevenue,
  aggregateMonthlyRevenue,
  aggregateTopSellers,
  localDateFromIso,
  resolvePeriod,
  type Period,
  type TopSeller,
} from '@/lib/order-analytics';
import type { ShopContext } from '@/lib/shop-context';
import type { ExpenseCategory, ID, OrderStatus, PaymentMethod, Product } from '@/lib/shop-types';
import { isLowStock, listLowStock } from '@/lib/services/catalog';
import { listOrders } from '@/lib/services/orders';
import { totalsByCategory } from '@/lib/services/expenses';

export interface PeriodSummary {
  period: Period;
  revenue: number;
  cost_of_goods: number;
  gross_profit: number;
  expenses: number;
  net_profit: number;
  purchases_spent: number;
  completed_orders: number;
  average_order_value: number;
  orders_by_status: Record<OrderStatus, number>;
  revenue_by_payment_method: Record<PaymentMethod, number>;
  expenses_by_category: Array<{ category: ExpenseCategory; amount: number }>;
  top_sellers: TopSeller[];
  daily_revenue: Array<{ date: string; total_amount: number }>;
  /** Twelve calendar-month buckets; only filled for the year view. */
  monthly_revenue: Array<{ month: string; total_amount: number }>;
}

export interface PurchaseSuggestion {
  product: Product;
  low: boolean;
  expired: boolean;
  near_expiry: boolean;
  suggested_quantity: number;
}

export interface GstRow {
  product_id: ID;
  product_name: string;
  tax_rate_percent: number;
  taxable_value: number;
  tax_amount: number;
}

/**
 * Revenue and cost come from completed orders only; returned orders gave their
 * money and stock back. Expenses and purchases are matched on their local date.
 */
export async function summarizePeriod(ctx: ShopContext, period: Period, timezoneOffsetMinutes = 0): Promise<PeriodSummary> {
  const [orders, expenses, purchases] = await Promise.all([
    listOrders(ctx, { startIso: period.startIso, endIso: period.endIso }),
    ctx.store.expenses.list({ startDate: period.startDate, endDate: period.endDate }),
    ctx.store.purchases.list({ startDate: period.startDate, endDate: period.endDate }),
  ]);

  const ordersByStatus: Record<OrderStatus, number> = { pending: 0, completed: 0, returned: 0 };
  const revenueByMethod: Record<PaymentMethod, number> = { cash: 0, card: 0, upi: 0 };
  for (const order of orders) {
    ordersByStatus[order.status] += 1;
    if (order.status === 'completed') {
      revenueByMethod[order.payment_method] = roundMoney(revenueByMethod[order.payment_method] + order.total_amount);
    }
  }

  const completed = orders.filter((order) => order.status === 'completed');
  const completedLines = completed.flatMap((order) => order.lines);

  const revenue = sumMoney(completed.map((order) => order.total_amount));
  const costOfGoods = sumMoney(completedLines.map((line) => line.unit_cost * line.quantity));
  const grossProfit = roundMoney(revenue - costOfGoods);
  const expenseTotal = sumMoney(expenses.map((expense) => expense.amount));

  return {
    period,
    revenue,
    cost_of_goods: costOfGoods,
    gross_profit: grossProfit,
    expenses: expenseTotal,
    net_profit: roundMoney(grossProfit - expenseTotal),
    purchases_spent: sumMoney(purchases.map((purchase) => purchase.unit_cost * purchase.quantity)),
    completed_orders: completed.length,
    average_order_value: completed.length > 0 ? roundMoney(revenue / completed.length) : 0,
    orders_by_status: ordersByStatus,
    revenue_by_payment_method: revenueByMethod,
    expenses_by_category: totalsByCategory(expenses),
    top_sellers: aggregateTopSellers(completedLines).slice(0, 10),
    daily_revenue: aggregateDailyRevenue(completed, timezoneOffsetMinutes),
    monthly_revenue: period.range === 'year' ? aggregateMonthlyRevenue(completed, timezoneOffsetMinutes) : [],
  };
}

export async function topSellers(ctx: ShopContext, period: Period, limit = 10) {
  const orders = await listOrders(ctx, { status: 'completed', startIso: period.startIso, endIso: period.endIso });
  return aggregateTopSellers(orders.flatMap((order) => order.lines)).slice(0, limit);
}

/** Active products that are low, expired, or expiring within `nearDays` of `today`. */
export async function suggestPurchases(
  ctx: ShopContext,
  today: string,
  nearDays = ctx.config.nearExpiryDays
): Promise<PurchaseSuggestion[]> {
  const limit = addDays(today, nearDays);
  const products = await ctx.store.products.list({ activeOnly: true });

  const rows: PurchaseSuggestion[] = [];
  for (const product of products) {
    const low = isLowStock(product);
    const expired = product.expiry_date !== null && product.expiry_date < today;
    const nearExpiry = product.expiry_date !== null && product.expiry_date >= today && product.expiry_date <= limit;
    if (!low && !expired && !nearExpiry) continue;
    rows.push({
      product,
      low,
      expired,
      near_expiry: nearExpiry,
      suggested_quantity: Math.max(product.reorder_threshold * 2 - product.stock_quantity, 0),
    });
  }
  return rows.sort((a, b) => a.product.name.localeCompare(b.product.name));
}

/** Tax owed per product and rate for completed sales in the period; line prices are tax-exclusive. */
export async function gstSummary(ctx: ShopContext, period: Period): Promise<GstRow[]> {
  const orders = await listOrders(ctx, { status: 'completed', startIso: period.startIso, endIso: period.endIso });

  const grouped = new Map<string, GstRow>();
  for (const line of orders.flatMap((order) => order.lines)) {
    const key = `${line.product_id}:${line.tax_rate_percent}`;
    const row = grouped.get(key) ?? {
      product_id: line.product_id,
      product_name: line.product_name,
      tax_rate_percent: line.tax_rate_percent,
      taxable_value: 0,
      tax_amount: 0,
    };
    row.taxable_value = roundMoney(row.taxable_value + line.subtotal);
    row.tax_amount = roundMoney(row.tax_amount + (line.subtotal * line.tax_rate_percent) / 100);
    grouped.set(key, row);
  }

  return Array.from(grouped.values()).sort(
    (a, b) => a.product_name.localeCompare(b.product_name) || a.tax_rate_percent - b.tax_rate_percent
  );
}

function csvCell(value: string | number) {
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

export function gstCsv(rows: GstRow[]) {
  const lines = [['Product', 'Tax Rate (%)', 'Taxable Value', 'GST Amount'].join(',')];
  for (const row of rows) {
    lines.push(
      [
        csvCell(row.product_name),
        csvCell(row.tax_rate_percent),
        csvCell(row.taxable_value.toFixed(2)),
        csvCell(row.tax_amount.toFixed(2)),
      ].join(',')
    );
  }
  return `${lines.join('\r\n')}\r\n`;
}

export async function dashboardSummary(ctx: ShopContext, timezoneOffsetMinutes = 0) {
  const todayPeriod = resolvePeriod('today', timezoneOffsetMinutes, ctx.now());
  const today = localDateFromIso(ctx.now().toISOString(), timezoneOffsetMinutes);
  const nearLimit = addDays(today, ctx.config.nearExpiryDays);

  const [todaySummary, bestToday, pending, lowStock, openCredit, activeProducts, recentOrders] = await Promise.all([
    summarizePeriod(ctx, todayPeriod, timezoneOffsetMinutes),
    topSellers(ctx, todayPeriod, 5),
    ctx.store.orders.list({ status: 'pending' }),
    listLowStock(ctx),
    ctx.store.credits.list({ settled: false }),
    ctx.store.products.list({ activeOnly: true }),
    ctx.store.orders.list(),
  ]);

  const nearExpiry = activeProducts.filter(
    (product) => product.expiry_date !== null && product.expiry_date >= today && product.expiry_date <= nearLimit
  );

  return {
    today,
    sales_today: todaySummary.revenue,
    orders_today: todaySummary.completed_orders,
    net_profit_today: todaySummary.net_profit,
    top_sellers_today: bestToday,
    pending_orders: pending.length,
    low_stock_count: lowStock.length,
    low_stock: lowStock.slice(0, 10),
    outstanding_credit: sumMoney(openCredit.map((entry) => entry.amount)),
    near_expiry_count: nearExpiry.length,
    near_expiry: nearExpiry.slice(0, 10),
    recent_orders: recentOrders.slice(0, 10),
  };
}

export type DashboardSummary = Awaited<ReturnType<typeof dashboardSummary>>;
