import assert from 'node:assert/strict';
import test from 'node:test';
import { monthPeriod, resolvePeriod } from '../lib/order-analytics';
import { addCreditEntry } from '../lib/services/credit';
import { createExpense } from '../lib/services/expenses';
import { createOrder, returnOrder } from '../lib/services/orders';
import {
  dashboardSummary,
  gstCsv,
  gstSummary,
  suggestPurchases,
  summarizePeriod,
  topSellers,
} from '../lib/services/reports';
import type { ShopContext } from '../lib/shop-context';
import { FIXED_NOW, seedProduct, testContext } from './support/context';

async function seedTradingDay(ctx: ShopContext) {
  const rice = await seedProduct(ctx, {
    name: 'Rice 1kg',
    selling_price: 60,
    discount: 5,
    cost_price: 40,
    stock_quantity: 10,
  });
  const dal = await seedProduct(ctx, { name: 'Toor Dal 1kg', selling_price: 120, cost_price: 100, stock_quantity: 3 });

  await createOrder(ctx, {
    lines: [
      { product_id: rice.id, quantity: 2 },
      { product_id: dal.id, quantity: 1 },
    ],
    payment_method: 'cash',
    complete: true,
  });
  await createOrder(ctx, { lines: [{ product_id: rice.id, quantity: 1 }], payment_method: 'upi' });
  const returned = await createOrder(ctx, {
    lines: [{ product_id: rice.id, quantity: 1 }],
    payment_method: 'card',
    complete: true,
  });
  await returnOrder(ctx, returned.id, 'Wrong item');

  await createExpense(ctx, { category: 'electricity', amount: 20 });
  await createExpense(ctx, { category: 'transport', amount: 15, date: '2026-03-14' });
  await ctx.store.purchases.insert({
    wholesaler_id: 1,
    product_id: rice.id,
    quantity: 3,
    unit_cost: 10,
    selling_price: 60,
    expiry_date: null,
    date: '2026-03-15',
    created_at: FIXED_NOW.toISOString(),
  });
  return { rice, dal };
}

test('summarizePeriod counts only completed sales toward revenue and profit', async () => {
  const ctx = testContext();
  const { rice, dal } = await seedTradingDay(ctx);

  const summary = await summarizePeriod(ctx, resolvePeriod('today', 0, FIXED_NOW));

  assert.equal(summary.revenue, 230);
  assert.equal(summary.cost_of_goods, 180);
  assert.equal(summary.gross_profit, 50);
  assert.equal(summary.expenses, 20);
  assert.equal(summary.net_profit, 30);
  assert.equal(summary.purchases_spent, 30);
  assert.equal(summary.completed_orders, 1);
  assert.equal(summary.average_order_value, 230);
  assert.deepEqual(summary.orders_by_status, { pending: 1, completed: 1, returned: 1 });
  assert.deepEqual(summary.revenue_by_payment_method, { cash: 230, card: 0, upi: 0 });
  assert.deepEqual(summary.expenses_by_category, [{ category: 'electricity', amount: 20 }]);
  assert.deepEqual(summary.top_sellers, [
    { product_id: rice.id, product_name: 'Rice 1kg', quantity: 2, revenue: 110 },
    { product_id: dal.id, product_name: 'Toor Dal 1kg', quantity: 1, revenue: 120 },
  ]);
  assert.deepEqual(summary.daily_revenue, [{ date: '2026-03-15', total_amount: 230 }]);
  assert.deepEqual(summary.monthly_revenue, []);
});

test('summarizePeriod over a year buckets revenue by month', async () => {
  const ctx = testContext();
  await seedTradingDay(ctx);

  const summary = await summarizePeriod(ctx, resolvePeriod('year', 0, FIXED_NOW));

  assert.equal(summary.monthly_revenue.length, 12);
  assert.deepEqual(summary.monthly_revenue[2], { month: 'Mar', total_amount: 230 });
  assert.equal(summary.monthly_revenue[0].total_amount, 0);
});

test('summarizePeriod over a week picks up earlier expenses', async () => {
  const ctx = testContext();
  await seedTradingDay(ctx);

  const summary = await summarizePeriod(ctx, resolvePeriod('week', 0, FIXED_NOW));

  assert.equal(summary.period.startDate, '2026-03-09');
  assert.equal(summary.expenses, 35);
  assert.equal(summary.net_profit, 15);
});

test('topSellers ignores pending and returned orders', async () => {
  const ctx = testContext();
  await seedTradingDay(ctx);

  const rows = await topSellers(ctx, resolvePeriod('month', 0, FIXED_NOW), 1);

  assert.deepEqual(
    rows.map((row) => [row.product_name, row.quantity]),
    [['Rice 1kg', 2]]
  );
});

test('suggestPurchases flags low, expired and nearly expired stock', async () => {
  const ctx = testContext();
  await seedProduct(ctx, { name: 'Milk', stock_quantity: 2, reorder_threshold: 5 });
  await seedProduct(ctx, { name: 'Bread', stock_quantity: 20, reorder_threshold: 5, expiry_date: '2026-03-20' });
  await seedProduct(ctx, { name: 'Jam', stock_quantity: 8, reorder_threshold: 5, expiry_date: '2026-03-10' });
  await seedProduct(ctx, { name: 'Salt', stock_quantity: 50, reorder_threshold: 5, expiry_date: '2027-01-01' });
  await seedProduct(ctx, { name: 'Ghee', stock_quantity: 0, reorder_threshold: 5, is_active: false });

  const rows = await suggestPurchases(ctx, '2026-03-15', 7);

  assert.deepEqual(
    rows.map((row) => [row.product.name, row.low, row.expired, row.near_expiry, row.suggested_quantity]),
    [
      ['Bread', false, false, true, 0],
      ['Jam', false, true, false, 2],
      ['Milk', true, false, false, 8],
    ]
  );
});

test('gstSummary groups completed sales by product and rate', async () => {
  const ctx = testContext();
  const soap = await seedProduct(ctx, { name: 'Soap', selling_price: 50, tax_rate_percent: 18 });
  const tea = await seedProduct(ctx, { name: 'Tea, Premium', selling_price: 200, tax_rate_percent: 5 });
  await createOrder(ctx, {
    lines: [
      { product_id: tea.id, quantity: 1 },
      { product_id: soap.id, quantity: 2 },
    ],
    payment_method: 'cash',
    complete: true,
  });
  await createOrder(ctx, { lines: [{ product_id: soap.id, quantity: 1 }], payment_method: 'cash' });

  const rows = await gstSummary(ctx, monthPeriod('2026-03', 0));

  assert.deepEqual(rows, [
    { product_id: soap.id, product_name: 'Soap', tax_rate_percent: 18, taxable_value: 100, tax_amount: 18 },
    { product_id: tea.id, product_name: 'Tea, Premium', tax_rate_percent: 5, taxable_value: 200, tax_amount: 10 },
  ]);
  assert.equal(
    gstCsv(rows),
    'Product,Tax Rate (%),Taxable Value,GST Amount\r\nSoap,18,100.00,18.00\r\n"Tea, Premium",5,200.00,10.00\r\n'
  );
});

test('gstCsv writes only the header for an empty month', () => {
  assert.equal(gstCsv([]), 'Product,Tax Rate (%),Taxable Value,GST Amount\r\n');
});

test('dashboardSummary reports today and what needs attention', async () => {
  const ctx = testContext();
  const { dal } = await seedTradingDay(ctx);
  await seedProduct(ctx, { name: 'Curd', stock_quantity: 30, expiry_date: '2026-03-17' });
  await addCreditEntry(ctx, { customer_name: 'Asha', item_name: 'Tea', amount: 45 });

  const dashboard = await dashboardSummary(ctx);

  assert.equal(dashboard.today, '2026-03-15');
  assert.equal(dashboard.sales_today, 230);
  assert.equal(dashboard.orders_today, 1);
  assert.equal(dashboard.net_profit_today, 30);
  assert.deepEqual(
    dashboard.top_sellers_today.map((row) => [row.product_name, row.quantity, row.revenue]),
    [
      ['Rice 1kg', 2, 110],
      ['Toor Dal 1kg', 1, 120],
    ]
  );
  assert.equal(dashboard.pending_orders, 1);
  assert.equal(dashboard.low_stock_count, 1);
  assert.equal(dashboard.low_stock[0].id, dal.id);
  assert.equal(dashboard.outstanding_credit, 45);
  assert.equal(dashboard.near_expiry_count, 1);
  assert.equal(dashboard.near_expiry[0].name, 'Curd');
  assert.equal(dashboard.recent_orders.length, 3);
});
