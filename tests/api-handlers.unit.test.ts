import assert from 'node:assert/strict';
import test from 'node:test';
import { NextRequest } from 'next/server';
import { ADMIN_ENTITIES } from '../lib/admin-entities';
import { adminHandlers } from '../lib/handlers/admin';
import { categoriesHandlers, productsHandlers } from '../lib/handlers/catalog';
import { creditHandlers, creditSettleHandlers } from '../lib/handlers/credit';
import { expensesHandlers } from '../lib/handlers/expenses';
import { orderHandlers, orderStatusHandlers, ordersHandlers } from '../lib/handlers/orders';
import { gstHandlers, reportsHandlers } from '../lib/handlers/reports';
import { createMemoryStore } from './support/memory-store';
import { seedProduct, testContext } from './support/context';

process.env.AUTH_TEST_MODE = '1';

interface RequestOptions {
  method?: string;
  token?: string;
  json?: unknown;
  rawBody?: string;
  form?: Record<string, string>;
  headers?: Record<string, string>;
}

function request(path: string, options: RequestOptions = {}) {
  const headers = new Headers(options.headers);
  if (options.token) headers.set('authorization', `Bearer ${options.token}`);
  let body: string | undefined;
  if (options.form) {
    headers.set('content-type', 'application/x-www-form-urlencoded');
    body = new URLSearchParams(options.form).toString();
  } else if (options.json !== undefined) {
    headers.set('content-type', 'application/json');
    body = JSON.stringify(options.json);
  } else if (options.rawBody !== undefined) {
    headers.set('content-type', 'application/json');
    body = options.rawBody;
  }
  return new NextRequest(`http://localhost${path}`, { method: options.method ?? 'GET', headers, body });
}

function setup() {
  const store = createMemoryStore();
  return { store, resolve: () => store, ctx: testContext(store) };
}

test('requests without a bearer token are refused', async () => {
  const { resolve } = setup();

  const res = await productsHandlers(resolve).GET(request('/api/products'));

  assert.equal(res.status, 401);
  assert.deepEqual(await res.json(), { success: false, error: 'Missing bearer token' });
});

test('staff cannot change the catalog', async () => {
  const { resolve } = setup();

  const res = await productsHandlers(resolve).POST(
    request('/api/products', { method: 'POST', token: 'test-staff', json: { name: 'Soap', selling_price: 20 } })
  );

  assert.equal(res.status, 403);
});

test('invalid input answers 400 with field errors', async () => {
  const { resolve } = setup();

  const res = await productsHandlers(resolve).POST(
    request('/api/products', { method: 'POST', token: 'test-owner', json: { name: 'Soap' } })
  );
  const body = await res.json();

  assert.equal(res.status, 400);
  assert.equal(body.success, false);
  assert.deepEqual(body.fieldErrors, [{ field: 'selling_price', message: 'selling_price is required' }]);
});

test('a body that is not JSON is reported on the form', async () => {
  const { resolve } = setup();

  const res = await categoriesHandlers(resolve).POST(
    request('/api/categories', { method: 'POST', token: 'test-owner', rawBody: '{oops' })
  );
  const body = await res.json();

  assert.equal(res.status, 400);
  assert.deepEqual(body.fieldErrors, [{ field: 'form', message: 'Request body must be valid JSON' }]);
});

test('duplicate barcodes come back as a field error', async () => {
  const { resolve, ctx } = setup();
  await seedProduct(ctx, { name: 'Soap', barcode: '8901' });

  const res = await productsHandlers(resolve).POST(
    request('/api/products', {
      method: 'POST',
      token: 'test-owner',
      json: { name: 'Shampoo', selling_price: 90, barcode: '8901' },
    })
  );
  const body = await res.json();

  assert.equal(res.status, 400);
  assert.deepEqual(body.fieldErrors, [{ field: 'barcode', message: 'Barcode 8901 is already used by Soap.' }]);
});

test('created products are listed with a low-stock summary', async () => {
  const { resolve } = setup();
  const handlers = productsHandlers(resolve);

  const created = await handlers.POST(
    request('/api/products', { method: 'POST', token: 'test-owner', json: { name: 'Soap', selling_price: 20 } })
  );
  assert.equal(created.status, 201);

  const res = await handlers.GET(request('/api/products?q=soa', { token: 'test-staff' }));
  const body = await res.json();

  assert.equal(res.status, 200);
  assert.equal(body.data[0].name, 'Soap');
  assert.deepEqual(body.summary, { count: 1, low_stock: 1 });
});

test('form-encoded expenses are accepted', async () => {
  const { resolve } = setup();

  const res = await expensesHandlers(resolve).POST(
    request('/api/expenses', {
      method: 'POST',
      token: 'test-owner',
      form: { category: 'rent', amount: '500', date: '2026-03-01', description: 'Shop rent' },
    })
  );
  const body = await res.json();

  assert.equal(res.status, 201);
  assert.equal(body.data.amount, 500);
  assert.equal(body.data.date, '2026-03-01');
});

test('checkout beyond stock answers 409 with the rule code', async () => {
  const { resolve, ctx } = setup();
  const soap = await seedProduct(ctx, { name: 'Soap', stock_quantity: 1 });

  const res = await ordersHandlers(resolve).POST(
    request('/api/orders', {
      method: 'POST',
      token: 'test-staff',
      json: { lines: [{ product_id: soap.id, quantity: 2 }], payment_method: 'cash' },
    })
  );
  const body = await res.json();

  assert.equal(res.status, 409);
  assert.equal(body.code, 'INSUFFICIENT_STOCK');
  assert.equal(body.error, 'Only 1 Soap available (requested 2).');
});

test('order detail validates the id and includes share text', async () => {
  const { resolve, ctx } = setup();
  const soap = await seedProduct(ctx, { name: 'Soap', selling_price: 20 });
  const handlers = orderHandlers(resolve);

  const invalid = await handlers.GET(request('/api/orders/abc', { token: 'test-staff' }), { params: { id: 'abc' } });
  assert.equal(invalid.status, 400);
  assert.deepEqual((await invalid.json()).fieldErrors, [{ field: 'id', message: 'id must be a positive integer' }]);

  const missing = await handlers.GET(request('/api/orders/999', { token: 'test-staff' }), { params: { id: '999' } });
  assert.equal(missing.status, 404);
  assert.deepEqual(await missing.json(), { success: false, error: 'Order not found', code: 'NOT_FOUND' });

  const placed = await ordersHandlers(resolve).POST(
    request('/api/orders', {
      method: 'POST',
      token: 'test-staff',
      json: { lines: [{ product_id: soap.id, quantity: 1 }], payment_method: 'cash', complete: true },
    })
  );
  assert.equal(placed.status, 201);

  const found = await handlers.GET(request('/api/orders/1', { token: 'test-staff' }), { params: { id: '1' } });
  const body = await found.json();
  assert.equal(body.data.share_text, 'Order #1\n1 x Soap = Rs.20.00\nTotal: Rs.20.00\nPaid by CASH');
  assert.equal(body.data.created_by, 'staff@example.test');
});

test('order status route returns an order and rejects a second return', async () => {
  const { resolve, ctx } = setup();
  const soap = await seedProduct(ctx, { name: 'Soap', stock_quantity: 5 });
  await ordersHandlers(resolve).POST(
    request('/api/orders', {
      method: 'POST',
      token: 'test-staff',
      json: { lines: [{ product_id: soap.id, quantity: 2 }], payment_method: 'card', complete: true },
    })
  );
  const handlers = orderStatusHandlers(resolve);
  const returnRequest = () =>
    request('/api/orders/1/status', { method: 'POST', token: 'test-staff', json: { status: 'returned' } });

  const first = await handlers.POST(returnRequest(), { params: { id: '1' } });
  const second = await handlers.POST(returnRequest(), { params: { id: '1' } });

  assert.equal(first.status, 200);
  assert.equal((await first.json()).data.status, 'returned');
  assert.equal(second.status, 409);
  assert.equal((await second.json()).code, 'INVALID_TRANSITION');
  assert.equal((await ctx.store.products.getById(soap.id))?.stock_quantity, 5);
});

test('credit list carries the outstanding total and settling reports a change once', async () => {
  const { resolve } = setup();
  const credit = creditHandlers(resolve);
  await credit.POST(
    request('/api/credit', {
      method: 'POST',
      token: 'test-staff',
      json: { customer_name: 'Asha', item_name: 'Tea', amount: 30 },
    })
  );

  const listed = await (await credit.GET(request('/api/credit?sort=customer_asc', { token: 'test-staff' }))).json();
  assert.deepEqual(listed.summary, { total_outstanding: 30, count: 1 });

  const settle = creditSettleHandlers(resolve);
  const settleRequest = () => request('/api/credit/1/settle', { method: 'POST', token: 'test-staff' });
  const first = await (await settle.POST(settleRequest(), { params: { id: '1' } })).json();
  const again = await (await settle.POST(settleRequest(), { params: { id: '1' } })).json();
  assert.deepEqual(first.summary, { changed: true });
  assert.deepEqual(again.summary, { changed: false });

  const badSort = await credit.GET(request('/api/credit?sort=amount', { token: 'test-staff' }));
  assert.equal(badSort.status, 400);
});

test('GST export downloads a CSV named after the month', async () => {
  const { resolve } = setup();

  const res = await gstHandlers(resolve).GET(
    request('/api/reports/gst?month=2026-03&format=csv', { token: 'test-owner' })
  );

  assert.equal(res.status, 200);
  assert.equal(res.headers.get('content-type'), 'text/csv; charset=utf-8');
  assert.equal(res.headers.get('content-disposition'), 'attachment; filename="gst_2026_03.csv"');
  assert.equal(await res.text(), 'Product,Tax Rate (%),Taxable Value,GST Amount\r\n');

  const bad = await gstHandlers(resolve).GET(request('/api/reports/gst?month=2026-13', { token: 'test-owner' }));
  assert.equal(bad.status, 400);
});

test('reports reject unknown ranges and are owner only', async () => {
  const { resolve } = setup();
  const handlers = reportsHandlers(resolve);

  const bad = await handlers.GET(request('/api/reports?range=decade', { token: 'test-owner' }));
  assert.equal(bad.status, 400);
  assert.deepEqual((await bad.json()).fieldErrors, [
    { field: 'range', message: 'range must be one of: today, week, month, year' },
  ]);

  const staff = await handlers.GET(request('/api/reports', { token: 'test-staff' }));
  assert.equal(staff.status, 403);

  const ok = await handlers.GET(request('/api/reports?from=2026-03-01&to=2026-03-31', { token: 'test-owner' }));
  const body = await ok.json();
  assert.equal(ok.status, 200);
  assert.equal(body.data.period.startDate, '2026-03-01');
  assert.equal(body.data.period.endDate, '2026-04-01');
  assert.equal(body.data.revenue, 0);
});

test('admin browser checks the entity and its allowed operations', async () => {
  const { resolve, ctx } = setup();
  const handlers = adminHandlers(resolve);
  await ctx.store.categories.insert({ name: 'Snacks', description: '', created_at: '2026-03-01T00:00:00.000Z' });

  const unknown = await handlers.GET(request('/api/admin/users', { token: 'test-owner' }), { params: { entity: 'users' } });
  assert.equal(unknown.status, 404);

  const readOnly = await handlers.POST(
    request('/api/admin/audit_logs', { method: 'POST', token: 'test-owner', json: {} }),
    { params: { entity: 'audit_logs' } }
  );
  assert.equal(readOnly.status, 405);
  assert.deepEqual(await readOnly.json(), {
    success: false,
    error: 'Audit Log cannot be created here.',
    code: 'METHOD_NOT_ALLOWED',
  });

  const staff = await handlers.GET(request('/api/admin/categories', { token: 'test-staff' }), {
    params: { entity: 'categories' },
  });
  assert.equal(staff.status, 403);

  const listed = await handlers.GET(request('/api/admin/categories', { token: 'test-owner' }), {
    params: { entity: 'categories' },
  });
  const body = await listed.json();
  assert.equal(body.data[0].name, 'Snacks');
  assert.equal(body.summary.count, 1);
  assert.equal(body.summary.entity.canDelete, true);
});

test('admin edits to product stock are refused with a field error', async () => {
  const { resolve, ctx } = setup();
  const soap = await seedProduct(ctx, { name: 'Soap', stock_quantity: 10 });

  const res = await adminHandlers(resolve).PUT(
    request('/api/admin/products', { method: 'PUT', token: 'test-owner', json: { id: soap.id, stock_quantity: 3 } }),
    { params: { entity: 'products' } }
  );
  const body = await res.json();

  assert.equal(res.status, 400);
  assert.deepEqual(body.fieldErrors, [
    { field: 'stock_quantity', message: 'stock_quantity cannot be edited; scan stock in or record a purchase' },
  ]);
  assert.equal((await ctx.store.products.getById(soap.id))?.stock_quantity, 10);
  assert.deepEqual(ADMIN_ENTITIES.products.lockedColumns, ['stock_quantity']);
});

test('unexpected store failures become a 500 carrying the request id', async () => {
  const { resolve, store } = setup();
  store.failures.add('categories.insert');

  const res = await categoriesHandlers(resolve).POST(
    request('/api/categories', {
      method: 'POST',
      token: 'test-owner',
      json: { name: 'Snacks' },
      headers: { 'x-request-id': 'req-42' },
    })
  );

  assert.equal(res.status, 500);
  assert.equal(res.headers.get('x-request-id'), 'req-42');
  assert.deepEqual(await res.json(), {
    success: false,
    error: 'simulated failure: categories.insert',
    requestId: 'req-42',
  });
});
