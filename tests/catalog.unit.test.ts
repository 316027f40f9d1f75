import assert from 'node:assert/strict';
import test from 'node:test';
import {
  DuplicateRecordError,
  InsufficientStockError,
  NotFoundError,
  ProtectedRecordError,
  StockConflictError,
  ValidationError,
} from '../lib/errors';
import {
  compensateStock,
  createCategory,
  createProduct,
  decrementStock,
  deleteCategory,
  deleteProduct,
  findProductByCode,
  listLowStock,
  listProducts,
  restoreStock,
  scanStockIncrement,
  updateProduct,
} from '../lib/services/catalog';
import { createOrder } from '../lib/services/orders';
import { recordingLogger, seedProduct, testContext, type LoggedLine } from './support/context';

function fieldOf(error: unknown) {
  return error instanceof ValidationError ? error.fieldErrors.map((e) => e.field) : [];
}

test('createCategory rejects a name that differs only by case', async () => {
  const ctx = testContext();
  await createCategory(ctx, { name: 'Staples' });

  await assert.rejects(createCategory(ctx, { name: 'staples' }), (error: unknown) => {
    assert.ok(error instanceof DuplicateRecordError);
    assert.equal(error.status, 400);
    assert.deepEqual(fieldOf(error), ['name']);
    return true;
  });
});

test('a category created between the name check and the insert is still reported on the name', async () => {
  const ctx = testContext();
  await createCategory(ctx, { name: 'Dairy' });
  ctx.store.categories.getByName = async () => null;

  await assert.rejects(createCategory(ctx, { name: 'dairy' }), (error: unknown) => {
    assert.ok(error instanceof DuplicateRecordError);
    assert.equal(error.status, 400);
    assert.deepEqual(error.fieldErrors, [{ field: 'name', message: 'Another record already uses this name.' }]);
    return true;
  });
  assert.equal((await ctx.store.categories.list()).length, 1);
});

test('createProduct normalises form values and applies defaults', async () => {
  const ctx = testContext();
  const product = await createProduct(ctx, {
    name: '  Atta 5kg ',
    selling_price: '250',
    stock_quantity: '12',
    barcode: '',
    is_active: 'on',
  });

  assert.equal(product.name, 'Atta 5kg');
  assert.equal(product.selling_price, 250);
  assert.equal(product.stock_quantity, 12);
  assert.equal(product.barcode, null);
  assert.equal(product.reorder_threshold, 5);
  assert.equal(product.unit, 'piece');
  assert.equal(product.is_active, true);
  assert.equal(product.version, 0);
});

test('createProduct rejects a discount above the selling price', async () => {
  const ctx = testContext();
  await assert.rejects(createProduct(ctx, { name: 'Soap', selling_price: 20, discount: 25 }), (error: unknown) => {
    assert.deepEqual(fieldOf(error), ['discount']);
    return true;
  });
});

test('createProduct rejects an unknown category and a taken barcode', async () => {
  const ctx = testContext();
  await assert.rejects(createProduct(ctx, { name: 'Soap', selling_price: 20, category_id: 42 }), (error: unknown) => {
    assert.deepEqual(fieldOf(error), ['category_id']);
    return true;
  });

  await createProduct(ctx, { name: 'Soap', selling_price: 20, barcode: '8901' });
  await assert.rejects(createProduct(ctx, { name: 'Shampoo', selling_price: 90, barcode: '8901' }), (error: unknown) => {
    assert.ok(error instanceof DuplicateRecordError);
    assert.equal(error.message, 'Barcode 8901 is already used by Soap.');
    return true;
  });
});

test('updateProduct refuses a stock edit and points to scans and purchases', async () => {
  const ctx = testContext();
  const soap = await seedProduct(ctx, { name: 'Soap', stock_quantity: 10 });

  await assert.rejects(updateProduct(ctx, { id: soap.id, stock_quantity: 3 }), (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.deepEqual(error.fieldErrors, [
      { field: 'stock_quantity', message: 'stock_quantity cannot be edited; scan stock in or record a purchase' },
    ]);
    return true;
  });
  assert.equal((await ctx.store.products.getById(soap.id))?.stock_quantity, 10);
});

test('updateProduct audits a price change', async () => {
  const ctx = testContext();
  const soap = await seedProduct(ctx, { name: 'Soap', selling_price: 10, stock_quantity: 10 });

  const updated = await updateProduct(ctx, { id: soap.id, selling_price: 12 });

  assert.equal(updated.selling_price, 12);
  assert.equal(updated.stock_quantity, 10);
  const [entry] = await ctx.store.auditLogs.list();
  assert.equal(entry.action, 'price_change');
  assert.equal(entry.old_value, '10.00');
  assert.equal(entry.new_value, '12.00');
  assert.equal(entry.actor, 'owner@example.test');
});

test('updateProduct checks a new discount against the stored selling price', async () => {
  const ctx = testContext();
  const soap = await seedProduct(ctx, { name: 'Soap', selling_price: 10 });

  await assert.rejects(updateProduct(ctx, { id: soap.id, discount: 15 }), (error: unknown) => {
    assert.deepEqual(fieldOf(error), ['discount']);
    return true;
  });
});

test('deleteProduct refuses products that were sold', async () => {
  const ctx = testContext();
  const rice = await seedProduct(ctx, { name: 'Rice' });
  await createOrder(ctx, { lines: [{ product_id: rice.id, quantity: 1 }], payment_method: 'cash' });

  await assert.rejects(deleteProduct(ctx, rice.id), ProtectedRecordError);
  assert.ok(await ctx.store.products.getById(rice.id));
});

test('deleteProduct is refused by the store when a sale lands after the check', async () => {
  const ctx = testContext();
  const rice = await seedProduct(ctx, { name: 'Rice' });
  await createOrder(ctx, { lines: [{ product_id: rice.id, quantity: 1 }], payment_method: 'cash' });
  ctx.store.orders.countLinesForProduct = async () => 0;

  await assert.rejects(deleteProduct(ctx, rice.id), (error: unknown) => {
    assert.ok(error instanceof ProtectedRecordError);
    assert.equal(error.status, 409);
    return true;
  });
  assert.ok(await ctx.store.products.getById(rice.id));
});

test('deleteProduct detaches credit entries that named the product', async () => {
  const ctx = testContext();
  const jam = await seedProduct(ctx, { name: 'Jam' });
  const customer = await ctx.store.customers.insert({
    name: 'Asha',
    phone: '',
    address: '',
    notes: '',
    is_active: true,
    last_reminder_date: null,
    created_at: '2026-03-01T00:00:00.000Z',
  });
  const entry = await ctx.store.credits.insert({
    customer_id: customer.id,
    product_id: jam.id,
    item_name: 'Jam',
    quantity: 1,
    amount: 10,
    is_settled: false,
    date_taken: '2026-03-01T00:00:00.000Z',
    date_settled: null,
    notes: '',
  });

  await deleteProduct(ctx, jam.id);

  assert.equal(await ctx.store.products.getById(jam.id), null);
  const kept = await ctx.store.credits.getById(entry.id);
  assert.equal(kept?.product_id, null);
  assert.equal(kept?.item_name, 'Jam');
});

test('deleteCategory leaves its products uncategorised', async () => {
  const ctx = testContext();
  const category = await createCategory(ctx, { name: 'Snacks' });
  const chips = await seedProduct(ctx, { name: 'Chips', category_id: category.id });

  await deleteCategory(ctx, category.id);

  assert.equal(await ctx.store.categories.getById(category.id), null);
  assert.equal((await ctx.store.products.getById(chips.id))?.category_id, null);
});

test('listLowStock returns active products at or below threshold, lowest stock first', async () => {
  const ctx = testContext();
  await seedProduct(ctx, { name: 'Milk', stock_quantity: 5, reorder_threshold: 5 });
  await seedProduct(ctx, { name: 'Eggs', stock_quantity: 1, reorder_threshold: 5 });
  await seedProduct(ctx, { name: 'Salt', stock_quantity: 40, reorder_threshold: 5 });
  await seedProduct(ctx, { name: 'Ghee', stock_quantity: 0, reorder_threshold: 5, is_active: false });

  const low = await listLowStock(ctx);
  assert.deepEqual(
    low.map((product) => product.name),
    ['Eggs', 'Milk']
  );

  const filtered = await listProducts(ctx, { lowStockOnly: true });
  assert.deepEqual(
    filtered.map((product) => product.name),
    ['Eggs', 'Ghee', 'Milk']
  );
});

test('findProductByCode matches barcode first, then numeric id', async () => {
  const ctx = testContext();
  const soap = await seedProduct(ctx, { name: 'Soap', barcode: '8901' });
  const salt = await seedProduct(ctx, { name: 'Salt' });

  assert.equal((await findProductByCode(ctx, ' 8901 ')).id, soap.id);
  assert.equal((await findProductByCode(ctx, String(salt.id))).id, salt.id);
  await assert.rejects(findProductByCode(ctx, 'missing'), NotFoundError);
});

test('scanStockIncrement adds at least one unit and records the change', async () => {
  const ctx = testContext();
  await seedProduct(ctx, { name: 'Soap', barcode: '8901', stock_quantity: 10 });

  const once = await scanStockIncrement(ctx, { code: '8901' });
  const clamped = await scanStockIncrement(ctx, { code: '8901', delta: '0' });

  assert.equal(once.stock_quantity, 11);
  assert.equal(clamped.stock_quantity, 12);
  const entries = await ctx.store.auditLogs.list();
  assert.equal(entries.length, 2);
  assert.equal(entries[1].action, 'stock_change');
  assert.equal(entries[1].old_value, '10');
  assert.equal(entries[1].new_value, '11');
});

test('decrementStock refuses to go below zero', async () => {
  const ctx = testContext();
  const eggs = await seedProduct(ctx, { name: 'Eggs', stock_quantity: 2 });

  await assert.rejects(decrementStock(ctx, eggs, 3), InsufficientStockError);
  assert.equal((await ctx.store.products.getById(eggs.id))?.stock_quantity, 2);
});

test('decrementStock fails on a stale read instead of overwriting', async () => {
  const ctx = testContext();
  const stale = await seedProduct(ctx, { name: 'Eggs', stock_quantity: 10 });
  await ctx.store.products.setStock(stale.id, 7, stale.version);

  await assert.rejects(decrementStock(ctx, stale, 1), StockConflictError);
  assert.equal((await ctx.store.products.getById(stale.id))?.stock_quantity, 7);
});

test('restoreStock re-reads and retries when the version moved on', async () => {
  const ctx = testContext();
  const eggs = await seedProduct(ctx, { name: 'Eggs', stock_quantity: 4 });
  const original = ctx.store.products.setStock;
  let calls = 0;
  ctx.store.products.setStock = async (id, next, version) => {
    calls += 1;
    if (calls === 1) return null;
    return original(id, next, version);
  };

  const restored = await restoreStock(ctx, eggs.id, 3);

  assert.equal(calls, 2);
  assert.equal(restored.stock_quantity, 7);
});

test('compensateStock logs a failed restore and carries on', async () => {
  const lines: LoggedLine[] = [];
  const ctx = testContext(undefined, { logger: recordingLogger(lines) });
  const eggs = await seedProduct(ctx, { name: 'Eggs', stock_quantity: 4 });
  const milk = await seedProduct(ctx, { name: 'Milk', stock_quantity: 4 });
  ctx.store.failures.add('products.setStock');

  await compensateStock(ctx, [
    { productId: eggs.id, quantity: 1 },
    { productId: milk.id, quantity: 2 },
  ]);

  // Restores run newest first, so the tripped call is Milk's.
  assert.equal((await ctx.store.products.getById(milk.id))?.stock_quantity, 4);
  assert.equal((await ctx.store.products.getById(eggs.id))?.stock_quantity, 5);
  const failure = lines.find((line) => line.type === 'stock_compensation_failed');
  assert.equal(failure?.fields.productId, milk.id);
  assert.equal(failure?.fields.message, 'simulated failure: products.setStock');
});
