import assert from 'node:assert/strict';
import test from 'node:test';
import { NotFoundError, ValidationError } from '../lib/errors';
import {
  addCreditEntry,
  buildReminders,
  createCustomer,
  deleteCustomer,
  isCreditSort,
  listCreditEntries,
  listCustomers,
  recordReminder,
  renderReminder,
  settleCreditEntry,
  suggestCustomers,
} from '../lib/services/credit';
import { seedProduct, testContext } from './support/context';

test('addCreditEntry creates the customer once and reuses it by name and phone', async () => {
  const ctx = testContext();

  const first = await addCreditEntry(ctx, { customer_name: 'Asha', customer_phone: '98450', item_name: 'Sugar', amount: '45' });
  const second = await addCreditEntry(ctx, { customer_name: 'Asha', customer_phone: '98450', item_name: 'Tea', amount: 30 });

  assert.equal(first.customer_id, second.customer_id);
  assert.equal((await ctx.store.customers.list()).length, 1);
  assert.equal(first.amount, 45);
  assert.equal(first.quantity, 1);
  assert.equal(first.is_settled, false);
  assert.equal(first.product_id, null);
});

test('addCreditEntry prices a product line from its selling price', async () => {
  const ctx = testContext();
  const oil = await seedProduct(ctx, { name: 'Sunflower Oil', selling_price: 145 });

  const entry = await addCreditEntry(ctx, { customer_name: 'Bala', product_id: oil.id, quantity: 2, amount: 0 });

  assert.equal(entry.amount, 290);
  assert.equal(entry.item_name, 'Sunflower Oil');
  assert.equal(entry.product_id, oil.id);
});

test('addCreditEntry needs a customer, an item and a positive amount', async () => {
  const ctx = testContext();

  await assert.rejects(addCreditEntry(ctx, { amount: 10 }), (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.deepEqual(
      error.fieldErrors.map((e) => e.field),
      ['customer_name', 'item_name']
    );
    return true;
  });
  await assert.rejects(addCreditEntry(ctx, { customer_name: 'Asha', item_name: 'Sugar' }), (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.deepEqual(error.fieldErrors, [{ field: 'amount', message: 'amount must be greater than zero' }]);
    return true;
  });
  await assert.rejects(addCreditEntry(ctx, { customer_id: 7, item_name: 'Sugar', amount: 5 }), NotFoundError);
});

test('settleCreditEntry settles once and audits the payment', async () => {
  const ctx = testContext();
  const entry = await addCreditEntry(ctx, { customer_name: 'Asha', item_name: 'Sugar', amount: 45 });

  const first = await settleCreditEntry(ctx, entry.id);
  const again = await settleCreditEntry(ctx, entry.id);

  assert.equal(first.changed, true);
  assert.equal(first.entry.is_settled, true);
  assert.equal(first.entry.date_settled, '2026-03-15T10:00:00.000Z');
  assert.equal(again.changed, false);
  const audit = await ctx.store.auditLogs.list();
  assert.equal(audit.length, 1);
  assert.equal(audit[0].action, 'credit_paid');
  assert.equal(audit[0].old_value, 'False');
  assert.equal(audit[0].new_value, 'True');
});

test('listCreditEntries puts open entries first and totals what is owed', async () => {
  const ctx = testContext();
  const paid = await addCreditEntry(ctx, { customer_name: 'Asha', item_name: 'Rice', amount: 100 });
  await addCreditEntry(ctx, { customer_name: 'Bala', item_name: 'Dal', amount: 50 });
  await addCreditEntry(ctx, { customer_name: 'Asha', item_name: 'Tea', amount: 30 });
  await settleCreditEntry(ctx, paid.id);

  const byCustomer = await listCreditEntries(ctx, 'customer_asc');

  assert.deepEqual(
    byCustomer.entries.map((row) => [row.customer_name, row.item_name, row.is_settled]),
    [
      ['Asha', 'Tea', false],
      ['Bala', 'Dal', false],
      ['Asha', 'Rice', true],
    ]
  );
  assert.equal(byCustomer.total_outstanding, 80);

  const descending = await listCreditEntries(ctx, 'customer_desc');
  assert.deepEqual(
    descending.entries.map((row) => row.item_name),
    ['Dal', 'Tea', 'Rice']
  );
});

test('isCreditSort accepts only the known orderings', () => {
  assert.equal(isCreditSort('customer_asc'), true);
  assert.equal(isCreditSort('amount'), false);
  assert.equal(isCreditSort(null), false);
});

test('listCustomers adds the outstanding balance per customer', async () => {
  const ctx = testContext();
  await addCreditEntry(ctx, { customer_name: 'Asha', item_name: 'Rice', amount: 100.5 });
  await addCreditEntry(ctx, { customer_name: 'Asha', item_name: 'Tea', amount: 30.25 });
  await createCustomer(ctx, { name: 'Chitra' });

  const customers = await listCustomers(ctx);

  assert.deepEqual(
    customers.map((row) => [row.name, row.outstanding, row.open_entries]),
    [
      ['Asha', 130.75, 2],
      ['Chitra', 0, 0],
    ]
  );
});

test('buildReminders renders one message per debtor, largest balance first', async () => {
  const ctx = testContext();
  await addCreditEntry(ctx, { customer_name: 'Asha', customer_phone: '111', item_name: 'Tea', amount: 30 });
  await addCreditEntry(ctx, { customer_name: 'Bala', customer_phone: '222', item_name: 'Dal', amount: 50 });

  const reminders = await buildReminders(ctx);

  assert.deepEqual(
    reminders.map((row) => [row.customer_name, row.customer_phone, row.amount]),
    [
      ['Bala', '222', 50],
      ['Asha', '111', 30],
    ]
  );
  assert.equal(
    reminders[1].message,
    'Dear Asha, your pending udhari is Rs.30.00. Please clear it. - Test Kirana'
  );
});

test('renderReminder fills every placeholder', () => {
  assert.equal(
    renderReminder('{customer_name} owes {amount} to {shop_name}; pay {customer_name}', {
      customer_name: 'Asha',
      amount: 12.5,
      shop_name: 'Corner Store',
    }),
    'Asha owes 12.50 to Corner Store; pay Asha'
  );
});

test('recordReminder stamps today on the customer', async () => {
  const ctx = testContext();
  const customer = await createCustomer(ctx, { name: 'Asha', phone: '111' });

  const updated = await recordReminder(ctx, customer.id);

  assert.equal(updated.last_reminder_date, '2026-03-15');
  await assert.rejects(recordReminder(ctx, 404), NotFoundError);
});

test('recordReminder uses the shop calendar, not the UTC date', async () => {
  const ctx = testContext(undefined, { now: () => new Date('2026-10-19T20:00:00.000Z'), timezoneOffset: -330 });
  const customer = await createCustomer(ctx, { name: 'Asha', phone: '111' });

  const updated = await recordReminder(ctx, customer.id);

  assert.equal(updated.last_reminder_date, '2026-10-20');
});

test('suggestCustomers matches active customers by name', async () => {
  const ctx = testContext();
  await createCustomer(ctx, { name: 'Asha Rao', phone: '111', address: 'MG Road' });
  await createCustomer(ctx, { name: 'Ashok', phone: '222', is_active: 'off' });
  await createCustomer(ctx, { name: 'Bala', phone: '333' });

  const suggestions = await suggestCustomers(ctx, 'ash');

  assert.deepEqual(suggestions, [{ id: 1, name: 'Asha Rao', phone: '111', address: 'MG Road' }]);
  assert.deepEqual(await suggestCustomers(ctx, '  '), []);
});

test('deleteCustomer removes the customer and all of their entries', async () => {
  const ctx = testContext();
  const entry = await addCreditEntry(ctx, { customer_name: 'Asha', item_name: 'Tea', amount: 30 });
  await addCreditEntry(ctx, { customer_name: 'Bala', item_name: 'Dal', amount: 50 });

  await deleteCustomer(ctx, entry.customer_id);

  assert.equal(await ctx.store.customers.getById(entry.customer_id), null);
  const remaining = await ctx.store.credits.list();
  assert.deepEqual(
    remaining.map((row) => row.item_name),
    ['Dal']
  );
});
