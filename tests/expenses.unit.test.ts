import assert from 'node:assert/strict';
import test from 'node:test';
import { NotFoundError, ValidationError } from '../lib/errors';
import {
  createExpense,
  deleteExpense,
  listExpenses,
  totalsByCategory,
  updateExpense,
} from '../lib/services/expenses';
import { resolvePeriod } from '../lib/order-analytics';
import { summarizePeriod } from '../lib/services/reports';
import { testContext } from './support/context';

test('createExpense normalises the category and defaults the date to today', async () => {
  const ctx = testContext();

  const expense = await createExpense(ctx, { category: ' Rent ', amount: '12000', description: 'March rent' });

  assert.equal(expense.category, 'rent');
  assert.equal(expense.amount, 12000);
  assert.equal(expense.date, '2026-03-15');
  assert.equal(expense.description, 'March rent');
});

test('an expense logged just after local midnight counts towards that local day', async () => {
  // 01:30 on 20 October in IST, still the 19th in UTC.
  const ctx = testContext(undefined, { now: () => new Date('2026-10-19T20:00:00.000Z'), timezoneOffset: -330 });

  const expense = await createExpense(ctx, { category: 'rent', amount: 100 });
  const summary = await summarizePeriod(ctx, resolvePeriod('today', -330, ctx.now()), -330);

  assert.equal(expense.date, '2026-10-20');
  assert.equal(summary.period.startDate, '2026-10-20');
  assert.equal(summary.expenses, 100);
});

test('createExpense rejects unknown categories and non-positive amounts', async () => {
  const ctx = testContext();

  await assert.rejects(createExpense(ctx, { category: 'party', amount: 0, date: '2026-02-30' }), (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.deepEqual(
      error.fieldErrors.map((e) => e.field),
      ['category', 'amount', 'date']
    );
    return true;
  });
});

test('listExpenses keeps to the window, newest first', async () => {
  const ctx = testContext();
  await createExpense(ctx, { category: 'electricity', amount: 900, date: '2026-03-01' });
  await createExpense(ctx, { category: 'transport', amount: 150, date: '2026-03-14' });
  await createExpense(ctx, { category: 'rent', amount: 12000, date: '2026-02-28' });

  const march = await listExpenses(ctx, { startDate: '2026-03-01', endDate: '2026-04-01' });

  assert.deepEqual(
    march.map((row) => [row.date, row.category]),
    [
      ['2026-03-14', 'transport'],
      ['2026-03-01', 'electricity'],
    ]
  );
  assert.equal((await listExpenses(ctx)).length, 3);
});

test('totalsByCategory sums per category, largest first', async () => {
  const ctx = testContext();
  await createExpense(ctx, { category: 'transport', amount: 150.4 });
  await createExpense(ctx, { category: 'salary', amount: 8000 });
  await createExpense(ctx, { category: 'transport', amount: 49.6 });

  assert.deepEqual(totalsByCategory(await listExpenses(ctx)), [
    { category: 'salary', amount: 8000 },
    { category: 'transport', amount: 200 },
  ]);
});

test('updateExpense keeps the stored date when none is sent', async () => {
  const ctx = testContext();
  const expense = await createExpense(ctx, { category: 'other', amount: 75, date: '2026-03-02' });

  const updated = await updateExpense(ctx, { id: expense.id, amount: '80', date: '' });

  assert.equal(updated.amount, 80);
  assert.equal(updated.date, '2026-03-02');
  await assert.rejects(updateExpense(ctx, { id: 99, amount: 5 }), NotFoundError);
});

test('deleteExpense removes the row and reports a missing one', async () => {
  const ctx = testContext();
  const expense = await createExpense(ctx, { category: 'maintenance', amount: 300 });

  await deleteExpense(ctx, expense.id);

  assert.equal(await ctx.store.expenses.getById(expense.id), null);
  await assert.rejects(deleteExpense(ctx, expense.id), NotFoundError);
});
