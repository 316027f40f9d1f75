import { NotFoundError } from '@/lib/errors';
import { sumMoney } from '@/lib/money';
import { nowIso, todayIso, type ShopContext } from '@/lib/shop-context';
import type { Expense, ExpenseCategory, ID } from '@/lib/shop-types';
import { expenseInputSchema, expenseUpdateSchema, parseInput } from '@/lib/validation';

export interface ExpenseWindow {
  /** Inclusive `YYYY-MM-DD`. */
  startDate?: string;
  /** Exclusive `YYYY-MM-DD`. */
  endDate?: string;
}

export async function listExpenses(ctx: ShopContext, window: ExpenseWindow = {}) {
  const expenses = await ctx.store.expenses.list(window);
  return expenses.sort(
    (a, b) => b.date.localeCompare(a.date) || b.created_at.localeCompare(a.created_at) || b.id - a.id
  );
}

export function totalsByCategory(expenses: Expense[]) {
  const totals = new Map<ExpenseCategory, number>();
  for (const expense of expenses) {
    totals.set(expense.category, sumMoney([totals.get(expense.category) ?? 0, expense.amount]));
  }
  return Array.from(totals.entries())
    .map(([category, amount]) => ({ category, amount }))
    .sort((a, b) => b.amount - a.amount);
}

export async function createExpense(ctx: ShopContext, raw: unknown): Promise<Expense> {
  const input = parseInput(expenseInputSchema, raw);
  const expense = await ctx.store.expenses.insert({
    ...input,
    date: input.date ?? todayIso(ctx),
    created_at: nowIso(ctx),
  });
  ctx.logger.info('expense_created', {
    requestId: ctx.requestId,
    expenseId: expense.id,
    category: expense.category,
    amount: expense.amount,
  });
  return expense;
}

export async function updateExpense(ctx: ShopContext, raw: unknown): Promise<Expense> {
  const { id, date, ...rest } = parseInput(expenseUpdateSchema, raw);
  const patch = date ? { ...rest, date } : rest;
  const updated = await ctx.store.expenses.update(id, patch);
  if (!updated) throw new NotFoundError('Expense', id);
  return updated;
}

export async function deleteExpense(ctx: ShopContext, id: ID) {
  const expense = await ctx.store.expenses.getById(id);
  if (!expense) throw new NotFoundError('Expense', id);
  await ctx.store.expenses.delete(id);
  ctx.logger.info('expense_deleted', { requestId: ctx.requestId, expenseId: id });
}
