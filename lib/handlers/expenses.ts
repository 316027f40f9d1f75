import { OWNER_ONLY } from '@/lib/api-auth';
import { created, guarded, ok, parseId, parsePeriodParams, readBody, type StoreResolver } from '@/lib/api-response';
import { ValidationError } from '@/lib/errors';
import { sumMoney } from '@/lib/money';
import { addDays } from '@/lib/order-analytics';
import * as expenses from '@/lib/services/expenses';
import { isIsoDate } from '@/lib/validation';

export function expensesHandlers(resolveStore: StoreResolver) {
  return {
    /** `?date=` lists one day; `?range=` or `?from&to` list a period; neither lists everything. */
    GET: guarded(OWNER_ONLY, resolveStore, async (ctx, req) => {
      const { searchParams } = req.nextUrl;
      const date = searchParams.get('date');
      let window: expenses.ExpenseWindow = {};

      if (date) {
        if (!isIsoDate(date)) throw ValidationError.single('date', 'date must be a date (YYYY-MM-DD)');
        window = { startDate: date, endDate: addDays(date, 1) };
      } else if (searchParams.has('range') || searchParams.has('from') || searchParams.has('to')) {
        const { period } = parsePeriodParams(searchParams, ctx);
        window = { startDate: period.startDate, endDate: period.endDate };
      }

      const rows = await expenses.listExpenses(ctx, window);
      return ok(rows, {
        summary: {
          total_amount: sumMoney(rows.map((row) => row.amount)),
          count: rows.length,
          by_category: expenses.totalsByCategory(rows),
        },
      });
    }),

    POST: guarded(OWNER_ONLY, resolveStore, async (ctx, req) =>
      created(await expenses.createExpense(ctx, await readBody(req)))
    ),

    PUT: guarded(OWNER_ONLY, resolveStore, async (ctx, req) =>
      ok(await expenses.updateExpense(ctx, await readBody(req)))
    ),

    DELETE: guarded(OWNER_ONLY, resolveStore, async (ctx, req) => {
      const id = parseId(req.nextUrl.searchParams.get('id'));
      await expenses.deleteExpense(ctx, id);
      return ok({ id });
    }),
  };
}
