import { OWNER_ONLY, STAFF_ROLES } from '@/lib/api-auth';
import { created, guarded, guardedWithId, ok, parseId, readBody, type StoreResolver } from '@/lib/api-response';
import { ValidationError } from '@/lib/errors';
import * as credit from '@/lib/services/credit';

export function customersHandlers(resolveStore: StoreResolver) {
  return {
    /** `?suggest=1&q=` answers the autocomplete list instead of full summaries. */
    GET: guarded(STAFF_ROLES, resolveStore, async (ctx, req) => {
      const { searchParams } = req.nextUrl;
      const query = searchParams.get('q') ?? '';
      if (searchParams.get('suggest') === '1') {
        return ok(await credit.suggestCustomers(ctx, query));
      }
      return ok(await credit.listCustomers(ctx, query || undefined));
    }),

    POST: guarded(STAFF_ROLES, resolveStore, async (ctx, req) =>
      created(await credit.createCustomer(ctx, await readBody(req)))
    ),

    PUT: guarded(STAFF_ROLES, resolveStore, async (ctx, req) =>
      ok(await credit.updateCustomer(ctx, await readBody(req)))
    ),

    DELETE: guarded(OWNER_ONLY, resolveStore, async (ctx, req) => {
      const id = parseId(req.nextUrl.searchParams.get('id'));
      await credit.deleteCustomer(ctx, id);
      return ok({ id });
    }),
  };
}

export function customerReminderHandlers(resolveStore: StoreResolver) {
  return {
    POST: guardedWithId(STAFF_ROLES, resolveStore, async (ctx, _req, id) => ok(await credit.recordReminder(ctx, id))),
  };
}

export function creditHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(STAFF_ROLES, resolveStore, async (ctx, req) => {
      const rawSort = req.nextUrl.searchParams.get('sort');
      let sort: credit.CreditSort = 'date';
      if (rawSort) {
        if (!credit.isCreditSort(rawSort)) {
          throw ValidationError.single('sort', `sort must be one of: ${credit.CREDIT_SORTS.join(', ')}`);
        }
        sort = rawSort;
      }
      const { entries, total_outstanding } = await credit.listCreditEntries(ctx, sort);
      return ok(entries, { summary: { total_outstanding, count: entries.length } });
    }),

    POST: guarded(STAFF_ROLES, resolveStore, async (ctx, req) =>
      created(await credit.addCreditEntry(ctx, await readBody(req)))
    ),

    DELETE: guarded(OWNER_ONLY, resolveStore, async (ctx, req) => {
      const id = parseId(req.nextUrl.searchParams.get('id'));
      await credit.deleteCreditEntry(ctx, id);
      return ok({ id });
    }),
  };
}

export function creditSettleHandlers(resolveStore: StoreResolver) {
  return {
    POST: guardedWithId(STAFF_ROLES, resolveStore, async (ctx, _req, id) => {
      const { entry, changed } = await credit.settleCreditEntry(ctx, id);
      return ok(entry, { summary: { changed } });
    }),
  };
}

export function creditRemindersHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(STAFF_ROLES, resolveStore, async (ctx) => ok(await credit.buildReminders(ctx))),
  };
}
