import { OWNER_ONLY } from '@/lib/api-auth';
import { created, guarded, ok, parseId, readBody, type StoreResolver } from '@/lib/api-response';
import { todayIso } from '@/lib/shop-context';
import * as purchases from '@/lib/services/purchases';
import { suggestPurchases } from '@/lib/services/reports';

export function wholesalersHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(OWNER_ONLY, resolveStore, async (ctx) => ok(await purchases.listWholesalers(ctx))),

    POST: guarded(OWNER_ONLY, resolveStore, async (ctx, req) =>
      created(await purchases.createWholesaler(ctx, await readBody(req)))
    ),

    DELETE: guarded(OWNER_ONLY, resolveStore, async (ctx, req) => {
      const id = parseId(req.nextUrl.searchParams.get('id'));
      await purchases.deleteWholesaler(ctx, id);
      return ok({ id });
    }),
  };
}

export function purchasesHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(OWNER_ONLY, resolveStore, async (ctx) => ok(await purchases.listPurchases(ctx))),

    POST: guarded(OWNER_ONLY, resolveStore, async (ctx, req) =>
      created(await purchases.recordPurchase(ctx, await readBody(req)))
    ),
  };
}

export function suggestedPurchasesHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(OWNER_ONLY, resolveStore, async (ctx) => {
      const today = todayIso(ctx);
      const rows = await suggestPurchases(ctx, today);
      return ok(rows, { summary: { today, near_days: ctx.config.nearExpiryDays, count: rows.length } });
    }),
  };
}
