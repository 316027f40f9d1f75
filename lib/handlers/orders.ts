import { OWNER_ONLY, STAFF_ROLES } from '@/lib/api-auth';
import { created, guarded, guardedWithId, ok, parsePeriodParams, readBody, type StoreResolver } from '@/lib/api-response';
import { ValidationError } from '@/lib/errors';
import { sumMoney } from '@/lib/money';
import { generateReceipt, buildShareText } from '@/lib/receipt';
import { ORDER_STATUSES, type OrderStatus } from '@/lib/shop-types';
import * as orders from '@/lib/services/orders';

function parseStatus(value: string | null): OrderStatus | undefined {
  if (value === null || value === '' || value === 'all') return undefined;
  const match = ORDER_STATUSES.find((status) => status === value);
  if (!match) throw ValidationError.single('status', `status must be one of: ${ORDER_STATUSES.join(', ')}`);
  return match;
}

export function ordersHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(STAFF_ROLES, resolveStore, async (ctx, req) => {
      const { searchParams } = req.nextUrl;
      const status = parseStatus(searchParams.get('status'));
      const hasWindow = searchParams.has('range') || searchParams.has('from') || searchParams.has('to');
      const window = hasWindow ? parsePeriodParams(searchParams, ctx).period : undefined;

      const rows = await orders.listOrders(ctx, {
        status,
        startIso: window?.startIso,
        endIso: window?.endIso,
      });
      return ok(rows, {
        summary: {
          count: rows.length,
          total_amount: sumMoney(rows.filter((row) => row.status === 'completed').map((row) => row.total_amount)),
        },
      });
    }),

    POST: guarded(STAFF_ROLES, resolveStore, async (ctx, req) =>
      created(await orders.createOrder(ctx, await readBody(req)))
    ),
  };
}

export function orderHandlers(resolveStore: StoreResolver) {
  return {
    GET: guardedWithId(STAFF_ROLES, resolveStore, async (ctx, _req, id) => {
      const order = await orders.getOrder(ctx, id);
      return ok({
        ...order,
        receipt: generateReceipt(order, ctx.config.shopName),
        share_text: buildShareText(order),
      });
    }),

    DELETE: guardedWithId(OWNER_ONLY, resolveStore, async (ctx, _req, id) => {
      await orders.deleteOrder(ctx, id);
      return ok({ id });
    }),
  };
}

export function orderStatusHandlers(resolveStore: StoreResolver) {
  return {
    POST: guardedWithId(STAFF_ROLES, resolveStore, async (ctx, req, id) =>
      ok(await orders.changeOrderStatus(ctx, id, await readBody(req)))
    ),
  };
}
