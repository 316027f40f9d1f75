import { NextRequest, NextResponse } from 'next/server';
import { OWNER_ONLY } from '@/lib/api-auth';
import { authorize, created, errorResponse, ok, parseId, readBody, type StoreResolver } from '@/lib/api-response';
import { ADMIN_ENTITIES, isAdminEntityKey, type AdminEntityKey } from '@/lib/admin-entities';
import { AppError, NotFoundError } from '@/lib/errors';
import type { ShopContext } from '@/lib/shop-context';
import * as catalog from '@/lib/services/catalog';
import * as credit from '@/lib/services/credit';
import * as expenses from '@/lib/services/expenses';
import * as orders from '@/lib/services/orders';
import * as purchases from '@/lib/services/purchases';

interface AdminOperations {
  list(ctx: ShopContext): Promise<object[]>;
  create?(ctx: ShopContext, raw: unknown): Promise<object>;
  update?(ctx: ShopContext, raw: unknown): Promise<object>;
  remove?(ctx: ShopContext, id: number): Promise<unknown>;
}

// Every write goes through the owning service so validation and deletion policies still apply.
const OPERATIONS: Record<AdminEntityKey, AdminOperations> = {
  categories: {
    list: catalog.listCategories,
    create: catalog.createCategory,
    update: catalog.updateCategory,
    remove: catalog.deleteCategory,
  },
  products: {
    list: (ctx) => catalog.listProducts(ctx),
    create: catalog.createProduct,
    update: catalog.updateProduct,
    remove: catalog.deleteProduct,
  },
  orders: {
    list: (ctx) => ctx.store.orders.list(),
    remove: orders.deleteOrder,
  },
  customers: {
    list: (ctx) => ctx.store.customers.list(),
    create: credit.createCustomer,
    update: credit.updateCustomer,
    remove: credit.deleteCustomer,
  },
  credit_entries: {
    list: (ctx) => ctx.store.credits.list(),
    create: credit.addCreditEntry,
    remove: credit.deleteCreditEntry,
  },
  expenses: {
    list: (ctx) => expenses.listExpenses(ctx),
    create: expenses.createExpense,
    update: expenses.updateExpense,
    remove: expenses.deleteExpense,
  },
  wholesalers: {
    list: purchases.listWholesalers,
    create: purchases.createWholesaler,
    remove: purchases.deleteWholesaler,
  },
  purchases: {
    list: (ctx) => ctx.store.purchases.list(),
    create: purchases.recordPurchase,
  },
  audit_logs: {
    list: (ctx) => ctx.store.auditLogs.list(200),
  },
};

export interface AdminRouteSegment {
  params: { entity: string };
}

type AdminHandler = (ctx: ShopContext, req: NextRequest, entity: AdminEntityKey) => Promise<NextResponse>;

function unsupported(entity: AdminEntityKey, action: string) {
  return new AppError(`${ADMIN_ENTITIES[entity].label} cannot be ${action} here.`, 'METHOD_NOT_ALLOWED', 405);
}

function adminRoute(run: AdminHandler, resolveStore: StoreResolver) {
  return async (req: NextRequest, segment: AdminRouteSegment): Promise<NextResponse> => {
    try {
      const ctx = await authorize(req, OWNER_ONLY, resolveStore);
      if (ctx instanceof NextResponse) return ctx;
      const { entity } = segment.params;
      if (!isAdminEntityKey(entity)) throw new NotFoundError('Admin entity', entity);
      return await run(ctx, req, entity);
    } catch (error) {
      return errorResponse(error, req);
    }
  };
}

export function adminHandlers(resolveStore: StoreResolver) {
  return {
    GET: adminRoute(async (ctx, _req, entity) => {
      const rows = await OPERATIONS[entity].list(ctx);
      return ok(rows, { summary: { entity: ADMIN_ENTITIES[entity], count: rows.length } });
    }, resolveStore),

    POST: adminRoute(async (ctx, req, entity) => {
      const { create } = OPERATIONS[entity];
      if (!create) throw unsupported(entity, 'created');
      return created(await create(ctx, await readBody(req)));
    }, resolveStore),

    PUT: adminRoute(async (ctx, req, entity) => {
      const { update } = OPERATIONS[entity];
      if (!update) throw unsupported(entity, 'edited');
      return ok(await update(ctx, await readBody(req)));
    }, resolveStore),

    DELETE: adminRoute(async (ctx, req, entity) => {
      const { remove } = OPERATIONS[entity];
      if (!remove) throw unsupported(entity, 'deleted');
      const id = parseId(req.nextUrl.searchParams.get('id'));
      await remove(ctx, id);
      return ok({ id });
    }, resolveStore),
  };
}
