import { OWNER_ONLY, STAFF_ROLES } from '@/lib/api-auth';
import { created, guarded, ok, parseId, readBody, type StoreResolver } from '@/lib/api-response';
import { ValidationError } from '@/lib/errors';
import * as catalog from '@/lib/services/catalog';

function flagParam(value: string | null) {
  return value === '1' || value === 'true';
}

export function categoriesHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(STAFF_ROLES, resolveStore, async (ctx) => ok(await catalog.listCategories(ctx))),

    POST: guarded(OWNER_ONLY, resolveStore, async (ctx, req) =>
      created(await catalog.createCategory(ctx, await readBody(req)))
    ),

    PUT: guarded(OWNER_ONLY, resolveStore, async (ctx, req) =>
      ok(await catalog.updateCategory(ctx, await readBody(req)))
    ),

    DELETE: guarded(OWNER_ONLY, resolveStore, async (ctx, req) => {
      const id = parseId(req.nextUrl.searchParams.get('id'));
      await catalog.deleteCategory(ctx, id);
      return ok({ id });
    }),
  };
}

export function productsHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(STAFF_ROLES, resolveStore, async (ctx, req) => {
      const { searchParams } = req.nextUrl;
      const category = searchParams.get('category');
      const products = await catalog.listProducts(ctx, {
        query: searchParams.get('q') ?? undefined,
        categoryId: category ? parseId(category, 'category') : undefined,
        activeOnly: flagParam(searchParams.get('active')),
        lowStockOnly: flagParam(searchParams.get('low_stock')),
      });
      return ok(products, {
        summary: { count: products.length, low_stock: products.filter(catalog.isLowStock).length },
      });
    }),

    POST: guarded(OWNER_ONLY, resolveStore, async (ctx, req) =>
      created(await catalog.createProduct(ctx, await readBody(req)))
    ),

    PUT: guarded(OWNER_ONLY, resolveStore, async (ctx, req) =>
      ok(await catalog.updateProduct(ctx, await readBody(req)))
    ),

    DELETE: guarded(OWNER_ONLY, resolveStore, async (ctx, req) => {
      const id = parseId(req.nextUrl.searchParams.get('id'));
      await catalog.deleteProduct(ctx, id);
      return ok({ id });
    }),
  };
}

export function productLookupHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(STAFF_ROLES, resolveStore, async (ctx, req) => {
      const code = req.nextUrl.searchParams.get('code')?.trim() ?? '';
      if (!code) throw ValidationError.single('code', 'code is required');
      return ok(await catalog.findProductByCode(ctx, code));
    }),
  };
}

export function productStockHandlers(resolveStore: StoreResolver) {
  return {
    POST: guarded(STAFF_ROLES, resolveStore, async (ctx, req) =>
      ok(await catalog.scanStockIncrement(ctx, await readBody(req)))
    ),
  };
}
