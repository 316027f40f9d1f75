import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { AppError, DuplicateRecordError, ProtectedRecordError } from '@/lib/errors';
import { AUDIT_ACTIONS, EXPENSE_CATEGORIES, ORDER_STATUSES, PAYMENT_METHODS } from '@/lib/shop-types';
import type {
  AuditLogsRepo,
  CategoriesRepo,
  CreditEntriesRepo,
  CustomersRepo,
  ExpensesRepo,
  OrdersRepo,
  ProductsRepo,
  PurchasesRepo,
  ShopStore,
  WholesalersRepo,
} from '@/lib/store/types';

// Postgres numeric columns come back as strings; rows are coerced here once.
const num = z.coerce.number();
const text = z
  .string()
  .nullable()
  .transform((value) => value ?? '');
const optionalText = z.string().nullable();

const categoryRow = z.object({
  id: num,
  name: z.string(),
  description: text,
  created_at: z.string(),
});

const productRow = z.object({
  id: num,
  category_id: num.nullable(),
  name: z.string(),
  description: text,
  image_url: optionalText,
  cost_price: num,
  selling_price: num,
  discount: num,
  stock_quantity: num,
  reorder_threshold: num,
  tax_rate_percent: num,
  expiry_date: optionalText,
  barcode: optionalText,
  unit: text,
  is_active: z.boolean(),
  version: num,
  created_at: z.string(),
  updated_at: z.string(),
});

const orderRow = z.object({
  id: num,
  status: z.enum(ORDER_STATUSES),
  payment_method: z.enum(PAYMENT_METHODS),
  total_amount: num,
  customer_name: optionalText,
  customer_phone: optionalText,
  return_reason: optionalText,
  created_by: optionalText,
  created_at: z.string(),
  completed_at: optionalText,
  returned_at: optionalText,
});

const orderLineRow = z.object({
  id: num,
  order_id: num,
  product_id: num,
  product_name: z.string(),
  quantity: num,
  unit_price: num,
  unit_cost: num,
  tax_rate_percent: num,
  subtotal: num,
});

const customerRow = z.object({
  id: num,
  name: z.string(),
  phone: text,
  address: text,
  notes: text,
  is_active: z.boolean(),
  last_reminder_date: optionalText,
  created_at: z.string(),
});

const creditRow = z.object({
  id: num,
  customer_id: num,
  product_id: num.nullable(),
  item_name: z.string(),
  quantity: num,
  amount: num,
  is_settled: z.boolean(),
  date_taken: z.string(),
  date_settled: optionalText,
  notes: text,
});

const expenseRow = z.object({
  id: num,
  category: z.enum(EXPENSE_CATEGORIES),
  amount: num,
  description: text,
  date: z.string(),
  created_at: z.string(),
});

const wholesalerRow = z.object({
  id: num,
  name: z.string(),
  phone: text,
  email: text,
  address: text,
  created_at: z.string(),
});

const purchaseRow = z.object({
  id: num,
  wholesaler_id: num,
  product_id: num,
  quantity: num,
  unit_cost: num,
  selling_price: num,
  expiry_date: optionalText,
  date: z.string(),
  created_at: z.string(),
});

const auditRow = z.object({
  id: num,
  action: z.enum(AUDIT_ACTIONS),
  entity: z.string(),
  entity_id: num,
  field: z.string(),
  old_value: text,
  new_value: text,
  actor: optionalText,
  created_at: z.string(),
});

export interface StoreQueryError {
  message: string;
  code?: string;
  details?: string | null;
}

interface QueryResult {
  data: unknown;
  error: StoreQueryError | null;
  count?: number | null;
}

// Unique indexes whose key is an expression, so `details` does not name a plain column.
const UNIQUE_INDEX_FIELDS = new Map([
  ['idx_categories_name', 'name'],
  ['products_barcode_key', 'barcode'],
]);

function duplicateField(error: StoreQueryError) {
  const constraint = /constraint "([^"]+)"/.exec(error.message)?.[1];
  const indexed = constraint ? UNIQUE_INDEX_FIELDS.get(constraint) : undefined;
  if (indexed) return indexed;
  return /Key \((?:lower\()?(\w+)\)?\)=/i.exec(error.details ?? '')?.[1] ?? 'form';
}

/**
 * Unique violations (23505) become field errors and foreign-key violations
 * (23503) become protected-record errors; the service checks run first, so
 * these only surface when another request got in between.
 */
export function toStoreError(error: StoreQueryError, operation: string): AppError {
  if (error.code === '23505') {
    const field = duplicateField(error);
    const message = field === 'form' ? 'A record with the same value already exists.' : `Another record already uses this ${field}.`;
    return new DuplicateRecordError(field, message);
  }
  if (error.code === '23503') {
    return new ProtectedRecordError('This record is still linked to other records.');
  }
  return new AppError(`${operation}: ${error.message}`, error.code || 'DB_ERROR', 500);
}

function unwrap(result: QueryResult, operation: string) {
  if (result.error) {
    throw toStoreError(result.error, operation);
  }
  return result;
}

function many<S extends z.ZodTypeAny>(schema: S, result: QueryResult, operation: string): z.output<S>[] {
  return z.array(schema).parse(unwrap(result, operation).data ?? []);
}

function maybeOne<S extends z.ZodTypeAny>(schema: S, result: QueryResult, operation: string): z.output<S> | null {
  const { data } = unwrap(result, operation);
  return data == null ? null : schema.parse(data);
}

function one<S extends z.ZodTypeAny>(schema: S, result: QueryResult, operation: string): z.output<S> {
  return schema.parse(unwrap(result, operation).data);
}

function countOf(result: QueryResult, operation: string) {
  return unwrap(result, operation).count ?? 0;
}

function escapeLike(term: string) {
  return term.trim().replace(/[\\%_]/g, (char) => `\\${char}`);
}

/** Contains-match pattern; drops characters PostgREST treats as filter syntax. */
export function likePattern(term: string) {
  return `%${escapeLike(term.replace(/[,()]/g, ' '))}%`;
}

/** Store backed by the Supabase tables created in db/migrations. */
export function createSupabaseStore(client: SupabaseClient): ShopStore {
  const categories: CategoriesRepo = {
    async list() {
      return many(categoryRow, await client.from('categories').select('*').order('name'), 'categories.list');
    },
    async getById(id) {
      return maybeOne(categoryRow, await client.from('categories').select('*').eq('id', id).maybeSingle(), 'categories.get');
    },
    async getByName(name) {
      const result = await client.from('categories').select('*').ilike('name', escapeLike(name)).limit(1).maybeSingle();
      return maybeOne(categoryRow, result, 'categories.getByName');
    },
    async insert(input) {
      return one(categoryRow, await client.from('categories').insert(input).select().single(), 'categories.insert');
    },
    async update(id, patch) {
      const result = await client.from('categories').update(patch).eq('id', id).select().maybeSingle();
      return maybeOne(categoryRow, result, 'categories.update');
    },
    async delete(id) {
      unwrap(await client.from('categories').delete().eq('id', id), 'categories.delete');
    },
  };

  const products: ProductsRepo = {
    async list(filter = {}) {
      let query = client.from('products').select('*');
      if (filter.query?.trim()) query = query.ilike('name', likePattern(filter.query));
      if (filter.categoryId !== undefined) query = query.eq('category_id', filter.categoryId);
      if (filter.activeOnly) query = query.eq('is_active', true);
      return many(productRow, await query.order('name'), 'products.list');
    },
    async getById(id) {
      return maybeOne(productRow, await client.from('products').select('*').eq('id', id).maybeSingle(), 'products.get');
    },
    async getByIds(ids) {
      if (ids.length === 0) return [];
      return many(productRow, await client.from('products').select('*').in('id', ids), 'products.getByIds');
    },
    async getByBarcode(barcode) {
      const result = await client.from('products').select('*').eq('barcode', barcode).limit(1).maybeSingle();
      return maybeOne(productRow, result, 'products.getByBarcode');
    },
    async insert(input) {
      return one(productRow, await client.from('products').insert(input).select().single(), 'products.insert');
    },
    async update(id, patch) {
      const result = await client
        .from('products')
        .update({ ...patch, updated_at: new Date().toISOString() })
        .eq('id', id)
        .select()
        .maybeSingle();
      return maybeOne(productRow, result, 'products.update');
    },
    async setStock(id, nextQuantity, expectedVersion) {
      const result = await client
        .from('products')
        .update({
          stock_quantity: nextQuantity,
          version: expectedVersion + 1,
          updated_at: new Date().toISOString(),
        })
        .eq('id', id)
        .eq('version', expectedVersion)
        .select()
        .maybeSingle();
      return maybeOne(productRow, result, 'products.setStock');
    },
    async clearCategory(categoryId) {
      unwrap(
        await client.from('products').update({ category_id: null }).eq('category_id', categoryId),
        'products.clearCategory'
      );
    },
    async delete(id) {
      unwrap(await client.from('products').delete().eq('id', id), 'products.delete');
    },
  };

  const orders: OrdersRepo = {
    async list(filter = {}) {
      let query = client.from('orders').select('*');
      if (filter.status) query = query.eq('status', filter.status);
      if (filter.statuses) query = query.in('status', filter.statuses);
      if (filter.startIso) query = query.gte('created_at', filter.startIso);
      if (filter.endIso) query = query.lt('created_at', filter.endIso);
      const result = await query.order('created_at', { ascending: false }).order('id', { ascending: false });
      return many(orderRow, result, 'orders.list');
    },
    async getById(id) {
      return maybeOne(orderRow, await client.from('orders').select('*').eq('id', id).maybeSingle(), 'orders.get');
    },
    async insert(input) {
      return one(orderRow, await client.from('orders').insert(input).select().single(), 'orders.insert');
    },
    async insertLines(lines) {
      if (lines.length === 0) return [];
      return many(orderLineRow, await client.from('order_lines').insert(lines).select(), 'orders.insertLines');
    },
    async getLines(orderId) {
      const result = await client.from('order_lines').select('*').eq('order_id', orderId).order('id');
      return many(orderLineRow, result, 'orders.getLines');
    },
    async listLines(orderIds) {
      if (orderIds.length === 0) return [];
      const result = await client.from('order_lines').select('*').in('order_id', orderIds).order('id');
      return many(orderLineRow, result, 'orders.listLines');
    },
    async countLinesForProduct(productId) {
      const result = await client
        .from('order_lines')
        .select('id', { count: 'exact', head: true })
        .eq('product_id', productId);
      return countOf(result, 'orders.countLinesForProduct');
    },
    async changeStatus(id, from, change) {
      const result = await client
        .from('orders')
        .update(change)
        .eq('id', id)
        .eq('status', from)
        .select()
        .maybeSingle();
      return maybeOne(orderRow, result, 'orders.changeStatus');
    },
    async deleteLines(orderId) {
      unwrap(await client.from('order_lines').delete().eq('order_id', orderId), 'orders.deleteLines');
    },
    async delete(id) {
      unwrap(await client.from('orders').delete().eq('id', id), 'orders.delete');
    },
  };

  const customers: CustomersRepo = {
    async list(search) {
      let query = client.from('customers').select('*');
      if (search?.trim()) {
        const pattern = likePattern(search);
        query = query.or(`name.ilike.${pattern},phone.ilike.${pattern}`);
      }
      return many(customerRow, await query.order('name'), 'customers.list');
    },
    async getById(id) {
      return maybeOne(customerRow, await client.from('customers').select('*').eq('id', id).maybeSingle(), 'customers.get');
    },
    async findByNameAndPhone(name, phone) {
      const result = await client
        .from('customers')
        .select('*')
        .eq('name', name)
        .eq('phone', phone)
        .limit(1)
        .maybeSingle();
      return maybeOne(customerRow, result, 'customers.findByNameAndPhone');
    },
    async insert(input) {
      return one(customerRow, await client.from('customers').insert(input).select().single(), 'customers.insert');
    },
    async update(id, patch) {
      const result = await client.from('customers').update(patch).eq('id', id).select().maybeSingle();
      return maybeOne(customerRow, result, 'customers.update');
    },
    async delete(id) {
      unwrap(await client.from('customers').delete().eq('id', id), 'customers.delete');
    },
  };

  const credits: CreditEntriesRepo = {
    async list(filter = {}) {
      let query = client.from('credit_entries').select('*');
      if (filter.customerId !== undefined) query = query.eq('customer_id', filter.customerId);
      if (filter.settled !== undefined) query = query.eq('is_settled', filter.settled);
      const result = await query.order('date_taken', { ascending: false }).order('id', { ascending: false });
      return many(creditRow, result, 'credits.list');
    },
    async getById(id) {
      return maybeOne(creditRow, await client.from('credit_entries').select('*').eq('id', id).maybeSingle(), 'credits.get');
    },
    async insert(input) {
      return one(creditRow, await client.from('credit_entries').insert(input).select().single(), 'credits.insert');
    },
    async markSettled(id, settledAt) {
      const result = await client
        .from('credit_entries')
        .update({ is_settled: true, date_settled: settledAt })
        .eq('id', id)
        .eq('is_settled', false)
        .select()
        .maybeSingle();
      return maybeOne(creditRow, result, 'credits.markSettled');
    },
    async clearProduct(productId) {
      unwrap(
        await client.from('credit_entries').update({ product_id: null }).eq('product_id', productId),
        'credits.clearProduct'
      );
    },
    async deleteForCustomer(customerId) {
      unwrap(await client.from('credit_entries').delete().eq('customer_id', customerId), 'credits.deleteForCustomer');
    },
    async delete(id) {
      unwrap(await client.from('credit_entries').delete().eq('id', id), 'credits.delete');
    },
  };

  const expenses: ExpensesRepo = {
    async list(window = {}) {
      let query = client.from('expenses').select('*');
      if (window.startDate) query = query.gte('date', window.startDate);
      if (window.endDate) query = query.lt('date', window.endDate);
      const result = await query.order('date', { ascending: false }).order('id', { ascending: false });
      return many(expenseRow, result, 'expenses.list');
    },
    async getById(id) {
      return maybeOne(expenseRow, await client.from('expenses').select('*').eq('id', id).maybeSingle(), 'expenses.get');
    },
    async insert(input) {
      return one(expenseRow, await client.from('expenses').insert(input).select().single(), 'expenses.insert');
    },
    async update(id, patch) {
      const result = await client.from('expenses').update(patch).eq('id', id).select().maybeSingle();
      return maybeOne(expenseRow, result, 'expenses.update');
    },
    async delete(id) {
      unwrap(await client.from('expenses').delete().eq('id', id), 'expenses.delete');
    },
  };

  const wholesalers: WholesalersRepo = {
    async list() {
      return many(wholesalerRow, await client.from('wholesalers').select('*').order('name'), 'wholesalers.list');
    },
    async getById(id) {
      const result = await client.from('wholesalers').select('*').eq('id', id).maybeSingle();
      return maybeOne(wholesalerRow, result, 'wholesalers.get');
    },
    async getByName(name) {
      const result = await client.from('wholesalers').select('*').ilike('name', escapeLike(name)).limit(1).maybeSingle();
      return maybeOne(wholesalerRow, result, 'wholesalers.getByName');
    },
    async insert(input) {
      return one(wholesalerRow, await client.from('wholesalers').insert(input).select().single(), 'wholesalers.insert');
    },
    async delete(id) {
      unwrap(await client.from('wholesalers').delete().eq('id', id), 'wholesalers.delete');
    },
  };

  const purchases: PurchasesRepo = {
    async list(window = {}) {
      let query = client.from('purchases').select('*');
      if (window.startDate) query = query.gte('date', window.startDate);
      if (window.endDate) query = query.lt('date', window.endDate);
      query = query.order('date', { ascending: false }).order('id', { ascending: false });
      if (window.limit) query = query.limit(window.limit);
      return many(purchaseRow, await query, 'purchases.list');
    },
    async insert(input) {
      return one(purchaseRow, await client.from('purchases').insert(input).select().single(), 'purchases.insert');
    },
    async countForProduct(productId) {
      const result = await client
        .from('purchases')
        .select('id', { count: 'exact', head: true })
        .eq('product_id', productId);
      return countOf(result, 'purchases.countForProduct');
    },
    async countForWholesaler(wholesalerId) {
      const result = await client
        .from('purchases')
        .select('id', { count: 'exact', head: true })
        .eq('wholesaler_id', wholesalerId);
      return countOf(result, 'purchases.countForWholesaler');
    },
  };

  const auditLogs: AuditLogsRepo = {
    async insert(input) {
      return one(auditRow, await client.from('audit_logs').insert(input).select().single(), 'auditLogs.insert');
    },
    async list(limit = 100) {
      const result = await client
        .from('audit_logs')
        .select('*')
        .order('id', { ascending: false })
        .limit(limit);
      return many(auditRow, result, 'auditLogs.list');
    },
  };

  return { categories, products, orders, customers, credits, expenses, wholesalers, purchases, auditLogs };
}
