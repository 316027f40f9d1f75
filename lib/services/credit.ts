import { writeAuditEvent } from '@/lib/audit-log';
import { NotFoundError, ValidationError } from '@/lib/errors';
import { lineSubtotal, sumMoney } from '@/lib/money';
import { nowIso, todayIso, type ShopContext } from '@/lib/shop-context';
import type { CreditEntry, Customer, ID } from '@/lib/shop-types';
import {
  creditInputSchema,
  customerInputSchema,
  customerUpdateSchema,
  parseInput,
  type CreditInput,
} from '@/lib/validation';

export const CREDIT_SORTS = ['date', 'customer_asc', 'customer_desc'] as const;
export type CreditSort = (typeof CREDIT_SORTS)[number];

export function isCreditSort(value: string | null): value is CreditSort {
  return CREDIT_SORTS.some((sort) => sort === value);
}

export interface CustomerSummary extends Customer {
  outstanding: number;
  open_entries: number;
}

export interface CreditRow extends CreditEntry {
  customer_name: string;
  customer_phone: string;
}

export interface CreditReminder {
  customer_id: ID;
  customer_name: string;
  customer_phone: string;
  last_reminder_date: string | null;
  amount: number;
  message: string;
}

/* ===========================
   Customers
   =========================== */

export async function getCustomer(ctx: ShopContext, id: ID): Promise<Customer> {
  const customer = await ctx.store.customers.getById(id);
  if (!customer) throw new NotFoundError('Customer', id);
  return customer;
}

function outstandingByCustomer(entries: CreditEntry[]) {
  const totals = new Map<ID, { amount: number; count: number }>();
  for (const entry of entries) {
    if (entry.is_settled) continue;
    const current = totals.get(entry.customer_id) ?? { amount: 0, count: 0 };
    totals.set(entry.customer_id, {
      amount: sumMoney([current.amount, entry.amount]),
      count: current.count + 1,
    });
  }
  return totals;
}

export async function listCustomers(ctx: ShopContext, query?: string): Promise<CustomerSummary[]> {
  const [customers, openEntries] = await Promise.all([
    ctx.store.customers.list(query),
    ctx.store.credits.list({ settled: false }),
  ]);
  const totals = outstandingByCustomer(openEntries);
  return customers.map((customer) => ({
    ...customer,
    outstanding: totals.get(customer.id)?.amount ?? 0,
    open_entries: totals.get(customer.id)?.count ?? 0,
  }));
}

/** Up to ten active customers whose name contains `query`, for autocomplete. */
export async function suggestCustomers(ctx: ShopContext, query: string) {
  const needle = query.trim();
  if (!needle) return [];
  const customers = await ctx.store.customers.list(needle);
  return customers
    .filter((customer) => customer.is_active && customer.name.toLowerCase().includes(needle.toLowerCase()))
    .slice(0, 10)
    .map(({ id, name, phone, address }) => ({ id, name, phone, address }));
}

export async function createCustomer(ctx: ShopContext, raw: unknown): Promise<Customer> {
  const input = parseInput(customerInputSchema, raw);
  const customer = await ctx.store.customers.insert({
    ...input,
    last_reminder_date: null,
    created_at: nowIso(ctx),
  });
  ctx.logger.info('customer_created', { requestId: ctx.requestId, customerId: customer.id });
  return customer;
}

export async function updateCustomer(ctx: ShopContext, raw: unknown): Promise<Customer> {
  const { id, ...patch } = parseInput(customerUpdateSchema, raw);
  const updated = await ctx.store.customers.update(id, patch);
  if (!updated) throw new NotFoundError('Customer', id);
  return updated;
}

/** Removes the customer together with every credit entry, settled or not. */
export async function deleteCustomer(ctx: ShopContext, id: ID) {
  await getCustomer(ctx, id);
  await ctx.store.credits.deleteForCustomer(id);
  await ctx.store.customers.delete(id);
  ctx.logger.info('customer_deleted', { requestId: ctx.requestId, customerId: id });
}

export async function recordReminder(ctx: ShopContext, customerId: ID): Promise<Customer> {
  await getCustomer(ctx, customerId);
  const updated = await ctx.store.customers.update(customerId, { last_reminder_date: todayIso(ctx) });
  if (!updated) throw new NotFoundError('Customer', customerId);
  return updated;
}

/* ===========================
   Credit entries
   =========================== */

async function resolveCustomer(ctx: ShopContext, input: CreditInput): Promise<Customer> {
  if (input.customer_id !== undefined) {
    return getCustomer(ctx, input.customer_id);
  }
  const name = input.customer_name ?? '';
  const existing = await ctx.store.customers.findByNameAndPhone(name, input.customer_phone);
  if (existing) return existing;
  return ctx.store.customers.insert({
    name,
    phone: input.customer_phone,
    address: '',
    notes: '',
    is_active: true,
    last_reminder_date: null,
    created_at: nowIso(ctx),
  });
}

/**
 * The item text defaults to the product name, and a missing or zero amount is
 * priced from the product's selling price.
 */
export async function addCreditEntry(ctx: ShopContext, raw: unknown): Promise<CreditEntry> {
  const input = parseInput(creditInputSchema, raw);

  const product = input.product_id !== undefined ? await ctx.store.products.getById(input.product_id) : null;
  if (input.product_id !== undefined && !product) {
    throw new NotFoundError('Product', input.product_id);
  }

  const itemName = input.item_name ?? product?.name ?? '';
  let amount = input.amount ?? 0;
  if (amount <= 0 && product) {
    amount = lineSubtotal(product.selling_price, input.quantity);
  }
  if (amount <= 0) {
    throw ValidationError.single('amount', 'amount must be greater than zero');
  }

  const customer = await resolveCustomer(ctx, input);
  const entry = await ctx.store.credits.insert({
    customer_id: customer.id,
    product_id: product?.id ?? null,
    item_name: itemName,
    quantity: input.quantity,
    amount,
    is_settled: false,
    date_taken: nowIso(ctx),
    date_settled: null,
    notes: input.notes,
  });

  ctx.logger.info('credit_added', {
    requestId: ctx.requestId,
    creditId: entry.id,
    customerId: customer.id,
    amount,
  });
  return entry;
}

export async function getCreditEntry(ctx: ShopContext, id: ID): Promise<CreditEntry> {
  const entry = await ctx.store.credits.getById(id);
  if (!entry) throw new NotFoundError('Credit entry', id);
  return entry;
}

/** Settling an already settled entry returns it unchanged with `changed: false`. */
export async function settleCreditEntry(ctx: ShopContext, id: ID): Promise<{ entry: CreditEntry; changed: boolean }> {
  const entry = await getCreditEntry(ctx, id);
  if (entry.is_settled) return { entry, changed: false };

  const settled = await ctx.store.credits.markSettled(id, nowIso(ctx));
  if (!settled) {
    return { entry: await getCreditEntry(ctx, id), changed: false };
  }

  await writeAuditEvent(ctx, {
    action: 'credit_paid',
    entity: 'CreditEntry',
    entityId: id,
    field: 'is_settled',
    before: 'False',
    after: 'True',
  });
  ctx.logger.info('credit_settled', { requestId: ctx.requestId, creditId: id, amount: settled.amount });
  return { entry: settled, changed: true };
}

export async function deleteCreditEntry(ctx: ShopContext, id: ID) {
  await getCreditEntry(ctx, id);
  await ctx.store.credits.delete(id);
}

/** Open entries come first; inside each group rows follow `sort`. */
export async function listCreditEntries(ctx: ShopContext, sort: CreditSort = 'date') {
  const [entries, customers] = await Promise.all([ctx.store.credits.list(), ctx.store.customers.list()]);
  const byId = new Map(customers.map((customer) => [customer.id, customer]));

  const rows: CreditRow[] = entries.map((entry) => ({
    ...entry,
    customer_name: byId.get(entry.customer_id)?.name ?? '',
    customer_phone: byId.get(entry.customer_id)?.phone ?? '',
  }));

  rows.sort((a, b) => {
    if (a.is_settled !== b.is_settled) return a.is_settled ? 1 : -1;
    if (sort === 'customer_asc') return a.customer_name.localeCompare(b.customer_name) || b.id - a.id;
    if (sort === 'customer_desc') return b.customer_name.localeCompare(a.customer_name) || b.id - a.id;
    return b.date_taken.localeCompare(a.date_taken) || b.id - a.id;
  });

  const totalOutstanding = sumMoney(rows.filter((row) => !row.is_settled).map((row) => row.amount));
  return { entries: rows, total_outstanding: totalOutstanding };
}

export function renderReminder(
  template: string,
  values: { customer_name: string; amount: number; shop_name: string }
) {
  return template
    .replaceAll('{customer_name}', values.customer_name)
    .replaceAll('{amount}', values.amount.toFixed(2))
    .replaceAll('{shop_name}', values.shop_name);
}

/** One message per customer that still owes money, largest balance first. */
export async function buildReminders(ctx: ShopContext): Promise<CreditReminder[]> {
  const customers = await listCustomers(ctx);
  return customers
    .filter((customer) => customer.outstanding > 0)
    .sort((a, b) => b.outstanding - a.outstanding || a.name.localeCompare(b.name))
    .map((customer) => ({
      customer_id: customer.id,
      customer_name: customer.name,
      customer_phone: customer.phone,
      last_reminder_date: customer.last_reminder_date,
      amount: customer.outstanding,
      message: renderReminder(ctx.config.reminderTemplate, {
        customer_name: customer.name,
        amount: customer.outstanding,
        shop_name: ctx.config.shopName,
      }),
    }));
}
