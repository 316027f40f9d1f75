import { z } from 'zod';
import { ValidationError, type FieldError } from '@/lib/errors';
import { EXPENSE_CATEGORIES, ORDER_STATUSES, PAYMENT_METHODS } from '@/lib/shop-types';

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; fieldErrors: FieldError[] };

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string) {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

// Form posts deliver every value as a string; blank inputs count as "not provided".
function blankToUndefined(value: unknown) {
  if (value === null) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

function toNumber(value: unknown) {
  const normalized = blankToUndefined(value);
  if (typeof normalized === 'string') return Number(normalized.trim());
  return normalized;
}

function toBoolean(value: unknown) {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['on', 'true', '1', 'yes'].includes(normalized)) return true;
    if (['off', 'false', '0', 'no', ''].includes(normalized)) return false;
  }
  return value;
}

function toLowerTrimmed(value: unknown) {
  return typeof value === 'string' ? value.trim().toLowerCase() : value;
}

const money = (label: string) =>
  z.preprocess(
    toNumber,
    z
      .number({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
      .finite(`${label} must be a number`)
  );

const nonNegativeMoney = (label: string) =>
  money(label).pipe(z.number().min(0, `${label} must not be negative`));

const positiveMoney = (label: string) =>
  money(label).pipe(z.number().positive(`${label} must be greater than zero`));

const wholeNumber = (label: string) =>
  z.preprocess(
    toNumber,
    z
      .number({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
      .int(`${label} must be a whole number`)
  );

export const idField = (label = 'id') => wholeNumber(label).pipe(z.number().positive(`${label} must be a positive integer`));

const optionalId = (label: string) =>
  z.preprocess(blankToUndefined, idField(label).optional());

const requiredText = (label: string, max = 200) =>
  z.preprocess(
    (value) => (value === null || value === undefined ? '' : value),
    z
      .string({ invalid_type_error: `${label} must be text` })
      .trim()
      .min(1, `${label} is required`)
      .max(max, `${label} must be at most ${max} characters`)
  );

const optionalText = (max = 2000) =>
  z.preprocess(
    (value) => (value === null || value === undefined ? '' : value),
    z.string().trim().max(max, `must be at most ${max} characters`)
  );

const nullableText = (max: number) =>
  z.preprocess(blankToUndefined, z.string().trim().max(max).optional()).transform((value) => value ?? null);

const isoDate = (label: string) =>
  z.string().trim().refine(isIsoDate, `${label} must be a date (YYYY-MM-DD)`);

const nullableDate = (label: string) =>
  z.preprocess(blankToUndefined, isoDate(label).optional()).transform((value) => value ?? null);

const flag = (fallback: boolean) => z.preprocess(toBoolean, z.boolean().default(fallback));

/* ===========================
   Catalog
   =========================== */

export const categoryInputSchema = z.object({
  name: requiredText('name', 100),
  description: optionalText().default(''),
});

const productFields = z.object({
  name: requiredText('name'),
  description: optionalText().default(''),
  category_id: z.preprocess(blankToUndefined, idField('category_id').optional()).transform((v) => v ?? null),
  image_url: nullableText(500),
  cost_price: z.preprocess(blankToUndefined, nonNegativeMoney('cost_price').default(0)),
  selling_price: nonNegativeMoney('selling_price'),
  discount: z.preprocess(blankToUndefined, nonNegativeMoney('discount').default(0)),
  stock_quantity: z.preprocess(
    blankToUndefined,
    wholeNumber('stock_quantity').pipe(z.number().min(0, 'stock_quantity must not be negative')).default(0)
  ),
  reorder_threshold: z.preprocess(
    blankToUndefined,
    wholeNumber('reorder_threshold').pipe(z.number().min(0, 'reorder_threshold must not be negative')).default(5)
  ),
  tax_rate_percent: z.preprocess(
    blankToUndefined,
    money('tax_rate_percent')
      .pipe(z.number().min(0, 'tax_rate_percent must be between 0 and 100').max(100, 'tax_rate_percent must be between 0 and 100'))
      .default(0)
  ),
  expiry_date: nullableDate('expiry_date'),
  barcode: nullableText(64),
  unit: z.preprocess(blankToUndefined, z.string().trim().max(30).default('piece')),
  is_active: flag(true),
});

function checkDiscount(
  value: { discount?: number; selling_price?: number },
  ctx: z.RefinementCtx
) {
  if (value.discount !== undefined && value.selling_price !== undefined && value.discount > value.selling_price) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['discount'],
      message: 'discount must not exceed selling_price',
    });
  }
}

export const productInputSchema = productFields.superRefine(checkDiscount);

// Stock moves only through orders, purchases and scans, never through a plain edit.
export const productUpdateSchema = productFields
  .omit({ stock_quantity: true })
  .partial()
  .extend({
    id: idField('id'),
    stock_quantity: z.undefined({
      errorMap: () => ({ message: 'stock_quantity cannot be edited; scan stock in or record a purchase' }),
    }),
  })
  .superRefine(checkDiscount);

export const stockScanSchema = z.object({
  code: requiredText('code', 200),
  delta: z.preprocess(blankToUndefined, wholeNumber('delta').default(1)).transform((delta) => Math.max(delta, 1)),
});

/* ===========================
   Orders
   =========================== */

export const orderLineInputSchema = z.object({
  product_id: idField('product_id'),
  quantity: wholeNumber('quantity').pipe(z.number().positive('quantity must be greater than zero')),
});

export const orderInputSchema = z.object({
  lines: z.array(orderLineInputSchema, { required_error: 'lines are required' }).min(1, 'add at least one item'),
  payment_method: z.preprocess(
    toLowerTrimmed,
    z.enum(PAYMENT_METHODS, { errorMap: () => ({ message: 'payment_method must be one of: cash, card, upi' }) })
  ),
  customer_name: nullableText(150),
  customer_phone: nullableText(20),
  complete: flag(false),
});

export const orderStatusChangeSchema = z.object({
  status: z.preprocess(
    toLowerTrimmed,
    z.enum(ORDER_STATUSES, { errorMap: () => ({ message: 'status must be one of: pending, completed, returned' }) })
  ),
  reason: nullableText(500),
});

/* ===========================
   Credit ledger
   =========================== */

export const customerInputSchema = z.object({
  name: requiredText('name', 150),
  phone: optionalText(20).default(''),
  address: optionalText().default(''),
  notes: optionalText().default(''),
  is_active: flag(true),
});

export const customerUpdateSchema = customerInputSchema.partial().extend({ id: idField('id') });

export const creditInputSchema = z
  .object({
    customer_id: optionalId('customer_id'),
    customer_name: nullableText(150),
    customer_phone: optionalText(20).default(''),
    product_id: optionalId('product_id'),
    item_name: nullableText(200),
    quantity: z.preprocess(
      blankToUndefined,
      wholeNumber('quantity').pipe(z.number().positive('quantity must be greater than zero')).default(1)
    ),
    amount: z.preprocess(blankToUndefined, nonNegativeMoney('amount').optional()),
    notes: optionalText().default(''),
  })
  .superRefine((value, ctx) => {
    if (value.customer_id === undefined && !value.customer_name) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['customer_name'], message: 'Customer is required' });
    }
    if (value.product_id === undefined && !value.item_name) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['item_name'], message: 'Item name is required' });
    }
  });

/* ===========================
   Expenses
   =========================== */

export const expenseInputSchema = z.object({
  category: z.preprocess(
    toLowerTrimmed,
    z.enum(EXPENSE_CATEGORIES, {
      errorMap: () => ({ message: `category must be one of: ${EXPENSE_CATEGORIES.join(', ')}` }),
    })
  ),
  amount: positiveMoney('amount'),
  description: optionalText(200).default(''),
  date: nullableDate('date'),
});

export const expenseUpdateSchema = expenseInputSchema.partial().extend({ id: idField('id') });

/* ===========================
   Restocking
   =========================== */

export const wholesalerInputSchema = z.object({
  name: requiredText('name', 150),
  phone: optionalText(20).default(''),
  email: z.preprocess(
    (value) => (value === null || value === undefined ? '' : value),
    z
      .string()
      .trim()
      .refine((value) => value === '' || value.includes('@'), 'email must be valid')
  ),
  address: optionalText().default(''),
});

export const purchaseInputSchema = z
  .object({
    wholesaler_id: optionalId('wholesaler_id'),
    wholesaler_name: nullableText(150),
    wholesaler_phone: optionalText(20).default(''),
    product_id: optionalId('product_id'),
    new_product_name: nullableText(200),
    quantity: wholeNumber('quantity').pipe(z.number().positive('quantity must be greater than zero')),
    unit_cost: positiveMoney('unit_cost'),
    selling_price: positiveMoney('selling_price'),
    date: nullableDate('date'),
    expiry_date: nullableDate('expiry_date'),
  })
  .superRefine((value, ctx) => {
    if (value.wholesaler_id === undefined && !value.wholesaler_name) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['wholesaler_name'], message: 'Wholesaler is required' });
    }
    if (value.product_id === undefined && !value.new_product_name) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['new_product_name'], message: 'Product is required' });
    }
  });

/* ===========================
   Helpers
   =========================== */

export function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'form',
    message: issue.message,
  }));
}

export function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown): ValidationResult<z.output<S>> {
  const result = schema.safeParse(raw);
  if (result.success) return { ok: true, value: result.data };
  return { ok: false, fieldErrors: toFieldErrors(result.error) };
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = validate(schema, raw);
  if (!result.ok) throw new ValidationError(result.fieldErrors);
  return result.value;
}

export type OrderInput = z.output<typeof orderInputSchema>;
export type CreditInput = z.output<typeof creditInputSchema>;
export type PurchaseInput = z.output<typeof purchaseInputSchema>;
