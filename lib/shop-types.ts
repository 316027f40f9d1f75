export type ID = number;

export const ORDER_STATUSES = ['pending', 'completed', 'returned'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const PAYMENT_METHODS = ['cash', 'card', 'upi'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const EXPENSE_CATEGORIES = ['rent', 'electricity', 'salary', 'maintenance', 'transport', 'other'] as const;
export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

export const AUDIT_ACTIONS = ['stock_change', 'price_change', 'credit_paid'] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export interface Category {
  id: ID;
  name: string;
  description: string;
  created_at: string;
}

export interface Product {
  id: ID;
  category_id: ID | null;
  name: string;
  description: string;
  image_url: string | null;
  cost_price: number;
  selling_price: number;
  discount: number;
  stock_quantity: number;
  reorder_threshold: number;
  tax_rate_percent: number;
  expiry_date: string | null;
  barcode: string | null;
  unit: string;
  is_active: boolean;
  /** Bumped on every stock write; stock updates are conditional on it. */
  version: number;
  created_at: string;
  updated_at: string;
}

export interface Order {
  id: ID;
  status: OrderStatus;
  payment_method: PaymentMethod;
  total_amount: number;
  customer_name: string | null;
  customer_phone: string | null;
  return_reason: string | null;
  created_by: string | null;
  created_at: string;
  completed_at: string | null;
  returned_at: string | null;
}

export interface OrderLine {
  id: ID;
  order_id: ID;
  product_id: ID;
  product_name: string;
  quantity: number;
  unit_price: number;
  unit_cost: number;
  tax_rate_percent: number;
  subtotal: number;
}

export interface OrderWithLines extends Order {
  lines: OrderLine[];
}

export interface Customer {
  id: ID;
  name: string;
  phone: string;
  address: string;
  notes: string;
  is_active: boolean;
  last_reminder_date: string | null;
  created_at: string;
}

export interface CreditEntry {
  id: ID;
  customer_id: ID;
  product_id: ID | null;
  item_name: string;
  quantity: number;
  amount: number;
  is_settled: boolean;
  date_taken: string;
  date_settled: string | null;
  notes: string;
}

export interface Expense {
  id: ID;
  category: ExpenseCategory;
  amount: number;
  description: string;
  date: string;
  created_at: string;
}

export interface Wholesaler {
  id: ID;
  name: string;
  phone: string;
  email: string;
  address: string;
  created_at: string;
}

export interface Purchase {
  id: ID;
  wholesaler_id: ID;
  product_id: ID;
  quantity: number;
  unit_cost: number;
  selling_price: number;
  expiry_date: string | null;
  date: string;
  created_at: string;
}

export interface AuditLogEntry {
  id: ID;
  action: AuditAction;
  entity: string;
  entity_id: ID;
  field: string;
  old_value: string;
  new_value: string;
  actor: string | null;
  created_at: string;
}

export type NewRecord<T extends { id: ID }> = Omit<T, 'id'>;

export type AppRole = 'staff' | 'owner';
