export const ADMIN_ENTITY_KEYS = [
  'categories',
  'products',
  'orders',
  'customers',
  'credit_entries',
  'expenses',
  'wholesalers',
  'purchases',
  'audit_logs',
] as const;

export type AdminEntityKey = (typeof ADMIN_ENTITY_KEYS)[number];

export interface AdminEntityMeta {
  key: AdminEntityKey;
  label: string;
  columns: string[];
  /** Shown in the grid but never edited in place. */
  lockedColumns?: string[];
  canCreate: boolean;
  canUpdate: boolean;
  canDelete: boolean;
}

// Orders, purchases and the audit trail change only through their workflows.
export const ADMIN_ENTITIES: Record<AdminEntityKey, AdminEntityMeta> = {
  categories: {
    key: 'categories',
    label: 'Categories',
    columns: ['id', 'name', 'description'],
    canCreate: true,
    canUpdate: true,
    canDelete: true,
  },
  products: {
    key: 'products',
    label: 'Products',
    columns: ['id', 'name', 'category_id', 'selling_price', 'discount', 'cost_price', 'stock_quantity', 'reorder_threshold', 'tax_rate_percent', 'expiry_date', 'barcode', 'unit', 'is_active'],
    lockedColumns: ['stock_quantity'],
    canCreate: true,
    canUpdate: true,
    canDelete: true,
  },
  orders: {
    key: 'orders',
    label: 'Orders',
    columns: ['id', 'status', 'payment_method', 'total_amount', 'customer_name', 'created_at'],
    canCreate: false,
    canUpdate: false,
    canDelete: true,
  },
  customers: {
    key: 'customers',
    label: 'Customers',
    columns: ['id', 'name', 'phone', 'address', 'notes', 'is_active', 'last_reminder_date'],
    canCreate: true,
    canUpdate: true,
    canDelete: true,
  },
  credit_entries: {
    key: 'credit_entries',
    label: 'Credit Entries',
    columns: ['id', 'customer_id', 'item_name', 'quantity', 'amount', 'is_settled', 'date_taken', 'date_settled'],
    canCreate: true,
    canUpdate: false,
    canDelete: true,
  },
  expenses: {
    key: 'expenses',
    label: 'Expenses',
    columns: ['id', 'date', 'category', 'amount', 'description'],
    canCreate: true,
    canUpdate: true,
    canDelete: true,
  },
  wholesalers: {
    key: 'wholesalers',
    label: 'Wholesalers',
    columns: ['id', 'name', 'phone', 'email', 'address'],
    canCreate: true,
    canUpdate: false,
    canDelete: true,
  },
  purchases: {
    key: 'purchases',
    label: 'Purchases',
    columns: ['id', 'date', 'wholesaler_id', 'product_id', 'quantity', 'unit_cost', 'selling_price', 'expiry_date'],
    canCreate: true,
    canUpdate: false,
    canDelete: false,
  },
  audit_logs: {
    key: 'audit_logs',
    label: 'Audit Log',
    columns: ['id', 'created_at', 'action', 'entity', 'entity_id', 'field', 'old_value', 'new_value', 'actor'],
    canCreate: false,
    canUpdate: false,
    canDelete: false,
  },
};

export function isAdminEntityKey(value: string): value is AdminEntityKey {
  return ADMIN_ENTITY_KEYS.some((key) => key === value);
}
