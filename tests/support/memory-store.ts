import type {
  AuditLogEntry,
  Category,
  CreditEntry,
  Customer,
  Expense,
  ID,
  NewRecord,
  Order,
  OrderLine,
  Product,
  Purchase,
  Wholesaler,
} from '../../lib/shop-types';
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
} from '../../lib/store/types';
import { toStoreError } from '../../lib/store/supabase-store';

/**
 * In-process stand-in for the Supabase store. Rows are copied on the way in and
 * out so services never hold live references. Names in `failures` (e.g.
 * "orders.insertLines") make that call reject once, to exercise rollback paths.
 * Unique indexes and restricting foreign keys of the migration are enforced
 * and reported through the same mapping as the Supabase store.
 */
export interface MemoryShopStore extends ShopStore {
  failures: Set<string>;
}

class Table<T extends { id: ID }> {
  private rows = new Map<ID, T>();
  private nextId = 1;

  all(): T[] {
    return Array.from(this.rows.values()).map((row) => ({ ...row }));
  }

  get(id: ID): T | null {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  insert(input: NewRecord<T>, build: (id: ID, input: NewRecord<T>) => T): T {
    const id = this.nextId++;
    const row = build(id, input);
    this.rows.set(id, row);
    return { ...row };
  }

  replace(row: T) {
    this.rows.set(row.id, { ...row });
    return { ...row };
  }

  delete(id: ID) {
    this.rows.delete(id);
  }
}

function byId<T extends { id: ID }>(a: T, b: T) {
  return a.id - b.id;
}

function inWindow(value: string, startIso?: string, endIso?: string) {
  if (startIso && value < startIso) return false;
  if (endIso && value >= endIso) return false;
  return true;
}

export function createMemoryStore(): MemoryShopStore {
  const failures = new Set<string>();

  function trip(name: string) {
    if (failures.has(name)) {
      failures.delete(name);
      throw new Error(`simulated failure: ${name}`);
    }
  }

  function uniqueViolation(constraint: string, operation: string) {
    return toStoreError(
      { code: '23505', message: `duplicate key value violates unique constraint "${constraint}"` },
      operation
    );
  }

  function foreignKeyViolation(operation: string) {
    return toStoreError({ code: '23503', message: 'update or delete violates foreign key constraint' }, operation);
  }

  function assertCategoryNameFree(name: string, ownId: ID | null, operation: string) {
    const needle = name.toLowerCase();
    if (tables.categories.all().some((row) => row.id !== ownId && row.name.toLowerCase() === needle)) {
      throw uniqueViolation('idx_categories_name', operation);
    }
  }

  function assertBarcodeFree(barcode: string | null | undefined, ownId: ID | null, operation: string) {
    if (!barcode) return;
    if (tables.products.all().some((row) => row.id !== ownId && row.barcode === barcode)) {
      throw uniqueViolation('products_barcode_key', operation);
    }
  }

  const tables = {
    categories: new Table<Category>(),
    products: new Table<Product>(),
    orders: new Table<Order>(),
    lines: new Table<OrderLine>(),
    customers: new Table<Customer>(),
    credits: new Table<CreditEntry>(),
    expenses: new Table<Expense>(),
    wholesalers: new Table<Wholesaler>(),
    purchases: new Table<Purchase>(),
    auditLogs: new Table<AuditLogEntry>(),
  };

  const categories: CategoriesRepo = {
    async list() {
      return tables.categories.all().sort((a, b) => a.name.localeCompare(b.name));
    },
    async getById(id) {
      return tables.categories.get(id);
    },
    async getByName(name) {
      const needle = name.trim().toLowerCase();
      return tables.categories.all().find((row) => row.name.toLowerCase() === needle) ?? null;
    },
    async insert(input) {
      trip('categories.insert');
      assertCategoryNameFree(input.name, null, 'categories.insert');
      return tables.categories.insert(input, (id, row) => ({ ...row, id }));
    },
    async update(id, patch) {
      const current = tables.categories.get(id);
      if (!current) return null;
      if (patch.name !== undefined) assertCategoryNameFree(patch.name, id, 'categories.update');
      return tables.categories.replace({ ...current, ...patch, id });
    },
    async delete(id) {
      tables.categories.delete(id);
    },
  };

  const products: ProductsRepo = {
    async list(filter = {}) {
      const query = filter.query?.trim().toLowerCase();
      return tables.products
        .all()
        .filter((row) => (query ? row.name.toLowerCase().includes(query) : true))
        .filter((row) => (filter.categoryId !== undefined ? row.category_id === filter.categoryId : true))
        .filter((row) => (filter.activeOnly ? row.is_active : true))
        .sort((a, b) => a.name.localeCompare(b.name));
    },
    async getById(id) {
      return tables.products.get(id);
    },
    async getByIds(ids) {
      return tables.products.all().filter((row) => ids.includes(row.id));
    },
    async getByBarcode(barcode) {
      return tables.products.all().find((row) => row.barcode === barcode) ?? null;
    },
    async insert(input) {
      trip('products.insert');
      assertBarcodeFree(input.barcode, null, 'products.insert');
      return tables.products.insert(input, (id, row) => ({ ...row, id }));
    },
    async update(id, patch) {
      trip('products.update');
      const current = tables.products.get(id);
      if (!current) return null;
      assertBarcodeFree(patch.barcode, id, 'products.update');
      return tables.products.replace({ ...current, ...patch, id });
    },
    async setStock(id, nextQuantity, expectedVersion) {
      trip('products.setStock');
      const current = tables.products.get(id);
      if (!current || current.version !== expectedVersion) return null;
      if (nextQuantity < 0) throw new Error('stock_quantity check constraint violated');
      return tables.products.replace({
        ...current,
        stock_quantity: nextQuantity,
        version: current.version + 1,
      });
    },
    async clearCategory(categoryId) {
      for (const row of tables.products.all()) {
        if (row.category_id === categoryId) tables.products.replace({ ...row, category_id: null });
      }
    },
    async delete(id) {
      const referenced =
        tables.lines.all().some((row) => row.product_id === id) ||
        tables.purchases.all().some((row) => row.product_id === id);
      if (referenced) throw foreignKeyViolation('products.delete');
      tables.products.delete(id);
    },
  };

  const orders: OrdersRepo = {
    async list(filter = {}) {
      return tables.orders
        .all()
        .filter((row) => (filter.status ? row.status === filter.status : true))
        .filter((row) => (filter.statuses ? filter.statuses.includes(row.status) : true))
        .filter((row) => inWindow(row.created_at, filter.startIso, filter.endIso))
        .sort((a, b) => b.created_at.localeCompare(a.created_at) || b.id - a.id);
    },
    async getById(id) {
      return tables.orders.get(id);
    },
    async insert(input) {
      trip('orders.insert');
      return tables.orders.insert(input, (id, row) => ({ ...row, id }));
    },
    async insertLines(lines) {
      trip('orders.insertLines');
      return lines.map((line) => tables.lines.insert(line, (id, row) => ({ ...row, id })));
    },
    async getLines(orderId) {
      return tables.lines.all().filter((row) => row.order_id === orderId).sort(byId);
    },
    async listLines(orderIds) {
      return tables.lines.all().filter((row) => orderIds.includes(row.order_id)).sort(byId);
    },
    async countLinesForProduct(productId) {
      return tables.lines.all().filter((row) => row.product_id === productId).length;
    },
    async changeStatus(id, from, change) {
      const current = tables.orders.get(id);
      if (!current || current.status !== from) return null;
      return tables.orders.replace({ ...current, ...change, id });
    },
    async deleteLines(orderId) {
      trip('orders.deleteLines');
      for (const row of tables.lines.all()) {
        if (row.order_id === orderId) tables.lines.delete(row.id);
      }
    },
    async delete(id) {
      tables.orders.delete(id);
    },
  };

  const customers: CustomersRepo = {
    async list(query) {
      const needle = query?.trim().toLowerCase();
      return tables.customers
        .all()
        .filter((row) =>
          needle ? row.name.toLowerCase().includes(needle) || row.phone.includes(needle) : true
        )
        .sort((a, b) => a.name.localeCompare(b.name));
    },
    async getById(id) {
      return tables.customers.get(id);
    },
    async findByNameAndPhone(name, phone) {
      return tables.customers.all().find((row) => row.name === name && row.phone === phone) ?? null;
    },
    async insert(input) {
      return tables.customers.insert(input, (id, row) => ({ ...row, id }));
    },
    async update(id, patch) {
      const current = tables.customers.get(id);
      if (!current) return null;
      return tables.customers.replace({ ...current, ...patch, id });
    },
    async delete(id) {
      tables.customers.delete(id);
    },
  };

  const credits: CreditEntriesRepo = {
    async list(filter = {}) {
      return tables.credits
        .all()
        .filter((row) => (filter.customerId !== undefined ? row.customer_id === filter.customerId : true))
        .filter((row) => (filter.settled !== undefined ? row.is_settled === filter.settled : true))
        .sort((a, b) => b.date_taken.localeCompare(a.date_taken) || b.id - a.id);
    },
    async getById(id) {
      return tables.credits.get(id);
    },
    async insert(input) {
      trip('credits.insert');
      return tables.credits.insert(input, (id, row) => ({ ...row, id }));
    },
    async markSettled(id, settledAt) {
      const current = tables.credits.get(id);
      if (!current || current.is_settled) return null;
      return tables.credits.replace({ ...current, is_settled: true, date_settled: settledAt });
    },
    async clearProduct(productId) {
      for (const row of tables.credits.all()) {
        if (row.product_id === productId) tables.credits.replace({ ...row, product_id: null });
      }
    },
    async deleteForCustomer(customerId) {
      for (const row of tables.credits.all()) {
        if (row.customer_id === customerId) tables.credits.delete(row.id);
      }
    },
    async delete(id) {
      tables.credits.delete(id);
    },
  };

  const expenses: ExpensesRepo = {
    async list(window = {}) {
      return tables.expenses
        .all()
        .filter((row) => inWindow(row.date, window.startDate, window.endDate))
        .sort((a, b) => b.date.localeCompare(a.date) || b.id - a.id);
    },
    async getById(id) {
      return tables.expenses.get(id);
    },
    async insert(input) {
      return tables.expenses.insert(input, (id, row) => ({ ...row, id }));
    },
    async update(id, patch) {
      const current = tables.expenses.get(id);
      if (!current) return null;
      return tables.expenses.replace({ ...current, ...patch, id });
    },
    async delete(id) {
      tables.expenses.delete(id);
    },
  };

  const wholesalers: WholesalersRepo = {
    async list() {
      return tables.wholesalers.all().sort((a, b) => a.name.localeCompare(b.name));
    },
    async getById(id) {
      return tables.wholesalers.get(id);
    },
    async getByName(name) {
      const needle = name.trim().toLowerCase();
      return tables.wholesalers.all().find((row) => row.name.toLowerCase() === needle) ?? null;
    },
    async insert(input) {
      return tables.wholesalers.insert(input, (id, row) => ({ ...row, id }));
    },
    async delete(id) {
      if (tables.purchases.all().some((row) => row.wholesaler_id === id)) {
        throw foreignKeyViolation('wholesalers.delete');
      }
      tables.wholesalers.delete(id);
    },
  };

  const purchases: PurchasesRepo = {
    async list(window = {}) {
      const rows = tables.purchases
        .all()
        .filter((row) => inWindow(row.date, window.startDate, window.endDate))
        .sort((a, b) => b.date.localeCompare(a.date) || b.id - a.id);
      return window.limit ? rows.slice(0, window.limit) : rows;
    },
    async insert(input) {
      trip('purchases.insert');
      return tables.purchases.insert(input, (id, row) => ({ ...row, id }));
    },
    async countForProduct(productId) {
      return tables.purchases.all().filter((row) => row.product_id === productId).length;
    },
    async countForWholesaler(wholesalerId) {
      return tables.purchases.all().filter((row) => row.wholesaler_id === wholesalerId).length;
    },
  };

  const auditLogs: AuditLogsRepo = {
    async insert(input) {
      trip('auditLogs.insert');
      return tables.auditLogs.insert(input, (id, row) => ({ ...row, id }));
    },
    async list(limit = 100) {
      return tables.auditLogs
        .all()
        .sort((a, b) => b.id - a.id)
        .slice(0, limit);
    },
  };

  return {
    failures,
    categories,
    products,
    orders,
    customers,
    credits,
    expenses,
    wholesalers,
    purchases,
    auditLogs,
  };
}
