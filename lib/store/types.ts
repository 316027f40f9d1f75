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
  OrderStatus,
  Product,
  Purchase,
  Wholesaler,
} from '@/lib/shop-types';

export interface DateWindow {
  startIso?: string;
  endIso?: string;
}

export interface CategoriesRepo {
  list(): Promise<Category[]>;
  getById(id: ID): Promise<Category | null>;
  getByName(name: string): Promise<Category | null>;
  insert(input: NewRecord<Category>): Promise<Category>;
  update(id: ID, patch: Partial<NewRecord<Category>>): Promise<Category | null>;
  delete(id: ID): Promise<void>;
}

export interface ProductFilter {
  query?: string;
  categoryId?: ID;
  activeOnly?: boolean;
}

export type ProductPatch = Partial<Omit<NewRecord<Product>, 'stock_quantity' | 'version' | 'created_at'>>;

export interface ProductsRepo {
  list(filter?: ProductFilter): Promise<Product[]>;
  getById(id: ID): Promise<Product | null>;
  getByIds(ids: ID[]): Promise<Product[]>;
  getByBarcode(barcode: string): Promise<Product | null>;
  insert(input: NewRecord<Product>): Promise<Product>;
  update(id: ID, patch: ProductPatch): Promise<Product | null>;
  /**
   * Writes a new stock quantity only while the row still has `expectedVersion`.
   * Resolves null when the version moved on (or the row is gone).
   */
  setStock(id: ID, nextQuantity: number, expectedVersion: number): Promise<Product | null>;
  clearCategory(categoryId: ID): Promise<void>;
  delete(id: ID): Promise<void>;
}

export interface OrderFilter extends DateWindow {
  status?: OrderStatus;
  statuses?: OrderStatus[];
}

export interface OrderStatusChange {
  status: OrderStatus;
  completed_at?: string | null;
  returned_at?: string | null;
  return_reason?: string | null;
}

export interface OrdersRepo {
  list(filter?: OrderFilter): Promise<Order[]>;
  getById(id: ID): Promise<Order | null>;
  insert(input: NewRecord<Order>): Promise<Order>;
  insertLines(lines: NewRecord<OrderLine>[]): Promise<OrderLine[]>;
  getLines(orderId: ID): Promise<OrderLine[]>;
  listLines(orderIds: ID[]): Promise<OrderLine[]>;
  countLinesForProduct(productId: ID): Promise<number>;
  /** Compare-and-set on the current status; resolves null when `from` no longer matches. */
  changeStatus(id: ID, from: OrderStatus, change: OrderStatusChange): Promise<Order | null>;
  deleteLines(orderId: ID): Promise<void>;
  delete(id: ID): Promise<void>;
}

export interface CustomersRepo {
  list(query?: string): Promise<Customer[]>;
  getById(id: ID): Promise<Customer | null>;
  findByNameAndPhone(name: string, phone: string): Promise<Customer | null>;
  insert(input: NewRecord<Customer>): Promise<Customer>;
  update(id: ID, patch: Partial<NewRecord<Customer>>): Promise<Customer | null>;
  delete(id: ID): Promise<void>;
}

export interface CreditEntriesRepo {
  list(filter?: { customerId?: ID; settled?: boolean }): Promise<CreditEntry[]>;
  getById(id: ID): Promise<CreditEntry | null>;
  insert(input: NewRecord<CreditEntry>): Promise<CreditEntry>;
  /** Flips an unsettled entry; resolves null when it was already settled. */
  markSettled(id: ID, settledAt: string): Promise<CreditEntry | null>;
  clearProduct(productId: ID): Promise<void>;
  deleteForCustomer(customerId: ID): Promise<void>;
  delete(id: ID): Promise<void>;
}

export interface ExpensesRepo {
  list(window?: { startDate?: string; endDate?: string }): Promise<Expense[]>;
  getById(id: ID): Promise<Expense | null>;
  insert(input: NewRecord<Expense>): Promise<Expense>;
  update(id: ID, patch: Partial<NewRecord<Expense>>): Promise<Expense | null>;
  delete(id: ID): Promise<void>;
}

export interface WholesalersRepo {
  list(): Promise<Wholesaler[]>;
  getById(id: ID): Promise<Wholesaler | null>;
  getByName(name: string): Promise<Wholesaler | null>;
  insert(input: NewRecord<Wholesaler>): Promise<Wholesaler>;
  delete(id: ID): Promise<void>;
}

export interface PurchasesRepo {
  list(window?: { startDate?: string; endDate?: string; limit?: number }): Promise<Purchase[]>;
  insert(input: NewRecord<Purchase>): Promise<Purchase>;
  countForProduct(productId: ID): Promise<number>;
  countForWholesaler(wholesalerId: ID): Promise<number>;
}

export interface AuditLogsRepo {
  insert(input: NewRecord<AuditLogEntry>): Promise<AuditLogEntry>;
  list(limit?: number): Promise<AuditLogEntry[]>;
}

/**
 * Data-access context handed to every service call. Route handlers resolve the
 * Supabase-backed store; tests pass an isolated in-memory one.
 */
export interface ShopStore {
  categories: CategoriesRepo;
  products: ProductsRepo;
  orders: OrdersRepo;
  customers: CustomersRepo;
  credits: CreditEntriesRepo;
  expenses: ExpensesRepo;
  wholesalers: WholesalersRepo;
  purchases: PurchasesRepo;
  auditLogs: AuditLogsRepo;
}
