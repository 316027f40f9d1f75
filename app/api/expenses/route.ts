import { expensesHandlers } from '@/lib/handlers/expenses';
import { getShopStore } from '@/lib/store';

export const { GET, POST, PUT, DELETE } = expensesHandlers(getShopStore);
