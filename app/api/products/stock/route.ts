import { productStockHandlers } from '@/lib/handlers/catalog';
import { getShopStore } from '@/lib/store';

export const { POST } = productStockHandlers(getShopStore);
