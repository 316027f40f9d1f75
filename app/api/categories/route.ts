import { categoriesHandlers } from '@/lib/handlers/catalog';
import { getShopStore } from '@/lib/store';

export const { GET, POST, PUT, DELETE } = categoriesHandlers(getShopStore);
