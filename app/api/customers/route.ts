import { customersHandlers } from '@/lib/handlers/credit';
import { getShopStore } from '@/lib/store';

export const { GET, POST, PUT, DELETE } = customersHandlers(getShopStore);
