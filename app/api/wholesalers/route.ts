import { wholesalersHandlers } from '@/lib/handlers/purchases';
import { getShopStore } from '@/lib/store';

export const { GET, POST, DELETE } = wholesalersHandlers(getShopStore);
