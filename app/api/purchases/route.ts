import { purchasesHandlers } from '@/lib/handlers/purchases';
import { getShopStore } from '@/lib/store';

export const { GET, POST } = purchasesHandlers(getShopStore);
