import { creditHandlers } from '@/lib/handlers/credit';
import { getShopStore } from '@/lib/store';

export const { GET, POST, DELETE } = creditHandlers(getShopStore);
