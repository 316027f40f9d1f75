import { suggestedPurchasesHandlers } from '@/lib/handlers/purchases';
import { getShopStore } from '@/lib/store';

export const dynamic = 'force-dynamic';

export const { GET } = suggestedPurchasesHandlers(getShopStore);
