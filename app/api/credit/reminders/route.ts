import { creditRemindersHandlers } from '@/lib/handlers/credit';
import { getShopStore } from '@/lib/store';

export const dynamic = 'force-dynamic';

export const { GET } = creditRemindersHandlers(getShopStore);
