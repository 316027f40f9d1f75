import { reportsHandlers } from '@/lib/handlers/reports';
import { getShopStore } from '@/lib/store';

export const dynamic = 'force-dynamic';

export const { GET } = reportsHandlers(getShopStore);
