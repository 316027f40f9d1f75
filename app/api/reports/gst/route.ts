import { gstHandlers } from '@/lib/handlers/reports';
import { getShopStore } from '@/lib/store';

export const dynamic = 'force-dynamic';

export const { GET } = gstHandlers(getShopStore);
