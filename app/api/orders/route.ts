import { ordersHandlers } from '@/lib/handlers/orders';
import { getShopStore } from '@/lib/store';

export const dynamic = 'force-dynamic';

export const { GET, POST } = ordersHandlers(getShopStore);
