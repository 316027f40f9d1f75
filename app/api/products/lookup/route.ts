import { productLookupHandlers } from '@/lib/handlers/catalog';
import { getShopStore } from '@/lib/store';

export const dynamic = 'force-dynamic';

export const { GET } = productLookupHandlers(getShopStore);
