import { getSupabaseClient } from '@/lib/supabase';
import { createSupabaseStore } from '@/lib/store/supabase-store';
import type { ShopStore } from '@/lib/store/types';

let store: ShopStore | null = null;

/** Store used by API routes; created on first use so missing env only fails the request that needs it. */
export function getShopStore(): ShopStore {
  if (!store) store = createSupabaseStore(getSupabaseClient());
  return store;
}
