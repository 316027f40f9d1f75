import { getConfig, type ShopConfig } from '@/lib/config';
import { logger as defaultLogger, type Logger } from '@/lib/logger';
import { localDateFromIso } from '@/lib/order-analytics';
import type { AppRole } from '@/lib/shop-types';
import type { ShopStore } from '@/lib/store/types';

export interface Actor {
  id: string;
  email: string | null;
  role: AppRole;
}

export interface ShopContext {
  store: ShopStore;
  actor: Actor | null;
  config: ShopConfig;
  logger: Logger;
  requestId: string | null;
  /** Offset of the shop's local day, in `Date#getTimezoneOffset` minutes. */
  timezoneOffset: number;
  now(): Date;
}

export function createShopContext(
  store: ShopStore,
  options: Partial<Omit<ShopContext, 'store'>> = {}
): ShopContext {
  const config = options.config ?? getConfig();
  return {
    store,
    actor: options.actor ?? null,
    config,
    logger: options.logger ?? defaultLogger,
    requestId: options.requestId ?? null,
    timezoneOffset: options.timezoneOffset ?? config.timezoneOffset,
    now: options.now ?? (() => new Date()),
  };
}

export function nowIso(ctx: ShopContext) {
  return ctx.now().toISOString();
}

/** The shop's calendar date right now, not the UTC one. */
export function todayIso(ctx: ShopContext) {
  return localDateFromIso(nowIso(ctx), ctx.timezoneOffset);
}

export function actorLabel(ctx: ShopContext) {
  return ctx.actor?.email ?? ctx.actor?.id ?? null;
}
