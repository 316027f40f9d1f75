import { actorLabel, nowIso, type ShopContext } from '@/lib/shop-context';
import { getErrorMessage } from '@/lib/logger';
import type { AuditAction, ID } from '@/lib/shop-types';

interface AuditEventInput {
  action: AuditAction;
  entity: string;
  entityId: ID;
  field: string;
  before: unknown;
  after: unknown;
}

function stringifyValue(value: unknown) {
  if (value === null || value === undefined) return '';
  return String(value);
}

function formatAuditEvent(ctx: ShopContext, input: AuditEventInput) {
  return {
    requestId: ctx.requestId,
    timestamp: nowIso(ctx),
    actor: actorLabel(ctx),
    actorRole: ctx.actor?.role ?? null,
    action: input.action,
    entity: input.entity,
    entityId: input.entityId,
    field: input.field,
    oldValue: stringifyValue(input.before),
    newValue: stringifyValue(input.after),
  };
}

/**
 * Logs the event and appends it to the audit table. A failed insert is logged
 * and does not fail the write that triggered it.
 */
export async function writeAuditEvent(ctx: ShopContext, input: AuditEventInput) {
  const event = formatAuditEvent(ctx, input);

  ctx.logger.info('audit_event', { persistToDb: ctx.config.auditLogToDb, ...event });

  if (!ctx.config.auditLogToDb) {
    return;
  }

  try {
    await ctx.store.auditLogs.insert({
      action: event.action,
      entity: event.entity,
      entity_id: event.entityId,
      field: event.field,
      old_value: event.oldValue,
      new_value: event.newValue,
      actor: event.actor,
      created_at: event.timestamp,
    });
  } catch (error) {
    ctx.logger.error('audit_event_persist_failed', {
      requestId: event.requestId,
      action: event.action,
      entity: event.entity,
      message: getErrorMessage(error),
    });
  }
}

export async function auditStockChange(ctx: ShopContext, productId: ID, before: number, after: number) {
  if (before === after) return;
  await writeAuditEvent(ctx, {
    action: 'stock_change',
    entity: 'Product',
    entityId: productId,
    field: 'stock_quantity',
    before,
    after,
  });
}

export async function auditPriceChange(ctx: ShopContext, productId: ID, before: number, after: number) {
  if (before === after) return;
  await writeAuditEvent(ctx, {
    action: 'price_change',
    entity: 'Product',
    entityId: productId,
    field: 'selling_price',
    before: before.toFixed(2),
    after: after.toFixed(2),
  });
}
