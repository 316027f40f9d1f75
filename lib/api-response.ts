import { NextRequest, NextResponse } from 'next/server';
import { requireAuth } from '@/lib/api-auth';
import { AppError, ValidationError, type FieldError } from '@/lib/errors';
import { describeError, getErrorMessage, logger } from '@/lib/logger';
import {
  customPeriod,
  isReportRange,
  parseTimezoneOffset,
  resolvePeriod,
  type Period,
  type ReportRange,
} from '@/lib/order-analytics';
import { createShopContext, type ShopContext } from '@/lib/shop-context';
import type { AppRole } from '@/lib/shop-types';
import type { ShopStore } from '@/lib/store/types';
import { idField, isIsoDate } from '@/lib/validation';

export type StoreResolver = () => ShopStore;

export function ok<T>(data: T, init: { status?: number; summary?: Record<string, unknown> } = {}) {
  const body = init.summary ? { success: true, data, summary: init.summary } : { success: true, data };
  return NextResponse.json(body, { status: init.status ?? 200 });
}

export function created<T>(data: T) {
  return ok(data, { status: 201 });
}

export function badRequest(error: string, fieldErrors: FieldError[] = []) {
  return NextResponse.json({ success: false, error, fieldErrors }, { status: 400 });
}

function requestIdFor(req?: NextRequest) {
  return req?.headers.get('x-request-id') ?? crypto.randomUUID();
}

/** The caller's offset from `x-timezone-offset` or `tz_offset`; undefined keeps the configured one. */
function timezoneOffsetFor(req: NextRequest) {
  const raw = req.headers.get('x-timezone-offset') ?? req.nextUrl.searchParams.get('tz_offset');
  return raw === null || raw.trim() === '' ? undefined : parseTimezoneOffset(raw);
}

export function serverError(error: unknown, req?: NextRequest) {
  const message = getErrorMessage(error);
  const requestId = requestIdFor(req);

  logger.error('api_error', {
    requestId,
    route: req?.nextUrl?.pathname ?? null,
    method: req?.method ?? null,
    error: describeError(error),
  });

  return NextResponse.json(
    { success: false, error: message, requestId },
    { status: 500, headers: { 'x-request-id': requestId } }
  );
}

/** Maps service errors to their HTTP status; anything unexpected becomes a logged 500. */
export function errorResponse(error: unknown, req?: NextRequest) {
  if (error instanceof ValidationError) {
    return badRequest(error.message, error.fieldErrors);
  }
  if (error instanceof AppError && error.status < 500) {
    logger.info('api_rejected', {
      requestId: req?.headers.get('x-request-id') ?? null,
      route: req?.nextUrl?.pathname ?? null,
      code: error.code,
      status: error.status,
      message: error.message,
    });
    return NextResponse.json({ success: false, error: error.message, code: error.code }, { status: error.status });
  }
  return serverError(error, req);
}

/**
 * Authenticates the request and builds the service context around the
 * resolved store. Answers with a 401/403 response when access is refused.
 */
export async function authorize(
  req: NextRequest,
  allowedRoles: AppRole[],
  resolveStore: StoreResolver
): Promise<ShopContext | NextResponse> {
  const auth = await requireAuth(req, allowedRoles);
  if (auth instanceof NextResponse) return auth;
  return createShopContext(resolveStore(), {
    actor: { id: auth.userId, email: auth.email, role: auth.role },
    requestId: requestIdFor(req),
    timezoneOffset: timezoneOffsetFor(req),
  });
}

function formDataToRecord(form: FormData) {
  const record: Record<string, unknown> = {};
  form.forEach((value, key) => {
    if (typeof value === 'string') record[key] = value;
  });
  return record;
}

/** Accepts JSON or form-encoded bodies; both arrive as a plain record for schema validation. */
export async function readBody(req: NextRequest): Promise<Record<string, unknown>> {
  const contentType = req.headers.get('content-type') ?? '';
  if (contentType.includes('application/x-www-form-urlencoded') || contentType.includes('multipart/form-data')) {
    return formDataToRecord(await req.formData());
  }

  let payload: unknown;
  try {
    payload = await req.json();
  } catch {
    throw ValidationError.single('form', 'Request body must be valid JSON');
  }
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) {
    throw ValidationError.single('form', 'Request body must be an object');
  }
  return { ...payload };
}

export function parseId(raw: string | null | undefined, label = 'id'): number {
  const result = idField(label).safeParse(raw ?? '');
  if (!result.success) {
    throw ValidationError.single(label, `${label} must be a positive integer`);
  }
  return result.data;
}

/**
 * Reads `range`, `from` and `to` against the caller's local day. An explicit
 * `from`/`to` pair wins over `range`; `range` defaults to `fallback`.
 */
export function parsePeriodParams(
  searchParams: URLSearchParams,
  ctx: Pick<ShopContext, 'now' | 'timezoneOffset'>,
  fallback: ReportRange = 'month'
): { period: Period; timezoneOffset: number } {
  const { timezoneOffset } = ctx;
  const from = searchParams.get('from');
  const to = searchParams.get('to');

  if (from || to) {
    const errors: FieldError[] = [];
    if (!from || !isIsoDate(from)) errors.push({ field: 'from', message: 'from must be a date (YYYY-MM-DD)' });
    if (!to || !isIsoDate(to)) errors.push({ field: 'to', message: 'to must be a date (YYYY-MM-DD)' });
    if (errors.length === 0 && from && to && from > to) {
      errors.push({ field: 'to', message: 'to must not be before from' });
    }
    if (errors.length > 0 || !from || !to) throw new ValidationError(errors);
    return { period: customPeriod(from, to, timezoneOffset), timezoneOffset };
  }

  const rawRange = searchParams.get('range');
  let range: ReportRange = fallback;
  if (rawRange !== null) {
    if (!isReportRange(rawRange)) {
      throw ValidationError.single('range', 'range must be one of: today, week, month, year');
    }
    range = rawRange;
  }
  return { period: resolvePeriod(range, timezoneOffset, ctx.now()), timezoneOffset };
}

type Handler = (ctx: ShopContext, req: NextRequest) => Promise<NextResponse>;
type IdHandler = (ctx: ShopContext, req: NextRequest, id: number) => Promise<NextResponse>;

export interface IdRouteSegment {
  params: { id: string };
}

/** Wraps a route body with role checks, context creation and error mapping. */
export function guarded(allowedRoles: AppRole[], resolveStore: StoreResolver, run: Handler) {
  return async (req: NextRequest): Promise<NextResponse> => {
    try {
      const ctx = await authorize(req, allowedRoles, resolveStore);
      if (ctx instanceof NextResponse) return ctx;
      return await run(ctx, req);
    } catch (error) {
      return errorResponse(error, req);
    }
  };
}

/** Same as `guarded` for `[id]` routes; the id segment is validated before `run` sees it. */
export function guardedWithId(allowedRoles: AppRole[], resolveStore: StoreResolver, run: IdHandler) {
  return async (req: NextRequest, segment: IdRouteSegment): Promise<NextResponse> => {
    try {
      const ctx = await authorize(req, allowedRoles, resolveStore);
      if (ctx instanceof NextResponse) return ctx;
      return await run(ctx, req, parseId(segment.params.id));
    } catch (error) {
      return errorResponse(error, req);
    }
  };
}
