import { NextResponse } from 'next/server';
import { OWNER_ONLY, STAFF_ROLES } from '@/lib/api-auth';
import { guarded, ok, parsePeriodParams, type StoreResolver } from '@/lib/api-response';
import { ValidationError } from '@/lib/errors';
import { sumMoney } from '@/lib/money';
import { monthPeriod } from '@/lib/order-analytics';
import { todayIso } from '@/lib/shop-context';
import { dashboardSummary, gstCsv, gstSummary, summarizePeriod } from '@/lib/services/reports';

const MONTH = /^\d{4}-(0[1-9]|1[0-2])$/;

export function reportsHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(OWNER_ONLY, resolveStore, async (ctx, req) => {
      const { period, timezoneOffset } = parsePeriodParams(req.nextUrl.searchParams, ctx);
      return ok(await summarizePeriod(ctx, period, timezoneOffset));
    }),
  };
}

export function gstHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(OWNER_ONLY, resolveStore, async (ctx, req) => {
      const { searchParams } = req.nextUrl;
      const month = searchParams.get('month') || todayIso(ctx).slice(0, 7);
      if (!MONTH.test(month)) throw ValidationError.single('month', 'month must look like YYYY-MM');

      const rows = await gstSummary(ctx, monthPeriod(month, ctx.timezoneOffset));

      if (searchParams.get('format') === 'csv') {
        return new NextResponse(gstCsv(rows), {
          status: 200,
          headers: {
            'content-type': 'text/csv; charset=utf-8',
            'content-disposition': `attachment; filename="gst_${month.replace('-', '_')}.csv"`,
          },
        });
      }

      return ok(rows, {
        summary: {
          month,
          taxable_value: sumMoney(rows.map((row) => row.taxable_value)),
          tax_amount: sumMoney(rows.map((row) => row.tax_amount)),
        },
      });
    }),
  };
}

export function dashboardHandlers(resolveStore: StoreResolver) {
  return {
    GET: guarded(STAFF_ROLES, resolveStore, async (ctx) => {
      return ok(await dashboardSummary(ctx, ctx.timezoneOffset));
    }),
  };
}
