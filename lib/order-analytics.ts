import { roundMoney } from '@/lib/money';
import type { ID, Order, OrderLine } from '@/lib/shop-types';

export const REPORT_RANGES = ['today', 'week', 'month', 'year'] as const;
export type ReportRange = (typeof REPORT_RANGES)[number];

export interface Period {
  range: ReportRange | 'custom';
  /** Inclusive UTC start of the local window. */
  startIso: string;
  /** Exclusive UTC end of the local window. */
  endIso: string;
  /** First local calendar day in the window. */
  startDate: string;
  /** Local calendar day after the window; exclusive. */
  endDate: string;
}

export type TopSeller = {
  product_id: ID;
  product_name: string;
  quantity: number;
  revenue: number;
};

function clampTimezoneOffset(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(-840, Math.min(840, Math.trunc(value)));
}

/** Offsets follow `Date#getTimezoneOffset`: minutes behind UTC, so IST is -330. */
export function parseTimezoneOffset(raw: string | null): number {
  return clampTimezoneOffset(Number(raw ?? '0'));
}

export function isReportRange(value: string | null): value is ReportRange {
  return REPORT_RANGES.some((range) => range === value);
}

function toUtcIsoFromLocalParts(year: number, monthIndex: number, day: number, timezoneOffsetMinutes: number): string {
  const localAsUtcMs = Date.UTC(year, monthIndex, day, 0, 0, 0, 0);
  return new Date(localAsUtcMs + timezoneOffsetMinutes * 60_000).toISOString();
}

function localNowFromOffset(now: Date, timezoneOffsetMinutes: number): Date {
  // Shift UTC "now" into a stable pseudo-local timeline for date component extraction.
  return new Date(now.getTime() - timezoneOffsetMinutes * 60_000);
}

function dateLabel(year: number, monthIndex: number, day: number) {
  return new Date(Date.UTC(year, monthIndex, day)).toISOString().slice(0, 10);
}

function buildPeriod(
  range: Period['range'],
  start: [number, number, number],
  end: [number, number, number],
  timezoneOffsetMinutes: number
): Period {
  return {
    range,
    startIso: toUtcIsoFromLocalParts(start[0], start[1], start[2], timezoneOffsetMinutes),
    endIso: toUtcIsoFromLocalParts(end[0], end[1], end[2], timezoneOffsetMinutes),
    startDate: dateLabel(start[0], start[1], start[2]),
    endDate: dateLabel(end[0], end[1], end[2]),
  };
}

export function localDateFromIso(isoString: string, timezoneOffsetMinutes: number): string {
  return localNowFromOffset(new Date(isoString), timezoneOffsetMinutes).toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number) {
  const date = new Date(`${isoDate}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

export function resolvePeriod(range: ReportRange, timezoneOffsetMinutes: number, now = new Date()): Period {
  const localNow = localNowFromOffset(now, timezoneOffsetMinutes);
  const y = localNow.getUTCFullYear();
  const m = localNow.getUTCMonth();
  const d = localNow.getUTCDate();

  switch (range) {
    case 'today':
      return buildPeriod(range, [y, m, d], [y, m, d + 1], timezoneOffsetMinutes);
    case 'week':
      // Rolling seven local days ending with today.
      return buildPeriod(range, [y, m, d - 6], [y, m, d + 1], timezoneOffsetMinutes);
    case 'month':
      return buildPeriod(range, [y, m, 1], [y, m + 1, 1], timezoneOffsetMinutes);
    case 'year':
      return buildPeriod(range, [y, 0, 1], [y + 1, 0, 1], timezoneOffsetMinutes);
  }
}

/** `from` and `to` are inclusive local calendar days. */
export function customPeriod(from: string, to: string, timezoneOffsetMinutes: number): Period {
  const [fy, fm, fd] = from.split('-').map(Number);
  const [ty, tm, td] = to.split('-').map(Number);
  return buildPeriod('custom', [fy, fm - 1, fd], [ty, tm - 1, td + 1], timezoneOffsetMinutes);
}

/** `month` is `YYYY-MM`. */
export function monthPeriod(month: string, timezoneOffsetMinutes: number): Period {
  const [y, m] = month.split('-').map(Number);
  return { ...buildPeriod('custom', [y, m - 1, 1], [y, m, 1], timezoneOffsetMinutes), range: 'month' };
}

export function aggregateTopSellers(lines: OrderLine[]): TopSeller[] {
  const grouped = new Map<ID, TopSeller>();

  for (const line of lines) {
    if (line.quantity <= 0) continue;
    const current = grouped.get(line.product_id) ?? {
      product_id: line.product_id,
      product_name: line.product_name,
      quantity: 0,
      revenue: 0,
    };
    current.quantity += line.quantity;
    current.revenue = roundMoney(current.revenue + line.subtotal);
    grouped.set(line.product_id, current);
  }

  return Array.from(grouped.values()).sort(
    (a, b) => b.quantity - a.quantity || b.revenue - a.revenue || a.product_name.localeCompare(b.product_name)
  );
}

type RevenueRow = Pick<Order, 'total_amount' | 'created_at'>;

export function aggregateDailyRevenue(
  orders: RevenueRow[],
  timezoneOffsetMinutes: number
): Array<{ date: string; total_amount: number }> {
  const totals = new Map<string, number>();
  for (const order of orders) {
    const day = localDateFromIso(order.created_at, timezoneOffsetMinutes);
    totals.set(day, (totals.get(day) ?? 0) + order.total_amount);
  }
  return Array.from(totals.entries())
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([date, total_amount]) => ({ date, total_amount: roundMoney(total_amount) }));
}

export function aggregateMonthlyRevenue(
  orders: RevenueRow[],
  timezoneOffsetMinutes: number
): Array<{ month: string; total_amount: number }> {
  const monthTotals = new Array<number>(12).fill(0);
  for (const order of orders) {
    const monthIndex = localNowFromOffset(new Date(order.created_at), timezoneOffsetMinutes).getUTCMonth();
    monthTotals[monthIndex] += order.total_amount;
  }
  const labels = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
  return monthTotals.map((total_amount, idx) => ({
    month: labels[idx],
    total_amount: roundMoney(total_amount),
  }));
}
