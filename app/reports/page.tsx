'use client';

import { useCallback, useEffect, useState } from 'react';
import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  Line,
  LineChart,
  Pie,
  PieChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import Sidebar from '@/components/Sidebar';
import StatCard from '@/components/StatCard';
import PageHeader from '@/components/PageHeader';
import AppToast, { type ToastState } from '@/components/AppToast';
import { authFetch, fetchJson } from '@/lib/auth-fetch';
import { formatError } from '@/lib/errors';
import { formatMoney } from '@/lib/money';
import type { ReportRange } from '@/lib/order-analytics';
import { useRouteGuard } from '@/lib/route-guard';
import type { GstRow, PeriodSummary } from '@/lib/services/reports';
import {
  getPdfButtonLabel,
  getPdfFilename,
  getPdfPeriodLabel,
  isPdfExportDisabled,
} from '@/lib/report-pdf-controls';

type GstSummary = { month: string; taxable_value: number; tax_amount: number };

const PAYMENT_COLORS = ['#059669', '#0ea5e9', '#f59e0b'];

function currentMonth() {
  const now = new Date();
  return `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}`;
}

export default function ReportsPage() {
  const { isChecking, isAuthorized, role } = useRouteGuard(['owner']);
  const [report, setReport] = useState<PeriodSummary | null>(null);
  const [range, setRange] = useState<ReportRange>('week');
  const [custom, setCustom] = useState({ from: '', to: '' });
  const [applied, setApplied] = useState<{ from: string; to: string } | null>(null);
  const [gstMonth, setGstMonth] = useState(currentMonth());
  const [gstRows, setGstRows] = useState<GstRow[]>([]);
  const [gstTotals, setGstTotals] = useState<GstSummary | null>(null);
  const [loading, setLoading] = useState(true);
  const [exporting, setExporting] = useState(false);
  const [toast, setToast] = useState<ToastState | null>(null);

  const fetchReportData = useCallback(async () => {
    setLoading(true);
    try {
      const params = new URLSearchParams({ tz_offset: String(new Date().getTimezoneOffset()) });
      if (applied) {
        params.set('from', applied.from);
        params.set('to', applied.to);
      } else {
        params.set('range', range);
      }
      const { data } = await fetchJson<PeriodSummary>(`/api/reports?${params}`);
      setReport(data);
    } catch (error) {
      setToast({ type: 'error', message: `Failed to load reports: ${formatError(error)}` });
    } finally {
      setLoading(false);
    }
  }, [range, applied]);

  const fetchGst = useCallback(async () => {
    try {
      const params = new URLSearchParams({ month: gstMonth, tz_offset: String(new Date().getTimezoneOffset()) });
      const { data, summary } = await fetchJson<GstRow[], GstSummary>(`/api/reports/gst?${params}`);
      setGstRows(data);
      setGstTotals(summary ?? null);
    } catch (error) {
      setToast({ type: 'error', message: `Failed to load GST summary: ${formatError(error)}` });
    }
  }, [gstMonth]);

  useEffect(() => {
    if (!isAuthorized) return;
    void fetchReportData();
  }, [fetchReportData, isAuthorized]);

  useEffect(() => {
    if (!isAuthorized) return;
    void fetchGst();
  }, [fetchGst, isAuthorized]);

  const handleDownloadPdf = async () => {
    if (!report || exporting) return;
    setExporting(true);
    try {
      const { generatePDF, downloadPDF } = await import('@/lib/pdf');
      const doc = generatePDF({
        shopName: process.env.NEXT_PUBLIC_SHOP_NAME || 'Kirana Desk',
        dateRange: getPdfPeriodLabel(range, applied?.from, applied?.to),
        revenue: report.revenue,
        orderCount: report.completed_orders,
        costOfGoods: report.cost_of_goods,
        grossProfit: report.gross_profit,
        expenses: report.expenses,
        netProfit: report.net_profit,
        topSellers: report.top_sellers.map((row) => ({ name: row.product_name, quantity: row.quantity, revenue: row.revenue })),
      });
      downloadPDF(doc, getPdfFilename(range, applied?.from, applied?.to));
    } catch (error) {
      setToast({ type: 'error', message: `Failed to generate PDF: ${formatError(error)}` });
    } finally {
      setExporting(false);
    }
  };

  const downloadGstCsv = async () => {
    try {
      const params = new URLSearchParams({
        month: gstMonth,
        format: 'csv',
        tz_offset: String(new Date().getTimezoneOffset()),
      });
      const response = await authFetch(`/api/reports/gst?${params}`);
      const url = URL.createObjectURL(await response.blob());
      const link = document.createElement('a');
      link.href = url;
      link.download = `gst_${gstMonth.replace('-', '_')}.csv`;
      link.click();
      URL.revokeObjectURL(url);
    } catch (error) {
      setToast({ type: 'error', message: `Failed to download GST CSV: ${formatError(error)}` });
    }
  };

  if (isChecking) {
    return <div className="min-h-screen bg-slate-100 text-slate-700 flex items-center justify-center">Checking access...</div>;
  }

  if (!isAuthorized) return null;

  const paymentBreakdown = report
    ? Object.entries(report.revenue_by_payment_method).map(([payment_method, total_amount]) => ({ payment_method, total_amount }))
    : [];

  return (
    <div className="flex h-screen bg-slate-100 text-slate-900">
      <Sidebar role={role} />
      {toast && <AppToast type={toast.type} message={toast.message} onClose={() => setToast(null)} />}
      <div className="flex-1 flex flex-col overflow-hidden">
        <PageHeader title="Reports" subtitle="Sales, profit and tax" role={role} />

        <main className="flex-1 p-6 overflow-y-auto space-y-6">
          <div className="flex flex-wrap gap-3 items-center">
            {(['today', 'week', 'month', 'year'] as const).map((value) => (
              <button
                key={value}
                onClick={() => {
                  setApplied(null);
                  setRange(value);
                }}
                className={`px-4 py-2 rounded-lg font-bold text-sm capitalize transition ${
                  !applied && range === value ? 'bg-emerald-600 text-white' : 'bg-white border border-slate-200 text-slate-700'
                }`}
              >
                {value === 'week' ? 'Last 7 days' : value}
              </button>
            ))}
            <input
              type="date"
              value={custom.from}
              onChange={(e) => setCustom({ ...custom, from: e.target.value })}
              className="px-3 py-2 border border-slate-300 rounded-lg bg-white"
            />
            <input
              type="date"
              value={custom.to}
              onChange={(e) => setCustom({ ...custom, to: e.target.value })}
              className="px-3 py-2 border border-slate-300 rounded-lg bg-white"
            />
            <button
              onClick={() => setApplied({ ...custom })}
              disabled={!custom.from || !custom.to}
              className="px-4 py-2 rounded-lg border border-slate-300 font-semibold disabled:opacity-50"
            >
              Apply
            </button>
            <button
              onClick={() => void handleDownloadPdf()}
              disabled={isPdfExportDisabled({ loading, exporting, hasSalesData: report !== null })}
              className="ml-auto px-4 py-2 rounded-lg font-bold text-sm bg-slate-900 text-white disabled:bg-slate-300"
            >
              {getPdfButtonLabel(exporting)}
            </button>
          </div>

          {loading && !report ? (
            <p className="text-slate-500">Loading reports...</p>
          ) : report ? (
            <>
              <p className="text-sm text-slate-500">
                {report.period.startDate} to {report.period.endDate} (exclusive)
              </p>
              <div className="grid grid-cols-2 xl:grid-cols-4 gap-4">
                <StatCard label="Revenue" value={formatMoney(report.revenue)} subValue={`${report.completed_orders} completed orders`} type="success" />
                <StatCard label="Gross Profit" value={formatMoney(report.gross_profit)} subValue={`Cost ${formatMoney(report.cost_of_goods)}`} />
                <StatCard label="Expenses" value={formatMoney(report.expenses)} type="danger" />
                <StatCard
                  label="Net Profit"
                  value={formatMoney(report.net_profit)}
                  type={report.net_profit < 0 ? 'danger' : 'success'}
                />
                <StatCard label="Avg. Order" value={formatMoney(report.average_order_value)} />
                <StatCard label="Restock Spend" value={formatMoney(report.purchases_spent)} />
                <StatCard label="Pending Orders" value={report.orders_by_status.pending} type="warning" />
                <StatCard label="Returned Orders" value={report.orders_by_status.returned} />
              </div>

              <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
                <section className="rounded-2xl border border-slate-200 bg-white p-5 shadow-sm">
                  <h2 className="text-lg font-bold mb-4">{report.monthly_revenue.length > 0 ? 'Monthly Revenue' : 'Daily Revenue'}</h2>
                  <div className="h-72">
                    <ResponsiveContainer width="100%" height="100%">
                      {report.monthly_revenue.length > 0 ? (
                        <BarChart data={report.monthly_revenue}>
                          <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
                          <XAxis dataKey="month" tick={{ fill: '#475569', fontSize: 12 }} />
                          <YAxis tick={{ fill: '#475569', fontSize: 12 }} />
                          <Tooltip formatter={(value) => formatMoney(Number(value))} />
                          <Bar dataKey="total_amount" fill="#059669" radius={[8, 8, 0, 0]} />
                        </BarChart>
                      ) : (
                        <LineChart data={report.daily_revenue}>
                          <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
                          <XAxis dataKey="date" tick={{ fill: '#475569', fontSize: 12 }} />
                          <YAxis tick={{ fill: '#475569', fontSize: 12 }} />
                          <Tooltip formatter={(value) => formatMoney(Number(value))} />
                          <Line type="monotone" dataKey="total_amount" stroke="#059669" strokeWidth={3} dot={false} />
                        </LineChart>
                      )}
                    </ResponsiveContainer>
                  </div>
                </section>

                <section className="rounded-2xl border border-slate-200 bg-white p-5 shadow-sm">
                  <h2 className="text-lg font-bold mb-4">Payment Methods</h2>
                  <div className="h-60">
                    <ResponsiveContainer width="100%" height="100%">
                      <PieChart>
                        <Pie data={paymentBreakdown} dataKey="total_amount" nameKey="payment_method" innerRadius={55} outerRadius={90} paddingAngle={3}>
                          {paymentBreakdown.map((row, index) => (
                            <Cell key={row.payment_method} fill={PAYMENT_COLORS[index % PAYMENT_COLORS.length]} />
                          ))}
                        </Pie>
                        <Tooltip formatter={(value) => formatMoney(Number(value))} />
                      </PieChart>
                    </ResponsiveContainer>
                  </div>
                  <div className="mt-3 grid grid-cols-3 gap-2 text-sm">
                    {paymentBreakdown.map((row, index) => (
                      <div key={row.payment_method} className="flex items-center justify-between rounded-lg bg-slate-50 px-3 py-2">
                        <span className="flex items-center gap-2 uppercase">
                          <span className="inline-block h-2.5 w-2.5 rounded-full" style={{ backgroundColor: PAYMENT_COLORS[index % PAYMENT_COLORS.length] }} />
                          {row.payment_method}
                        </span>
                        <span className="font-semibold">{formatMoney(row.total_amount)}</span>
                      </div>
                    ))}
                  </div>
                </section>
              </div>

              <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
                <section className="rounded-2xl border border-slate-200 bg-white p-5 shadow-sm">
                  <h2 className="text-lg font-bold mb-4">Top Sellers</h2>
                  {report.top_sellers.length === 0 ? (
                    <p className="text-sm text-slate-500">No sales in this period.</p>
                  ) : (
                    <ol className="space-y-2 text-sm">
                      {report.top_sellers.map((row, index) => (
                        <li key={row.product_id} className="flex justify-between">
                          <span>
                            {index + 1}. {row.product_name} <span className="text-slate-500">x{row.quantity}</span>
                          </span>
                          <span className="font-semibold">{formatMoney(row.revenue)}</span>
                        </li>
                      ))}
                    </ol>
                  )}
                </section>

                <section className="rounded-2xl border border-slate-200 bg-white p-5 shadow-sm">
                  <h2 className="text-lg font-bold mb-4">Expenses by Category</h2>
                  {report.expenses_by_category.length === 0 ? (
                    <p className="text-sm text-slate-500">No expenses in this period.</p>
                  ) : (
                    <ul className="space-y-2 text-sm">
                      {report.expenses_by_category.map((row) => (
                        <li key={row.category} className="flex justify-between capitalize">
                          <span>{row.category}</span>
                          <span className="font-semibold">{formatMoney(row.amount)}</span>
                        </li>
                      ))}
                    </ul>
                  )}
                </section>
              </div>
            </>
          ) : (
            <p className="text-slate-500">No data available</p>
          )}

          <section className="rounded-2xl border border-slate-200 bg-white p-5 shadow-sm">
            <div className="flex flex-wrap items-center gap-3 mb-4">
              <h2 className="text-lg font-bold">GST Summary</h2>
              <input
                type="month"
                value={gstMonth}
                onChange={(e) => setGstMonth(e.target.value)}
                className="ml-auto px-3 py-2 border border-slate-300 rounded-lg bg-white"
              />
              <button onClick={() => void downloadGstCsv()} className="px-4 py-2 rounded-lg bg-emerald-600 text-white font-semibold">
                Download CSV
              </button>
            </div>
            {gstRows.length === 0 ? (
              <p className="text-sm text-slate-500">No taxable sales in {gstMonth}.</p>
            ) : (
              <table className="w-full text-sm">
                <thead className="text-left text-slate-500">
                  <tr>
                    <th className="py-2">Product</th>
                    <th className="py-2 text-right">GST %</th>
                    <th className="py-2 text-right">Taxable value</th>
                    <th className="py-2 text-right">Tax</th>
                  </tr>
                </thead>
                <tbody className="divide-y divide-slate-100">
                  {gstRows.map((row) => (
                    <tr key={`${row.product_id}:${row.tax_rate_percent}`}>
                      <td className="py-2">{row.product_name}</td>
                      <td className="py-2 text-right">{row.tax_rate_percent}</td>
                      <td className="py-2 text-right">{formatMoney(row.taxable_value)}</td>
                      <td className="py-2 text-right">{formatMoney(row.tax_amount)}</td>
                    </tr>
                  ))}
                </tbody>
                {gstTotals && (
                  <tfoot className="font-semibold">
                    <tr>
                      <td className="py-2" colSpan={2}>
                        Total
                      </td>
                      <td className="py-2 text-right">{formatMoney(gstTotals.taxable_value)}</td>
                      <td className="py-2 text-right">{formatMoney(gstTotals.tax_amount)}</td>
                    </tr>
                  </tfoot>
                )}
              </table>
            )}
          </section>
        </main>
      </div>
    </div>
  );
}
