'use client';

import Link from 'next/link';
import { useCallback, useEffect, useState } from 'react';
import Sidebar from '@/components/Sidebar';
import PageHeader from '@/components/PageHeader';
import StatCard from '@/components/StatCard';
import AppToast, { type ToastState } from '@/components/AppToast';
import { fetchJson } from '@/lib/auth-fetch';
import { formatError } from '@/lib/errors';
import { formatMoney } from '@/lib/money';
import { useRouteGuard } from '@/lib/route-guard';
import type { DashboardSummary } from '@/lib/services/reports';

const STATUS_BADGE: Record<string, string> = {
  pending: 'bg-amber-100 text-amber-800',
  completed: 'bg-emerald-100 text-emerald-800',
  returned: 'bg-slate-200 text-slate-700',
};

export default function DashboardPage() {
  const { isChecking, isAuthorized, role } = useRouteGuard(['staff', 'owner']);
  const [summary, setSummary] = useState<DashboardSummary | null>(null);
  const [loading, setLoading] = useState(true);
  const [toast, setToast] = useState<ToastState | null>(null);

  const loadDashboard = useCallback(async () => {
    setLoading(true);
    try {
      const offset = new Date().getTimezoneOffset();
      const { data } = await fetchJson<DashboardSummary>(`/api/dashboard?tz_offset=${offset}`);
      setSummary(data);
    } catch (error) {
      setToast({ type: 'error', message: `Failed to load dashboard: ${formatError(error)}` });
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    if (!isAuthorized) return;
    void loadDashboard();
  }, [isAuthorized, loadDashboard]);

  if (isChecking) {
    return <div className="min-h-screen bg-slate-100 text-slate-700 flex items-center justify-center">Checking access...</div>;
  }

  if (!isAuthorized) return null;

  return (
    <div className="flex h-screen bg-slate-100 text-slate-900">
      <Sidebar role={role} />
      {toast && <AppToast type={toast.type} message={toast.message} onClose={() => setToast(null)} />}
      <div className="flex-1 flex flex-col overflow-hidden">
        <PageHeader title="Dashboard" subtitle={summary ? `Today, ${summary.today}` : undefined} role={role} />
        <main className="flex-1 p-6 overflow-y-auto space-y-6">
          {loading && !summary ? (
            <p className="text-slate-500">Loading dashboard...</p>
          ) : summary ? (
            <>
              <div className="grid grid-cols-2 xl:grid-cols-4 gap-4">
                <StatCard label="Sales Today" value={formatMoney(summary.sales_today)} subValue={`${summary.orders_today} completed orders`} type="success" />
                {role === 'owner' && <StatCard label="Net Profit Today" value={formatMoney(summary.net_profit_today)} />}
                <StatCard label="Pending Orders" value={summary.pending_orders} type={summary.pending_orders > 0 ? 'warning' : 'default'} />
                <StatCard label="Udhari Outstanding" value={formatMoney(summary.outstanding_credit)} type="danger" />
                <StatCard label="Low Stock" value={summary.low_stock_count} type={summary.low_stock_count > 0 ? 'danger' : 'default'} />
                <StatCard label="Expiring Soon" value={summary.near_expiry_count} type={summary.near_expiry_count > 0 ? 'warning' : 'default'} />
              </div>

              <div className="grid grid-cols-1 xl:grid-cols-2 gap-6">
                <section className="bg-white border border-slate-200 rounded-2xl p-5">
                  <div className="flex justify-between items-center mb-3">
                    <h2 className="font-bold text-lg">Low stock</h2>
                    <Link href="/purchases" className="text-sm font-semibold text-emerald-700">
                      Restock
                    </Link>
                  </div>
                  {summary.low_stock.length === 0 ? (
                    <p className="text-sm text-slate-500">Everything is above its reorder level.</p>
                  ) : (
                    <ul className="divide-y divide-slate-100">
                      {summary.low_stock.map((product) => (
                        <li key={product.id} className="py-2 flex justify-between text-sm">
                          <span>{product.name}</span>
                          <span className="font-semibold text-rose-700">
                            {product.stock_quantity} {product.unit} left (reorder at {product.reorder_threshold})
                          </span>
                        </li>
                      ))}
                    </ul>
                  )}
                </section>

                <section className="bg-white border border-slate-200 rounded-2xl p-5">
                  <h2 className="font-bold text-lg mb-3">Expiring soon</h2>
                  {summary.near_expiry.length === 0 ? (
                    <p className="text-sm text-slate-500">Nothing expires in the next few days.</p>
                  ) : (
                    <ul className="divide-y divide-slate-100">
                      {summary.near_expiry.map((product) => (
                        <li key={product.id} className="py-2 flex justify-between text-sm">
                          <span>{product.name}</span>
                          <span className="font-semibold text-amber-700">{product.expiry_date}</span>
                        </li>
                      ))}
                    </ul>
                  )}
                </section>
              </div>

              <section className="bg-white border border-slate-200 rounded-2xl p-5">
                <h2 className="font-bold text-lg mb-3">Top sellers today</h2>
                {summary.top_sellers_today.length === 0 ? (
                  <p className="text-sm text-slate-500">No completed sales yet today.</p>
                ) : (
                  <ul className="divide-y divide-slate-100">
                    {summary.top_sellers_today.map((row) => (
                      <li key={row.product_id} className="py-2 flex justify-between text-sm">
                        <span>{row.product_name}</span>
                        <span className="font-semibold">
                          {row.quantity} sold · {formatMoney(row.revenue)}
                        </span>
                      </li>
                    ))}
                  </ul>
                )}
              </section>

              <section className="bg-white border border-slate-200 rounded-2xl p-5">
                <div className="flex justify-between items-center mb-3">
                  <h2 className="font-bold text-lg">Recent orders</h2>
                  <Link href="/orders" className="text-sm font-semibold text-emerald-700">
                    All orders
                  </Link>
                </div>
                <table className="w-full text-sm">
                  <thead className="text-left text-slate-500">
                    <tr>
                      <th className="py-2">#</th>
                      <th className="py-2">Time</th>
                      <th className="py-2">Customer</th>
                      <th className="py-2">Payment</th>
                      <th className="py-2">Status</th>
                      <th className="py-2 text-right">Total</th>
                    </tr>
                  </thead>
                  <tbody className="divide-y divide-slate-100">
                    {summary.recent_orders.map((order) => (
                      <tr key={order.id}>
                        <td className="py-2">{order.id}</td>
                        <td className="py-2">{new Date(order.created_at).toLocaleString('en-IN')}</td>
                        <td className="py-2">{order.customer_name ?? '-'}</td>
                        <td className="py-2 uppercase">{order.payment_method}</td>
                        <td className="py-2">
                          <span className={`px-2 py-0.5 rounded-full text-xs font-semibold ${STATUS_BADGE[order.status] ?? ''}`}>
                            {order.status}
                          </span>
                        </td>
                        <td className="py-2 text-right font-semibold">{formatMoney(order.total_amount)}</td>
                      </tr>
                    ))}
                  </tbody>
                </table>
              </section>
            </>
          ) : (
            <p className="text-slate-500">No data available.</p>
          )}
        </main>
      </div>
    </div>
  );
}
