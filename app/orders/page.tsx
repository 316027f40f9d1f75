'use client';

import { useCallback, useEffect, useState } from 'react';
import Sidebar from '@/components/Sidebar';
import PageHeader from '@/components/PageHeader';
import StatCard from '@/components/StatCard';
import AppToast, { type ToastState } from '@/components/AppToast';
import ConfirmModal from '@/components/ConfirmModal';
import TextPromptModal from '@/components/TextPromptModal';
import { fetchJson, sendJson } from '@/lib/auth-fetch';
import { formatError } from '@/lib/errors';
import { formatMoney } from '@/lib/money';
import { nextStatuses } from '@/lib/order-workflow';
import { printReceipt } from '@/lib/receipt';
import { useRouteGuard } from '@/lib/route-guard';
import { ORDER_STATUSES, type OrderStatus, type OrderWithLines } from '@/lib/shop-types';
import type { ReportRange } from '@/lib/order-analytics';

type StatusFilter = OrderStatus | 'all';
type OrdersSummary = { count: number; total_amount: number };
type OrderDetail = OrderWithLines & { receipt: string };

export default function OrdersPage() {
  const { isChecking, isAuthorized, role } = useRouteGuard(['staff', 'owner']);
  const [orders, setOrders] = useState<OrderWithLines[]>([]);
  const [summary, setSummary] = useState<OrdersSummary>({ count: 0, total_amount: 0 });
  const [status, setStatus] = useState<StatusFilter>('all');
  const [range, setRange] = useState<ReportRange>('today');
  const [loading, setLoading] = useState(true);
  const [busyId, setBusyId] = useState<number | null>(null);
  const [returning, setReturning] = useState<OrderWithLines | null>(null);
  const [deleting, setDeleting] = useState<OrderWithLines | null>(null);
  const [toast, setToast] = useState<ToastState | null>(null);

  const loadOrders = useCallback(async () => {
    setLoading(true);
    try {
      const params = new URLSearchParams({ range, tz_offset: String(new Date().getTimezoneOffset()) });
      if (status !== 'all') params.set('status', status);
      const { data, summary: totals } = await fetchJson<OrderWithLines[], OrdersSummary>(`/api/orders?${params}`);
      setOrders(data);
      setSummary(totals ?? { count: data.length, total_amount: 0 });
    } catch (error) {
      setToast({ type: 'error', message: `Failed to load orders: ${formatError(error)}` });
    } finally {
      setLoading(false);
    }
  }, [range, status]);

  useEffect(() => {
    if (!isAuthorized) return;
    void loadOrders();
  }, [isAuthorized, loadOrders]);

  const changeStatus = async (order: OrderWithLines, next: OrderStatus, reason?: string) => {
    setBusyId(order.id);
    try {
      await sendJson(`/api/orders/${order.id}/status`, 'POST', { status: next, reason });
      setToast({ type: 'success', message: `Order #${order.id} marked ${next}.` });
      await loadOrders();
    } catch (error) {
      setToast({ type: 'error', message: `Could not update order #${order.id}: ${formatError(error)}` });
    } finally {
      setBusyId(null);
      setReturning(null);
    }
  };

  const deleteOrder = async (order: OrderWithLines) => {
    setBusyId(order.id);
    try {
      await sendJson(`/api/orders/${order.id}`, 'DELETE');
      setToast({ type: 'success', message: `Order #${order.id} deleted.` });
      await loadOrders();
    } catch (error) {
      setToast({ type: 'error', message: `Could not delete order #${order.id}: ${formatError(error)}` });
    } finally {
      setBusyId(null);
      setDeleting(null);
    }
  };

  const showReceipt = async (order: OrderWithLines) => {
    try {
      const { data } = await fetchJson<OrderDetail>(`/api/orders/${order.id}`);
      printReceipt(data.receipt);
    } catch (error) {
      setToast({ type: 'error', message: `Could not load receipt: ${formatError(error)}` });
    }
  };

  if (isChecking) {
    return <div className="min-h-screen bg-slate-100 text-slate-700 flex items-center justify-center">Checking access...</div>;
  }

  if (!isAuthorized) return null;

  return (
    <div className="flex h-screen bg-slate-100 text-slate-900">
      <Sidebar role={role} />
      {toast && <AppToast type={toast.type} message={toast.message} onClose={() => setToast(null)} />}
      <TextPromptModal
        isOpen={returning !== null}
        title={`Return order #${returning?.id ?? ''}`}
        label="Reason (optional)"
        placeholder="Damaged packet, wrong item..."
        confirmLabel="Return order"
        required={false}
        loading={busyId !== null}
        onConfirm={(reason) => returning && void changeStatus(returning, 'returned', reason)}
        onCancel={() => setReturning(null)}
      />
      <ConfirmModal
        isOpen={deleting !== null}
        title={`Delete order #${deleting?.id ?? ''}?`}
        message="Pending orders give their stock back. Completed and returned orders are removed as they are."
        confirmLabel="Delete"
        loading={busyId !== null}
        onConfirm={() => deleting && void deleteOrder(deleting)}
        onCancel={() => setDeleting(null)}
      />
      <div className="flex-1 flex flex-col overflow-hidden">
        <PageHeader title="Orders" role={role} />
        <main className="flex-1 p-6 overflow-y-auto space-y-6">
          <div className="flex flex-wrap gap-3">
            {(['today', 'week', 'month', 'year'] as const).map((value) => (
              <button
                key={value}
                onClick={() => setRange(value)}
                className={`px-4 py-2 rounded-lg text-sm font-bold capitalize ${
                  range === value ? 'bg-emerald-600 text-white' : 'bg-white border border-slate-200 text-slate-700'
                }`}
              >
                {value}
              </button>
            ))}
            <select
              value={status}
              onChange={(e) => {
                const next = ORDER_STATUSES.find((value) => value === e.target.value);
                setStatus(next ?? 'all');
              }}
              className="ml-auto px-3 py-2 rounded-lg border border-slate-300 bg-white"
            >
              <option value="all">All statuses</option>
              {ORDER_STATUSES.map((value) => (
                <option key={value} value={value}>
                  {value}
                </option>
              ))}
            </select>
          </div>

          <div className="grid grid-cols-2 gap-4">
            <StatCard label="Orders" value={summary.count} />
            <StatCard label="Completed Sales" value={formatMoney(summary.total_amount)} type="success" />
          </div>

          {loading ? (
            <p className="text-slate-500">Loading orders...</p>
          ) : orders.length === 0 ? (
            <p className="text-slate-500">No orders in this period.</p>
          ) : (
            <div className="bg-white border border-slate-200 rounded-2xl overflow-hidden">
              <table className="w-full text-sm">
                <thead className="bg-slate-50 text-left text-slate-500">
                  <tr>
                    <th className="px-4 py-3">#</th>
                    <th className="px-4 py-3">Time</th>
                    <th className="px-4 py-3">Items</th>
                    <th className="px-4 py-3">Customer</th>
                    <th className="px-4 py-3">Payment</th>
                    <th className="px-4 py-3">Status</th>
                    <th className="px-4 py-3 text-right">Total</th>
                    <th className="px-4 py-3" />
                  </tr>
                </thead>
                <tbody className="divide-y divide-slate-100">
                  {orders.map((order) => (
                    <tr key={order.id} className="align-top">
                      <td className="px-4 py-3 font-semibold">{order.id}</td>
                      <td className="px-4 py-3">{new Date(order.created_at).toLocaleString('en-IN')}</td>
                      <td className="px-4 py-3">
                        {order.lines.map((line) => (
                          <p key={line.id}>
                            {line.quantity} x {line.product_name}
                          </p>
                        ))}
                      </td>
                      <td className="px-4 py-3">{order.customer_name ?? '-'}</td>
                      <td className="px-4 py-3 uppercase">{order.payment_method}</td>
                      <td className="px-4 py-3">
                        {order.status}
                        {order.return_reason && <p className="text-xs text-slate-500">{order.return_reason}</p>}
                      </td>
                      <td className="px-4 py-3 text-right font-semibold">{formatMoney(order.total_amount)}</td>
                      <td className="px-4 py-3">
                        <div className="flex gap-2 justify-end">
                          {nextStatuses(order.status).includes('completed') && (
                            <button
                              disabled={busyId === order.id}
                              onClick={() => void changeStatus(order, 'completed')}
                              className="px-3 py-1 rounded bg-emerald-600 text-white font-semibold disabled:opacity-50"
                            >
                              Complete
                            </button>
                          )}
                          {nextStatuses(order.status).includes('returned') && (
                            <button
                              disabled={busyId === order.id}
                              onClick={() => setReturning(order)}
                              className="px-3 py-1 rounded bg-amber-500 text-white font-semibold disabled:opacity-50"
                            >
                              Return
                            </button>
                          )}
                          <button onClick={() => void showReceipt(order)} className="px-3 py-1 rounded border border-slate-300">
                            Receipt
                          </button>
                          {role === 'owner' && (
                            <button
                              disabled={busyId === order.id}
                              onClick={() => setDeleting(order)}
                              className="px-3 py-1 rounded border border-rose-300 text-rose-700 disabled:opacity-50"
                            >
                              Delete
                            </button>
                          )}
                        </div>
                      </td>
                    </tr>
                  ))}
                </tbody>
              </table>
            </div>
          )}
        </main>
      </div>
    </div>
  );
}
