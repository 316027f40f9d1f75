'use client';

import { useCallback, useEffect, useState } from 'react';
import Sidebar from '@/components/Sidebar';
import PageHeader from '@/components/PageHeader';
import StatCard from '@/components/StatCard';
import AppToast, { type ToastState } from '@/components/AppToast';
import ConfirmModal from '@/components/ConfirmModal';
import FieldErrors from '@/components/FieldErrors';
import { fetchJson, sendJson } from '@/lib/auth-fetch';
import { fieldErrorsOf, formatError, type FieldError } from '@/lib/errors';
import { formatMoney } from '@/lib/money';
import type { ReportRange } from '@/lib/order-analytics';
import { useRouteGuard } from '@/lib/route-guard';
import { EXPENSE_CATEGORIES, type Expense, type ExpenseCategory } from '@/lib/shop-types';

type ExpenseSummary = {
  total_amount: number;
  count: number;
  by_category: { category: ExpenseCategory; amount: number }[];
};

type ExpenseForm = { date: string; category: ExpenseCategory; amount: string; description: string };

function todayLocalIsoDate() {
  const now = new Date();
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

const inputClass = 'px-3 py-2 border border-slate-300 rounded-lg bg-white';

export default function ExpensesPage() {
  const { isChecking, isAuthorized, role } = useRouteGuard(['owner']);
  const [rows, setRows] = useState<Expense[]>([]);
  const [summary, setSummary] = useState<ExpenseSummary>({ total_amount: 0, count: 0, by_category: [] });
  const [range, setRange] = useState<ReportRange>('month');
  const [loading, setLoading] = useState(true);
  const [saving, setSaving] = useState(false);
  const [deleting, setDeleting] = useState<Expense | null>(null);
  const [formErrors, setFormErrors] = useState<FieldError[]>([]);
  const [toast, setToast] = useState<ToastState | null>(null);
  const [form, setForm] = useState<ExpenseForm>({
    date: todayLocalIsoDate(),
    category: 'other',
    amount: '',
    description: '',
  });

  const fetchExpenses = useCallback(async () => {
    setLoading(true);
    try {
      const params = new URLSearchParams({ range, tz_offset: String(new Date().getTimezoneOffset()) });
      const { data, summary: totals } = await fetchJson<Expense[], ExpenseSummary>(`/api/expenses?${params}`);
      setRows(data);
      setSummary(totals ?? { total_amount: 0, count: data.length, by_category: [] });
    } catch (error) {
      setToast({ type: 'error', message: `Failed to fetch expenses: ${formatError(error)}` });
    } finally {
      setLoading(false);
    }
  }, [range]);

  useEffect(() => {
    if (!isAuthorized) return;
    void fetchExpenses();
  }, [isAuthorized, fetchExpenses]);

  async function handleAddExpense(e: React.FormEvent) {
    e.preventDefault();
    setSaving(true);
    setFormErrors([]);
    try {
      await sendJson('/api/expenses', 'POST', form);
      setToast({ type: 'success', message: 'Expense added.' });
      setForm({ date: todayLocalIsoDate(), category: 'other', amount: '', description: '' });
      await fetchExpenses();
    } catch (error) {
      setFormErrors(fieldErrorsOf(error));
      setToast({ type: 'error', message: `Failed to add expense: ${formatError(error)}` });
    } finally {
      setSaving(false);
    }
  }

  async function deleteExpense(expense: Expense) {
    setSaving(true);
    try {
      await sendJson(`/api/expenses?id=${expense.id}`, 'DELETE');
      setToast({ type: 'success', message: 'Expense deleted.' });
      await fetchExpenses();
    } catch (error) {
      setToast({ type: 'error', message: `Failed to delete expense: ${formatError(error)}` });
    } finally {
      setSaving(false);
      setDeleting(null);
    }
  }

  if (isChecking) {
    return <div className="min-h-screen bg-slate-100 text-slate-700 flex items-center justify-center">Checking access...</div>;
  }

  if (!isAuthorized) return null;

  return (
    <div className="flex h-screen bg-slate-100 text-slate-900">
      <Sidebar role={role} />
      {toast && <AppToast type={toast.type} message={toast.message} onClose={() => setToast(null)} />}
      <ConfirmModal
        isOpen={deleting !== null}
        title="Delete expense?"
        message={deleting ? `${deleting.category} on ${deleting.date}: ${formatMoney(deleting.amount)}` : ''}
        confirmLabel="Delete"
        loading={saving}
        onConfirm={() => deleting && void deleteExpense(deleting)}
        onCancel={() => setDeleting(null)}
      />
      <div className="flex-1 flex flex-col overflow-hidden">
        <PageHeader title="Expenses" role={role} />
        <main className="flex-1 p-6 overflow-y-auto space-y-6">
          <div className="flex gap-3">
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
          </div>

          <div className="grid grid-cols-2 xl:grid-cols-4 gap-4">
            <StatCard label="Total Expenses" value={formatMoney(summary.total_amount)} type="danger" />
            <StatCard label="Entries" value={summary.count} />
            {summary.by_category.slice(0, 2).map((item) => (
              <StatCard key={item.category} label={item.category} value={formatMoney(item.amount)} />
            ))}
          </div>

          <div className="bg-white border border-slate-200 rounded-2xl p-5">
            <h2 className="font-bold text-lg mb-3">Add Expense</h2>
            <form onSubmit={(e) => void handleAddExpense(e)} className="grid grid-cols-1 md:grid-cols-5 gap-3">
              <input
                type="date"
                value={form.date}
                onChange={(e) => setForm({ ...form, date: e.target.value })}
                className={inputClass}
                required
              />
              <select
                value={form.category}
                onChange={(e) => {
                  const category = EXPENSE_CATEGORIES.find((value) => value === e.target.value);
                  if (category) setForm({ ...form, category });
                }}
                className={`${inputClass} capitalize`}
              >
                {EXPENSE_CATEGORIES.map((category) => (
                  <option key={category} value={category}>
                    {category}
                  </option>
                ))}
              </select>
              <input
                type="number"
                min={0}
                step={0.01}
                inputMode="decimal"
                placeholder="Amount"
                value={form.amount}
                onChange={(e) => setForm({ ...form, amount: e.target.value })}
                className={inputClass}
                required
              />
              <input
                placeholder="Description"
                value={form.description}
                onChange={(e) => setForm({ ...form, description: e.target.value })}
                className={inputClass}
              />
              <button
                type="submit"
                disabled={saving}
                className="px-4 py-2 bg-emerald-600 hover:bg-emerald-700 text-white rounded-lg font-bold disabled:opacity-60"
              >
                {saving ? 'Saving...' : 'Add'}
              </button>
            </form>
            <FieldErrors errors={formErrors} />
          </div>

          <div className="bg-white border border-slate-200 rounded-2xl overflow-hidden">
            {loading ? (
              <p className="p-5 text-slate-500">Loading expenses...</p>
            ) : rows.length === 0 ? (
              <p className="p-5 text-slate-500">No expenses in this period.</p>
            ) : (
              <table className="w-full text-sm">
                <thead className="bg-slate-50 text-left text-slate-500">
                  <tr>
                    <th className="px-4 py-3">Date</th>
                    <th className="px-4 py-3">Category</th>
                    <th className="px-4 py-3">Description</th>
                    <th className="px-4 py-3 text-right">Amount</th>
                    <th className="px-4 py-3" />
                  </tr>
                </thead>
                <tbody className="divide-y divide-slate-100">
                  {rows.map((row) => (
                    <tr key={row.id}>
                      <td className="px-4 py-3">{row.date}</td>
                      <td className="px-4 py-3 capitalize">{row.category}</td>
                      <td className="px-4 py-3">{row.description || '-'}</td>
                      <td className="px-4 py-3 text-right font-semibold">{formatMoney(row.amount)}</td>
                      <td className="px-4 py-3 text-right">
                        <button onClick={() => setDeleting(row)} className="px-3 py-1 rounded border border-rose-300 text-rose-700">
                          Delete
                        </button>
                      </td>
                    </tr>
                  ))}
                </tbody>
              </table>
            )}
          </div>
        </main>
      </div>
    </div>
  );
}
