'use client';

import { useCallback, useEffect, useState } from 'react';
import Sidebar from '@/components/Sidebar';
import PageHeader from '@/components/PageHeader';
import StatCard from '@/components/StatCard';
import AppToast, { type ToastState } from '@/components/AppToast';
import FieldErrors from '@/components/FieldErrors';
import { fetchJson, sendJson } from '@/lib/auth-fetch';
import { fieldErrorsOf, formatError, type FieldError } from '@/lib/errors';
import { formatMoney } from '@/lib/money';
import { useRouteGuard } from '@/lib/route-guard';
import type { CreditReminder, CreditRow, CreditSort, CustomerSummary } from '@/lib/services/credit';
import type { Product } from '@/lib/shop-types';

type CreditSummary = { total_outstanding: number; count: number };
type Suggestion = { id: number; name: string; phone: string; address: string };

const SORT_OPTIONS: { value: CreditSort; label: string }[] = [
  { value: 'date', label: 'Newest first' },
  { value: 'customer_asc', label: 'Customer A-Z' },
  { value: 'customer_desc', label: 'Customer Z-A' },
];

const EMPTY_ENTRY = { customer_name: '', customer_phone: '', product_id: '', item_name: '', quantity: '1', amount: '', notes: '' };

const inputClass = 'px-3 py-2 border border-slate-300 rounded-lg bg-white';

export default function CreditPage() {
  const { isChecking, isAuthorized, role } = useRouteGuard(['staff', 'owner']);
  const [entries, setEntries] = useState<CreditRow[]>([]);
  const [summary, setSummary] = useState<CreditSummary>({ total_outstanding: 0, count: 0 });
  const [customers, setCustomers] = useState<CustomerSummary[]>([]);
  const [reminders, setReminders] = useState<CreditReminder[]>([]);
  const [products, setProducts] = useState<Product[]>([]);
  const [sort, setSort] = useState<CreditSort>('date');
  const [entry, setEntry] = useState(EMPTY_ENTRY);
  const [suggestions, setSuggestions] = useState<Suggestion[]>([]);
  const [formErrors, setFormErrors] = useState<FieldError[]>([]);
  const [busyId, setBusyId] = useState<number | null>(null);
  const [saving, setSaving] = useState(false);
  const [loading, setLoading] = useState(true);
  const [toast, setToast] = useState<ToastState | null>(null);

  const loadLedger = useCallback(async () => {
    setLoading(true);
    try {
      const [creditRes, customerRes, reminderRes, productRes] = await Promise.all([
        fetchJson<CreditRow[], CreditSummary>(`/api/credit?sort=${sort}`),
        fetchJson<CustomerSummary[]>('/api/customers'),
        fetchJson<CreditReminder[]>('/api/credit/reminders'),
        fetchJson<Product[]>('/api/products?active=1'),
      ]);
      setEntries(creditRes.data);
      setSummary(creditRes.summary ?? { total_outstanding: 0, count: creditRes.data.length });
      setCustomers(customerRes.data);
      setReminders(reminderRes.data);
      setProducts(productRes.data);
    } catch (error) {
      setToast({ type: 'error', message: `Failed to load udhari: ${formatError(error)}` });
    } finally {
      setLoading(false);
    }
  }, [sort]);

  useEffect(() => {
    if (!isAuthorized) return;
    void loadLedger();
  }, [isAuthorized, loadLedger]);

  useEffect(() => {
    const query = entry.customer_name.trim();
    if (!isAuthorized || query.length < 2) {
      setSuggestions([]);
      return;
    }
    const timer = setTimeout(() => {
      fetchJson<Suggestion[]>(`/api/customers?suggest=1&q=${encodeURIComponent(query)}`)
        .then(({ data }) => setSuggestions(data))
        .catch((error: unknown) => setToast({ type: 'error', message: formatError(error) }));
    }, 250);
    return () => clearTimeout(timer);
  }, [isAuthorized, entry.customer_name]);

  const addEntry = async (e: React.FormEvent) => {
    e.preventDefault();
    setSaving(true);
    setFormErrors([]);
    try {
      await sendJson('/api/credit', 'POST', entry);
      setToast({ type: 'success', message: `Udhari recorded for ${entry.customer_name}.` });
      setEntry(EMPTY_ENTRY);
      await loadLedger();
    } catch (error) {
      setFormErrors(fieldErrorsOf(error));
      setToast({ type: 'error', message: `Could not record udhari: ${formatError(error)}` });
    } finally {
      setSaving(false);
    }
  };

  const settle = async (row: CreditRow) => {
    setBusyId(row.id);
    try {
      await sendJson(`/api/credit/${row.id}/settle`, 'POST');
      setToast({ type: 'success', message: `${row.customer_name} paid ${formatMoney(row.amount)}.` });
      await loadLedger();
    } catch (error) {
      setToast({ type: 'error', message: formatError(error) });
    } finally {
      setBusyId(null);
    }
  };

  const sendReminder = async (reminder: CreditReminder) => {
    try {
      await navigator.clipboard.writeText(reminder.message);
      await sendJson(`/api/customers/${reminder.customer_id}/reminder`, 'POST');
      setToast({ type: 'success', message: `Reminder for ${reminder.customer_name} copied.` });
      await loadLedger();
    } catch (error) {
      setToast({ type: 'error', message: `Could not record reminder: ${formatError(error)}` });
    }
  };

  if (isChecking) {
    return <div className="min-h-screen bg-slate-100 text-slate-700 flex items-center justify-center">Checking access...</div>;
  }

  if (!isAuthorized) return null;

  const owing = customers.filter((customer) => customer.outstanding > 0);

  return (
    <div className="flex h-screen bg-slate-100 text-slate-900">
      <Sidebar role={role} />
      {toast && <AppToast type={toast.type} message={toast.message} onClose={() => setToast(null)} />}
      <div className="flex-1 flex flex-col overflow-hidden">
        <PageHeader title="Udhari" subtitle="Goods given on credit" role={role} />
        <main className="flex-1 p-6 overflow-y-auto space-y-6">
          <div className="grid grid-cols-3 gap-4">
            <StatCard label="Outstanding" value={formatMoney(summary.total_outstanding)} type="danger" />
            <StatCard label="Customers Owing" value={owing.length} />
            <StatCard label="Reminders Due" value={reminders.length} type={reminders.length > 0 ? 'warning' : 'default'} />
          </div>

          <form onSubmit={(e) => void addEntry(e)} className="bg-white border border-slate-200 rounded-2xl p-5">
            <h2 className="font-bold text-lg mb-3">Give on credit</h2>
            <div className="grid grid-cols-2 lg:grid-cols-4 gap-3">
              <div className="relative">
                <input
                  value={entry.customer_name}
                  onChange={(e) => setEntry({ ...entry, customer_name: e.target.value })}
                  placeholder="Customer name"
                  className={`w-full ${inputClass}`}
                  required
                />
                {suggestions.length > 0 && (
                  <ul className="absolute z-10 mt-1 w-full bg-white border border-slate-200 rounded-lg shadow">
                    {suggestions.map((suggestion) => (
                      <li key={suggestion.id}>
                        <button
                          type="button"
                          onClick={() => {
                            setEntry({ ...entry, customer_name: suggestion.name, customer_phone: suggestion.phone });
                            setSuggestions([]);
                          }}
                          className="w-full text-left px-3 py-2 text-sm hover:bg-slate-100"
                        >
                          {suggestion.name} {suggestion.phone && <span className="text-slate-500">· {suggestion.phone}</span>}
                        </button>
                      </li>
                    ))}
                  </ul>
                )}
              </div>
              <input
                value={entry.customer_phone}
                onChange={(e) => setEntry({ ...entry, customer_phone: e.target.value })}
                placeholder="Phone"
                className={inputClass}
              />
              <select value={entry.product_id} onChange={(e) => setEntry({ ...entry, product_id: e.target.value })} className={inputClass}>
                <option value="">Other item</option>
                {products.map((product) => (
                  <option key={product.id} value={product.id}>
                    {product.name} ({formatMoney(product.selling_price)})
                  </option>
                ))}
              </select>
              {entry.product_id === '' && (
                <input
                  value={entry.item_name}
                  onChange={(e) => setEntry({ ...entry, item_name: e.target.value })}
                  placeholder="Item"
                  className={inputClass}
                />
              )}
              <input
                value={entry.quantity}
                onChange={(e) => setEntry({ ...entry, quantity: e.target.value })}
                placeholder="Quantity"
                inputMode="numeric"
                className={inputClass}
              />
              <input
                value={entry.amount}
                onChange={(e) => setEntry({ ...entry, amount: e.target.value })}
                placeholder="Amount (blank = price x qty)"
                inputMode="decimal"
                className={inputClass}
              />
              <input
                value={entry.notes}
                onChange={(e) => setEntry({ ...entry, notes: e.target.value })}
                placeholder="Notes"
                className={inputClass}
              />
              <button type="submit" disabled={saving} className="px-4 py-2 rounded-lg bg-emerald-600 text-white font-semibold disabled:opacity-50">
                {saving ? 'Saving...' : 'Record'}
              </button>
            </div>
            <FieldErrors errors={formErrors} />
          </form>

          {reminders.length > 0 && (
            <section className="bg-amber-50 border border-amber-200 rounded-2xl p-5">
              <h2 className="font-bold text-lg mb-3">Reminders due</h2>
              <ul className="divide-y divide-amber-100">
                {reminders.map((reminder) => (
                  <li key={reminder.customer_id} className="py-2 flex items-center justify-between text-sm">
                    <div>
                      <p className="font-semibold">
                        {reminder.customer_name} owes {formatMoney(reminder.amount)}
                      </p>
                      <p className="text-slate-600">Last reminded: {reminder.last_reminder_date ?? 'never'}</p>
                    </div>
                    <button onClick={() => void sendReminder(reminder)} className="px-3 py-1 rounded bg-amber-500 text-white font-semibold">
                      Copy reminder
                    </button>
                  </li>
                ))}
              </ul>
            </section>
          )}

          <div className="flex justify-end">
            <select
              value={sort}
              onChange={(e) => setSort(SORT_OPTIONS.find((option) => option.value === e.target.value)?.value ?? 'date')}
              className={inputClass}
            >
              {SORT_OPTIONS.map(({ value, label }) => (
                <option key={value} value={value}>
                  {label}
                </option>
              ))}
            </select>
          </div>

          {loading ? (
            <p className="text-slate-500">Loading udhari...</p>
          ) : entries.length === 0 ? (
            <p className="text-slate-500">No udhari recorded.</p>
          ) : (
            <div className="bg-white border border-slate-200 rounded-2xl overflow-hidden">
              <table className="w-full text-sm">
                <thead className="bg-slate-50 text-left text-slate-500">
                  <tr>
                    <th className="px-4 py-3">Date</th>
                    <th className="px-4 py-3">Customer</th>
                    <th className="px-4 py-3">Item</th>
                    <th className="px-4 py-3 text-right">Amount</th>
                    <th className="px-4 py-3">Status</th>
                    <th className="px-4 py-3" />
                  </tr>
                </thead>
                <tbody className="divide-y divide-slate-100">
                  {entries.map((row) => (
                    <tr key={row.id}>
                      <td className="px-4 py-3">{new Date(row.date_taken).toLocaleDateString('en-IN')}</td>
                      <td className="px-4 py-3">
                        <p className="font-semibold">{row.customer_name}</p>
                        {row.customer_phone && <p className="text-xs text-slate-500">{row.customer_phone}</p>}
                      </td>
                      <td className="px-4 py-3">
                        {row.quantity} x {row.item_name}
                      </td>
                      <td className="px-4 py-3 text-right font-semibold">{formatMoney(row.amount)}</td>
                      <td className="px-4 py-3">{row.is_settled ? `Paid ${row.date_settled?.slice(0, 10) ?? ''}` : 'Open'}</td>
                      <td className="px-4 py-3 text-right">
                        {!row.is_settled && (
                          <button
                            disabled={busyId === row.id}
                            onClick={() => void settle(row)}
                            className="px-3 py-1 rounded bg-emerald-600 text-white font-semibold disabled:opacity-50"
                          >
                            Mark paid
                          </button>
                        )}
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
