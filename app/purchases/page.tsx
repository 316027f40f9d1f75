'use client';

import { useCallback, useEffect, useState } from 'react';
import Sidebar from '@/components/Sidebar';
import PageHeader from '@/components/PageHeader';
import StatCard from '@/components/StatCard';
import AppToast, { type ToastState } from '@/components/AppToast';
import FieldErrors from '@/components/FieldErrors';
import { fetchJson, sendJson } from '@/lib/auth-fetch';
import { fieldErrorsOf, formatError, type FieldError } from '@/lib/errors';
import { formatMoney, sumMoney } from '@/lib/money';
import { useRouteGuard } from '@/lib/route-guard';
import type { PurchaseRow } from '@/lib/services/purchases';
import type { PurchaseSuggestion } from '@/lib/services/reports';
import type { Product, Wholesaler } from '@/lib/shop-types';

type PurchaseForm = {
  wholesaler_id: string;
  wholesaler_name: string;
  wholesaler_phone: string;
  product_id: string;
  new_product_name: string;
  quantity: string;
  unit_cost: string;
  selling_price: string;
  date: string;
  expiry_date: string;
};

const EMPTY_PURCHASE: PurchaseForm = {
  wholesaler_id: '',
  wholesaler_name: '',
  wholesaler_phone: '',
  product_id: '',
  new_product_name: '',
  quantity: '',
  unit_cost: '',
  selling_price: '',
  date: '',
  expiry_date: '',
};

const inputClass = 'px-3 py-2 border border-slate-300 rounded-lg bg-white';

function suggestionReason(row: PurchaseSuggestion) {
  const reasons: string[] = [];
  if (row.low) reasons.push('low stock');
  if (row.expired) reasons.push('expired');
  if (row.near_expiry) reasons.push(`expires ${row.product.expiry_date ?? ''}`);
  return reasons.join(', ');
}

export default function PurchasesPage() {
  const { isChecking, isAuthorized, role } = useRouteGuard(['owner']);
  const [purchases, setPurchases] = useState<PurchaseRow[]>([]);
  const [wholesalers, setWholesalers] = useState<Wholesaler[]>([]);
  const [products, setProducts] = useState<Product[]>([]);
  const [suggestions, setSuggestions] = useState<PurchaseSuggestion[]>([]);
  const [form, setForm] = useState<PurchaseForm>(EMPTY_PURCHASE);
  const [wholesalerForm, setWholesalerForm] = useState({ name: '', phone: '', email: '', address: '' });
  const [formErrors, setFormErrors] = useState<FieldError[]>([]);
  const [saving, setSaving] = useState(false);
  const [loading, setLoading] = useState(true);
  const [toast, setToast] = useState<ToastState | null>(null);

  const loadRestocking = useCallback(async () => {
    setLoading(true);
    try {
      const offset = new Date().getTimezoneOffset();
      const [purchaseRes, wholesalerRes, productRes, suggestionRes] = await Promise.all([
        fetchJson<PurchaseRow[]>('/api/purchases'),
        fetchJson<Wholesaler[]>('/api/wholesalers'),
        fetchJson<Product[]>('/api/products'),
        fetchJson<PurchaseSuggestion[]>(`/api/purchases/suggested?tz_offset=${offset}`),
      ]);
      setPurchases(purchaseRes.data);
      setWholesalers(wholesalerRes.data);
      setProducts(productRes.data);
      setSuggestions(suggestionRes.data);
    } catch (error) {
      setToast({ type: 'error', message: `Failed to load restocking: ${formatError(error)}` });
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    if (!isAuthorized) return;
    void loadRestocking();
  }, [isAuthorized, loadRestocking]);

  const pickProduct = (productId: string) => {
    const product = products.find((row) => String(row.id) === productId);
    setForm({
      ...form,
      product_id: productId,
      unit_cost: product ? String(product.cost_price) : form.unit_cost,
      selling_price: product ? String(product.selling_price) : form.selling_price,
    });
  };

  const restockFromSuggestion = (row: PurchaseSuggestion) => {
    setFormErrors([]);
    setForm({
      ...EMPTY_PURCHASE,
      product_id: String(row.product.id),
      quantity: String(row.suggested_quantity || row.product.reorder_threshold || 1),
      unit_cost: String(row.product.cost_price),
      selling_price: String(row.product.selling_price),
    });
  };

  const recordPurchase = async (e: React.FormEvent) => {
    e.preventDefault();
    setSaving(true);
    setFormErrors([]);
    try {
      await sendJson('/api/purchases', 'POST', form);
      setToast({ type: 'success', message: 'Purchase recorded and stock updated.' });
      setForm(EMPTY_PURCHASE);
      await loadRestocking();
    } catch (error) {
      setFormErrors(fieldErrorsOf(error));
      setToast({ type: 'error', message: `Could not record purchase: ${formatError(error)}` });
    } finally {
      setSaving(false);
    }
  };

  const addWholesaler = async (e: React.FormEvent) => {
    e.preventDefault();
    try {
      await sendJson('/api/wholesalers', 'POST', wholesalerForm);
      setWholesalerForm({ name: '', phone: '', email: '', address: '' });
      setToast({ type: 'success', message: 'Wholesaler added.' });
      await loadRestocking();
    } catch (error) {
      setToast({ type: 'error', message: `Could not add wholesaler: ${formatError(error)}` });
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
      <div className="flex-1 flex flex-col overflow-hidden">
        <PageHeader title="Restocking" subtitle="Purchases from wholesalers" role={role} />
        <main className="flex-1 p-6 overflow-y-auto space-y-6">
          <div className="grid grid-cols-3 gap-4">
            <StatCard label="To Restock" value={suggestions.length} type={suggestions.length > 0 ? 'warning' : 'default'} />
            <StatCard label="Wholesalers" value={wholesalers.length} />
            <StatCard label="Recent Spend" value={formatMoney(sumMoney(purchases.map((row) => row.total_cost)))} />
          </div>

          <section className="bg-white border border-slate-200 rounded-2xl p-5">
            <h2 className="font-bold text-lg mb-3">Suggested purchases</h2>
            {suggestions.length === 0 ? (
              <p className="text-sm text-slate-500">Nothing needs restocking.</p>
            ) : (
              <ul className="divide-y divide-slate-100">
                {suggestions.map((row) => (
                  <li key={row.product.id} className="py-2 flex items-center justify-between text-sm">
                    <div>
                      <p className="font-semibold">{row.product.name}</p>
                      <p className="text-slate-500">
                        {row.product.stock_quantity} {row.product.unit} left · {suggestionReason(row)}
                      </p>
                    </div>
                    <button onClick={() => restockFromSuggestion(row)} className="px-3 py-1 rounded bg-emerald-600 text-white font-semibold">
                      Restock {row.suggested_quantity > 0 ? row.suggested_quantity : ''}
                    </button>
                  </li>
                ))}
              </ul>
            )}
          </section>

          <form onSubmit={(e) => void recordPurchase(e)} className="bg-white border border-slate-200 rounded-2xl p-5">
            <h2 className="font-bold text-lg mb-3">Record purchase</h2>
            <div className="grid grid-cols-2 lg:grid-cols-4 gap-3">
              <select value={form.wholesaler_id} onChange={(e) => setForm({ ...form, wholesaler_id: e.target.value })} className={inputClass}>
                <option value="">New wholesaler</option>
                {wholesalers.map((wholesaler) => (
                  <option key={wholesaler.id} value={wholesaler.id}>
                    {wholesaler.name}
                  </option>
                ))}
              </select>
              {form.wholesaler_id === '' && (
                <>
                  <input
                    value={form.wholesaler_name}
                    onChange={(e) => setForm({ ...form, wholesaler_name: e.target.value })}
                    placeholder="Wholesaler name"
                    className={inputClass}
                  />
                  <input
                    value={form.wholesaler_phone}
                    onChange={(e) => setForm({ ...form, wholesaler_phone: e.target.value })}
                    placeholder="Wholesaler phone"
                    className={inputClass}
                  />
                </>
              )}
              <select value={form.product_id} onChange={(e) => pickProduct(e.target.value)} className={inputClass}>
                <option value="">New product</option>
                {products.map((product) => (
                  <option key={product.id} value={product.id}>
                    {product.name}
                  </option>
                ))}
              </select>
              {form.product_id === '' && (
                <input
                  value={form.new_product_name}
                  onChange={(e) => setForm({ ...form, new_product_name: e.target.value })}
                  placeholder="Product name"
                  className={inputClass}
                />
              )}
              <input
                value={form.quantity}
                onChange={(e) => setForm({ ...form, quantity: e.target.value })}
                placeholder="Quantity"
                inputMode="numeric"
                className={inputClass}
                required
              />
              <input
                value={form.unit_cost}
                onChange={(e) => setForm({ ...form, unit_cost: e.target.value })}
                placeholder="Unit cost"
                inputMode="decimal"
                className={inputClass}
                required
              />
              <input
                value={form.selling_price}
                onChange={(e) => setForm({ ...form, selling_price: e.target.value })}
                placeholder="Selling price"
                inputMode="decimal"
                className={inputClass}
                required
              />
              <label className="text-xs text-slate-500">
                Purchase date
                <input type="date" value={form.date} onChange={(e) => setForm({ ...form, date: e.target.value })} className={`w-full ${inputClass}`} />
              </label>
              <label className="text-xs text-slate-500">
                Expiry date
                <input
                  type="date"
                  value={form.expiry_date}
                  onChange={(e) => setForm({ ...form, expiry_date: e.target.value })}
                  className={`w-full ${inputClass}`}
                />
              </label>
            </div>
            <FieldErrors errors={formErrors} />
            <button type="submit" disabled={saving} className="mt-4 px-4 py-2 rounded-lg bg-emerald-600 text-white font-semibold disabled:opacity-50">
              {saving ? 'Saving...' : 'Record purchase'}
            </button>
          </form>

          <div className="grid grid-cols-1 xl:grid-cols-3 gap-6">
            <section className="xl:col-span-2 bg-white border border-slate-200 rounded-2xl overflow-hidden">
              <h2 className="font-bold text-lg p-5 pb-0">Recent purchases</h2>
              {loading ? (
                <p className="p-5 text-slate-500">Loading purchases...</p>
              ) : (
                <table className="w-full text-sm mt-3">
                  <thead className="bg-slate-50 text-left text-slate-500">
                    <tr>
                      <th className="px-4 py-3">Date</th>
                      <th className="px-4 py-3">Wholesaler</th>
                      <th className="px-4 py-3">Product</th>
                      <th className="px-4 py-3 text-right">Qty</th>
                      <th className="px-4 py-3 text-right">Total</th>
                    </tr>
                  </thead>
                  <tbody className="divide-y divide-slate-100">
                    {purchases.map((row) => (
                      <tr key={row.id}>
                        <td className="px-4 py-3">{row.date}</td>
                        <td className="px-4 py-3">{row.wholesaler_name}</td>
                        <td className="px-4 py-3">{row.product_name}</td>
                        <td className="px-4 py-3 text-right">{row.quantity}</td>
                        <td className="px-4 py-3 text-right font-semibold">{formatMoney(row.total_cost)}</td>
                      </tr>
                    ))}
                  </tbody>
                </table>
              )}
            </section>

            <form onSubmit={(e) => void addWholesaler(e)} className="bg-white border border-slate-200 rounded-2xl p-5 space-y-3">
              <h2 className="font-bold text-lg">Add wholesaler</h2>
              <input
                value={wholesalerForm.name}
                onChange={(e) => setWholesalerForm({ ...wholesalerForm, name: e.target.value })}
                placeholder="Name"
                className={`w-full ${inputClass}`}
                required
              />
              <input
                value={wholesalerForm.phone}
                onChange={(e) => setWholesalerForm({ ...wholesalerForm, phone: e.target.value })}
                placeholder="Phone"
                className={`w-full ${inputClass}`}
              />
              <input
                type="email"
                value={wholesalerForm.email}
                onChange={(e) => setWholesalerForm({ ...wholesalerForm, email: e.target.value })}
                placeholder="Email"
                className={`w-full ${inputClass}`}
              />
              <input
                value={wholesalerForm.address}
                onChange={(e) => setWholesalerForm({ ...wholesalerForm, address: e.target.value })}
                placeholder="Address"
                className={`w-full ${inputClass}`}
              />
              <button type="submit" className="w-full px-4 py-2 rounded-lg border border-slate-300 font-semibold">
                Add
              </button>
            </form>
          </div>
        </main>
      </div>
    </div>
  );
}
