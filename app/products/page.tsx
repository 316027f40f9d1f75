'use client';

import { useCallback, useEffect, useMemo, useState } from 'react';
import Sidebar from '@/components/Sidebar';
import PageHeader from '@/components/PageHeader';
import StatCard from '@/components/StatCard';
import AppToast, { type ToastState } from '@/components/AppToast';
import ConfirmModal from '@/components/ConfirmModal';
import FieldErrors from '@/components/FieldErrors';
import { fetchJson, sendJson } from '@/lib/auth-fetch';
import { fieldErrorsOf, formatError, type FieldError } from '@/lib/errors';
import { effectiveUnitPrice, formatMoney } from '@/lib/money';
import { useRouteGuard } from '@/lib/route-guard';
import type { Category, Product } from '@/lib/shop-types';

type ProductForm = {
  id: number | null;
  name: string;
  category_id: string;
  barcode: string;
  unit: string;
  cost_price: string;
  selling_price: string;
  discount: string;
  stock_quantity: string;
  reorder_threshold: string;
  tax_rate_percent: string;
  expiry_date: string;
  is_active: boolean;
};

const EMPTY_FORM: ProductForm = {
  id: null,
  name: '',
  category_id: '',
  barcode: '',
  unit: 'piece',
  cost_price: '',
  selling_price: '',
  discount: '',
  stock_quantity: '',
  reorder_threshold: '5',
  tax_rate_percent: '0',
  expiry_date: '',
  is_active: true,
};

function formFromProduct(product: Product): ProductForm {
  return {
    id: product.id,
    name: product.name,
    category_id: product.category_id === null ? '' : String(product.category_id),
    barcode: product.barcode ?? '',
    unit: product.unit,
    cost_price: String(product.cost_price),
    selling_price: String(product.selling_price),
    discount: String(product.discount),
    stock_quantity: String(product.stock_quantity),
    reorder_threshold: String(product.reorder_threshold),
    tax_rate_percent: String(product.tax_rate_percent),
    expiry_date: product.expiry_date ?? '',
    is_active: product.is_active,
  };
}

const inputClass = 'px-3 py-2 border border-slate-300 rounded-lg bg-white';

export default function ProductsPage() {
  const { isChecking, isAuthorized, role } = useRouteGuard(['staff', 'owner']);
  const isOwner = role === 'owner';
  const [products, setProducts] = useState<Product[]>([]);
  const [categories, setCategories] = useState<Category[]>([]);
  const [search, setSearch] = useState('');
  const [categoryFilter, setCategoryFilter] = useState('');
  const [lowStockOnly, setLowStockOnly] = useState(false);
  const [form, setForm] = useState<ProductForm | null>(null);
  const [formErrors, setFormErrors] = useState<FieldError[]>([]);
  const [newCategory, setNewCategory] = useState('');
  const [scan, setScan] = useState({ code: '', delta: '1' });
  const [priceCode, setPriceCode] = useState('');
  const [priceResult, setPriceResult] = useState<Product | null>(null);
  const [deleting, setDeleting] = useState<Product | null>(null);
  const [saving, setSaving] = useState(false);
  const [loading, setLoading] = useState(true);
  const [toast, setToast] = useState<ToastState | null>(null);

  const categoryName = useMemo(() => new Map(categories.map((c) => [c.id, c.name])), [categories]);

  const loadCatalog = useCallback(async () => {
    setLoading(true);
    try {
      const params = new URLSearchParams();
      if (search.trim()) params.set('q', search.trim());
      if (categoryFilter) params.set('category', categoryFilter);
      if (lowStockOnly) params.set('low_stock', '1');
      const [productRes, categoryRes] = await Promise.all([
        fetchJson<Product[]>(`/api/products?${params}`),
        fetchJson<Category[]>('/api/categories'),
      ]);
      setProducts(productRes.data);
      setCategories(categoryRes.data);
    } catch (error) {
      setToast({ type: 'error', message: `Failed to load products: ${formatError(error)}` });
    } finally {
      setLoading(false);
    }
  }, [search, categoryFilter, lowStockOnly]);

  useEffect(() => {
    if (!isAuthorized) return;
    void loadCatalog();
  }, [isAuthorized, loadCatalog]);

  const saveProduct = async (e: React.FormEvent) => {
    e.preventDefault();
    if (!form) return;
    setSaving(true);
    setFormErrors([]);
    const { id, stock_quantity, ...fields } = form;
    try {
      if (id === null) {
        await sendJson('/api/products', 'POST', { ...fields, stock_quantity });
        setToast({ type: 'success', message: `${form.name} added.` });
      } else {
        await sendJson('/api/products', 'PUT', { ...fields, id });
        setToast({ type: 'success', message: `${form.name} updated.` });
      }
      setForm(null);
      await loadCatalog();
    } catch (error) {
      setFormErrors(fieldErrorsOf(error));
      setToast({ type: 'error', message: `Could not save product: ${formatError(error)}` });
    } finally {
      setSaving(false);
    }
  };

  const deleteProduct = async (product: Product) => {
    setSaving(true);
    try {
      await sendJson(`/api/products?id=${product.id}`, 'DELETE');
      setToast({ type: 'success', message: `${product.name} deleted.` });
      await loadCatalog();
    } catch (error) {
      setToast({ type: 'error', message: formatError(error) });
    } finally {
      setSaving(false);
      setDeleting(null);
    }
  };

  const addCategory = async (e: React.FormEvent) => {
    e.preventDefault();
    try {
      await sendJson('/api/categories', 'POST', { name: newCategory });
      setNewCategory('');
      await loadCatalog();
    } catch (error) {
      setToast({ type: 'error', message: `Could not add category: ${formatError(error)}` });
    }
  };

  const scanStock = async (e: React.FormEvent) => {
    e.preventDefault();
    try {
      const { data } = await sendJson<Product>('/api/products/stock', 'POST', scan);
      setToast({ type: 'success', message: `${data.name} now has ${data.stock_quantity} ${data.unit}.` });
      setScan({ code: '', delta: '1' });
      await loadCatalog();
    } catch (error) {
      setToast({ type: 'error', message: formatError(error) });
    }
  };

  const checkPrice = async (e: React.FormEvent) => {
    e.preventDefault();
    try {
      const { data } = await fetchJson<Product>(`/api/products/lookup?code=${encodeURIComponent(priceCode.trim())}`);
      setPriceResult(data);
    } catch (error) {
      setPriceResult(null);
      setToast({ type: 'error', message: formatError(error) });
    }
  };

  if (isChecking) {
    return <div className="min-h-screen bg-slate-100 text-slate-700 flex items-center justify-center">Checking access...</div>;
  }

  if (!isAuthorized) return null;

  const lowCount = products.filter((p) => p.stock_quantity <= p.reorder_threshold).length;

  return (
    <div className="flex h-screen bg-slate-100 text-slate-900">
      <Sidebar role={role} />
      {toast && <AppToast type={toast.type} message={toast.message} onClose={() => setToast(null)} />}
      <ConfirmModal
        isOpen={deleting !== null}
        title={`Delete ${deleting?.name ?? ''}?`}
        message="Products that appear on an order cannot be deleted; mark them inactive instead."
        confirmLabel="Delete"
        loading={saving}
        onConfirm={() => deleting && void deleteProduct(deleting)}
        onCancel={() => setDeleting(null)}
      />
      <div className="flex-1 flex flex-col overflow-hidden">
        <PageHeader title="Products & Stock" role={role} />
        <main className="flex-1 p-6 overflow-y-auto space-y-6">
          <div className="grid grid-cols-3 gap-4">
            <StatCard label="Products" value={products.length} />
            <StatCard label="Low Stock" value={lowCount} type={lowCount > 0 ? 'danger' : 'default'} />
            <StatCard label="Categories" value={categories.length} />
          </div>

          <div className="grid grid-cols-1 xl:grid-cols-2 gap-6">
            <form onSubmit={(e) => void scanStock(e)} className="bg-white border border-slate-200 rounded-2xl p-5 space-y-3">
              <h2 className="font-bold text-lg">Scan stock in</h2>
              <p className="text-sm text-slate-500">Each scan adds units to the product with this barcode or name.</p>
              <div className="flex gap-2">
                <input
                  value={scan.code}
                  onChange={(e) => setScan({ ...scan, code: e.target.value })}
                  placeholder="Barcode or name"
                  className={`flex-1 ${inputClass}`}
                  required
                />
                <input
                  type="number"
                  min={1}
                  value={scan.delta}
                  onChange={(e) => setScan({ ...scan, delta: e.target.value })}
                  className={`w-24 ${inputClass}`}
                />
                <button type="submit" className="px-4 py-2 rounded-lg bg-emerald-600 text-white font-semibold">
                  Add
                </button>
              </div>
            </form>

            <form onSubmit={(e) => void checkPrice(e)} className="bg-white border border-slate-200 rounded-2xl p-5 space-y-3">
              <h2 className="font-bold text-lg">Price checker</h2>
              <div className="flex gap-2">
                <input
                  value={priceCode}
                  onChange={(e) => setPriceCode(e.target.value)}
                  placeholder="Barcode or name"
                  className={`flex-1 ${inputClass}`}
                  required
                />
                <button type="submit" className="px-4 py-2 rounded-lg bg-slate-900 text-white font-semibold">
                  Check
                </button>
              </div>
              {priceResult && (
                <p className="text-sm">
                  <span className="font-semibold">{priceResult.name}</span>: {formatMoney(effectiveUnitPrice(priceResult))}
                  {priceResult.discount > 0 && ` (MRP ${formatMoney(priceResult.selling_price)})`} · {priceResult.stock_quantity}{' '}
                  {priceResult.unit} in stock
                </p>
              )}
            </form>
          </div>

          <div className="flex flex-wrap gap-3 items-center">
            <input value={search} onChange={(e) => setSearch(e.target.value)} placeholder="Search" className={inputClass} />
            <select value={categoryFilter} onChange={(e) => setCategoryFilter(e.target.value)} className={inputClass}>
              <option value="">All categories</option>
              {categories.map((category) => (
                <option key={category.id} value={category.id}>
                  {category.name}
                </option>
              ))}
            </select>
            <label className="flex items-center gap-2 text-sm font-semibold">
              <input type="checkbox" checked={lowStockOnly} onChange={(e) => setLowStockOnly(e.target.checked)} />
              Low stock only
            </label>
            {isOwner && (
              <>
                <form onSubmit={(e) => void addCategory(e)} className="flex gap-2 ml-auto">
                  <input value={newCategory} onChange={(e) => setNewCategory(e.target.value)} placeholder="New category" className={inputClass} required />
                  <button type="submit" className="px-3 py-2 rounded-lg border border-slate-300 font-semibold">
                    Add category
                  </button>
                </form>
                <button
                  onClick={() => {
                    setFormErrors([]);
                    setForm(EMPTY_FORM);
                  }}
                  className="px-4 py-2 rounded-lg bg-emerald-600 text-white font-semibold"
                >
                  New product
                </button>
              </>
            )}
          </div>

          {form && (
            <form onSubmit={(e) => void saveProduct(e)} className="bg-white border border-emerald-200 rounded-2xl p-5">
              <h2 className="font-bold text-lg mb-3">{form.id === null ? 'New product' : `Edit ${form.name}`}</h2>
              <div className="grid grid-cols-2 lg:grid-cols-4 gap-3">
                <input value={form.name} onChange={(e) => setForm({ ...form, name: e.target.value })} placeholder="Name" className={inputClass} required />
                <select value={form.category_id} onChange={(e) => setForm({ ...form, category_id: e.target.value })} className={inputClass}>
                  <option value="">No category</option>
                  {categories.map((category) => (
                    <option key={category.id} value={category.id}>
                      {category.name}
                    </option>
                  ))}
                </select>
                <input value={form.barcode} onChange={(e) => setForm({ ...form, barcode: e.target.value })} placeholder="Barcode" className={inputClass} />
                <input value={form.unit} onChange={(e) => setForm({ ...form, unit: e.target.value })} placeholder="Unit (kg, packet...)" className={inputClass} />
                <input value={form.cost_price} onChange={(e) => setForm({ ...form, cost_price: e.target.value })} placeholder="Cost price" inputMode="decimal" className={inputClass} />
                <input value={form.selling_price} onChange={(e) => setForm({ ...form, selling_price: e.target.value })} placeholder="Selling price (MRP)" inputMode="decimal" className={inputClass} required />
                <input value={form.discount} onChange={(e) => setForm({ ...form, discount: e.target.value })} placeholder="Discount" inputMode="decimal" className={inputClass} />
                <input value={form.tax_rate_percent} onChange={(e) => setForm({ ...form, tax_rate_percent: e.target.value })} placeholder="GST %" inputMode="decimal" className={inputClass} />
                {form.id === null && (
                  <input value={form.stock_quantity} onChange={(e) => setForm({ ...form, stock_quantity: e.target.value })} placeholder="Opening stock" inputMode="numeric" className={inputClass} />
                )}
                <input value={form.reorder_threshold} onChange={(e) => setForm({ ...form, reorder_threshold: e.target.value })} placeholder="Reorder at" inputMode="numeric" className={inputClass} />
                <input type="date" value={form.expiry_date} onChange={(e) => setForm({ ...form, expiry_date: e.target.value })} className={inputClass} />
                <label className="flex items-center gap-2 text-sm font-semibold">
                  <input type="checkbox" checked={form.is_active} onChange={(e) => setForm({ ...form, is_active: e.target.checked })} />
                  Active
                </label>
              </div>
              <FieldErrors errors={formErrors} />
              <div className="flex gap-3 mt-4">
                <button type="submit" disabled={saving} className="px-4 py-2 rounded-lg bg-emerald-600 text-white font-semibold disabled:opacity-50">
                  {saving ? 'Saving...' : 'Save'}
                </button>
                <button type="button" onClick={() => setForm(null)} className="px-4 py-2 rounded-lg bg-slate-200 font-semibold">
                  Cancel
                </button>
              </div>
            </form>
          )}

          {loading ? (
            <p className="text-slate-500">Loading products...</p>
          ) : (
            <div className="bg-white border border-slate-200 rounded-2xl overflow-hidden">
              <table className="w-full text-sm">
                <thead className="bg-slate-50 text-left text-slate-500">
                  <tr>
                    <th className="px-4 py-3">Name</th>
                    <th className="px-4 py-3">Category</th>
                    <th className="px-4 py-3 text-right">Price</th>
                    <th className="px-4 py-3 text-right">Stock</th>
                    <th className="px-4 py-3">Expiry</th>
                    <th className="px-4 py-3" />
                  </tr>
                </thead>
                <tbody className="divide-y divide-slate-100">
                  {products.map((product) => (
                    <tr key={product.id} className={product.is_active ? '' : 'opacity-50'}>
                      <td className="px-4 py-3">
                        <p className="font-semibold">{product.name}</p>
                        {product.barcode && <p className="text-xs text-slate-500">{product.barcode}</p>}
                      </td>
                      <td className="px-4 py-3">{product.category_id === null ? '-' : categoryName.get(product.category_id) ?? '-'}</td>
                      <td className="px-4 py-3 text-right">{formatMoney(effectiveUnitPrice(product))}</td>
                      <td
                        className={`px-4 py-3 text-right font-semibold ${
                          product.stock_quantity <= product.reorder_threshold ? 'text-rose-700' : ''
                        }`}
                      >
                        {product.stock_quantity} {product.unit}
                      </td>
                      <td className="px-4 py-3">{product.expiry_date ?? '-'}</td>
                      <td className="px-4 py-3">
                        {isOwner && (
                          <div className="flex gap-2 justify-end">
                            <button
                              onClick={() => {
                                setFormErrors([]);
                                setForm(formFromProduct(product));
                              }}
                              className="px-3 py-1 rounded border border-slate-300"
                            >
                              Edit
                            </button>
                            <button onClick={() => setDeleting(product)} className="px-3 py-1 rounded border border-rose-300 text-rose-700">
                              Delete
                            </button>
                          </div>
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
