'use client';

import { useCallback, useEffect, useMemo, useState } from 'react';
import Sidebar from '@/components/Sidebar';
import PageHeader from '@/components/PageHeader';
import AppToast, { type ToastState } from '@/components/AppToast';
import PaymentModal, { type CheckoutDetails } from '@/components/PaymentModal';
import { fetchJson, sendJson } from '@/lib/auth-fetch';
import { addItemToCart, cartTotal, removeItemFromCart, type CartLine } from '@/lib/cart';
import { AppError, formatError } from '@/lib/errors';
import { formatMoney } from '@/lib/money';
import { downloadReceipt, printReceipt } from '@/lib/receipt';
import { useRouteGuard } from '@/lib/route-guard';
import type { OrderWithLines, Product } from '@/lib/shop-types';

type OrderDetail = OrderWithLines & { receipt: string; share_text: string };

export default function PosPage() {
  const { isChecking, isAuthorized, role } = useRouteGuard(['staff', 'owner']);
  const [products, setProducts] = useState<Product[]>([]);
  const [search, setSearch] = useState('');
  const [scanCode, setScanCode] = useState('');
  const [lines, setLines] = useState<CartLine[]>([]);
  const [loading, setLoading] = useState(true);
  const [paymentOpen, setPaymentOpen] = useState(false);
  const [submitting, setSubmitting] = useState(false);
  const [lastOrder, setLastOrder] = useState<OrderDetail | null>(null);
  const [toast, setToast] = useState<ToastState | null>(null);

  const loadProducts = useCallback(async () => {
    setLoading(true);
    try {
      const { data } = await fetchJson<Product[]>('/api/products?active=1');
      setProducts(data);
    } catch (error) {
      setToast({ type: 'error', message: `Failed to load products: ${formatError(error)}` });
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    if (!isAuthorized) return;
    void loadProducts();
  }, [isAuthorized, loadProducts]);

  const visibleProducts = useMemo(() => {
    const needle = search.trim().toLowerCase();
    if (!needle) return products;
    return products.filter(
      (product) => product.name.toLowerCase().includes(needle) || (product.barcode ?? '').includes(needle)
    );
  }, [products, search]);

  const total = cartTotal(lines);

  const addToCart = (product: Product) => {
    const { nextLines, message } = addItemToCart(lines, product);
    setLines(nextLines);
    if (message) setToast({ type: 'info', message });
  };

  const handleScan = async (e: React.FormEvent) => {
    e.preventDefault();
    const code = scanCode.trim();
    if (!code) return;
    try {
      const { data } = await fetchJson<Product>(`/api/products/lookup?code=${encodeURIComponent(code)}`);
      addToCart(data);
      setScanCode('');
    } catch (error) {
      setToast({ type: 'error', message: formatError(error) });
    }
  };

  const placeOrder = async (details: CheckoutDetails | null) => {
    if (lines.length === 0) {
      setToast({ type: 'info', message: 'Add items before checking out.' });
      return;
    }
    setSubmitting(true);
    try {
      const { data: order } = await sendJson<OrderWithLines>('/api/orders', 'POST', {
        lines: lines.map((line) => ({ product_id: line.productId, quantity: line.quantity })),
        payment_method: details?.paymentMethod ?? 'cash',
        customer_name: details?.customerName ?? '',
        customer_phone: details?.customerPhone ?? '',
        complete: details !== null,
      });
      const { data: detail } = await fetchJson<OrderDetail>(`/api/orders/${order.id}`);
      setLastOrder(detail);
      setLines([]);
      setPaymentOpen(false);
      setToast({
        type: 'success',
        message: details ? `Order #${order.id} completed.` : `Order #${order.id} saved as pending.`,
      });
      await loadProducts();
    } catch (error) {
      const stale = error instanceof AppError && error.status === 409;
      setToast({ type: 'error', message: `Checkout failed: ${formatError(error)}` });
      if (stale) await loadProducts();
    } finally {
      setSubmitting(false);
    }
  };

  const copyShareText = async () => {
    if (!lastOrder) return;
    try {
      await navigator.clipboard.writeText(lastOrder.share_text);
      setToast({ type: 'success', message: 'Order summary copied.' });
    } catch (error) {
      setToast({ type: 'error', message: `Could not copy: ${formatError(error)}` });
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
      <PaymentModal
        isOpen={paymentOpen}
        amount={total}
        itemCount={lines.reduce((sum, line) => sum + line.quantity, 0)}
        loading={submitting}
        onConfirm={(details) => void placeOrder(details)}
        onCancel={() => setPaymentOpen(false)}
      />
      <div className="flex-1 flex flex-col overflow-hidden">
        <PageHeader title="Billing" subtitle="Scan or pick items to ring up a sale" role={role} />
        <div className="flex-1 grid grid-cols-1 xl:grid-cols-3 gap-6 p-6 overflow-hidden">
          <section className="xl:col-span-2 flex flex-col overflow-hidden">
            <div className="flex gap-3 mb-4">
              <input
                value={search}
                onChange={(e) => setSearch(e.target.value)}
                placeholder="Search products"
                className="flex-1 px-3 py-2 border border-slate-300 rounded-lg bg-white"
              />
              <form onSubmit={(e) => void handleScan(e)} className="flex gap-2">
                <input
                  value={scanCode}
                  onChange={(e) => setScanCode(e.target.value)}
                  placeholder="Barcode"
                  className="w-44 px-3 py-2 border border-slate-300 rounded-lg bg-white"
                />
                <button type="submit" className="px-4 py-2 rounded-lg bg-slate-900 text-white font-semibold">
                  Add
                </button>
              </form>
            </div>
            {loading ? (
              <p className="text-slate-500">Loading products...</p>
            ) : (
              <div className="grid grid-cols-2 lg:grid-cols-3 2xl:grid-cols-4 gap-3 overflow-y-auto pb-4">
                {visibleProducts.map((product) => (
                  <button
                    key={product.id}
                    type="button"
                    onClick={() => addToCart(product)}
                    disabled={product.stock_quantity <= 0}
                    className="text-left bg-white border border-slate-200 rounded-xl p-4 hover:border-emerald-400 disabled:opacity-50 transition"
                  >
                    <p className="font-semibold">{product.name}</p>
                    <p className="text-sm text-slate-500">
                      {product.stock_quantity} {product.unit} in stock
                    </p>
                    <p className="mt-2 font-bold text-emerald-700">
                      {formatMoney(Math.max(0, product.selling_price - product.discount))}
                      {product.discount > 0 && (
                        <span className="ml-2 text-xs text-slate-400 line-through">{formatMoney(product.selling_price)}</span>
                      )}
                    </p>
                  </button>
                ))}
              </div>
            )}
          </section>

          <section className="bg-white border border-slate-200 rounded-2xl p-5 flex flex-col overflow-hidden">
            <h2 className="font-bold text-lg mb-3">Cart</h2>
            <div className="flex-1 overflow-y-auto divide-y divide-slate-100">
              {lines.length === 0 && <p className="text-sm text-slate-500">Cart is empty.</p>}
              {lines.map((line) => (
                <div key={line.productId} className="py-2 flex items-center justify-between text-sm">
                  <div>
                    <p className="font-semibold">{line.name}</p>
                    <p className="text-slate-500">
                      {line.quantity} x {formatMoney(line.unitPrice)}
                    </p>
                  </div>
                  <div className="flex items-center gap-2">
                    <span className="font-semibold">{formatMoney(line.unitPrice * line.quantity)}</span>
                    <button
                      type="button"
                      onClick={() => setLines(removeItemFromCart(lines, line.productId))}
                      className="px-2 py-1 rounded bg-slate-100 hover:bg-slate-200"
                    >
                      -
                    </button>
                  </div>
                </div>
              ))}
            </div>
            <div className="border-t border-slate-200 pt-4 mt-4 space-y-3">
              <p className="flex justify-between text-lg font-black">
                <span>Total</span>
                <span>{formatMoney(total)}</span>
              </p>
              <button
                type="button"
                onClick={() => setPaymentOpen(true)}
                disabled={lines.length === 0 || submitting}
                className="w-full py-3 rounded-lg bg-emerald-600 hover:bg-emerald-700 disabled:bg-slate-300 text-white font-bold"
              >
                Take Payment
              </button>
              <button
                type="button"
                onClick={() => void placeOrder(null)}
                disabled={lines.length === 0 || submitting}
                className="w-full py-2 rounded-lg bg-slate-200 hover:bg-slate-300 disabled:opacity-50 font-semibold"
              >
                Save as pending
              </button>
            </div>

            {lastOrder && (
              <div className="mt-4 rounded-xl border border-emerald-200 bg-emerald-50 p-3 text-sm">
                <p className="font-semibold">
                  Order #{lastOrder.id} · {formatMoney(lastOrder.total_amount)} · {lastOrder.status}
                </p>
                <div className="flex gap-2 mt-2">
                  <button type="button" onClick={() => printReceipt(lastOrder.receipt)} className="px-3 py-1 rounded bg-white border">
                    Print
                  </button>
                  <button
                    type="button"
                    onClick={() => downloadReceipt(lastOrder.receipt, lastOrder.id)}
                    className="px-3 py-1 rounded bg-white border"
                  >
                    Download
                  </button>
                  <button type="button" onClick={() => void copyShareText()} className="px-3 py-1 rounded bg-white border">
                    Copy summary
                  </button>
                </div>
              </div>
            )}
          </section>
        </div>
      </div>
    </div>
  );
}
