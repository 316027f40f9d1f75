'use client';

import { useEffect, useState } from 'react';
import { PAYMENT_METHODS, type PaymentMethod } from '@/lib/shop-types';

export interface CheckoutDetails {
  paymentMethod: PaymentMethod;
  customerName: string;
  customerPhone: string;
}

interface PaymentModalProps {
  isOpen: boolean;
  amount: number;
  itemCount: number;
  loading?: boolean;
  onConfirm: (details: CheckoutDetails) => void;
  onCancel: () => void;
}

const METHOD_LABEL: Record<PaymentMethod, string> = {
  cash: 'Cash',
  card: 'Card',
  upi: 'UPI',
};

export default function PaymentModal({ isOpen, amount, itemCount, loading = false, onConfirm, onCancel }: PaymentModalProps) {
  const [paymentMethod, setPaymentMethod] = useState<PaymentMethod>('cash');
  const [customerName, setCustomerName] = useState('');
  const [customerPhone, setCustomerPhone] = useState('');
  const [tendered, setTendered] = useState('');

  useEffect(() => {
    if (!isOpen) return;
    setPaymentMethod('cash');
    setCustomerName('');
    setCustomerPhone('');
    setTendered('');
  }, [isOpen]);

  if (!isOpen) return null;

  const tenderedAmount = Number(tendered);
  const change = paymentMethod === 'cash' && Number.isFinite(tenderedAmount) && tenderedAmount >= amount ? tenderedAmount - amount : null;

  return (
    <div className="fixed inset-0 bg-slate-950/60 backdrop-blur-sm flex items-center justify-center z-50 p-4">
      <div className="bg-white border border-slate-200 w-full max-w-md p-8 rounded-3xl shadow-2xl text-slate-900">
        <h2 className="text-2xl font-bold text-emerald-700 mb-2">Take Payment</h2>
        <p className="text-slate-500 mb-6">
          {itemCount} item{itemCount === 1 ? '' : 's'} · Total{' '}
          <span className="text-emerald-700 text-xl font-bold">Rs.{amount.toFixed(2)}</span>
        </p>

        <div className="grid grid-cols-3 gap-2 mb-4">
          {PAYMENT_METHODS.map((method) => (
            <button
              key={method}
              type="button"
              onClick={() => setPaymentMethod(method)}
              className={`py-2 rounded-lg font-bold transition ${
                paymentMethod === method ? 'bg-emerald-600 text-white' : 'bg-slate-100 text-slate-700 hover:bg-slate-200'
              }`}
            >
              {METHOD_LABEL[method]}
            </button>
          ))}
        </div>

        {paymentMethod === 'cash' && (
          <div className="mb-4">
            <input
              type="number"
              min={0}
              step={0.01}
              inputMode="decimal"
              placeholder="Cash received"
              value={tendered}
              onChange={(e) => setTendered(e.target.value)}
              className="w-full px-3 py-2 border border-slate-300 rounded-lg"
            />
            {change !== null && <p className="text-sm text-slate-600 mt-2">Change to return: Rs.{change.toFixed(2)}</p>}
          </div>
        )}

        <div className="space-y-2 mb-6">
          <input
            placeholder="Customer name (optional)"
            value={customerName}
            onChange={(e) => setCustomerName(e.target.value)}
            className="w-full px-3 py-2 border border-slate-300 rounded-lg"
          />
          <input
            placeholder="Customer phone (optional)"
            value={customerPhone}
            onChange={(e) => setCustomerPhone(e.target.value)}
            className="w-full px-3 py-2 border border-slate-300 rounded-lg"
          />
        </div>

        <div className="space-y-3">
          <button
            type="button"
            onClick={() => onConfirm({ paymentMethod, customerName: customerName.trim(), customerPhone: customerPhone.trim() })}
            disabled={loading}
            className="w-full py-3 bg-emerald-600 hover:bg-emerald-700 disabled:bg-slate-300 text-white font-bold rounded-lg transition"
          >
            {loading ? 'Saving...' : 'Complete Sale'}
          </button>
          <button
            type="button"
            onClick={onCancel}
            disabled={loading}
            className="w-full py-3 bg-slate-200 hover:bg-slate-300 text-slate-800 font-bold rounded-lg transition"
          >
            Cancel
          </button>
        </div>
      </div>
    </div>
  );
}
