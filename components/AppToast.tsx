'use client';

import { useEffect } from 'react';

export type ToastType = 'success' | 'error' | 'info';

export interface ToastState {
  type: ToastType;
  message: string;
}

type AppToastProps = {
  message: string;
  type?: ToastType;
  /** Errors stay until closed; other toasts close after this delay. */
  autoCloseMs?: number;
  onClose: () => void;
};

const STYLE_BY_TYPE: Record<ToastType, string> = {
  success: 'border-emerald-300 bg-emerald-50 text-emerald-800',
  error: 'border-rose-300 bg-rose-50 text-rose-800',
  info: 'border-sky-300 bg-sky-50 text-sky-800',
};

export default function AppToast({ message, type = 'info', autoCloseMs = 4000, onClose }: AppToastProps) {
  useEffect(() => {
    if (type === 'error') return;
    const timer = setTimeout(onClose, autoCloseMs);
    return () => clearTimeout(timer);
  }, [type, autoCloseMs, onClose, message]);

  return (
    <div role="status" className={`fixed top-4 right-4 z-50 max-w-sm border rounded-lg px-4 py-3 shadow-xl ${STYLE_BY_TYPE[type]}`}>
      <div className="flex items-start gap-3">
        <p className="text-sm font-medium">{message}</p>
        <button onClick={onClose} className="text-xs font-bold opacity-80 hover:opacity-100 transition">
          Close
        </button>
      </div>
    </div>
  );
}
