'use client';

import { useEffect, useMemo, useState } from 'react';
import type { AppRole } from '@/lib/shop-types';
import { getCurrentUser } from '@/lib/auth';

type PageHeaderProps = {
  title: string;
  subtitle?: string;
  role?: AppRole | null;
};

export default function PageHeader({ title, subtitle = 'Shop counter', role }: PageHeaderProps) {
  const [userName, setUserName] = useState('User');
  const [clock, setClock] = useState(() => new Date());

  useEffect(() => {
    let mounted = true;

    const loadUser = async () => {
      const user = await getCurrentUser();
      if (!mounted) return;
      const fullName = user?.user_metadata?.full_name;
      setUserName(typeof fullName === 'string' && fullName.trim().length > 0 ? fullName : user?.email ?? 'User');
    };

    void loadUser();

    const timer = setInterval(() => setClock(new Date()), 30_000);
    return () => {
      mounted = false;
      clearInterval(timer);
    };
  }, []);

  const roleLabel = useMemo(() => {
    if (!role) return 'Staff';
    return role.charAt(0).toUpperCase() + role.slice(1);
  }, [role]);

  return (
    <header className="bg-white border-b border-slate-200 px-8 py-5 flex justify-between items-center">
      <div>
        <h1 className="text-2xl font-black text-slate-900 tracking-tight">{title}</h1>
        <p className="text-sm text-slate-500">{subtitle}</p>
      </div>
      <div className="flex items-center gap-3">
        <span className="px-3 py-1 rounded-full border border-emerald-200 bg-emerald-50 text-xs font-bold text-emerald-700">
          {roleLabel}
        </span>
        <span className="px-3 py-1 rounded-full border border-slate-200 bg-slate-100 text-xs font-semibold text-slate-700">
          {userName}
        </span>
        <span className="px-3 py-1 rounded-full border border-slate-200 bg-slate-100 text-xs font-semibold text-slate-700">
          {clock.toLocaleString('en-IN', { dateStyle: 'medium', timeStyle: 'short' })}
        </span>
      </div>
    </header>
  );
}
