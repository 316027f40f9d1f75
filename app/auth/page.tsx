'use client';

import { Suspense, useEffect, useState } from 'react';
import { useRouter, useSearchParams } from 'next/navigation';
import { getSession, sendPasswordReset, signIn, updatePassword } from '@/lib/auth';
import { fetchServerRole, homePathFor } from '@/lib/route-guard';
import type { AppRole } from '@/lib/shop-types';

type AuthView = 'password' | 'forgot' | 'reset';

function resolveNextPath(nextValue: string | null, role: AppRole): string {
  if (nextValue && nextValue.startsWith('/') && !nextValue.startsWith('//')) return nextValue;
  return homePathFor(role);
}

function connectivityHint() {
  const url = process.env.NEXT_PUBLIC_SUPABASE_URL?.trim() ?? '';
  if (!url) return 'NEXT_PUBLIC_SUPABASE_URL is not set.';
  if (!url.startsWith('https://')) return `NEXT_PUBLIC_SUPABASE_URL must start with https:// (current: ${url}).`;
  return 'Could not reach Supabase Auth. Check the project status and anon key.';
}

function mapError(err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  if (message.toLowerCase().includes('failed to fetch')) {
    return `Cannot reach the sign-in server. ${connectivityHint()}`;
  }
  return message || 'Sign-in failed';
}

const inputClass =
  'w-full rounded-lg border border-slate-600 bg-slate-900/70 px-3 py-2 outline-none focus:border-emerald-400';
const submitClass =
  'w-full rounded-lg bg-emerald-600 px-3 py-2 font-black text-white transition hover:bg-emerald-500 disabled:opacity-60';

function AuthPageContent() {
  const router = useRouter();
  const searchParams = useSearchParams();

  const [view, setView] = useState<AuthView>('password');
  const [loading, setLoading] = useState(false);
  const [email, setEmail] = useState('');
  const [password, setPassword] = useState('');
  const [newPassword, setNewPassword] = useState('');
  const [confirmPassword, setConfirmPassword] = useState('');
  const [error, setError] = useState('');
  const [success, setSuccess] = useState('');

  useEffect(() => {
    if (searchParams.get('mode') === 'reset') {
      setView('reset');
      return;
    }
    void (async () => {
      const session = await getSession();
      if (!session?.access_token) return;
      const role = await fetchServerRole(session.access_token);
      if (role === null || role === 'inactive') return;
      router.replace(resolveNextPath(searchParams.get('next'), role));
    })();
  }, [router, searchParams]);

  async function routeAfterSignIn() {
    const session = await getSession();
    const role = session?.access_token ? await fetchServerRole(session.access_token) : null;
    if (role === 'inactive') throw new Error('This account is inactive. Ask the owner to enable it.');
    router.push(resolveNextPath(searchParams.get('next'), role ?? 'staff'));
  }

  async function run(action: () => Promise<void>) {
    setLoading(true);
    setError('');
    setSuccess('');
    try {
      await action();
    } catch (err) {
      setError(mapError(err));
    } finally {
      setLoading(false);
    }
  }

  const handleSignIn = (e: React.FormEvent) => {
    e.preventDefault();
    void run(async () => {
      const { error: signInError } = await signIn(email, password);
      if (signInError) throw signInError;
      await routeAfterSignIn();
    });
  };

  const handleForgot = (e: React.FormEvent) => {
    e.preventDefault();
    void run(async () => {
      const { error: resetError } = await sendPasswordReset(email);
      if (resetError) throw resetError;
      setSuccess('Password reset email sent.');
    });
  };

  const handleReset = (e: React.FormEvent) => {
    e.preventDefault();
    void run(async () => {
      if (newPassword.length < 6) throw new Error('Password must be at least 6 characters.');
      if (newPassword !== confirmPassword) throw new Error('Passwords do not match.');
      const { error: updateError } = await updatePassword(newPassword);
      if (updateError) throw updateError;
      setSuccess('Password updated. Redirecting...');
      await routeAfterSignIn();
    });
  };

  return (
    <div className="min-h-screen bg-slate-950 text-slate-100 px-4 py-8">
      <div className="mx-auto grid w-full max-w-5xl grid-cols-1 gap-6 lg:grid-cols-2">
        <section className="rounded-3xl border border-emerald-400/20 bg-gradient-to-br from-emerald-500/15 to-slate-900/60 p-8">
          <p className="text-sm font-bold tracking-wide text-emerald-200">Kirana Desk</p>
          <h1 className="mt-5 text-4xl font-black leading-tight">Billing, stock and udhari for your shop</h1>
          <p className="mt-4 max-w-md text-slate-300">
            Ring up sales, keep the shelf stocked and track what customers owe, all in one place.
          </p>
          <p className="mt-8 text-sm text-slate-300">
            Staff use the billing counter. The owner also sees reports, expenses and the admin browser.
          </p>
        </section>

        <section className="rounded-3xl border border-slate-700 bg-slate-900/60 p-8">
          <h2 className="mb-4 text-2xl font-black">Sign In</h2>

          {view === 'password' && (
            <form onSubmit={handleSignIn} className="space-y-3">
              <input type="email" placeholder="Email" value={email} onChange={(e) => setEmail(e.target.value)} required className={inputClass} />
              <input
                type="password"
                placeholder="Password"
                value={password}
                onChange={(e) => setPassword(e.target.value)}
                required
                className={inputClass}
              />
              <button type="submit" disabled={loading} className={submitClass}>
                {loading ? 'Signing in...' : 'Sign In'}
              </button>
              <button type="button" onClick={() => setView('forgot')} className="w-full text-sm font-semibold text-emerald-300">
                Forgot password?
              </button>
            </form>
          )}

          {view === 'forgot' && (
            <form onSubmit={handleForgot} className="space-y-3">
              <input type="email" placeholder="Email" value={email} onChange={(e) => setEmail(e.target.value)} required className={inputClass} />
              <button type="submit" disabled={loading} className={submitClass}>
                {loading ? 'Sending...' : 'Send reset email'}
              </button>
              <button type="button" onClick={() => setView('password')} className="w-full text-sm font-semibold text-slate-300">
                Back to sign in
              </button>
            </form>
          )}

          {view === 'reset' && (
            <form onSubmit={handleReset} className="space-y-3">
              <input
                type="password"
                placeholder="New password"
                value={newPassword}
                onChange={(e) => setNewPassword(e.target.value)}
                required
                className={inputClass}
              />
              <input
                type="password"
                placeholder="Confirm password"
                value={confirmPassword}
                onChange={(e) => setConfirmPassword(e.target.value)}
                required
                className={inputClass}
              />
              <button type="submit" disabled={loading} className={submitClass}>
                {loading ? 'Updating...' : 'Update password'}
              </button>
            </form>
          )}

          {error && <p className="mt-4 text-sm text-rose-300">{error}</p>}
          {success && <p className="mt-4 text-sm text-emerald-300">{success}</p>}
        </section>
      </div>
    </div>
  );
}

export default function AuthPage() {
  return (
    <Suspense fallback={<div className="min-h-screen bg-slate-950 text-slate-300 flex items-center justify-center">Loading...</div>}>
      <AuthPageContent />
    </Suspense>
  );
}
