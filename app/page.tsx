'use client';

import { useRouter } from 'next/navigation';

export default function Home() {
  const router = useRouter();

  return (
    <div className="flex flex-col items-center justify-center min-h-screen bg-slate-100 p-4">
      <div className="w-full max-w-md bg-white p-8 rounded-2xl border border-slate-200 shadow-xl text-center">
        <h1 className="text-4xl font-black text-emerald-600 mb-2">Kirana Desk</h1>
        <p className="text-slate-500 mb-8 uppercase tracking-widest text-xs">Shop Counter</p>
        <div className="grid grid-cols-1 gap-4">
          <button
            onClick={() => router.push('/auth?next=/pos')}
            className="w-full bg-slate-900 text-white font-bold py-4 rounded-xl hover:bg-slate-700 transition"
          >
            STAFF SIGN IN
          </button>
          <button
            onClick={() => router.push('/auth?next=/dashboard')}
            className="w-full bg-emerald-600 text-white font-bold py-4 rounded-xl hover:bg-emerald-700 transition"
          >
            OWNER SIGN IN
          </button>
        </div>
      </div>
    </div>
  );
}
