'use client';

import { useEffect, useState } from 'react';
import { usePathname, useRouter } from 'next/navigation';
import { supabase } from '@/lib/auth';
import type { AppRole } from '@/lib/shop-types';

export type ServerRole = AppRole | 'inactive' | null;

function isAppRole(value: unknown): value is AppRole {
  return value === 'owner' || value === 'staff';
}

/** Where a role lands after sign-in or when it opens a page it may not see. */
export function homePathFor(role: AppRole) {
  return role === 'owner' ? '/dashboard' : '/pos';
}

/**
 * Role as the server sees it. `'inactive'` means the account exists but is disabled;
 * `null` means the server could not be asked, so callers fall back to session metadata.
 */
export async function fetchServerRole(accessToken: string): Promise<ServerRole> {
  try {
    const response = await fetch('/api/auth-context', {
      headers: {
        Authorization: `Bearer ${accessToken}`,
        'x-request-id': crypto.randomUUID(),
      },
    });
    if (response.status === 403) return 'inactive';
    if (!response.ok) return null;
    const payload = await response.json();
    const role: unknown = payload?.data?.role;
    return isAppRole(role) ? role : null;
  } catch {
    return null;
  }
}

type GuardState = { isChecking: boolean; isAuthorized: boolean; role: AppRole | null };

export function useRouteGuard(allowedRoles: AppRole[]) {
  const router = useRouter();
  const pathname = usePathname();
  const allowedRolesKey = allowedRoles.join('|');
  const [state, setState] = useState<GuardState>({ isChecking: true, isAuthorized: false, role: null });

  useEffect(() => {
    let mounted = true;
    const settle = (next: Omit<GuardState, 'isChecking'>) => {
      if (mounted) setState({ ...next, isChecking: false });
    };
    const signInPath = `/auth?next=${encodeURIComponent(pathname || '/')}`;

    const verify = async () => {
      const { data, error } = await supabase.auth.getSession();
      const session = data.session;

      if (error || !session?.access_token || !session.user) {
        settle({ isAuthorized: false, role: null });
        router.replace(signInPath);
        return;
      }

      const serverRole = await fetchServerRole(session.access_token);
      if (serverRole === 'inactive') {
        await supabase.auth.signOut();
        settle({ isAuthorized: false, role: null });
        router.replace(signInPath);
        return;
      }

      const metadataRole = [session.user.app_metadata?.role, session.user.user_metadata?.role].find(isAppRole);
      const role = serverRole ?? metadataRole ?? 'staff';

      if (!allowedRolesKey.split('|').includes(role)) {
        settle({ isAuthorized: false, role });
        router.replace(homePathFor(role));
        return;
      }

      settle({ isAuthorized: true, role });
    };

    void verify();

    return () => {
      mounted = false;
    };
  }, [allowedRolesKey, pathname, router]);

  return state;
}
