import { NextRequest, NextResponse } from 'next/server';
import { createClient, type User } from '@supabase/supabase-js';
import { getConfig } from '@/lib/config';
import { getErrorMessage, logger } from '@/lib/logger';
import type { AppRole } from '@/lib/shop-types';
import { getSupabaseClient } from '@/lib/supabase';

export interface AuthContext {
  userId: string;
  email: string | null;
  role: AppRole;
}

interface UserAccessRow {
  role: AppRole;
  isActive: boolean;
}

export const STAFF_ROLES: AppRole[] = ['staff', 'owner'];
export const OWNER_ONLY: AppRole[] = ['owner'];

function resolveRole(user: User): AppRole {
  const appRole = user.app_metadata?.role;
  const userRole = user.user_metadata?.role;
  const rawRole = typeof appRole === 'string' ? appRole : typeof userRole === 'string' ? userRole : 'staff';
  return rawRole === 'owner' ? 'owner' : 'staff';
}

async function resolveUserAccessFromUsersTable(userId: string): Promise<UserAccessRow | null> {
  try {
    const { data, error } = await getSupabaseClient()
      .from('users')
      .select('role, is_active')
      .eq('id', userId)
      .limit(1)
      .maybeSingle();
    if (error || !data) return null;
    const dbRole = typeof data.role === 'string' ? data.role.trim().toLowerCase() : '';
    const isActive = data.is_active !== false;
    if (dbRole === 'owner') return { role: 'owner', isActive };
    if (dbRole === 'staff') return { role: 'staff', isActive };
    return null;
  } catch (error) {
    // Metadata roles still apply when the users table is unreachable.
    logger.warn('user_access_lookup_failed', { userId, message: getErrorMessage(error) });
    return null;
  }
}

function unauthorized(message: string) {
  return NextResponse.json({ success: false, error: message }, { status: 401 });
}

function forbidden() {
  return NextResponse.json({ success: false, error: 'Forbidden' }, { status: 403 });
}

function resolveTestRoleFromToken(token: string): AppRole | null {
  if (!getConfig().authTestMode) return null;

  if (token === 'test-owner') return 'owner';
  if (token === 'test-staff') return 'staff';
  return null;
}

export async function requireAuth(
  req: NextRequest,
  allowedRoles?: AppRole[]
): Promise<AuthContext | NextResponse> {
  const authHeader = req.headers.get('authorization');
  if (!authHeader?.startsWith('Bearer ')) {
    return unauthorized('Missing bearer token');
  }

  const token = authHeader.slice('Bearer '.length).trim();
  if (!token) {
    return unauthorized('Invalid bearer token');
  }

  const testRole = resolveTestRoleFromToken(token);
  if (testRole) {
    if (allowedRoles && !allowedRoles.includes(testRole)) {
      return forbidden();
    }
    return { userId: `test-${testRole}`, email: `${testRole}@example.test`, role: testRole };
  }

  const config = getConfig();
  const authKey = config.supabaseServiceRoleKey ?? config.supabaseAnonKey;
  if (!config.supabaseUrl || !authKey) {
    return NextResponse.json({ success: false, error: 'Server auth is not configured' }, { status: 500 });
  }

  const authClient = createClient(config.supabaseUrl, authKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });

  const { data, error } = await authClient.auth.getUser(token);
  if (error || !data.user) {
    return unauthorized('Invalid or expired token');
  }

  const metadataRole = resolveRole(data.user);
  const dbAccess = await resolveUserAccessFromUsersTable(data.user.id);
  if (dbAccess && !dbAccess.isActive) {
    return forbidden();
  }
  const role = dbAccess?.role ?? metadataRole;
  if (allowedRoles && !allowedRoles.includes(role)) {
    return forbidden();
  }

  return { userId: data.user.id, email: data.user.email ?? null, role };
}
