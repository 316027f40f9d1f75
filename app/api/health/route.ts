import { NextResponse } from 'next/server';
import { getAppVersion, getConfig } from '@/lib/config';
import { getErrorMessage } from '@/lib/logger';

function supabaseHost(url: string | undefined) {
  if (!url) return null;
  try {
    return new URL(url).host;
  } catch {
    return null;
  }
}

export async function GET() {
  const config = getConfig();
  const envReady = Boolean(config.supabaseUrl && config.supabaseAnonKey);
  let authReachable: boolean | null = null;
  let authError: string | null = null;

  if (envReady && config.supabaseUrl) {
    try {
      const response = await fetch(`${config.supabaseUrl.replace(/\/+$/, '')}/auth/v1/health`, { method: 'GET' });
      authReachable = response.ok;
      if (!response.ok) authError = `Auth health check failed with status ${response.status}`;
    } catch (error) {
      authReachable = false;
      authError = getErrorMessage(error);
    }
  }

  // Readiness depends on configuration only; auth reachability is reported as a diagnostic.
  const statusCode = envReady ? 200 : 503;

  return NextResponse.json(
    {
      success: statusCode === 200,
      status: statusCode === 200 ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks: {
        env: envReady ? 'pass' : 'fail',
        supabase_auth: authReachable === null ? 'unknown' : authReachable ? 'pass' : 'fail',
      },
      diagnostics: {
        shopName: config.shopName,
        supabaseHost: supabaseHost(config.supabaseUrl),
        authError,
      },
      meta: {
        version: getAppVersion(),
        nodeEnv: process.env.NODE_ENV || 'unknown',
        runtime: 'nodejs',
        uptimeSec: Math.floor(process.uptime()),
      },
    },
    { status: statusCode }
  );
}
