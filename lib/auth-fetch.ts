'use client';

import { supabase } from '@/lib/auth';
import { AppError, ValidationError, type FieldError } from '@/lib/errors';

const TOKEN_CACHE_TTL_MS = 10_000;
const TOKEN_EXPIRY_SAFETY_MS = 30_000;
let cachedAccessToken: string | null = null;
let cachedTokenExpiryMs = 0;
let cachedAtMs = 0;
let inFlightTokenPromise: Promise<string> | null = null;

function setTokenCache(accessToken: string, expiresAtSeconds?: number | null) {
  const now = Date.now();
  cachedAccessToken = accessToken;
  cachedAtMs = now;
  cachedTokenExpiryMs =
    typeof expiresAtSeconds === 'number' && Number.isFinite(expiresAtSeconds)
      ? expiresAtSeconds * 1000
      : now + 60_000;
}

function clearTokenCache() {
  cachedAccessToken = null;
  cachedTokenExpiryMs = 0;
  cachedAtMs = 0;
}

function getCachedToken() {
  const now = Date.now();
  const isStaleByTime = now - cachedAtMs > TOKEN_CACHE_TTL_MS;
  const isNearExpiry = now >= cachedTokenExpiryMs - TOKEN_EXPIRY_SAFETY_MS;
  if (!cachedAccessToken || isStaleByTime || isNearExpiry) return null;
  return cachedAccessToken;
}

interface ErrorPayload {
  message: string;
  fieldErrors: FieldError[];
}

function readFieldErrors(value: unknown): FieldError[] {
  if (!Array.isArray(value)) return [];
  const errors: FieldError[] = [];
  for (const entry of value) {
    if (entry && typeof entry === 'object' && 'field' in entry && 'message' in entry) {
      const { field, message } = entry;
      if (typeof field === 'string' && typeof message === 'string') errors.push({ field, message });
    }
  }
  return errors;
}

async function extractError(response: Response): Promise<ErrorPayload> {
  const fallback = `Request failed with status ${response.status}`;

  try {
    const payload: unknown = await response.json();
    if (!payload || typeof payload !== 'object') return { message: fallback, fieldErrors: [] };

    const requestId =
      'requestId' in payload && typeof payload.requestId === 'string' && payload.requestId.trim().length > 0
        ? payload.requestId
        : null;
    const fieldErrors = 'fieldErrors' in payload ? readFieldErrors(payload.fieldErrors) : [];

    if ('error' in payload && typeof payload.error === 'string' && payload.error.trim().length > 0) {
      return {
        message: requestId ? `${payload.error} (requestId: ${requestId})` : payload.error,
        fieldErrors,
      };
    }

    return { message: fallback, fieldErrors };
  } catch {
    return { message: fallback, fieldErrors: [] };
  }
}

export async function authFetch(input: RequestInfo | URL, init: RequestInit = {}) {
  const getAccessToken = async () => {
    const cached = getCachedToken();
    if (cached) return cached;
    if (inFlightTokenPromise) return inFlightTokenPromise;

    inFlightTokenPromise = (async () => {
      const { data, error } = await supabase.auth.getSession();
      if (!error && data.session?.access_token) {
        setTokenCache(data.session.access_token, data.session.expires_at);
        return data.session.access_token;
      }

      const { data: refreshed, error: refreshError } = await supabase.auth.refreshSession();
      if (refreshError || !refreshed.session?.access_token) {
        clearTokenCache();
        throw new Error('You must be signed in.');
      }

      setTokenCache(refreshed.session.access_token, refreshed.session.expires_at);
      return refreshed.session.access_token;
    })();

    try {
      return await inFlightTokenPromise;
    } finally {
      inFlightTokenPromise = null;
    }
  };

  const send = async (accessToken: string) => {
    const headers = new Headers(init.headers);
    const method = String(init.method ?? 'GET').toUpperCase();
    headers.set('Authorization', `Bearer ${accessToken}`);
    if (!headers.has('x-request-id')) {
      headers.set('x-request-id', crypto.randomUUID());
    }
    if (!headers.has('x-timezone-offset')) {
      headers.set('x-timezone-offset', String(new Date().getTimezoneOffset()));
    }

    if (init.body && !(init.body instanceof FormData) && !headers.has('Content-Type')) {
      headers.set('Content-Type', 'application/json');
    }

    const requestInit: RequestInit = { ...init, headers };
    if ((method === 'GET' || method === 'HEAD') && requestInit.cache === undefined) {
      requestInit.cache = 'no-store';
    }

    return fetch(input, requestInit);
  };

  const initialToken = await getAccessToken();
  let response = await send(initialToken);

  if (!response.ok) {
    if (response.status === 401) {
      const { data: refreshed, error: refreshError } = await supabase.auth.refreshSession();
      if (!refreshError && refreshed.session?.access_token) {
        setTokenCache(refreshed.session.access_token, refreshed.session.expires_at);
        response = await send(refreshed.session.access_token);
      }
    }
  }

  if (!response.ok) {
    const { message, fieldErrors } = await extractError(response);
    if (response.status === 401) {
      clearTokenCache();
      await supabase.auth.signOut();
    }
    if (fieldErrors.length > 0) {
      throw new ValidationError(fieldErrors, message);
    }
    throw new AppError(message, `HTTP_${response.status}`, response.status);
  }

  return response;
}

export interface ApiEnvelope<T, S = Record<string, unknown>> {
  data: T;
  summary?: S;
}

/** `authFetch` plus unwrapping of the `{ success, data, summary }` envelope. */
export async function fetchJson<T, S = Record<string, unknown>>(
  input: RequestInfo | URL,
  init: RequestInit = {}
): Promise<ApiEnvelope<T, S>> {
  const response = await authFetch(input, init);
  const payload = await response.json();
  return { data: payload?.data, summary: payload?.summary };
}

export function sendJson<T>(input: RequestInfo | URL, method: 'POST' | 'PUT' | 'DELETE', body?: unknown) {
  return fetchJson<T>(input, { method, body: body === undefined ? undefined : JSON.stringify(body) });
}
