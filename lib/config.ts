export function normalizeEnv(value: string | undefined) {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readPositiveInt(value: string | undefined, fallback: number) {
  const parsed = Number(normalizeEnv(value));
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

// Minutes behind UTC, as `Date#getTimezoneOffset` reports them (IST is -330).
function readTimezoneOffset(value: string | undefined) {
  const parsed = Number(normalizeEnv(value) ?? '0');
  return Number.isInteger(parsed) && Math.abs(parsed) <= 840 ? parsed : 0;
}

export const DEFAULT_REMINDER_TEMPLATE =
  'Dear {customer_name}, your pending udhari is Rs.{amount}. Please clear it. - {shop_name}';

export interface ShopConfig {
  supabaseUrl?: string;
  supabaseAnonKey?: string;
  supabaseServiceRoleKey?: string;
  shopName: string;
  currencyCode: string;
  nearExpiryDays: number;
  timezoneOffset: number;
  reminderTemplate: string;
  auditLogToDb: boolean;
  authTestMode: boolean;
}

// Read on every call so tests and route handlers see the current environment.
export function getConfig(env: Partial<NodeJS.ProcessEnv> = process.env): ShopConfig {
  return {
    supabaseUrl: normalizeEnv(env.NEXT_PUBLIC_SUPABASE_URL),
    supabaseAnonKey: normalizeEnv(env.NEXT_PUBLIC_SUPABASE_ANON_KEY),
    supabaseServiceRoleKey: normalizeEnv(env.SUPABASE_SERVICE_ROLE_KEY),
    shopName: normalizeEnv(env.SHOP_NAME) ?? 'Kirana Desk',
    currencyCode: normalizeEnv(env.CURRENCY_CODE) ?? 'INR',
    nearExpiryDays: readPositiveInt(env.NEAR_EXPIRY_DAYS, 7),
    timezoneOffset: readTimezoneOffset(env.SHOP_TZ_OFFSET),
    reminderTemplate: normalizeEnv(env.CREDIT_REMINDER_TEMPLATE) ?? DEFAULT_REMINDER_TEMPLATE,
    // Persist by default. Set AUDIT_LOG_TO_DB=0 only when explicitly disabling DB writes.
    auditLogToDb: env.AUDIT_LOG_TO_DB !== '0',
    authTestMode: env.AUTH_TEST_MODE === '1',
  };
}

export function getAppVersion(env: NodeJS.ProcessEnv = process.env) {
  return env.NEXT_PUBLIC_APP_VERSION || env.npm_package_version || 'unknown';
}
