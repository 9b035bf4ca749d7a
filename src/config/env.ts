import dotenv from 'dotenv';
import path from 'path';
import { InitializationError } from '../issuance/errors';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalIntOrNull(key: string): number | null {
  const val = process.env[key];
  return val ? parseInt(val, 10) : null;
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'production'),
  logLevel: optional('LOG_LEVEL', 'info'),

  // ───── Vendor API ─────
  vendor: {
    baseUrl: optional('VENDOR_BASE_URL', 'https://api-gateway.coupang.com'),
    accessKey: optional('VENDOR_ACCESS_KEY', ''),
    secretKey: optional('VENDOR_SECRET_KEY', ''),
    vendorId: optional('VENDOR_ID', ''),
    userId: optional('VENDOR_USER_ID', ''),
    timeoutMs: optionalInt('VENDOR_TIMEOUT_MS', 30000),
  },

  // ───── Files ─────
  files: {
    couponSheet: path.resolve(optional('COUPON_SHEET_PATH', 'coupons.xlsx')),
    ledger: path.resolve(optional('ISSUED_LEDGER_PATH', 'issued-coupons.json')),
  },

  // ───── Issuance ─────
  issuance: {
    contractId: optionalIntOrNull('COUPON_CONTRACT_ID'),
    pollMaxAttempts: optionalInt('POLL_MAX_ATTEMPTS', 10),
    pollIntervalMs: optionalInt('POLL_INTERVAL_MS', 2000),
    jitterMaxMinutes: optionalInt('ISSUE_JITTER_MAX_MINUTES', 0),
  },

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
} as const;

export type Env = typeof env;

export interface VendorCredentials {
  accessKey: string;
  secretKey: string;
  vendorId: string;
  userId: string;
}

/**
 * Pull the four vendor credentials out of the loaded environment.
 * Throws an InitializationError listing every missing variable.
 */
export function resolveCredentials(vendor: Env['vendor']): VendorCredentials {
  const missing: string[] = [];
  if (!vendor.accessKey) missing.push('VENDOR_ACCESS_KEY');
  if (!vendor.secretKey) missing.push('VENDOR_SECRET_KEY');
  if (!vendor.vendorId) missing.push('VENDOR_ID');
  if (!vendor.userId) missing.push('VENDOR_USER_ID');

  if (missing.length > 0) {
    throw new InitializationError(`Missing vendor credentials: ${missing.join(', ')}`);
  }

  return {
    accessKey: vendor.accessKey,
    secretKey: vendor.secretKey,
    vendorId: vendor.vendorId,
    userId: vendor.userId,
  };
}
