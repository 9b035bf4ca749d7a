/**
 * Issuance types
 */

import { CouponKind } from '../spreadsheet/types';

/** One download coupon this tool created, kept until the next run expires it */
export interface IssuanceRecord {
  name: string;
  couponId: number;
  issuedAt: string;                      // ISO-8601
}

export interface LedgerFile {
  lastUpdated: string;
  coupons: IssuanceRecord[];
}

export interface LedgerStore {
  load(): Promise<IssuanceRecord[]>;
  append(record: IssuanceRecord): Promise<void>;
  clear(): Promise<void>;
}

export interface IssuanceOptions {
  pollMaxAttempts: number;
  pollIntervalMs: number;
  /** Download coupons start this long after issuance */
  downloadStartDelayMs: number;
  /** Use this contract instead of looking one up */
  contractId: number | null;
  expireReason: string;
}

export const DEFAULT_ISSUANCE_OPTIONS: IssuanceOptions = {
  pollMaxAttempts: 10,
  pollIntervalMs: 2_000,
  downloadStartDelayMs: 60 * 60 * 1000,
  contractId: null,
  expireReason: 'expired',
};

export type IssueStatus = 'success' | 'failure';

export interface IssueResult {
  /** 1-based position in the batch */
  index: number;
  name: string;
  kind: CouponKind;
  status: IssueStatus;
  message: string;
  couponId?: number;
}

export interface ExpiryOutcome {
  couponId: number;
  expired: boolean;
  message?: string;
}

export interface ExpiryReport {
  attempted: number;
  expired: number;
  failed: number;
  /** Set when the batched expiry call itself failed */
  error?: string;
  outcomes: ExpiryOutcome[];
}

export interface IssueSummary {
  total: number;
  succeeded: number;
  failed: number;
  results: IssueResult[];
  expiry: ExpiryReport | null;
}
