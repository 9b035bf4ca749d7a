/**
 * Coupon definitions
 *
 * One Coupon per data row of the coupon sheet. Every value here has already
 * passed the sheet's range and unit rules.
 */

export type CouponKind = 'INSTANT' | 'DOWNLOAD';

export type DiscountMode = 'RATE' | 'FIXED_PRICE' | 'FIXED_PER_UNIT';

interface CouponBase {
  readonly name: string;
  readonly validityDays: number;
  readonly discountMode: DiscountMode;
  /** Percentage for RATE, won amount for FIXED_PRICE, won per unit for FIXED_PER_UNIT */
  readonly discountValue: number;
  readonly maxDiscountPrice: number;
  readonly vendorItemIds: readonly number[];
}

export interface InstantCoupon extends CouponBase {
  readonly couponKind: 'INSTANT';
  readonly minPurchasePrice: null;
  readonly issueCount: null;
}

export interface DownloadCoupon extends CouponBase {
  readonly couponKind: 'DOWNLOAD';
  readonly minPurchasePrice: number;
  /** Daily issue cap */
  readonly issueCount: number;
}

export type Coupon = InstantCoupon | DownloadCoupon;

export interface CouponSheetLimits {
  instantMaxItems: number;
  downloadMaxItems: number;
  /** Used as minPurchasePrice when a DOWNLOAD row leaves the cell empty */
  downloadMinPurchasePrice: number;
  defaultIssueCount: number;
  maxNameLength: number;
}

export const DEFAULT_SHEET_LIMITS: CouponSheetLimits = {
  instantMaxItems: 10_000,
  downloadMaxItems: 100,
  downloadMinPurchasePrice: 10,
  defaultIssueCount: 1,
  maxNameLength: 45,
};

export type CellValue = string | number | boolean | Date | null | undefined;
