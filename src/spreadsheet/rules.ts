import { CouponKind, DiscountMode } from './types';

/**
 * Kind-dependent discount rules. Returns the reason a value is rejected,
 * or null when it is acceptable.
 *
 * FIXED_PER_UNIT is only offered on instant coupons, but a download row
 * using it is not rejected here.
 */
export function discountRuleViolation(
  kind: CouponKind,
  mode: DiscountMode,
  value: number,
): string | null {
  if (kind === 'DOWNLOAD') {
    switch (mode) {
      case 'RATE':
        return value >= 1 && value <= 99
          ? null
          : `download coupon rate discount must be between 1 and 99 (got ${value})`;
      case 'FIXED_PRICE':
        if (value < 10) return `download coupon fixed discount must be at least 10 (got ${value})`;
        if (value % 10 !== 0) return `download coupon fixed discount must be a multiple of 10 (got ${value})`;
        return null;
      case 'FIXED_PER_UNIT':
        return value >= 1 ? null : `per-unit discount must be at least 1 (got ${value})`;
    }
  }

  switch (mode) {
    case 'RATE':
      return value >= 1 && value <= 100
        ? null
        : `instant coupon rate discount must be between 1 and 100 (got ${value})`;
    case 'FIXED_PRICE':
      return value >= 1 ? null : `instant coupon fixed discount must be at least 1 (got ${value})`;
    case 'FIXED_PER_UNIT':
      return value >= 1 ? null : `per-unit discount must be at least 1 (got ${value})`;
  }
}

export function itemCountViolation(kind: CouponKind, count: number, max: number): string | null {
  if (count <= max) return null;
  const label = kind === 'INSTANT' ? 'instant' : 'download';
  return `${label} coupons accept at most ${max.toLocaleString('en-US')} item ids (got ${count})`;
}
