import { CouponKind, DiscountMode } from './types';

/** Header labels of the coupon sheet, keyed by the field they feed */
export const COLUMNS = {
  name: '쿠폰이름',
  kind: '쿠폰타입',
  validityDays: '쿠폰유효기간',
  discountMode: '할인방식',
  discountValue: '할인금액/비율',
  minPurchasePrice: '최소구매금액',
  maxDiscountPrice: '최대할인금액',
  issueCount: '발급개수',
  vendorItemIds: '옵션ID',
} as const;

export type ColumnKey = keyof typeof COLUMNS;

/** Older sheets label the item-id column with a space */
export const COLUMN_ALIASES: Partial<Record<ColumnKey, readonly string[]>> = {
  vendorItemIds: ['옵션 ID'],
};

/**
 * Kind labels are matched as substrings after all whitespace is removed.
 * `즉시할인` also covers the current `즉시할인쿠폰` label.
 */
export const KIND_LABELS: ReadonlyArray<{ match: string; kind: CouponKind }> = [
  { match: '즉시할인', kind: 'INSTANT' },
  { match: '다운로드쿠폰', kind: 'DOWNLOAD' },
];

export const DISCOUNT_MODE_LABELS: Readonly<Record<string, DiscountMode>> = {
  '정률할인': 'RATE',
  '정액할인': 'FIXED_PRICE',
  '수량별 정액할인': 'FIXED_PER_UNIT',
};
