import { CellValue, CouponKind, DiscountMode } from './types';
import { DISCOUNT_MODE_LABELS, KIND_LABELS } from './columns';

/**
 * Cell normalizers. Each returns the normalized value or a reason string
 * through RowIssue so the reader can attach the row number.
 */
export class RowIssue extends Error {
  constructor(readonly reason: string) {
    super(reason);
    this.name = 'RowIssue';
  }
}

export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

export function isBlankCell(value: CellValue): boolean {
  return cellText(value) === '';
}

/**
 * Keep only digits and dots, then truncate to an integer.
 * Nothing left after stripping counts as 0, so "abc" and an empty cell both
 * fall through to the caller's "> 0" check.
 */
export function lenientInt(value: CellValue, label: string): number {
  const raw = cellText(value);
  const digits = raw.replace(/[^\d.]/g, '');
  if (digits === '') return 0;

  const parsed = Number(digits);
  if (Number.isNaN(parsed)) {
    throw new RowIssue(`${label} must be a number (value: ${raw})`);
  }
  return Math.trunc(parsed);
}

export function normalizeKind(value: CellValue): CouponKind {
  const raw = cellText(value);
  const compact = raw.replace(/\s+/g, '');
  const hit = KIND_LABELS.find((label) => compact.includes(label.match));
  if (!hit) {
    throw new RowIssue(`invalid coupon kind '${raw}' (expected 즉시할인쿠폰 or 다운로드쿠폰)`);
  }
  return hit.kind;
}

export function normalizeDiscountMode(value: CellValue): DiscountMode {
  const raw = cellText(value);
  const mode = DISCOUNT_MODE_LABELS[raw];
  if (!mode) {
    throw new RowIssue(`invalid discount mode '${raw}' (expected 정률할인, 정액할인 or 수량별 정액할인)`);
  }
  return mode;
}

export function normalizeItemIds(value: CellValue): number[] {
  const raw = cellText(value);
  if (raw === '') {
    throw new RowIssue('item-id list is required');
  }

  const tokens = raw.split(',').map((token) => token.trim()).filter((token) => token !== '');
  if (tokens.length === 0) {
    throw new RowIssue('item-id list is empty');
  }

  return tokens.map((token) => {
    const id = /^\d+$/.test(token) ? Number(token) : NaN;
    if (!Number.isSafeInteger(id) || id <= 0) {
      throw new RowIssue(`item-id list must contain only positive integers (got '${token}')`);
    }
    return id;
  });
}
