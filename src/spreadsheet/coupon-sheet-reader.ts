/**
 * Coupon Sheet Reader
 *
 * Turns the bytes of a coupon workbook into validated Coupon specs.
 * The first row of the first worksheet holds the headers; every following
 * non-empty row becomes one Coupon, in row order. Parsing stops at the
 * first invalid row.
 */

import { promises as fs } from 'fs';
import * as XLSX from 'xlsx';
import { errorText } from '../observability/error-text';
import { logger } from '../observability/logger';
import { COLUMNS, COLUMN_ALIASES, ColumnKey } from './columns';
import { SpreadsheetValidationError } from './errors';
import {
  RowIssue,
  cellText,
  isBlankCell,
  lenientInt,
  normalizeDiscountMode,
  normalizeItemIds,
  normalizeKind,
} from './normalize';
import { discountRuleViolation, itemCountViolation } from './rules';
import { CellValue, Coupon, CouponSheetLimits, DEFAULT_SHEET_LIMITS, DownloadCoupon } from './types';

const log = logger.child({ module: 'coupon-sheet-reader' });

type ColumnIndex = Record<ColumnKey, number>;

export interface ParseOptions {
  limits?: Partial<CouponSheetLimits>;
}

export function parseCouponSheet(data: Buffer | Uint8Array, options: ParseOptions = {}): Coupon[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: Buffer.isBuffer(data) ? 'buffer' : 'array' });
  } catch (err) {
    throw new SpreadsheetValidationError(`unreadable workbook: ${errorText(err)}`);
  }
  return parseCouponWorkbook(workbook, options);
}

/** Parse the first worksheet of an already loaded workbook. */
export function parseCouponWorkbook(workbook: XLSX.WorkBook, options: ParseOptions = {}): Coupon[] {
  const limits: CouponSheetLimits = { ...DEFAULT_SHEET_LIMITS, ...options.limits };

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new SpreadsheetValidationError('workbook has no worksheet');
  }

  const rows = XLSX.utils.sheet_to_json<CellValue[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: true,
    raw: true,
  });
  const firstRowNumber = sheet['!ref'] ? XLSX.utils.decode_range(sheet['!ref']).s.r + 1 : 1;

  const headerRow = rows[0];
  if (!headerRow) {
    throw new SpreadsheetValidationError('sheet has no header row');
  }
  const columns = locateColumns(headerRow);

  const coupons: Coupon[] = [];
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i] ?? [];
    if (row.every(isBlankCell)) continue;

    const rowNumber = firstRowNumber + i;
    try {
      coupons.push(readRow(row, columns, limits));
    } catch (err) {
      if (err instanceof RowIssue) {
        throw new SpreadsheetValidationError(err.reason, rowNumber);
      }
      throw err;
    }
  }

  log.debug({ sheet: sheetName, coupons: coupons.length }, 'Coupon sheet parsed');
  return coupons;
}

/** Read the workbook at `filePath` and parse it. */
export async function readCouponSheet(filePath: string, options: ParseOptions = {}): Promise<Coupon[]> {
  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (err) {
    throw new SpreadsheetValidationError(`cannot read coupon sheet ${filePath}: ${errorText(err)}`);
  }
  return parseCouponSheet(data, options);
}

function locateColumns(headerRow: CellValue[]): ColumnIndex {
  const headers = headerRow.map(cellText);
  const find = (key: ColumnKey): number => {
    const labels = [COLUMNS[key], ...(COLUMN_ALIASES[key] ?? [])];
    for (const label of labels) {
      const idx = headers.indexOf(label);
      if (idx !== -1) return idx;
    }
    throw new SpreadsheetValidationError(`missing required column: ${COLUMNS[key]}`);
  };

  return {
    name: find('name'),
    kind: find('kind'),
    validityDays: find('validityDays'),
    discountMode: find('discountMode'),
    discountValue: find('discountValue'),
    minPurchasePrice: find('minPurchasePrice'),
    maxDiscountPrice: find('maxDiscountPrice'),
    issueCount: find('issueCount'),
    vendorItemIds: find('vendorItemIds'),
  };
}

function readRow(row: CellValue[], columns: ColumnIndex, limits: CouponSheetLimits): Coupon {
  const cell = (key: ColumnKey): CellValue => row[columns[key]];

  const name = cellText(cell('name'));
  if (name === '') {
    throw new RowIssue('coupon name is required');
  }
  if (name.length > limits.maxNameLength) {
    throw new RowIssue(`coupon name must be at most ${limits.maxNameLength} characters (got ${name.length})`);
  }

  const couponKind = normalizeKind(cell('kind'));

  const validityDays = lenientInt(cell('validityDays'), 'validity period');
  if (validityDays < 1) {
    throw new RowIssue('validity period must be at least 1 day');
  }

  const discountMode = normalizeDiscountMode(cell('discountMode'));

  const discountValue = lenientInt(cell('discountValue'), 'discount value');
  if (discountValue <= 0) {
    throw new RowIssue('discount value must be greater than 0');
  }

  const maxDiscountPrice = lenientInt(cell('maxDiscountPrice'), 'maximum discount price');
  if (maxDiscountPrice <= 0) {
    throw new RowIssue('maximum discount price must be greater than 0');
  }

  const discountIssue = discountRuleViolation(couponKind, discountMode, discountValue);
  if (discountIssue) {
    throw new RowIssue(discountIssue);
  }

  const vendorItemIds = normalizeItemIds(cell('vendorItemIds'));
  const maxItems = couponKind === 'INSTANT' ? limits.instantMaxItems : limits.downloadMaxItems;
  const countIssue = itemCountViolation(couponKind, vendorItemIds.length, maxItems);
  if (countIssue) {
    throw new RowIssue(countIssue);
  }

  const base = { name, validityDays, discountMode, discountValue, maxDiscountPrice, vendorItemIds };
  if (couponKind === 'INSTANT') {
    return { ...base, couponKind, minPurchasePrice: null, issueCount: null };
  }
  return { ...base, couponKind, ...readDownloadTerms(cell, limits) };
}

/** Minimum purchase price and daily issue cap; empty cells take the configured defaults */
function readDownloadTerms(
  cell: (key: ColumnKey) => CellValue,
  limits: CouponSheetLimits,
): Pick<DownloadCoupon, 'minPurchasePrice' | 'issueCount'> {
  const rawMin = cell('minPurchasePrice');
  const minPurchasePrice = isBlankCell(rawMin)
    ? limits.downloadMinPurchasePrice
    : lenientInt(rawMin, 'minimum purchase price');
  if (minPurchasePrice < 1) {
    throw new RowIssue(`minimum purchase price must be at least 1 (got ${minPurchasePrice})`);
  }

  const rawCount = cell('issueCount');
  const issueCount = isBlankCell(rawCount) ? limits.defaultIssueCount : lenientInt(rawCount, 'issue count');
  if (issueCount < 1) {
    throw new RowIssue(`issue count must be at least 1 (got ${issueCount})`);
  }

  return { minPurchasePrice, issueCount };
}
