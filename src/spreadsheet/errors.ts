export class SpreadsheetValidationError extends Error {
  /** 1-based spreadsheet row, absent for workbook-level problems */
  readonly row?: number;
  readonly reason: string;

  constructor(reason: string, row?: number) {
    super(row !== undefined ? `Row ${row}: ${reason}` : reason);
    this.name = 'SpreadsheetValidationError';
    this.reason = reason;
    this.row = row;
  }
}
