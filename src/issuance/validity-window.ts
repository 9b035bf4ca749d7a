/**
 * Coupon validity windows, in local time.
 *
 * Both kinds end at 23:59 on the last valid day: local midnight of the
 * issuance date, plus validityDays, minus one minute.
 */

export interface ValidityWindow {
  start: Date;
  end: Date;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** `YYYY-MM-DD HH:mm:ss` in local time, the format the vendor expects */
export function formatVendorDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

export function localMidnight(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate(), 0, 0, 0, 0);
}

function lastValidMinute(issuedAt: Date, validityDays: number): Date {
  const end = localMidnight(issuedAt);
  end.setDate(end.getDate() + validityDays);
  end.setMinutes(end.getMinutes() - 1);
  return end;
}

export function instantCouponWindow(issuedAt: Date, validityDays: number): ValidityWindow {
  return {
    start: localMidnight(issuedAt),
    end: lastValidMinute(issuedAt, validityDays),
  };
}

/** Starts `startDelayMs` after issuance to leave room for vendor-side processing */
export function downloadCouponWindow(issuedAt: Date, validityDays: number, startDelayMs: number): ValidityWindow {
  return {
    start: new Date(issuedAt.getTime() + startDelayMs),
    end: lastValidMinute(issuedAt, validityDays),
  };
}
