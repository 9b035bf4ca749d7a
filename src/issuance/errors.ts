/**
 * Issuance error taxonomy.
 *
 * InitializationError aborts the whole run before any coupon is attempted.
 * CouponIssueError (and PollTimeoutError) stay local to one coupon and end
 * up as a failed IssueResult.
 */

export class InitializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InitializationError';
  }
}

export class CouponIssueError extends Error {
  /** Set when the coupon already exists on the vendor side */
  constructor(
    message: string,
    readonly couponId?: number,
  ) {
    super(message);
    this.name = 'CouponIssueError';
  }
}

export class PollTimeoutError extends CouponIssueError {
  constructor(
    readonly requestedId: string,
    readonly attempts: number,
    readonly intervalMs: number,
    readonly totalWaitMs: number,
  ) {
    super(
      `Request ${requestedId} still REQUESTED after ${attempts} attempts ` +
        `(interval ${intervalMs}ms, waited ${totalWaitMs}ms in total)`,
    );
    this.name = 'PollTimeoutError';
  }
}
