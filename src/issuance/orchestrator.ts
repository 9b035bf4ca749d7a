/**
 * Issuance Orchestrator
 *
 * One run:
 *   1. resolve the non-contract-based billing contract (fatal on failure)
 *   2. expire the download coupons left in the ledger, then clear it
 *   3. issue every coupon in sheet order, one at a time
 *
 * A failing coupon is recorded in its result and the batch moves on; only
 * initialization problems are thrown.
 */

import pino from 'pino';
import { errorText } from '../observability/error-text';
import { logger } from '../observability/logger';
import { Coupon, DiscountMode, DownloadCoupon, InstantCoupon } from '../spreadsheet/types';
import { Contract, FailedVendorItem, VendorApi, VendorDiscountType } from '../vendor/types';
import { CouponIssueError, InitializationError } from './errors';
import { PollPolicy, pollRequest, sleep } from './poller';
import {
  DEFAULT_ISSUANCE_OPTIONS,
  ExpiryOutcome,
  ExpiryReport,
  IssuanceOptions,
  IssueResult,
  IssueSummary,
  LedgerStore,
} from './types';
import { downloadCouponWindow, formatVendorDateTime, instantCouponWindow } from './validity-window';

const NON_CONTRACT_TYPE = 'NON_CONTRACT_BASED';
const NON_CONTRACT_VENDOR_CODE = -1;

const VENDOR_DISCOUNT_TYPE: Record<DiscountMode, VendorDiscountType> = {
  RATE: 'RATE',
  FIXED_PRICE: 'PRICE',
  FIXED_PER_UNIT: 'FIXED_WITH_QUANTITY',
};

export interface IssuanceOrchestratorDeps {
  client: VendorApi;
  ledger: LedgerStore;
  vendorId: string;
  userId: string;
  options?: Partial<IssuanceOptions>;
  clock?: () => Date;
  wait?: (ms: number) => Promise<void>;
  log?: pino.Logger;
}

function describeFailedItems(items: FailedVendorItem[]): string {
  return items.map((item) => `${item.vendorItemId ?? '?'}: ${item.reason ?? 'unknown reason'}`).join(', ');
}

export class IssuanceOrchestrator {
  private readonly client: VendorApi;
  private readonly ledger: LedgerStore;
  private readonly userId: string;
  private readonly options: IssuanceOptions;
  private readonly clock: () => Date;
  private readonly poll: PollPolicy;
  private readonly log: pino.Logger;

  constructor(deps: IssuanceOrchestratorDeps) {
    this.client = deps.client;
    this.ledger = deps.ledger;
    this.userId = deps.userId;
    this.options = { ...DEFAULT_ISSUANCE_OPTIONS, ...deps.options };
    this.clock = deps.clock ?? (() => new Date());
    this.poll = {
      maxAttempts: this.options.pollMaxAttempts,
      intervalMs: this.options.pollIntervalMs,
      wait: deps.wait ?? sleep,
    };
    this.log = (deps.log ?? logger).child({ component: 'issuance', vendorId: deps.vendorId });
  }

  async issueAll(coupons: readonly Coupon[]): Promise<IssueSummary> {
    const contractId = await this.resolveContract();
    const expiry = await this.expireLedgered();

    this.log.info({ total: coupons.length }, 'Issuing coupons');

    const results: IssueResult[] = [];
    for (const [i, coupon] of coupons.entries()) {
      results.push(await this.issueOne(i + 1, coupon, contractId));
    }

    const succeeded = results.filter((r) => r.status === 'success').length;
    const summary: IssueSummary = {
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
      results,
      expiry,
    };

    this.log.info({ succeeded: summary.succeeded, failed: summary.failed }, 'Coupon issuance finished');
    return summary;
  }

  /**
   * Find the seller's non-contract-based contract (vendorContractId -1).
   * Exactly one must exist.
   */
  async resolveContract(): Promise<number> {
    if (this.options.contractId !== null) {
      this.log.info({ contractId: this.options.contractId }, 'Using configured contract');
      return this.options.contractId;
    }

    let contracts: Contract[];
    try {
      contracts = await this.client.listContracts();
    } catch (err) {
      throw new InitializationError(`Contract lookup failed: ${errorText(err)}`, { cause: err });
    }

    const matches = contracts.filter(
      (c) => c.type === NON_CONTRACT_TYPE && c.vendorContractId === NON_CONTRACT_VENDOR_CODE,
    );
    if (matches.length !== 1) {
      throw new InitializationError(
        `Expected exactly one ${NON_CONTRACT_TYPE} contract, found ${matches.length} among ${contracts.length}`,
      );
    }

    const contractId = matches[0].contractId;
    this.log.info({ contractId }, 'Resolved non-contract-based contract');
    return contractId;
  }

  /**
   * Expire everything in the ledger in one call, then clear the ledger
   * whatever the vendor answered.
   */
  async expireLedgered(): Promise<ExpiryReport | null> {
    const records = await this.ledger.load();
    if (records.length === 0) {
      this.log.debug('Ledger empty, nothing to expire');
      return null;
    }

    const report: ExpiryReport = { attempted: records.length, expired: 0, failed: 0, outcomes: [] };
    this.log.info({ count: records.length }, 'Expiring previously issued download coupons');

    try {
      const results = await this.client.expireDownloadCoupons(
        records.map((r) => ({ couponId: r.couponId, reason: this.options.expireReason, userId: this.userId })),
      );

      for (const [i, result] of results.entries()) {
        const couponId = result.body?.couponId ?? records[i]?.couponId;
        if (couponId === undefined) continue;

        const outcome: ExpiryOutcome =
          result.requestResultStatus === 'SUCCESS'
            ? { couponId, expired: true }
            : { couponId, expired: false, message: result.errorMessage ?? result.requestResultStatus };
        report.outcomes.push(outcome);

        if (outcome.expired) {
          this.log.info({ couponId }, 'Coupon expired');
        } else {
          this.log.warn({ couponId, reason: outcome.message }, 'Coupon expiry rejected');
        }
      }
      report.expired = report.outcomes.filter((o) => o.expired).length;
      report.failed = report.attempted - report.expired;
    } catch (err) {
      report.error = errorText(err);
      report.failed = report.attempted;
      this.log.warn({ err }, 'Coupon expiry call failed; continuing with issuance');
    } finally {
      await this.ledger.clear();
    }

    return report;
  }

  private async issueOne(index: number, coupon: Coupon, contractId: number): Promise<IssueResult> {
    const log = this.log.child({ index, coupon: coupon.name, kind: coupon.couponKind });
    log.info('Issuing coupon');

    try {
      const issued =
        coupon.couponKind === 'INSTANT'
          ? await this.issueInstant(coupon, contractId)
          : await this.issueDownload(coupon, contractId);

      log.info({ couponId: issued.couponId }, issued.message);
      return { index, name: coupon.name, kind: coupon.couponKind, status: 'success', ...issued };
    } catch (err) {
      const message = errorText(err);
      const couponId = err instanceof CouponIssueError ? err.couponId : undefined;
      log.error({ err, couponId }, 'Coupon issuance failed');
      return {
        index,
        name: coupon.name,
        kind: coupon.couponKind,
        status: 'failure',
        message,
        ...(couponId !== undefined ? { couponId } : {}),
      };
    }
  }

  /** create → poll → apply items → poll */
  private async issueInstant(coupon: InstantCoupon, contractId: number): Promise<{ couponId: number; message: string }> {
    const window = instantCouponWindow(this.clock(), coupon.validityDays);

    const created = await this.client.createInstantCoupon({
      contractId,
      name: coupon.name,
      maxDiscountPrice: coupon.maxDiscountPrice,
      discount: coupon.discountValue,
      startAt: formatVendorDateTime(window.start),
      endAt: formatVendorDateTime(window.end),
      type: VENDOR_DISCOUNT_TYPE[coupon.discountMode],
    });
    const createRequestId = created.data?.content?.requestedId;
    if (createRequestId === undefined || createRequestId === '') {
      throw new CouponIssueError('Instant coupon creation returned no requestedId');
    }

    const creation = await pollRequest(this.client, String(createRequestId), this.poll);
    if (creation.status !== 'DONE') {
      throw new CouponIssueError(
        `Instant coupon creation failed (status=${creation.content.status ?? 'missing'})`,
      );
    }
    const couponId = creation.content.couponId;
    if (couponId === undefined) {
      throw new CouponIssueError('Instant coupon creation finished without a couponId');
    }

    const applied = await this.client.applyInstantCouponItems(couponId, coupon.vendorItemIds);
    const applyRequestId = applied.data?.content?.requestedId;
    if (applyRequestId === undefined || applyRequestId === '') {
      throw new CouponIssueError(`Instant coupon ${couponId} item apply returned no requestedId`, couponId);
    }

    const application = await pollRequest(this.client, String(applyRequestId), this.poll);
    const failedItems = application.content.failedVendorItems ?? [];
    if (application.status !== 'DONE' || failedItems.length > 0) {
      const status = application.content.status ?? 'missing';
      const detail = failedItems.length > 0 ? `, failed items: ${describeFailedItems(failedItems)}` : '';
      throw new CouponIssueError(
        `Instant coupon ${couponId} item apply failed (status=${status}${detail})`,
        couponId,
      );
    }

    return {
      couponId,
      message: `Instant coupon created (couponId: ${couponId}, ${coupon.vendorItemIds.length} items applied)`,
    };
  }

  /** create → apply items → record in ledger */
  private async issueDownload(coupon: DownloadCoupon, contractId: number): Promise<{ couponId: number; message: string }> {
    const issuedAt = this.clock();
    const window = downloadCouponWindow(issuedAt, coupon.validityDays, this.options.downloadStartDelayMs);

    const created = await this.client.createDownloadCoupon({
      title: coupon.name,
      contractId,
      couponType: 'DOWNLOAD',
      startDate: formatVendorDateTime(window.start),
      endDate: formatVendorDateTime(window.end),
      userId: this.userId,
      policies: [
        {
          title: coupon.name,
          typeOfDiscount: VENDOR_DISCOUNT_TYPE[coupon.discountMode],
          description: `${coupon.name} (valid for ${coupon.validityDays} days)`,
          minimumPrice: coupon.minPurchasePrice,
          discount: coupon.discountValue,
          maximumDiscountPrice: coupon.maxDiscountPrice,
          maximumPerDaily: coupon.issueCount,
        },
      ],
    });

    const couponId = created.couponId;
    if (couponId === undefined) {
      throw new CouponIssueError('Download coupon creation returned no couponId');
    }

    const applied = await this.client.applyDownloadCouponItems(couponId, this.userId, coupon.vendorItemIds);
    const first = applied[0];
    if (!first || first.requestResultStatus !== 'SUCCESS') {
      const reason = first ? (first.errorMessage ?? first.requestResultStatus) : 'empty response';
      throw new CouponIssueError(`Download coupon ${couponId} item apply failed: ${reason}`, couponId);
    }

    try {
      await this.ledger.append({ name: coupon.name, couponId, issuedAt: issuedAt.toISOString() });
    } catch (err) {
      throw new CouponIssueError(
        `Download coupon ${couponId} was issued but could not be recorded in the ledger: ${errorText(err)}`,
        couponId,
      );
    }

    return {
      couponId,
      message: `Download coupon created (couponId: ${couponId}, ${coupon.vendorItemIds.length} items applied)`,
    };
  }
}
