import pino from 'pino';
import { IssuanceOrchestrator } from '../../src/issuance/orchestrator';
import { InitializationError } from '../../src/issuance/errors';
import { InMemoryLedgerStore } from '../../src/issuance/ledger';
import { IssuanceOptions, IssuanceRecord } from '../../src/issuance/types';
import { DownloadCoupon, InstantCoupon } from '../../src/spreadsheet/types';
import { VendorApiError } from '../../src/vendor/errors';
import {
  BatchResultItem,
  Contract,
  DownloadCouponCreateRequest,
  DownloadCouponCreated,
  ExpireCouponRequest,
  InstantCouponCreateRequest,
  RequestStatusContent,
  RequestedContent,
  VendorApi,
  VendorEnvelope,
} from '../../src/vendor/types';

const ISSUED_AT = new Date(2024, 11, 20, 15, 30);
const NON_CONTRACT: Contract = { contractId: 15, vendorContractId: -1, type: 'NON_CONTRACT_BASED' };
const CONTRACT_BASED: Contract = { contractId: 20, vendorContractId: 300, type: 'CONTRACT_BASED' };

const INSTANT: InstantCoupon = {
  name: '신규할인',
  couponKind: 'INSTANT',
  validityDays: 30,
  discountMode: 'RATE',
  discountValue: 10,
  minPurchasePrice: null,
  maxDiscountPrice: 5000,
  issueCount: null,
  vendorItemIds: [111, 222],
};

const DOWNLOAD: DownloadCoupon = {
  name: '다운로드 특가',
  couponKind: 'DOWNLOAD',
  validityDays: 7,
  discountMode: 'FIXED_PRICE',
  discountValue: 1000,
  minPurchasePrice: 20000,
  maxDiscountPrice: 1000,
  issueCount: 50,
  vendorItemIds: [333],
};

/** Records every call and answers from queued statuses */
class FakeVendor implements VendorApi {
  calls: string[] = [];
  contracts: Contract[] = [NON_CONTRACT, CONTRACT_BASED];
  statuses: RequestStatusContent[] = [];
  instantRequests: InstantCouponCreateRequest[] = [];
  downloadRequests: DownloadCouponCreateRequest[] = [];
  expireRequests: ExpireCouponRequest[][] = [];
  applyDownloadResult: BatchResultItem[] = [{ requestResultStatus: 'SUCCESS', body: { couponId: 500 } }];
  expireResult: BatchResultItem[] | null = null;
  contractError: Error | null = null;
  createInstantError: Error | null = null;
  expireError: Error | null = null;
  nextDownloadCouponId = 500;

  async createInstantCoupon(request: InstantCouponCreateRequest): Promise<VendorEnvelope<RequestedContent>> {
    this.calls.push('createInstant');
    this.instantRequests.push(request);
    if (this.createInstantError) throw this.createInstantError;
    return { code: 200, data: { success: true, content: { requestedId: 'create-1' } } };
  }

  async applyInstantCouponItems(couponId: number): Promise<VendorEnvelope<RequestedContent>> {
    this.calls.push(`applyInstant:${couponId}`);
    return { code: 200, data: { success: true, content: { requestedId: 'apply-1' } } };
  }

  async getRequestStatus(requestedId: string): Promise<VendorEnvelope<RequestStatusContent>> {
    this.calls.push(`status:${requestedId}`);
    return { code: 200, data: { content: this.statuses.shift() ?? { status: 'REQUESTED' } } };
  }

  async createDownloadCoupon(request: DownloadCouponCreateRequest): Promise<DownloadCouponCreated> {
    this.calls.push('createDownload');
    this.downloadRequests.push(request);
    return { couponId: this.nextDownloadCouponId++, couponStatus: 'STANDBY' };
  }

  async applyDownloadCouponItems(couponId: number): Promise<BatchResultItem[]> {
    this.calls.push(`applyDownload:${couponId}`);
    return this.applyDownloadResult;
  }

  async listContracts(): Promise<Contract[]> {
    this.calls.push('listContracts');
    if (this.contractError) throw this.contractError;
    return this.contracts;
  }

  async expireDownloadCoupons(requests: ExpireCouponRequest[]): Promise<BatchResultItem[]> {
    this.calls.push('expire');
    this.expireRequests.push(requests);
    if (this.expireError) throw this.expireError;
    return (
      this.expireResult ??
      requests.map((r) => ({ requestResultStatus: 'SUCCESS', body: { couponId: r.couponId } }))
    );
  }
}

describe('IssuanceOrchestrator', () => {
  let vendor: FakeVendor;
  let ledger: InMemoryLedgerStore;
  let wait: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    vendor = new FakeVendor();
    ledger = new InMemoryLedgerStore();
    wait = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  });

  function orchestrator(options: Partial<IssuanceOptions> = {}): IssuanceOrchestrator {
    return new IssuanceOrchestrator({
      client: vendor,
      ledger,
      vendorId: 'A00012345',
      userId: 'seller-user',
      options,
      clock: () => ISSUED_AT,
      wait,
      log: pino({ level: 'silent' }),
    });
  }

  describe('instant coupons', () => {
    it('should create, poll, apply items and poll again', async () => {
      vendor.statuses = [{ status: 'DONE', couponId: 7 }, { status: 'DONE' }];

      const summary = await orchestrator().issueAll([INSTANT]);

      expect(vendor.calls).toEqual([
        'listContracts',
        'createInstant',
        'status:create-1',
        'applyInstant:7',
        'status:apply-1',
      ]);
      expect(vendor.instantRequests[0]).toEqual({
        contractId: 15,
        name: '신규할인',
        maxDiscountPrice: 5000,
        discount: 10,
        startAt: '2024-12-20 00:00:00',
        endAt: '2025-01-18 23:59:00',
        type: 'RATE',
      });
      expect(summary.results).toEqual([
        {
          index: 1,
          name: '신규할인',
          kind: 'INSTANT',
          status: 'success',
          couponId: 7,
          message: 'Instant coupon created (couponId: 7, 2 items applied)',
        },
      ]);
      expect(await ledger.load()).toEqual([]);
    });

    it('should map fixed discounts to the vendor PRICE type', async () => {
      vendor.statuses = [{ status: 'DONE', couponId: 7 }, { status: 'DONE' }];

      await orchestrator().issueAll([{ ...INSTANT, discountMode: 'FIXED_PRICE', discountValue: 15 }]);

      expect(vendor.instantRequests[0].type).toBe('PRICE');
    });

    it('should map per-unit discounts to FIXED_WITH_QUANTITY', async () => {
      vendor.statuses = [{ status: 'DONE', couponId: 7 }, { status: 'DONE' }];

      await orchestrator().issueAll([{ ...INSTANT, discountMode: 'FIXED_PER_UNIT' }]);

      expect(vendor.instantRequests[0].type).toBe('FIXED_WITH_QUANTITY');
    });

    it('should fail the coupon when creation ends in FAIL without applying items', async () => {
      vendor.statuses = [{ status: 'FAIL' }];

      const summary = await orchestrator().issueAll([INSTANT]);

      expect(summary.results[0]).toEqual({
        index: 1,
        name: '신규할인',
        kind: 'INSTANT',
        status: 'failure',
        message: 'Instant coupon creation failed (status=FAIL)',
      });
      expect(vendor.calls).not.toContain('applyInstant:7');
    });

    it('should fail the coupon when creation finishes without a couponId', async () => {
      vendor.statuses = [{ status: 'DONE' }];

      const summary = await orchestrator().issueAll([INSTANT]);

      expect(summary.results[0].message).toBe('Instant coupon creation finished without a couponId');
    });

    it('should list rejected items when the apply request reports failures', async () => {
      vendor.statuses = [
        { status: 'DONE', couponId: 7 },
        { status: 'DONE', failedVendorItems: [{ vendorItemId: 222, reason: 'not on sale' }] },
      ];

      const summary = await orchestrator().issueAll([INSTANT]);

      expect(summary.results[0].status).toBe('failure');
      expect(summary.results[0].message).toBe(
        'Instant coupon 7 item apply failed (status=DONE, failed items: 222: not on sale)',
      );
      expect(summary.results[0].couponId).toBe(7);
    });

    it('should fail the coupon when polling runs out of attempts', async () => {
      const summary = await orchestrator({ pollMaxAttempts: 2 }).issueAll([INSTANT]);

      expect(summary.results[0].message).toBe(
        'Request create-1 still REQUESTED after 2 attempts (interval 2000ms, waited 2000ms in total)',
      );
      expect(wait).toHaveBeenCalledTimes(1);
      expect(wait).toHaveBeenCalledWith(2000);
    });

    it('should record a vendor error as the coupon failure', async () => {
      vendor.createInstantError = new VendorApiError('HTTP 400 Bad Request: invalid name', 'http', {
        method: 'POST',
        path: '/coupon',
        status: 400,
      });

      const summary = await orchestrator().issueAll([INSTANT]);

      expect(summary.results[0].message).toBe('HTTP 400 Bad Request: invalid name');
    });
  });

  describe('download coupons', () => {
    it('should create the coupon, apply items and record it in the ledger', async () => {
      const summary = await orchestrator().issueAll([DOWNLOAD]);

      expect(vendor.calls).toEqual(['listContracts', 'createDownload', 'applyDownload:500']);
      expect(vendor.downloadRequests[0]).toEqual({
        title: '다운로드 특가',
        contractId: 15,
        couponType: 'DOWNLOAD',
        startDate: '2024-12-20 16:30:00',
        endDate: '2024-12-26 23:59:00',
        userId: 'seller-user',
        policies: [
          {
            title: '다운로드 특가',
            typeOfDiscount: 'PRICE',
            description: '다운로드 특가 (valid for 7 days)',
            minimumPrice: 20000,
            discount: 1000,
            maximumDiscountPrice: 1000,
            maximumPerDaily: 50,
          },
        ],
      });
      expect(summary.results[0]).toEqual({
        index: 1,
        name: '다운로드 특가',
        kind: 'DOWNLOAD',
        status: 'success',
        couponId: 500,
        message: 'Download coupon created (couponId: 500, 1 items applied)',
      });
      expect(await ledger.load()).toEqual([
        { name: '다운로드 특가', couponId: 500, issuedAt: ISSUED_AT.toISOString() },
      ]);
    });

    it('should not record the coupon when applying items fails', async () => {
      vendor.applyDownloadResult = [{ requestResultStatus: 'FAIL', errorMessage: 'item 333 not found' }];

      const summary = await orchestrator().issueAll([DOWNLOAD]);

      expect(summary.results[0].message).toBe('Download coupon 500 item apply failed: item 333 not found');
      expect(summary.results[0].couponId).toBe(500);
      expect(await ledger.load()).toEqual([]);
    });

    it('should keep the coupon id when the issued coupon cannot be recorded', async () => {
      ledger.append = jest.fn(async (_record: IssuanceRecord): Promise<void> => {
        throw new Error('EACCES: permission denied');
      });

      const summary = await orchestrator().issueAll([DOWNLOAD]);

      expect(summary.results[0]).toEqual({
        index: 1,
        name: '다운로드 특가',
        kind: 'DOWNLOAD',
        status: 'failure',
        couponId: 500,
        message: 'Download coupon 500 was issued but could not be recorded in the ledger: EACCES: permission denied',
      });
      expect(summary.failed).toBe(1);
    });

    it('should send the minimum purchase price and daily cap from the coupon', async () => {
      await orchestrator().issueAll([{ ...DOWNLOAD, minPurchasePrice: 10, issueCount: 1 }]);

      expect(vendor.downloadRequests[0].policies[0]).toEqual(
        expect.objectContaining({ minimumPrice: 10, maximumPerDaily: 1 }),
      );
    });

    it('should fail on an empty apply response', async () => {
      vendor.applyDownloadResult = [];

      const summary = await orchestrator().issueAll([DOWNLOAD]);

      expect(summary.results[0].message).toBe('Download coupon 500 item apply failed: empty response');
    });
  });

  describe('batch', () => {
    it('should continue after a failing coupon and count the outcomes', async () => {
      vendor.statuses = [{ status: 'FAIL' }];

      const summary = await orchestrator().issueAll([INSTANT, DOWNLOAD]);

      expect(summary.total).toBe(2);
      expect(summary.succeeded).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.results.map((r) => [r.index, r.status])).toEqual([
        [1, 'failure'],
        [2, 'success'],
      ]);
    });

    it('should return an empty summary for no coupons', async () => {
      const summary = await orchestrator().issueAll([]);

      expect(summary).toEqual({ total: 0, succeeded: 0, failed: 0, results: [], expiry: null });
    });
  });

  describe('contract resolution', () => {
    it('should abort before any coupon when no non-contract-based contract exists', async () => {
      vendor.contracts = [CONTRACT_BASED];

      await expect(orchestrator().issueAll([INSTANT])).rejects.toThrow(
        new InitializationError('Expected exactly one NON_CONTRACT_BASED contract, found 0 among 1'),
      );
      expect(vendor.calls).toEqual(['listContracts']);
    });

    it('should abort when more than one non-contract-based contract exists', async () => {
      vendor.contracts = [NON_CONTRACT, { ...NON_CONTRACT, contractId: 16 }, CONTRACT_BASED];

      await expect(orchestrator().resolveContract()).rejects.toThrow(
        'Expected exactly one NON_CONTRACT_BASED contract, found 2 among 3',
      );
    });

    it('should ignore a NON_CONTRACT_BASED contract with a real vendor contract id', async () => {
      vendor.contracts = [{ ...NON_CONTRACT, vendorContractId: 300 }];

      await expect(orchestrator().resolveContract()).rejects.toBeInstanceOf(InitializationError);
    });

    it('should wrap a failed contract lookup', async () => {
      vendor.contractError = new Error('HTTP 500 Internal Server Error');

      await expect(orchestrator().resolveContract()).rejects.toThrow(
        'Contract lookup failed: HTTP 500 Internal Server Error',
      );
    });

    it('should leave the ledger untouched when contract resolution fails', async () => {
      ledger = new InMemoryLedgerStore([{ name: 'old', couponId: 1, issuedAt: '2024-12-19T00:00:00.000Z' }]);
      vendor.contracts = [];

      await expect(orchestrator().issueAll([DOWNLOAD])).rejects.toBeInstanceOf(InitializationError);
      expect(vendor.expireRequests).toEqual([]);
      expect(await ledger.load()).toHaveLength(1);
    });

    it('should use a configured contract without listing contracts', async () => {
      vendor.statuses = [{ status: 'DONE', couponId: 7 }, { status: 'DONE' }];

      await orchestrator({ contractId: 77 }).issueAll([INSTANT]);

      expect(vendor.calls).not.toContain('listContracts');
      expect(vendor.instantRequests[0].contractId).toBe(77);
    });
  });

  describe('ledger expiry', () => {
    beforeEach(() => {
      ledger = new InMemoryLedgerStore([
        { name: 'old-1', couponId: 1, issuedAt: '2024-12-19T00:00:00.000Z' },
        { name: 'old-2', couponId: 2, issuedAt: '2024-12-19T00:01:00.000Z' },
      ]);
    });

    it('should expire ledgered coupons before issuing and then clear the ledger', async () => {
      vendor.expireResult = [
        { requestResultStatus: 'SUCCESS', body: { couponId: 1 } },
        { requestResultStatus: 'FAIL', body: { couponId: 2 }, errorMessage: 'already expired' },
      ];

      const summary = await orchestrator().issueAll([DOWNLOAD]);

      expect(vendor.calls.slice(0, 3)).toEqual(['listContracts', 'expire', 'createDownload']);
      expect(vendor.expireRequests[0]).toEqual([
        { couponId: 1, reason: 'expired', userId: 'seller-user' },
        { couponId: 2, reason: 'expired', userId: 'seller-user' },
      ]);
      expect(summary.expiry).toEqual({
        attempted: 2,
        expired: 1,
        failed: 1,
        outcomes: [
          { couponId: 1, expired: true },
          { couponId: 2, expired: false, message: 'already expired' },
        ],
      });
      expect((await ledger.load()).map((r) => r.couponId)).toEqual([500]);
    });

    it('should use a configured expiry reason', async () => {
      await orchestrator({ expireReason: 'weekly rotation' }).expireLedgered();

      expect(vendor.expireRequests[0][0].reason).toBe('weekly rotation');
    });

    it('should clear the ledger and keep issuing when the expiry call fails', async () => {
      vendor.expireError = new Error('HTTP 503 Service Unavailable');

      const summary = await orchestrator().issueAll([DOWNLOAD]);

      expect(summary.expiry).toEqual({
        attempted: 2,
        expired: 0,
        failed: 2,
        error: 'HTTP 503 Service Unavailable',
        outcomes: [],
      });
      expect(summary.succeeded).toBe(1);
      expect((await ledger.load()).map((r) => r.couponId)).toEqual([500]);
    });

    it('should skip the expiry call when the ledger is empty', async () => {
      ledger = new InMemoryLedgerStore();

      await expect(orchestrator().expireLedgered()).resolves.toBeNull();
      expect(vendor.calls).not.toContain('expire');
    });
  });
});
