#!/usr/bin/env node
import { randomUUID } from 'crypto';
import { env, resolveCredentials } from './config/env';
import { IssuanceOrchestrator } from './issuance/orchestrator';
import { JsonFileLedgerStore } from './issuance/ledger';
import { IssueSummary } from './issuance/types';
import { runLogger } from './observability/logger';
import { waitWithJitter } from './scheduling/jitter';
import { readCouponSheet } from './spreadsheet/coupon-sheet-reader';
import { VendorApiClient } from './vendor/vendor-client';

function logSummary(log: ReturnType<typeof runLogger>, summary: IssueSummary): void {
  for (const result of summary.results) {
    const line = `[${result.status === 'success' ? 'OK' : 'FAIL'}] ${result.name}: ${result.message}`;
    if (result.status === 'success') {
      log.info({ index: result.index, couponId: result.couponId }, line);
    } else {
      log.error({ index: result.index, couponId: result.couponId }, line);
    }
  }
  log.info(
    { total: summary.total, succeeded: summary.succeeded, failed: summary.failed },
    `Issued ${summary.succeeded} of ${summary.total} coupons (${summary.failed} failed)`,
  );
}

async function main(): Promise<number> {
  const log = runLogger(randomUUID());
  const sheetPath = process.argv[2] ?? env.files.couponSheet;

  try {
    const credentials = resolveCredentials(env.vendor);

    if (env.issuance.jitterMaxMinutes > 0) {
      await waitWithJitter(env.issuance.jitterMaxMinutes);
    }

    log.info({ sheet: sheetPath }, 'Reading coupon sheet');
    const coupons = await readCouponSheet(sheetPath);
    log.info({ count: coupons.length }, 'Coupon sheet validated');

    const client = new VendorApiClient({
      baseUrl: env.vendor.baseUrl,
      accessKey: credentials.accessKey,
      secretKey: credentials.secretKey,
      vendorId: credentials.vendorId,
      timeoutMs: env.vendor.timeoutMs,
    });

    const orchestrator = new IssuanceOrchestrator({
      client,
      ledger: new JsonFileLedgerStore(env.files.ledger),
      vendorId: credentials.vendorId,
      userId: credentials.userId,
      options: {
        pollMaxAttempts: env.issuance.pollMaxAttempts,
        pollIntervalMs: env.issuance.pollIntervalMs,
        contractId: env.issuance.contractId,
      },
      log,
    });

    const summary = await orchestrator.issueAll(coupons);
    logSummary(log, summary);
    return summary.failed > 0 ? 1 : 0;
  } catch (err) {
    log.fatal({ err }, 'Coupon issuance aborted');
    return 1;
  }
}

main().then((code) => {
  process.exitCode = code;
});
