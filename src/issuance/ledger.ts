/**
 * Issued-coupon ledger.
 *
 * Records every download coupon this tool created so the next run can
 * expire it. The JSON file is rewritten whole on each change; there is no
 * locking, so only one run may use a file at a time.
 */

import { promises as fs } from 'fs';
import path from 'path';
import Ajv from 'ajv';
import { errorText } from '../observability/error-text';
import { logger } from '../observability/logger';
import { InitializationError } from './errors';
import { IssuanceRecord, LedgerFile, LedgerStore } from './types';

const log = logger.child({ module: 'ledger' });

const ajv = new Ajv({ allErrors: true });

const validateLedgerFile = ajv.compile<LedgerFile>({
  type: 'object',
  required: ['coupons'],
  properties: {
    lastUpdated: { type: 'string' },
    coupons: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'couponId', 'issuedAt'],
        properties: {
          name: { type: 'string' },
          couponId: { type: 'number' },
          issuedAt: { type: 'string' },
        },
      },
    },
  },
});

// fs errors may come from another realm, so match on shape rather than class
function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

// ───── In-Memory Ledger ────────────────────────────────────

export class InMemoryLedgerStore implements LedgerStore {
  private records: IssuanceRecord[];

  constructor(initial: IssuanceRecord[] = []) {
    this.records = [...initial];
  }

  async load(): Promise<IssuanceRecord[]> {
    return [...this.records];
  }

  async append(record: IssuanceRecord): Promise<void> {
    this.records.push(record);
  }

  async clear(): Promise<void> {
    this.records = [];
  }
}

// ───── JSON File Ledger ────────────────────────────────────

export class JsonFileLedgerStore implements LedgerStore {
  constructor(
    private readonly filePath: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** A missing file is an empty ledger; a malformed one is fatal. */
  async load(): Promise<IssuanceRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        return [];
      }
      throw new InitializationError(`Cannot read ledger ${this.filePath}: ${errorText(err)}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new InitializationError(`Ledger ${this.filePath} is not valid JSON: ${errorText(err)}`, { cause: err });
    }

    if (!validateLedgerFile(parsed)) {
      throw new InitializationError(
        `Ledger ${this.filePath} has an unexpected shape: ${ajv.errorsText(validateLedgerFile.errors)}`,
      );
    }
    return parsed.coupons;
  }

  async append(record: IssuanceRecord): Promise<void> {
    const records = await this.load();
    records.push(record);
    await this.write(records);
    log.debug({ couponId: record.couponId, total: records.length }, 'Ledger entry appended');
  }

  async clear(): Promise<void> {
    await this.write([]);
    log.debug('Ledger cleared');
  }

  private async write(coupons: IssuanceRecord[]): Promise<void> {
    const file: LedgerFile = { lastUpdated: this.clock().toISOString(), coupons };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${JSON.stringify(file, null, 2)}\n`, 'utf-8');
  }
}
