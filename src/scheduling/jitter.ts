import { logger } from '../observability/logger';
import { sleep } from '../issuance/poller';

const log = logger.child({ module: 'jitter' });

export const MAX_JITTER_MINUTES = 120;

export interface JitterDeps {
  /** Returns a float in [0, 1) */
  random?: () => number;
  wait?: (ms: number) => Promise<void>;
}

/**
 * Delay the start of a run by a random whole number of minutes in
 * [0, maxMinutes], so installations scheduled for the same time do not
 * all reach the vendor API together. Resolves with the delay applied.
 */
export async function waitWithJitter(maxMinutes: number, deps: JitterDeps = {}): Promise<number> {
  if (!Number.isInteger(maxMinutes) || maxMinutes < 1 || maxMinutes > MAX_JITTER_MINUTES) {
    throw new RangeError(`Jitter must be between 1 and ${MAX_JITTER_MINUTES} minutes (got ${maxMinutes})`);
  }

  const random = deps.random ?? Math.random;
  const wait = deps.wait ?? sleep;

  const minutes = Math.floor(random() * (maxMinutes + 1));
  if (minutes === 0) {
    log.info('Jitter is 0 minutes, starting immediately');
    return 0;
  }

  const delayMs = minutes * 60_000;
  log.info({ minutes, startsAt: new Date(Date.now() + delayMs).toISOString() }, 'Waiting before issuing coupons');
  await wait(delayMs);
  log.info('Jitter wait finished');
  return delayMs;
}
