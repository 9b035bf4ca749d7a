import { VendorApi, RequestStatus, RequestStatusContent } from '../vendor/types';
import { PollTimeoutError } from './errors';

export interface PollPolicy {
  maxAttempts: number;
  intervalMs: number;
  wait: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export interface PollOutcome {
  status: Exclude<RequestStatus, 'REQUESTED'>;
  content: RequestStatusContent;
  attempts: number;
}

/**
 * Re-fetch an asynchronous request's status until it leaves REQUESTED.
 * The first check is immediate; later checks wait `intervalMs` each.
 * Any status other than REQUESTED or DONE is reported as FAIL.
 */
export async function pollRequest(
  client: Pick<VendorApi, 'getRequestStatus'>,
  requestedId: string,
  policy: PollPolicy,
): Promise<PollOutcome> {
  let waited = 0;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (attempt > 1) {
      await policy.wait(policy.intervalMs);
      waited += policy.intervalMs;
    }

    const response = await client.getRequestStatus(requestedId);
    const content = response.data?.content ?? {};

    if (content.status === 'REQUESTED') continue;
    return { status: content.status === 'DONE' ? 'DONE' : 'FAIL', content, attempts: attempt };
  }

  throw new PollTimeoutError(requestedId, policy.maxAttempts, policy.intervalMs, waited);
}
