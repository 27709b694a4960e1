import type { JobStore } from '../memory/job-store.js';
import type { Logger } from '../logger.js';
import type { PendingInputRecord, UserInputRequest } from '../types.js';
import { UserInputTimeoutError } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// UserInputGate: the one place a mission waits on someone outside it
//
// The mission task calls waitFor() and suspends; an inbound request calls
// submit() with the answer. The waiter is removed from the registry before it
// is resolved, so a second submit for the same request finds nothing and a
// mission can never be resumed twice.
// ─────────────────────────────────────────────────────────────────────────────

export type SubmitResult = 'accepted' | 'no_request' | 'not_waiting';

interface Waiter {
  request: UserInputRequest;
  requestedAt: number;
  timeoutMs: number;
  timer: NodeJS.Timeout;
  resolve: (value: string) => void;
  reject: (err: Error) => void;
}

export class UserInputGate {
  private waiters = new Map<string, Waiter>();

  constructor(
    private readonly store: JobStore | null,
    private readonly logger: Logger,
  ) {}

  waitFor(jobId: string, request: UserInputRequest, timeoutMs: number): Promise<string> {
    // A newer request from the same job supersedes the old one
    const previous = this.release(jobId);
    previous?.reject(new UserInputTimeoutError(jobId, previous.timeoutMs));

    const requestedAt = Date.now();
    this.store?.saveInputRequest(jobId, request, requestedAt);
    this.logger.info({ jobId, inputType: request.inputType }, 'waiting for user input');

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        const waiter = this.release(jobId);
        if (waiter) {
          this.logger.warn({ jobId, timeoutMs }, 'user input timed out');
          waiter.reject(new UserInputTimeoutError(jobId, timeoutMs));
        }
      }, timeoutMs);
      this.waiters.set(jobId, { request, requestedAt, timeoutMs, timer, resolve, reject });
    });
  }

  submit(jobId: string, value: string): SubmitResult {
    const waiter = this.release(jobId);
    if (!waiter) {
      // A persisted request with nobody waiting is left over from an earlier process
      if (this.store?.deleteInputRequest(jobId)) return 'not_waiting';
      return 'no_request';
    }
    this.logger.info({ jobId }, 'user input received');
    waiter.resolve(value);
    return 'accepted';
  }

  getRequest(jobId: string): PendingInputRecord | null {
    const waiter = this.waiters.get(jobId);
    if (waiter) return { jobId, ...waiter.request, requestedAt: waiter.requestedAt };
    return this.store?.getInputRequest(jobId) ?? null;
  }

  isWaiting(jobId: string): boolean {
    return this.waiters.has(jobId);
  }

  get pendingCount(): number {
    return this.waiters.size;
  }

  /**
   * Release every waiter older than `maxAgeMs` (they fail as timeouts) and drop
   * persisted requests of the same age. Returns how many jobs were cleaned up.
   */
  cleanupStale(maxAgeMs: number, now = Date.now()): number {
    const cutoff = now - maxAgeMs;
    const cleaned = new Set<string>();

    for (const [jobId, waiter] of [...this.waiters]) {
      if (waiter.requestedAt >= cutoff) continue;
      this.release(jobId);
      waiter.reject(new UserInputTimeoutError(jobId, now - waiter.requestedAt));
      cleaned.add(jobId);
    }

    for (const record of this.store?.listInputRequestsOlderThan(cutoff) ?? []) {
      this.store?.deleteInputRequest(record.jobId);
      cleaned.add(record.jobId);
    }

    if (cleaned.size > 0) this.logger.info({ jobs: [...cleaned] }, 'cleaned up stale input requests');
    return cleaned.size;
  }

  private release(jobId: string): Waiter | undefined {
    const waiter = this.waiters.get(jobId);
    if (!waiter) return undefined;
    clearTimeout(waiter.timer);
    this.waiters.delete(jobId);
    this.store?.deleteInputRequest(jobId);
    return waiter;
  }
}
