import type { JobStore } from '../memory/job-store.js';
import type { Logger } from '../logger.js';
import type { JobEvent } from '../types.js';
import { errorMessage } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Status events: fire-and-forget. A failing sink or subscriber is logged and
// never reaches the mission loop.
// ─────────────────────────────────────────────────────────────────────────────

export interface StatusSink {
  push(jobId: string, event: string, details?: Record<string, unknown>): void;
}

export type JobEventListener = (event: JobEvent) => void;

/** Persists every event to the job store and fans it out to live subscribers */
export class JobEventBus implements StatusSink {
  private subscribers = new Map<string, Set<JobEventListener>>();

  constructor(
    private readonly store: JobStore | null,
    private readonly logger: Logger,
  ) {}

  push(jobId: string, event: string, details?: Record<string, unknown>): void {
    const entry: JobEvent = { jobId, ts: new Date().toISOString(), event };
    if (details) entry.details = details;

    try {
      this.store?.appendEvent(entry);
    } catch (err) {
      this.logger.warn({ jobId, event, error: errorMessage(err) }, 'failed to persist status event');
    }

    const listeners = this.subscribers.get(jobId);
    if (listeners) {
      for (const listener of listeners) {
        try {
          listener(entry);
        } catch (err) {
          this.logger.warn({ jobId, event, error: errorMessage(err) }, 'status subscriber threw');
        }
      }
    }

    this.logger.debug({ jobId, event }, 'status');
  }

  subscribe(jobId: string, listener: JobEventListener): () => void {
    let set = this.subscribers.get(jobId);
    if (!set) {
      set = new Set();
      this.subscribers.set(jobId, set);
    }
    set.add(listener);
    return () => {
      set?.delete(listener);
      if (set?.size === 0) this.subscribers.delete(jobId);
    };
  }
}

/** Sink that drops everything */
export const nullSink: StatusSink = {
  push: () => undefined,
};
