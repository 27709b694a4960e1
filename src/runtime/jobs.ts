import { randomUUID } from 'crypto';
import type { AgentConfig } from '../config.js';
import type { AgentPage } from '../engine/page.js';
import { DetectOnlyCaptchaSolver, type CaptchaSolver } from '../engine/captcha.js';
import type { JobStore } from '../memory/job-store.js';
import type { Reasoner } from '../semantic/reasoner.js';
import { silentLogger, type Logger } from '../logger.js';
import type {
  JobEvent,
  JobRecord,
  JobStatus,
  MissionReport,
  MissionRequest,
  PendingInputRecord,
} from '../types.js';
import { MissionRunner, buildReportForError } from './mission.js';
import { JobEventBus } from './status.js';
import { UserInputGate, type SubmitResult } from './user-input-gate.js';
import { errorMessage } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// JobManager: runs missions as independent concurrent tasks
//
// Each job gets its own page and its own MissionRunner pass. The only shared
// state is keyed by job id: the job store rows, the event bus subscriptions and
// the user-input gate's waiters.
// ─────────────────────────────────────────────────────────────────────────────

export interface SessionProvider {
  createSession(id: string): Promise<{ id: string; page: AgentPage }>;
  destroySession(id: string): Promise<void>;
}

export interface JobManagerDeps {
  config: AgentConfig;
  store: JobStore;
  sessions: SessionProvider;
  reasoner: Reasoner;
  captcha?: CaptchaSolver;
  logger?: Logger;
}

export interface SystemStatus {
  activeMissions: number;
  waitingForInput: number;
  store: ReturnType<JobStore['getStats']>;
}

export interface CleanupReport {
  staleInputRequests: number;
  orphanedJobs: string[];
}

const UNFINISHED: JobStatus[] = ['queued', 'running', 'waiting_for_input'];

export class JobManager {
  readonly events: JobEventBus;
  readonly gate: UserInputGate;

  private config: AgentConfig;
  private store: JobStore;
  private sessions: SessionProvider;
  private runner: MissionRunner;
  private logger: Logger;
  private active = new Map<string, Promise<MissionReport>>();

  constructor(deps: JobManagerDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.sessions = deps.sessions;
    this.logger = deps.logger ?? silentLogger();
    this.events = new JobEventBus(this.store, this.logger.child({ component: 'events' }));
    this.gate = new UserInputGate(this.store, this.logger.child({ component: 'input-gate' }));
    this.runner = new MissionRunner({
      config: this.config,
      reasoner: deps.reasoner,
      gate: this.gate,
      captcha: deps.captcha ?? new DetectOnlyCaptchaSolver(),
      status: this.events,
      logger: this.logger,
    });
  }

  // ─── Lifecycle ────────────────────────────────────────────────────────────

  /** Queue a mission and start it immediately. Returns the job id. */
  start(request: MissionRequest): string {
    const jobId = randomUUID();
    this.store.createJob(jobId, request);
    this.events.push(jobId, 'job_queued', { url: request.url, objective: request.objective, topK: request.topK });
    const task = this.runJob(jobId, request).finally(() => this.active.delete(jobId));
    this.active.set(jobId, task);
    return jobId;
  }

  /** Resolves with the final report; null for unknown jobs */
  async waitForCompletion(jobId: string): Promise<MissionReport | null> {
    const task = this.active.get(jobId);
    if (task) return task;
    return this.store.getJob(jobId)?.result ?? null;
  }

  async shutdown(): Promise<void> {
    await Promise.all([...this.active.values()]);
  }

  /** Never rejects: a mission that blows up is recorded as a failed job */
  private async runJob(jobId: string, request: MissionRequest): Promise<MissionReport> {
    const log = this.logger.child({ jobId });
    const unsubscribe = this.events.subscribe(jobId, (event) => this.trackStatus(jobId, event));

    try {
      this.store.updateStatus(jobId, 'running');
      const session = await this.sessions.createSession(jobId);
      let report: MissionReport;
      try {
        report = await this.runner.run(jobId, request, session.page);
      } finally {
        await this.sessions.destroySession(session.id);
      }
      this.store.saveResult(jobId, report, report.outcome === 'failed' ? 'failed' : 'completed');
      return report;
    } catch (err) {
      const message = errorMessage(err);
      log.error({ error: message }, 'mission crashed');
      const report = buildReportForError(jobId, message);
      try {
        this.store.saveResult(jobId, report, 'failed');
      } catch (saveErr) {
        log.error({ error: errorMessage(saveErr) }, 'could not record failed mission');
      }
      this.events.push(jobId, 'job_failed', { error: message });
      return report;
    } finally {
      unsubscribe();
    }
  }

  private trackStatus(jobId: string, event: JobEvent): void {
    if (event.event === 'user_input_required') {
      this.store.updateStatus(jobId, 'waiting_for_input');
    } else if (this.store.getJob(jobId)?.status === 'waiting_for_input') {
      this.store.updateStatus(jobId, 'running');
    }
  }

  // ─── Queries ──────────────────────────────────────────────────────────────

  status(jobId: string): JobRecord | null {
    return this.store.getJob(jobId);
  }

  result(jobId: string): MissionReport | null {
    return this.store.getJob(jobId)?.result ?? null;
  }

  listEvents(jobId: string, limit?: number): JobEvent[] {
    return this.store.listEvents(jobId, limit);
  }

  isActive(jobId: string): boolean {
    return this.active.has(jobId);
  }

  systemStatus(): SystemStatus {
    return {
      activeMissions: this.active.size,
      waitingForInput: this.gate.pendingCount,
      store: this.store.getStats(),
    };
  }

  // ─── Human input ──────────────────────────────────────────────────────────

  getUserInputRequest(jobId: string): PendingInputRecord | null {
    return this.gate.getRequest(jobId);
  }

  submitUserInput(jobId: string, value: string): SubmitResult {
    const result = this.gate.submit(jobId, value);
    if (result !== 'no_request') this.events.push(jobId, 'user_input_submitted', { result });
    return result;
  }

  // ─── Maintenance ──────────────────────────────────────────────────────────

  /**
   * Expire input requests older than the stale limit and fail jobs that the
   * store lists as unfinished but no task in this process is running (left
   * over from a previous process).
   */
  cleanupStuckJobs(): CleanupReport {
    const staleInputRequests = this.gate.cleanupStale(this.config.staleInputRequestMs);
    const orphanedJobs: string[] = [];

    for (const status of UNFINISHED) {
      for (const job of this.store.listJobs(status)) {
        if (this.active.has(job.id)) continue;
        this.store.saveResult(job.id, buildReportForError(job.id, 'mission was not running in this process'), 'failed');
        this.events.push(job.id, 'job_failed', { error: 'orphaned' });
        orphanedJobs.push(job.id);
      }
    }

    if (orphanedJobs.length > 0) this.logger.warn({ jobs: orphanedJobs }, 'failed orphaned jobs');
    return { staleInputRequests, orphanedJobs };
  }
}
