import Database from 'better-sqlite3';
import { dirname, join } from 'path';
import { mkdirSync } from 'fs';
import { defaultDataDir } from '../config.js';
import type {
  JobEvent,
  JobRecord,
  JobStatus,
  MissionReport,
  MissionRequest,
  PendingInputRecord,
  UserInputRequest,
  UserInputType,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// JobStore: durable registry for jobs, their event stream and pending
// human-input requests. Survives restarts; each job's rows are written only by
// that job's mission task and the request handlers acting on it.
// ─────────────────────────────────────────────────────────────────────────────

interface JobRow {
  id: string;
  url: string;
  objective: string;
  top_k: number;
  status: JobStatus;
  created_at: number;
  updated_at: number;
  result_json: string | null;
}

interface EventRow {
  job_id: string;
  ts: string;
  event: string;
  details_json: string | null;
}

interface InputRequestRow {
  job_id: string;
  input_type: UserInputType;
  prompt: string;
  sensitive: number;
  requested_at: number;
}

export const IN_MEMORY = ':memory:';

export class JobStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? JobStore.defaultPath();
    if (path !== IN_MEMORY) mkdirSync(dirname(path), { recursive: true });
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.init();
  }

  static defaultPath(dataDir = defaultDataDir()): string {
    return join(dataDir, 'jobs.db');
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id           TEXT PRIMARY KEY,
        url          TEXT NOT NULL,
        objective    TEXT NOT NULL,
        top_k        INTEGER NOT NULL,
        status       TEXT NOT NULL,
        created_at   INTEGER NOT NULL,
        updated_at   INTEGER NOT NULL,
        result_json  TEXT
      );

      -- Append-only status stream per job
      CREATE TABLE IF NOT EXISTS job_events (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id        TEXT NOT NULL,
        ts            TEXT NOT NULL,
        event         TEXT NOT NULL,
        details_json  TEXT
      );

      -- At most one outstanding request per job
      CREATE TABLE IF NOT EXISTS input_requests (
        job_id        TEXT PRIMARY KEY,
        input_type    TEXT NOT NULL,
        prompt        TEXT NOT NULL,
        sensitive     INTEGER NOT NULL DEFAULT 0,
        requested_at  INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_events_job ON job_events(job_id, id);
      CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
    `);
  }

  // ─── Jobs ──────────────────────────────────────────────────────────────────

  createJob(id: string, request: MissionRequest): JobRecord {
    const now = Date.now();
    this.db
      .prepare(`
        INSERT INTO jobs (id, url, objective, top_k, status, created_at, updated_at)
        VALUES (?, ?, ?, ?, 'queued', ?, ?)
      `)
      .run(id, request.url, request.objective, request.topK, now, now);
    return {
      id,
      url: request.url,
      objective: request.objective,
      topK: request.topK,
      status: 'queued',
      createdAt: now,
      updatedAt: now,
      result: null,
    };
  }

  updateStatus(id: string, status: JobStatus): void {
    this.db
      .prepare('UPDATE jobs SET status = ?, updated_at = ? WHERE id = ?')
      .run(status, Date.now(), id);
  }

  saveResult(id: string, report: MissionReport, status: JobStatus): void {
    this.db
      .prepare('UPDATE jobs SET status = ?, result_json = ?, updated_at = ? WHERE id = ?')
      .run(status, JSON.stringify(report), Date.now(), id);
  }

  getJob(id: string): JobRecord | null {
    const row = this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE id = ?').get(id);
    return row ? this.toJob(row) : null;
  }

  listJobs(status?: JobStatus): JobRecord[] {
    const rows = status
      ? this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE status = ? ORDER BY created_at DESC').all(status)
      : this.db.prepare<[], JobRow>('SELECT * FROM jobs ORDER BY created_at DESC').all();
    return rows.map((r) => this.toJob(r));
  }

  // ─── Events ────────────────────────────────────────────────────────────────

  appendEvent(event: JobEvent): void {
    this.db
      .prepare('INSERT INTO job_events (job_id, ts, event, details_json) VALUES (?, ?, ?, ?)')
      .run(event.jobId, event.ts, event.event, event.details ? JSON.stringify(event.details) : null);
  }

  /** Oldest first; `limit` keeps the most recent N */
  listEvents(jobId: string, limit?: number): JobEvent[] {
    const rows = limit
      ? this.db
          .prepare<[string, number], EventRow>(`
            SELECT * FROM (
              SELECT id, job_id, ts, event, details_json FROM job_events
              WHERE job_id = ? ORDER BY id DESC LIMIT ?
            ) ORDER BY id ASC
          `)
          .all(jobId, limit)
      : this.db
          .prepare<[string], EventRow>(
            'SELECT job_id, ts, event, details_json FROM job_events WHERE job_id = ? ORDER BY id ASC',
          )
          .all(jobId);

    return rows.map((r) => {
      const event: JobEvent = { jobId: r.job_id, ts: r.ts, event: r.event };
      if (r.details_json) event.details = JSON.parse(r.details_json);
      return event;
    });
  }

  // ─── Input requests ────────────────────────────────────────────────────────

  saveInputRequest(jobId: string, request: UserInputRequest, requestedAt = Date.now()): void {
    this.db
      .prepare(`
        INSERT INTO input_requests (job_id, input_type, prompt, sensitive, requested_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(job_id) DO UPDATE SET
          input_type   = excluded.input_type,
          prompt       = excluded.prompt,
          sensitive    = excluded.sensitive,
          requested_at = excluded.requested_at
      `)
      .run(jobId, request.inputType, request.prompt, request.sensitive ? 1 : 0, requestedAt);
  }

  getInputRequest(jobId: string): PendingInputRecord | null {
    const row = this.db
      .prepare<[string], InputRequestRow>('SELECT * FROM input_requests WHERE job_id = ?')
      .get(jobId);
    return row ? this.toInputRequest(row) : null;
  }

  deleteInputRequest(jobId: string): boolean {
    return this.db.prepare('DELETE FROM input_requests WHERE job_id = ?').run(jobId).changes > 0;
  }

  listInputRequestsOlderThan(cutoff: number): PendingInputRecord[] {
    return this.db
      .prepare<[number], InputRequestRow>('SELECT * FROM input_requests WHERE requested_at < ?')
      .all(cutoff)
      .map((r) => this.toInputRequest(r));
  }

  // ─── Stats ─────────────────────────────────────────────────────────────────

  getStats(): {
    jobs: number;
    running: number;
    waiting_for_input: number;
    completed: number;
    failed: number;
    pending_input_requests: number;
    events: number;
  } {
    const count = (sql: string, ...params: string[]) =>
      this.db.prepare<string[], { n: number }>(sql).get(...params)?.n ?? 0;
    const byStatus = (status: JobStatus) => count('SELECT COUNT(*) AS n FROM jobs WHERE status = ?', status);

    return {
      jobs: count('SELECT COUNT(*) AS n FROM jobs'),
      running: byStatus('running'),
      waiting_for_input: byStatus('waiting_for_input'),
      completed: byStatus('completed'),
      failed: byStatus('failed'),
      pending_input_requests: count('SELECT COUNT(*) AS n FROM input_requests'),
      events: count('SELECT COUNT(*) AS n FROM job_events'),
    };
  }

  // ─── Utilities ─────────────────────────────────────────────────────────────

  private toJob(row: JobRow): JobRecord {
    const result: MissionReport | null = row.result_json ? JSON.parse(row.result_json) : null;
    return {
      id: row.id,
      url: row.url,
      objective: row.objective,
      topK: row.top_k,
      status: row.status,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      result,
    };
  }

  private toInputRequest(row: InputRequestRow): PendingInputRecord {
    return {
      jobId: row.job_id,
      inputType: row.input_type,
      prompt: row.prompt,
      sensitive: row.sensitive === 1,
      requestedAt: row.requested_at,
    };
  }

  close(): void {
    this.db.close();
  }
}
