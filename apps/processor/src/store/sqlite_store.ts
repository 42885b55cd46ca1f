import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";
import { z } from "zod";
import { JobStateV1, TERMINAL_JOB_STATES, type JobStatusV1 } from "@bcona/contracts";

import { JobResultsV1Schema, type JobResultsV1 } from "../results";

export type JobStoreConfig = {
  // ":memory:" keeps the registry in process
  filePath: string;
};

export type JobRecord = JobStatusV1 & { results: JobResultsV1 | null };

const JobRowSchema = z.object({
  job_id: z.string(),
  status: JobStateV1,
  progress: z.number(),
  message: z.string(),
  created_at_ts: z.number(),
  updated_at_ts: z.number(),
  results_json: z.string().nullable(),
});

// Guard shared by every transition: a terminal job is never written again.
const NOT_TERMINAL = `status not in (${[...TERMINAL_JOB_STATES].map((s) => `'${s}'`).join(", ")})`;

/**
 * Job registry. better-sqlite3 is synchronous, so every transition is a single
 * statement and transitions on one job id are serialized.
 */
export class JobSqliteStore {
  private db: Database.Database;

  constructor(cfg: JobStoreConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    if (cfg.filePath !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    this.db.exec(`
      create table if not exists ona_jobs (
        job_id text primary key,
        status text not null,
        progress real not null,
        message text not null,
        created_at_ts integer not null,
        updated_at_ts integer not null,
        results_json text
      );

      create index if not exists idx_jobs_created on ona_jobs(created_at_ts);
    `);
  }

  createJob(args: { job_id: string; created_at_ts: number; message: string }): JobStatusV1 {
    this.db
      .prepare(
        `insert into ona_jobs (job_id, status, progress, message, created_at_ts, updated_at_ts) values (?, 'queued', 0, ?, ?, ?)`
      )
      .run(args.job_id, args.message, args.created_at_ts, args.created_at_ts);
    return {
      job_id: args.job_id,
      status: "queued",
      progress: 0,
      message: args.message,
      created_at_ts: args.created_at_ts,
      updated_at_ts: args.created_at_ts,
    };
  }

  /** Moves a live job to processing; progress never goes back. Returns false for terminal or unknown jobs. */
  updateProgress(args: { job_id: string; progress: number; message: string; ts: number }): boolean {
    const info = this.db
      .prepare(
        `update ona_jobs set status = 'processing', progress = max(progress, ?), message = ?, updated_at_ts = ?
         where job_id = ? and ${NOT_TERMINAL}`
      )
      .run(args.progress, args.message, args.ts, args.job_id);
    return info.changes > 0;
  }

  complete(args: { job_id: string; message: string; results: JobResultsV1; ts: number }): boolean {
    const info = this.db
      .prepare(
        `update ona_jobs set status = 'completed', progress = 100, message = ?, results_json = ?, updated_at_ts = ?
         where job_id = ? and ${NOT_TERMINAL}`
      )
      .run(args.message, JSON.stringify(args.results), args.ts, args.job_id);
    return info.changes > 0;
  }

  fail(args: { job_id: string; message: string; ts: number }): boolean {
    const info = this.db
      .prepare(
        `update ona_jobs set status = 'failed', message = ?, updated_at_ts = ? where job_id = ? and ${NOT_TERMINAL}`
      )
      .run(args.message, args.ts, args.job_id);
    return info.changes > 0;
  }

  getJob(jobId: string): JobRecord | null {
    const row: unknown = this.db.prepare(`select * from ona_jobs where job_id = ?`).get(jobId);
    if (row === undefined) return null;
    const r = JobRowSchema.parse(row);
    const results: unknown = r.results_json === null ? null : JSON.parse(r.results_json);
    return {
      job_id: r.job_id,
      status: r.status,
      progress: r.progress,
      message: r.message,
      created_at_ts: r.created_at_ts,
      updated_at_ts: r.updated_at_ts,
      results: results === null ? null : JobResultsV1Schema.parse(results),
    };
  }

  /** Jobs left live by a previous process; they can never finish now. */
  failInterrupted(message: string, ts: number): number {
    const info = this.db
      .prepare(`update ona_jobs set status = 'failed', message = ?, updated_at_ts = ? where ${NOT_TERMINAL}`)
      .run(message, ts);
    return info.changes;
  }

  close(): void {
    this.db.close();
  }
}
