// apps/processor/src/runtime.ts
//
// Job runtime: accepts uploaded files, runs the ONA pipeline off the request path and
// keeps the job registry current.
//
// Contract:
// - submit() returns the queued job immediately; the pipeline runs asynchronously.
// - Non-terminal progress events update the registry. The job completes only after the
//   processed CSV is written, so a completed job always has its download.
// - Any failure ends the job in `failed` with the pipeline's message; nothing is rethrown.

import fs from "node:fs";
import path from "node:path";
import type { FastifyBaseLogger } from "fastify";
import type { OnaRunOptionsInputV1, ProgressEventV1 } from "@bcona/contracts";
import { isOnaError, runOnaPipeline, type OnaPipelineResult } from "@bcona/ona-kernel";

import { resultsSampleSize, type OnaConfigV1 } from "./config";
import { processedCsvName, writeProcessedCsv } from "./export/processed_csv";
import type { JobResultsV1 } from "./results";
import type { JobRecord, JobSqliteStore } from "./store/sqlite_store";
import { errorMessage, newId, nowMs } from "./util";

export type JobRuntimeDeps = {
  store: JobSqliteStore;
  log: FastifyBaseLogger;
  config: OnaConfigV1;
  resultsDir: string;
  now?: () => number;
};

export type SubmitJobInput = {
  aethalometerPath: string;
  weatherPath: string | null;
  // request overrides on top of config run_defaults
  options: Pick<OnaRunOptionsInputV1, "channel" | "atn_min">;
};

export class JobRuntime {
  private readonly store: JobSqliteStore;
  private readonly log: FastifyBaseLogger;
  private readonly config: OnaConfigV1;
  private readonly resultsDir: string;
  private readonly now: () => number;
  private readonly running = new Map<string, Promise<void>>();

  constructor(deps: JobRuntimeDeps) {
    this.store = deps.store;
    this.log = deps.log;
    this.config = deps.config;
    this.resultsDir = deps.resultsDir;
    this.now = deps.now ?? nowMs;
  }

  submit(input: SubmitJobInput): JobRecord {
    const job_id = newId("job");
    const status = this.store.createJob({ job_id, created_at_ts: this.now(), message: "Queued" });

    const task = this.execute(job_id, input).finally(() => {
      this.running.delete(job_id);
    });
    this.running.set(job_id, task);
    return { ...status, results: null };
  }

  status(jobId: string): JobRecord | null {
    return this.store.getJob(jobId);
  }

  /** Resolves once the job has reached a terminal state (immediately for unknown or finished jobs). */
  async waitFor(jobId: string): Promise<void> {
    await this.running.get(jobId);
  }

  /** Resolves once every job submitted so far has finished. */
  async drain(): Promise<void> {
    await Promise.all([...this.running.values()]);
  }

  private onProgress(jobId: string, event: ProgressEventV1): void {
    // terminal transitions are written by execute()
    if (event.terminal) return;
    this.store.updateProgress({ job_id: jobId, progress: event.percent, message: event.message, ts: this.now() });
  }

  private async execute(jobId: string, input: SubmitJobInput): Promise<void> {
    const log = this.log.child({ jobId });
    const options: OnaRunOptionsInputV1 = { ...this.config.run_defaults };
    if (input.options.channel !== undefined) options.channel = input.options.channel;
    if (input.options.atn_min !== undefined) options.atn_min = input.options.atn_min;
    log.info({ channel: options.channel, atn_min: options.atn_min, weather: input.weatherPath !== null }, "job started");

    try {
      const aethalometerBytes = (await fs.promises.stat(input.aethalometerPath)).size;
      const result = await runOnaPipeline({
        aethalometer: fs.createReadStream(input.aethalometerPath),
        aethalometerBytes,
        maxRowChars: this.config.processor.max_row_chars,
        weather: input.weatherPath ? fs.createReadStream(input.weatherPath) : null,
        options,
        progress: {
          report: (event) => this.onProgress(jobId, event),
          onError: (err, event) => log.warn({ err, percent: event.percent }, "progress update failed"),
        },
      });

      const filename = processedCsvName(result.options.channel, this.now(), jobId);
      this.store.updateProgress({ job_id: jobId, progress: 98, message: "Saving processed data...", ts: this.now() });
      await writeProcessedCsv(result.records, path.join(this.resultsDir, filename));

      const message = `Processing completed successfully: ${result.records.length} records, ${result.ingestion.skipped} rows skipped`;
      this.store.complete({ job_id: jobId, message, results: this.toResults(result, filename), ts: this.now() });
      if (result.weatherWarning) log.warn(result.weatherWarning);
      log.info({ records: result.records.length, skipped: result.ingestion.skipped }, "job completed");
    } catch (err) {
      const message = `Error during processing: ${errorMessage(err)}`;
      this.store.fail({ job_id: jobId, message, ts: this.now() });
      log.error({ err, code: isOnaError(err) ? err.code : "UNEXPECTED" }, "job failed");
    }
  }

  private toResults(result: OnaPipelineResult, downloadPath: string): JobResultsV1 {
    const sample = resultsSampleSize(result.records.length, this.config);
    return {
      channel: result.options.channel,
      atn_min: result.options.atn_min,
      record_count: result.records.length,
      processed_data: result.records.slice(0, sample),
      comparison: result.comparison,
      correlations: result.correlations,
      weather: result.weather,
      weather_warning: result.weatherWarning,
      ingestion: result.ingestion,
      download_path: downloadPath,
    };
  }
}
