import assert from "node:assert";
import { test } from "node:test";

import type { JobResultsV1 } from "../results";
import { JobSqliteStore } from "../store/sqlite_store";

const RESULTS: JobResultsV1 = {
  channel: "Blue",
  atn_min: 0.01,
  record_count: 1,
  processed_data: [{ ts: 0, rawBC: 1, processedBC: 1, atn: 0.01, windowSize: 2, thresholdReached: true }],
  comparison: { correlation: { status: "insufficient_data", pairs: 1, min_pairs: 2 }, data_points: 1, null_percentage: 0 },
  correlations: null,
  weather: null,
  weather_warning: null,
  ingestion: { rows: 2, accepted: 2, skipped: 0, skipReasons: { malformed: 0, timestamp: 0, atn: 0 }, outOfOrder: 0 },
  download_path: "processed_Blue.csv",
};

function store(): JobSqliteStore {
  return new JobSqliteStore({ filePath: ":memory:" });
}

test("a job moves from queued through processing to completed", () => {
  const s = store();
  assert.deepStrictEqual(s.createJob({ job_id: "j1", created_at_ts: 10, message: "Queued" }), {
    job_id: "j1",
    status: "queued",
    progress: 0,
    message: "Queued",
    created_at_ts: 10,
    updated_at_ts: 10,
  });

  assert.equal(s.updateProgress({ job_id: "j1", progress: 50, message: "half", ts: 11 }), true);
  assert.equal(s.updateProgress({ job_id: "j1", progress: 30, message: "late", ts: 12 }), true);
  const mid = s.getJob("j1");
  assert.equal(mid?.status, "processing");
  assert.equal(mid?.progress, 50);
  assert.equal(mid?.message, "late");

  assert.equal(s.complete({ job_id: "j1", message: "done", results: RESULTS, ts: 13 }), true);
  assert.deepStrictEqual(s.getJob("j1"), {
    job_id: "j1",
    status: "completed",
    progress: 100,
    message: "done",
    created_at_ts: 10,
    updated_at_ts: 13,
    results: RESULTS,
  });
  s.close();
});

test("terminal jobs never change again", () => {
  const s = store();
  s.createJob({ job_id: "j2", created_at_ts: 1, message: "Queued" });
  s.updateProgress({ job_id: "j2", progress: 40, message: "working", ts: 2 });
  assert.equal(s.fail({ job_id: "j2", message: "boom", ts: 3 }), true);

  assert.equal(s.updateProgress({ job_id: "j2", progress: 90, message: "zombie", ts: 4 }), false);
  assert.equal(s.complete({ job_id: "j2", message: "zombie", results: RESULTS, ts: 5 }), false);
  assert.equal(s.fail({ job_id: "j2", message: "again", ts: 6 }), false);

  const job = s.getJob("j2");
  assert.equal(job?.status, "failed");
  assert.equal(job?.progress, 40);
  assert.equal(job?.message, "boom");
  assert.equal(job?.results, null);
  s.close();
});

test("unknown jobs", () => {
  const s = store();
  assert.equal(s.getJob("nope"), null);
  assert.equal(s.updateProgress({ job_id: "nope", progress: 1, message: "x", ts: 1 }), false);
  s.close();
});

test("unfinished jobs from a previous process are failed", () => {
  const s = store();
  s.createJob({ job_id: "a", created_at_ts: 1, message: "Queued" });
  s.createJob({ job_id: "b", created_at_ts: 1, message: "Queued" });
  s.complete({ job_id: "b", message: "done", results: RESULTS, ts: 2 });
  assert.equal(s.failInterrupted("interrupted", 3), 1);
  assert.equal(s.getJob("a")?.status, "failed");
  assert.equal(s.getJob("b")?.status, "completed");
  s.close();
});
