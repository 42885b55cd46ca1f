import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { parseOnaConfig, type OnaConfigV1, type ProcessorSettings } from "../config";

export const AETH_CSV = [
  "Timestamp,Blue BC1,Blue ATN1,UV BC1,UV ATN1",
  "2023-01-01 00:00:00,100,0.000,1,0.1",
  "2023-01-01 00:01:00,110,0.005,1,0.1",
  "2023-01-01 00:02:00,120,0.012,1,0.1",
  "2023-01-01 00:03:00,130,0.020,1,0.1",
  "2023-01-01 00:04:00,140,0.030,1,0.1",
].join("\n") + "\n";

export const WEATHER_CSV = [
  "Timestamp,Temperature (C),Relative Humidity (%)",
  "2023-01-01 00:02:00,5,40",
  "2023-01-01 00:04:00,6,NA",
].join("\n") + "\n";

export const PROCESSED_CSV = [
  "timestamp,rawBC,processedBC,atn,windowSize,thresholdReached",
  "2023-01-01T00:02:00.000Z,120,110,0.012,3,true",
  "2023-01-01T00:04:00.000Z,140,135,0.03,2,true",
].join("\n") + "\n";

export function testConfig(): OnaConfigV1 {
  return parseOnaConfig(
    {
      schema_version: "1.0.0",
      run_defaults: {
        channel: "Blue",
        atn_min: 0.01,
        chunk_size: 10000,
        progress_every_windows: 1000,
        tolerance_ms: 1800000,
        min_pairs: 2,
      },
      processor: { upload_limit_bytes: 1048576, results_sample_min: 100, results_sample_max: 1000 },
    },
    "test"
  );
}

export function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "bcona-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testSettings(dataDir: string): ProcessorSettings {
  return {
    port: 0,
    host: "127.0.0.1",
    repoRoot: dataDir,
    uploadDir: path.join(dataDir, "uploads"),
    resultsDir: path.join(dataDir, "results"),
    dbPath: ":memory:",
    corsOrigin: "*",
    config: testConfig(),
  };
}
