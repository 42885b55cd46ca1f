import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { ChannelV1, ProcessedRecordV1 } from "@bcona/contracts";

export const PROCESSED_CSV_HEADER = "timestamp,rawBC,processedBC,atn,windowSize,thresholdReached";

function num(v: number | null): string {
  return v === null ? "" : String(v);
}

export function processedCsvRow(r: ProcessedRecordV1): string {
  return [
    new Date(r.ts).toISOString(),
    num(r.rawBC),
    num(r.processedBC),
    num(r.atn),
    String(r.windowSize),
    r.thresholdReached ? "true" : "false",
  ].join(",");
}

function* processedCsvLines(records: Iterable<ProcessedRecordV1>): Generator<string> {
  yield `${PROCESSED_CSV_HEADER}\n`;
  for (const r of records) yield `${processedCsvRow(r)}\n`;
}

export async function writeProcessedCsv(records: Iterable<ProcessedRecordV1>, filePath: string): Promise<void> {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  await pipeline(Readable.from(processedCsvLines(records)), fs.createWriteStream(filePath));
}

/** processed_<channel>_<yyyymmdd_hhmmss>_<jobId>.csv */
export function processedCsvName(channel: ChannelV1, ts: number, jobId: string): string {
  const stamp = new Date(ts).toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
  return `processed_${channel}_${stamp}_${jobId}.csv`;
}

// Download names are bare file names; anything that could leave the results directory is refused.
const SAFE_NAME = /^[A-Za-z0-9][A-Za-z0-9_.-]*\.csv$/;

export function resolveResultFile(resultsDir: string, filename: string): string | null {
  if (!SAFE_NAME.test(filename) || filename.includes("..")) return null;
  const root = path.resolve(resultsDir);
  const fp = path.resolve(root, filename);
  if (path.dirname(fp) !== root) return null;
  return fp;
}
