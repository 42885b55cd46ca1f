// packages/ona-kernel/src/ingest/reading_source.ts
//
// Aethalometer CSV -> ReadingV1 stream for one wavelength channel.
//
// Contract:
// - The header is resolved into a ReadingSchema before any data row is read;
//   an unknown channel or a missing timestamp is a ConfigurationError.
// - Data rows are pulled one at a time (bounded memory). A row with a missing or
//   unparsable timestamp or attenuation is skipped and counted, never thrown.
//   A missing concentration is kept as rawBC = null.
// - Timestamps are passed through in file order. A reading earlier than the
//   latest timestamp seen is still accepted and counted in outOfOrder.
// - readings() is single-pass.

import type { Readable } from "node:stream";
import type { ChannelV1, ReadingV1 } from "@bcona/contracts";

import { ConfigurationError, ParsingError } from "../errors";
import { ProgressChannel, bandPercent } from "../progress/reporter";
import { CsvRowReader } from "./csv_rows";
import { resolveReadingSchema, type ReadingSchema } from "./headers";
import { parseNumberCell, parseTimestamp } from "./values";

export const INGEST_PROGRESS_FROM = 5;
export const INGEST_PROGRESS_TO = 80;

export type SkipReason = "malformed" | "timestamp" | "atn";

export type ReadingSourceStats = {
  rows: number; // data rows seen (header excluded)
  accepted: number;
  skipped: number;
  skipReasons: Record<SkipReason, number>;
  outOfOrder: number; // accepted readings earlier than the latest timestamp before them
};

export type ReadingSourceOptions = {
  channel: ChannelV1;
  chunkSize: number;
  // Longest CSV line kept; longer lines are skipped as malformed.
  maxRowChars?: number;
  // Size of the input in bytes, when known; drives the progress fraction.
  totalBytes?: number | null;
  progress?: ProgressChannel;
};

export interface ReadingSource {
  readonly schema: ReadingSchema;
  readings(): AsyncGenerator<ReadingV1>;
  stats(): ReadingSourceStats;
}

function cell(cells: string[], index: number): string | undefined {
  return index < cells.length ? cells[index] : undefined;
}

/**
 * Maps one data row onto a reading, or the ParsingError that disqualifies it.
 * `rowNumber` is 1-based and counts the header.
 */
export function rowToReading(cells: string[], schema: ReadingSchema, rowNumber: number): ReadingV1 | ParsingError {
  const tsText =
    schema.timestamp.kind === "single"
      ? cell(cells, schema.timestamp.index)
      : `${cell(cells, schema.timestamp.dateIndex) ?? ""} ${cell(cells, schema.timestamp.timeIndex) ?? ""}`;
  const ts = parseTimestamp(tsText);
  if (ts === null) {
    return new ParsingError("timestamp", rowNumber, `row ${rowNumber}: unparsable timestamp "${tsText ?? ""}"`);
  }

  const atn = parseNumberCell(cell(cells, schema.atnIndex));
  if (atn === null) {
    return new ParsingError("atn", rowNumber, `row ${rowNumber}: missing ${schema.channel} attenuation`);
  }

  return { ts, atn, rawBC: parseNumberCell(cell(cells, schema.bcIndex)) };
}

class CsvReadingSource implements ReadingSource {
  private consumed = false;
  private readonly counters = {
    rows: 0,
    accepted: 0,
    outOfOrder: 0,
    skipReasons: { malformed: 0, timestamp: 0, atn: 0 } satisfies Record<SkipReason, number>,
  };

  constructor(
    private readonly reader: CsvRowReader,
    readonly schema: ReadingSchema,
    private readonly options: ReadingSourceOptions,
    private readonly progress: ProgressChannel
  ) {}

  stats(): ReadingSourceStats {
    const malformed = this.reader.malformedRows;
    const reasons = { ...this.counters.skipReasons, malformed };
    return {
      rows: this.counters.rows + malformed,
      accepted: this.counters.accepted,
      skipped: malformed + reasons.timestamp + reasons.atn,
      skipReasons: reasons,
      outOfOrder: this.counters.outOfOrder,
    };
  }

  async *readings(): AsyncGenerator<ReadingV1> {
    if (this.consumed) throw new Error("reading source already consumed");
    this.consumed = true;

    const chunkSize = Math.max(1, this.options.chunkSize);
    let latestTs = Number.NEGATIVE_INFINITY;
    let chunk = 0;

    try {
      for (;;) {
        const cells = await this.reader.next();
        if (cells === null) break;
        this.counters.rows++;

        const r = rowToReading(cells, this.schema, this.reader.rowCount);
        if (r instanceof ParsingError) {
          this.counters.skipReasons[r.field === "timestamp" ? "timestamp" : "atn"]++;
        } else {
          if (r.ts < latestTs) this.counters.outOfOrder++;
          else latestTs = r.ts;
          this.counters.accepted++;
          yield r;
        }

        if (this.counters.rows % chunkSize === 0) {
          chunk++;
          this.reportChunk(chunk);
        }
      }
    } finally {
      this.reader.close();
    }
  }

  private reportChunk(chunk: number): void {
    const total = this.options.totalBytes;
    const percent =
      total && total > 0
        ? bandPercent(this.reader.bytesRead / total, INGEST_PROGRESS_FROM, INGEST_PROGRESS_TO)
        : this.progress.percent;
    this.progress.report(percent, `Processing chunk ${chunk} (${this.counters.rows} rows read)...`);
  }
}

/**
 * Opens a reading source over an aethalometer CSV stream. Resolves once the
 * header has been read and bound to the channel.
 */
export async function openReadingSource(input: Readable, options: ReadingSourceOptions): Promise<ReadingSource> {
  const progress = options.progress ?? ProgressChannel.silent();
  const reader = new CsvRowReader(input, { maxRowChars: options.maxRowChars });

  let schema: ReadingSchema;
  try {
    const header = await reader.next();
    if (header === null) throw new ConfigurationError("Aethalometer data is empty (no header row)");
    schema = resolveReadingSchema(header, options.channel);
  } catch (err) {
    reader.close();
    throw err;
  }

  progress.report(
    INGEST_PROGRESS_FROM,
    `Using columns: ${schema.columns[schema.atnIndex]} and ${schema.columns[schema.bcIndex]}`
  );
  return new CsvReadingSource(reader, schema, options, progress);
}
