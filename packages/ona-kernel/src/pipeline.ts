// packages/ona-kernel/src/pipeline.ts
//
// One job: Reading Source -> ONA Engine -> Correlation Engine.
//
// Sequential and pull-based; no state is shared between calls. Progress bands:
//   0 start | 5..80 ingestion + ONA | 82 weather | 85..95 correlation | 100 done
// A failure emits a terminal "failed" event at the last percent and rethrows.

import type { Readable } from "node:stream";
import {
  OnaRunOptionsV1Schema,
  type ComparisonStatsV1,
  type CorrelationReportV1,
  type OnaRunOptionsInputV1,
  type OnaRunOptionsV1,
  type ProcessedRecordV1,
} from "@bcona/contracts";

import { ConfigurationError } from "./errors";
import { compareRawProcessed, correlateWithWeather } from "./correlation/engine";
import { openReadingSource, type ReadingSourceStats } from "./ingest/reading_source";
import { readWeatherSamples } from "./ingest/weather_source";
import { applyOna } from "./ona/engine";
import {
  ProgressChannel,
  createProgressChannel,
  type ProgressErrorHandler,
  type ProgressReporter,
} from "./progress/reporter";

export type OnaPipelineRequest = {
  aethalometer: Readable;
  aethalometerBytes?: number | null;
  // Longest CSV line read from either input; defaults to MAX_ROW_CHARS.
  maxRowChars?: number;
  weather?: Readable | null;
  options?: OnaRunOptionsInputV1;
  // onError receives reporter failures; the caller decides how to log them.
  progress?: { report: ProgressReporter; onError: ProgressErrorHandler };
};

export type WeatherSummary = {
  rows: number;
  skipped: number;
  samples: number;
  covariates: string[];
};

export type OnaPipelineResult = {
  options: OnaRunOptionsV1;
  records: ProcessedRecordV1[];
  ingestion: ReadingSourceStats;
  comparison: ComparisonStatsV1;
  correlations: CorrelationReportV1 | null;
  weather: WeatherSummary | null;
  // Set when weather data was supplied but could not be used.
  weatherWarning: string | null;
};

export function parseRunOptions(input: OnaRunOptionsInputV1 | undefined): OnaRunOptionsV1 {
  const parsed = OnaRunOptionsV1Schema.safeParse(input ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid run options: ${detail}`);
  }
  return parsed.data;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function runOnaPipeline(req: OnaPipelineRequest): Promise<OnaPipelineResult> {
  const progress = req.progress
    ? createProgressChannel(req.progress.report, req.progress.onError)
    : ProgressChannel.silent();
  progress.report(0, "Starting data processing...");

  try {
    const options = parseRunOptions(req.options);

    const source = await openReadingSource(req.aethalometer, {
      channel: options.channel,
      chunkSize: options.chunk_size,
      totalBytes: req.aethalometerBytes ?? null,
      maxRowChars: req.maxRowChars,
      progress,
    });

    const records: ProcessedRecordV1[] = [];
    for await (const rec of applyOna(source.readings(), {
      atnMin: options.atn_min,
      progressEveryWindows: options.progress_every_windows,
      progress,
    })) {
      records.push(rec);
    }
    const ingestion = source.stats();
    progress.report(80, `ONA algorithm applied: ${records.length} windows from ${ingestion.accepted} readings`);

    let correlations: CorrelationReportV1 | null = null;
    let weather: WeatherSummary | null = null;
    let weatherWarning: string | null = null;
    if (req.weather) {
      progress.report(82, "Processing weather data...");
      try {
        const w = await readWeatherSamples(req.weather, { maxRowChars: req.maxRowChars });
        weather = { rows: w.rows, skipped: w.skipped, samples: w.samples.length, covariates: w.covariates };
        progress.report(85, "Synchronizing aethalometer and weather data...");
        correlations = correlateWithWeather(records, w.samples, {
          toleranceMs: options.tolerance_ms,
          minPairs: options.min_pairs,
        });
      } catch (err) {
        if (!(err instanceof ConfigurationError)) throw err;
        weatherWarning = `Warning: Error processing weather data: ${err.message}`;
        progress.report(85, weatherWarning);
      }
    }

    progress.report(95, "Preparing comparison statistics...");
    const comparison = compareRawProcessed(records, options.min_pairs);

    progress.succeed(
      `Processing completed successfully: ${records.length} records, ${ingestion.skipped} rows skipped`
    );
    return { options, records, ingestion, comparison, correlations, weather, weatherWarning };
  } catch (err) {
    req.aethalometer.destroy();
    req.weather?.destroy();
    progress.fail(`Error during processing: ${errorMessage(err)}`);
    throw err;
  }
}
