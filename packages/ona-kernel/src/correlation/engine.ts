// packages/ona-kernel/src/correlation/engine.ts
//
// Processed records x weather covariates.
//
// Contract:
// - Read-only: inputs are never mutated or reordered (sorting happens on a copy).
// - Join: each record takes the weather sample nearest in time within tolerance
//   (ties go to the earlier sample). A record without a sample only drops out of
//   the pairing, never out of the record set.
// - Per covariate: pairs with a null on either side are excluded; fewer than
//   min_pairs valid pairs -> insufficient_data; a ComputationError -> computation_error.
//   One covariate never affects another.

import {
  CovariateV1,
  type ComparisonStatsV1,
  type CorrelationReportV1,
  type CorrelationResultV1,
  type ProcessedRecordV1,
  type TimeSpanV1,
  type WeatherSampleV1,
} from "@bcona/contracts";

import { ComputationError } from "../errors";
import { correlationPValue, pearson, spearman } from "./stats";

export const MIN_PAIRS_FLOOR = 2;

export type CorrelationOptions = {
  toleranceMs: number;
  minPairs?: number;
};

export type JoinedPair = {
  record: ProcessedRecordV1;
  sample: WeatherSampleV1;
};

function byTs(a: { ts: number }, b: { ts: number }): number {
  return a.ts - b.ts;
}

// First index whose ts is >= target.
function lowerBound(sorted: readonly WeatherSampleV1[], target: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid].ts < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

export function joinNearest(
  records: readonly ProcessedRecordV1[],
  samples: readonly WeatherSampleV1[],
  toleranceMs: number
): JoinedPair[] {
  const sorted = [...samples].sort(byTs);
  const out: JoinedPair[] = [];
  if (!sorted.length) return out;

  for (const record of records) {
    const i = lowerBound(sorted, record.ts);
    const before = i > 0 ? sorted[i - 1] : null;
    const after = i < sorted.length ? sorted[i] : null;
    let best = before;
    if (after && (!best || after.ts - record.ts < record.ts - best.ts)) best = after;
    if (best && Math.abs(best.ts - record.ts) <= toleranceMs) out.push({ record, sample: best });
  }
  return out;
}

/** Correlates paired values; never throws for a data shortfall. */
export function correlatePairs(xs: readonly number[], ys: readonly number[], minPairs = MIN_PAIRS_FLOOR): CorrelationResultV1 {
  const floor = Math.max(MIN_PAIRS_FLOOR, minPairs);
  const pairs = Math.min(xs.length, ys.length);
  if (pairs < floor) return { status: "insufficient_data", pairs, min_pairs: floor };

  try {
    const pearson_r = pearson(xs, ys);
    const spearman_r = spearman(xs, ys);
    return {
      status: "ok",
      pearson_r,
      pearson_p: correlationPValue(pearson_r, pairs),
      spearman_r,
      spearman_p: correlationPValue(spearman_r, pairs),
      pairs,
    };
  } catch (err) {
    if (err instanceof ComputationError) return { status: "computation_error", pairs, reason: err.message };
    throw err;
  }
}

function span(items: ReadonlyArray<{ ts: number }>): TimeSpanV1 | null {
  if (!items.length) return null;
  let startTs = Number.POSITIVE_INFINITY;
  let endTs = Number.NEGATIVE_INFINITY;
  for (const it of items) {
    if (it.ts < startTs) startTs = it.ts;
    if (it.ts > endTs) endTs = it.ts;
  }
  return { startTs, endTs };
}

/** Covariates present in at least one sample, in CovariateV1 order. */
export function presentCovariates(samples: readonly WeatherSampleV1[]): CovariateV1[] {
  const present = new Set<CovariateV1>();
  for (const s of samples) {
    for (const c of CovariateV1.options) {
      if (c in s.covariates) present.add(c);
    }
  }
  return CovariateV1.options.filter((c) => present.has(c));
}

export function correlateWithWeather(
  records: readonly ProcessedRecordV1[],
  samples: readonly WeatherSampleV1[],
  options: CorrelationOptions
): CorrelationReportV1 {
  const joined = joinNearest(records, samples, options.toleranceMs);

  const covariates: CorrelationReportV1["covariates"] = {};
  for (const c of presentCovariates(samples)) {
    const xs: number[] = [];
    const ys: number[] = [];
    for (const { record, sample } of joined) {
      const y = sample.covariates[c];
      if (record.processedBC === null || y === null || y === undefined) continue;
      xs.push(record.processedBC);
      ys.push(y);
    }
    covariates[c] = correlatePairs(xs, ys, options.minPairs);
  }

  const aethalometer_span = span(records);
  const points_in_overlap = aethalometer_span
    ? samples.filter((s) => s.ts >= aethalometer_span.startTs && s.ts <= aethalometer_span.endTs).length
    : 0;

  return {
    covariates,
    overlap: { weather_span: span(samples), aethalometer_span, points_in_overlap },
  };
}

/** rawBC vs processedBC over the record sequence. */
export function compareRawProcessed(records: readonly ProcessedRecordV1[], minPairs = MIN_PAIRS_FLOOR): ComparisonStatsV1 {
  const xs: number[] = [];
  const ys: number[] = [];
  for (const r of records) {
    if (r.rawBC === null || r.processedBC === null) continue;
    xs.push(r.rawBC);
    ys.push(r.processedBC);
  }
  return {
    correlation: correlatePairs(xs, ys, minPairs),
    data_points: xs.length,
    null_percentage: records.length ? (1 - xs.length / records.length) * 100 : 0,
  };
}
