import assert from "node:assert";
import { test } from "node:test";
import type { ProcessedRecordV1, WeatherSampleV1 } from "@bcona/contracts";

import {
  compareRawProcessed,
  correlatePairs,
  correlateWithWeather,
  joinNearest,
  presentCovariates,
} from "../correlation/engine";
import { MINUTE, T0 } from "./fixtures";

function rec(ts: number, processedBC: number | null, rawBC: number | null = processedBC): ProcessedRecordV1 {
  return { ts, rawBC, processedBC, atn: 0.1, windowSize: 2, thresholdReached: true };
}

function near(actual: number, expected: number, tol = 1e-9): void {
  assert.ok(Math.abs(actual - expected) <= tol, `expected ${expected}, got ${actual}`);
}

const TOLERANCE = 30 * MINUTE;

test("join takes the nearest sample and the earlier one on a tie", () => {
  const samples: WeatherSampleV1[] = [
    { ts: T0 + 15 * MINUTE, covariates: { temperature: 2 } },
    { ts: T0 + 5 * MINUTE, covariates: { temperature: 1 } },
  ];
  const pairs = joinNearest([rec(T0 + 10 * MINUTE, 1), rec(T0 + 14 * MINUTE, 1)], samples, TOLERANCE);
  assert.deepStrictEqual(
    pairs.map((p) => p.sample.covariates.temperature),
    [1, 2]
  );
  // input order untouched
  assert.deepStrictEqual(
    samples.map((s) => s.ts),
    [T0 + 15 * MINUTE, T0 + 5 * MINUTE]
  );
});

test("join drops records with no sample inside the tolerance", () => {
  const samples: WeatherSampleV1[] = [{ ts: T0 + 31 * MINUTE, covariates: { temperature: 1 } }];
  assert.deepStrictEqual(joinNearest([rec(T0, 1)], samples, TOLERANCE), []);
  assert.equal(joinNearest([rec(T0 + MINUTE, 1)], samples, TOLERANCE).length, 1);
  assert.deepStrictEqual(joinNearest([rec(T0, 1)], [], TOLERANCE), []);
});

test("covariates are correlated independently", () => {
  const records = [1, 2, 3, 4].map((bc, i) => rec(T0 + i * 10 * MINUTE, bc));
  const temps = [1, 3, 2, 4];
  const samples: WeatherSampleV1[] = records.map((r, i) => ({
    ts: r.ts,
    covariates: i === 0 ? { temperature: temps[i], humidity: 55, pressure: 1013 } : { temperature: temps[i], pressure: 1013 },
  }));
  samples.push({ ts: T0 + 300 * MINUTE, covariates: { temperature: 99 } });

  const report = correlateWithWeather(records, samples, { toleranceMs: TOLERANCE, minPairs: 2 });

  assert.deepStrictEqual(Object.keys(report.covariates), ["temperature", "humidity", "pressure"]);

  const temperature = report.covariates.temperature;
  assert.ok(temperature && temperature.status === "ok");
  near(temperature.pearson_r, 0.8, 1e-12);
  near(temperature.pearson_p, 0.2);
  near(temperature.spearman_r, 0.8, 1e-12);
  near(temperature.spearman_p, 0.2);
  assert.equal(temperature.pairs, 4);

  assert.deepStrictEqual(report.covariates.humidity, { status: "insufficient_data", pairs: 1, min_pairs: 2 });
  assert.deepStrictEqual(report.covariates.pressure, {
    status: "computation_error",
    pairs: 4,
    reason: "correlation undefined for a constant series",
  });
  assert.equal(report.covariates.windSpeed, undefined);

  assert.deepStrictEqual(report.overlap, {
    weather_span: { startTs: T0, endTs: T0 + 300 * MINUTE },
    aethalometer_span: { startTs: T0, endTs: T0 + 30 * MINUTE },
    points_in_overlap: 4,
  });
});

test("records without processedBC drop out of the pairing only", () => {
  const records = [rec(T0, 1), rec(T0 + MINUTE, null), rec(T0 + 2 * MINUTE, 3)];
  const samples = records.map((r, i) => ({ ts: r.ts, covariates: { humidity: [10, 20, 40][i] } }));
  const report = correlateWithWeather(records, samples, { toleranceMs: TOLERANCE });
  const humidity = report.covariates.humidity;
  assert.ok(humidity && humidity.status === "ok");
  assert.equal(humidity.pairs, 2);
  assert.equal(humidity.pearson_p, 1);
});

test("no weather samples gives an empty report", () => {
  const report = correlateWithWeather([rec(T0, 1)], [], { toleranceMs: TOLERANCE });
  assert.deepStrictEqual(report, {
    covariates: {},
    overlap: { weather_span: null, aethalometer_span: { startTs: T0, endTs: T0 }, points_in_overlap: 0 },
  });
});

test("present covariates follow the declared order", () => {
  const samples: WeatherSampleV1[] = [
    { ts: T0, covariates: { pressure: 1 } },
    { ts: T0, covariates: { windSpeed: null, temperature: 3 } },
  ];
  assert.deepStrictEqual(presentCovariates(samples), ["temperature", "windSpeed", "pressure"]);
});

test("min_pairs is honoured and floored at two", () => {
  assert.deepStrictEqual(correlatePairs([1, 2, 3], [1, 2, 4], 5), { status: "insufficient_data", pairs: 3, min_pairs: 5 });
  assert.deepStrictEqual(correlatePairs([1], [1], 0), { status: "insufficient_data", pairs: 1, min_pairs: 2 });
  assert.equal(correlatePairs([1, 2], [2, 1], 1).status, "ok");
});

test("raw vs processed comparison counts nulls", () => {
  const records = [rec(T0, 2, 1), rec(T0 + MINUTE, 4, 2), rec(T0 + 2 * MINUTE, 7, 3), rec(T0 + 3 * MINUTE, 5, null)];
  const stats = compareRawProcessed(records);
  assert.equal(stats.data_points, 3);
  assert.equal(stats.null_percentage, 25);
  assert.equal(stats.correlation.status, "ok");
  assert.equal(stats.correlation.pairs, 3);
});

test("comparison of an empty sequence", () => {
  assert.deepStrictEqual(compareRawProcessed([]), {
    correlation: { status: "insufficient_data", pairs: 0, min_pairs: 2 },
    data_points: 0,
    null_percentage: 0,
  });
});
