import assert from "node:assert";
import { test } from "node:test";

import { ConfigurationError } from "../errors";
import { readWeatherSamples } from "../ingest/weather_source";
import { csvStream } from "./fixtures";

test("weather rows become sorted samples over known covariates", async () => {
  const res = await readWeatherSamples(
    csvStream([
      "Timestamp,Temperature (C),Relative Humidity (%),Wind Direction,Pressure (hPa)",
      "2023-01-01 01:00:00,5.5,80,180,1012",
      "2023-01-01 00:00:00,5.0,NA,170,1013",
      "not-a-date,1,1,1,1",
    ])
  );

  assert.deepStrictEqual(res.covariates, ["temperature", "humidity", "pressure"]);
  assert.deepStrictEqual(res.samples, [
    { ts: Date.UTC(2023, 0, 1, 0), covariates: { temperature: 5, humidity: null, pressure: 1013 } },
    { ts: Date.UTC(2023, 0, 1, 1), covariates: { temperature: 5.5, humidity: 80, pressure: 1012 } },
  ]);
  assert.equal(res.rows, 3);
  assert.equal(res.skipped, 1);
});

test("weather data without a timestamp column is a configuration error", async () => {
  await assert.rejects(readWeatherSamples(csvStream(["Temperature,Humidity", "1,2"])), ConfigurationError);
});
