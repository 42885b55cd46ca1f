import type { Readable } from "node:stream";
import type { CovariateV1, WeatherSampleV1 } from "@bcona/contracts";

import { ConfigurationError } from "../errors";
import { CsvRowReader, type CsvRowReaderOptions } from "./csv_rows";
import { resolveWeatherSchema } from "./headers";
import { parseNumberCell, parseTimestamp } from "./values";

export type WeatherReadResult = {
  samples: WeatherSampleV1[]; // sorted by ts, stable
  covariates: CovariateV1[]; // recognised columns, header order
  rows: number;
  skipped: number;
};

/**
 * Reads a weather CSV into samples. Columns that are not a known covariate are ignored;
 * rows without a parsable timestamp are skipped. A file with no timestamp column is a
 * ConfigurationError.
 */
export async function readWeatherSamples(
  input: Readable,
  options: CsvRowReaderOptions = {}
): Promise<WeatherReadResult> {
  const reader = new CsvRowReader(input, options);
  try {
    const header = await reader.next();
    if (header === null) throw new ConfigurationError("Weather data is empty (no header row)");
    const schema = resolveWeatherSchema(header);

    const samples: WeatherSampleV1[] = [];
    let rows = 0;
    let skipped = 0;
    for (;;) {
      const cells = await reader.next();
      if (cells === null) break;
      rows++;
      const ts = parseTimestamp(cells[schema.timestampIndex]);
      if (ts === null) {
        skipped++;
        continue;
      }
      const covariates: WeatherSampleV1["covariates"] = {};
      for (const { covariate, index } of schema.covariates) {
        covariates[covariate] = parseNumberCell(cells[index]);
      }
      samples.push({ ts, covariates });
    }

    samples.sort((a, b) => a.ts - b.ts);
    return {
      samples,
      covariates: schema.covariates.map((c) => c.covariate),
      rows: rows + reader.malformedRows,
      skipped: skipped + reader.malformedRows,
    };
  } finally {
    reader.close();
  }
}
