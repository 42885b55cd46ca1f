// packages/ona-kernel/src/ingest/headers.ts
//
// Column schema resolution. Runs once per file, on the header row, before any data row.
//
// Normalization (applied to every header cell):
// - trim, drop parenthetical descriptions ("Date local (yyyy/MM/dd)" -> "Date local")
// - collapse whitespace, camelCase the words ("UV BC1" -> "uvBc1")
// - "%" -> "Percent"; "/", ".", "-" removed
//
// Matching is done on a lookup key: the normalized name lowercased with every
// non-alphanumeric character removed ("temperature_c" -> "temperaturec").

import type { ChannelV1, CovariateV1 } from "@bcona/contracts";
import { ConfigurationError } from "../errors";

export function normalizeHeader(header: string): string {
  let s = header.trim().replace(/\s*\(.*?\)\s*/g, " ").trim();
  s = s.replace(/\s+/g, " ");
  const words = s.split(" ");
  const head = (words[0] ?? "").toLowerCase();
  const tail = words.slice(1).map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase());
  return [head, ...tail].join("").replace(/%/g, "Percent").replace(/[\/.-]/g, "");
}

export function headerKey(header: string): string {
  return normalizeHeader(header).toLowerCase().replace(/[^a-z0-9]/g, "");
}

export type TimestampColumns =
  | { kind: "single"; index: number }
  | { kind: "split"; dateIndex: number; timeIndex: number };

export type ReadingSchema = {
  channel: ChannelV1;
  columns: string[]; // normalized names, positional
  bcIndex: number;
  atnIndex: number;
  timestamp: TimestampColumns;
};

function findChannelColumn(keys: string[], channel: ChannelV1, quantity: "bc" | "atn"): number {
  const ch = channel.toLowerCase();
  const exact = keys.indexOf(`${ch}${quantity}1`);
  if (exact !== -1) return exact;
  // Spot 1 variants, e.g. "Blue BC 1 corrected".
  return keys.findIndex((k) => k.startsWith(ch) && k.includes(quantity) && k.includes("1"));
}

function findTimestampColumns(keys: string[]): TimestampColumns | null {
  const single = keys.findIndex((k) => k === "timestamp" || k === "datetime");
  if (single !== -1) return { kind: "single", index: single };

  // "Date / time local" carries both parts in one cell.
  const combined = keys.findIndex((k) => k.includes("date") && k.includes("time"));
  if (combined !== -1) return { kind: "single", index: combined };

  const dateIndex = keys.findIndex((k) => k.includes("date"));
  let timeIndex = keys.findIndex((k) => k.includes("time") && k.includes("local"));
  if (timeIndex === -1) timeIndex = keys.findIndex((k) => k.includes("time"));
  if (dateIndex !== -1 && timeIndex !== -1) return { kind: "split", dateIndex, timeIndex };
  return null;
}

/**
 * Binds the reading roles (timestamp, concentration, attenuation) of `channel` to row positions.
 * Throws ConfigurationError when the channel or the timestamp is not in the header.
 */
export function resolveReadingSchema(header: string[], channel: ChannelV1): ReadingSchema {
  const columns = header.map(normalizeHeader);
  const keys = header.map(headerKey);

  const bcIndex = findChannelColumn(keys, channel, "bc");
  const atnIndex = findChannelColumn(keys, channel, "atn");
  const missing: string[] = [];
  if (bcIndex === -1) missing.push(`${channel} BC1`);
  if (atnIndex === -1) missing.push(`${channel} ATN1`);
  if (missing.length) {
    throw new ConfigurationError(`Could not find ${channel} ATN and BC columns (missing: ${missing.join(", ")})`);
  }

  const timestamp = findTimestampColumns(keys);
  if (!timestamp) {
    throw new ConfigurationError("Could not find a timestamp column (expected Timestamp, or Date and Time columns)");
  }

  return { channel, columns, bcIndex, atnIndex, timestamp };
}

// Lookup keys accepted per covariate. Order inside a list does not matter; the first
// header column matching any alias wins.
const COVARIATE_ALIASES: Record<CovariateV1, string[]> = {
  temperature: ["temperaturec", "temperature", "tempc", "temp", "airtemperature", "airtemp"],
  humidity: ["relativehumiditypercent", "relativehumidity", "humiditypercent", "humidity", "rh", "relhumid"],
  windSpeed: ["windspeedkmh", "windspeedms", "windspeed", "wind"],
  pressure: ["pressurehpa", "pressuremb", "pressure", "press", "airpressure"],
};

export type WeatherSchema = {
  timestampIndex: number;
  covariates: Array<{ covariate: CovariateV1; index: number }>;
};

export function covariateForHeader(header: string): CovariateV1 | null {
  const key = headerKey(header);
  for (const [covariate, aliases] of Object.entries(COVARIATE_ALIASES)) {
    if (aliases.includes(key) && isCovariate(covariate)) return covariate;
  }
  return null;
}

function isCovariate(s: string): s is CovariateV1 {
  return Object.prototype.hasOwnProperty.call(COVARIATE_ALIASES, s);
}

export function resolveWeatherSchema(header: string[]): WeatherSchema {
  const keys = header.map(headerKey);
  let timestampIndex = keys.indexOf("timestamp");
  if (timestampIndex === -1) timestampIndex = keys.findIndex((k) => k.includes("time") || k.includes("date"));
  if (timestampIndex === -1) {
    throw new ConfigurationError("Weather data has no timestamp column");
  }

  const seen = new Set<CovariateV1>();
  const covariates: WeatherSchema["covariates"] = [];
  header.forEach((h, index) => {
    if (index === timestampIndex) return;
    const covariate = covariateForHeader(h);
    if (!covariate || seen.has(covariate)) return;
    seen.add(covariate);
    covariates.push({ covariate, index });
  });

  return { timestampIndex, covariates };
}
