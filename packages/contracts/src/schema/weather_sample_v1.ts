import { z } from "zod";

/**
 * CovariateV1
 * -----------
 * Weather covariates the correlation engine knows about. Columns that map to
 * none of these are ignored at ingestion.
 */
export const CovariateV1 = z.enum(["temperature", "humidity", "windSpeed", "pressure"]);

export type CovariateV1 = z.infer<typeof CovariateV1>;

export const WeatherSampleV1Schema = z.object({
  ts: z.number().int().finite(),
  covariates: z.record(CovariateV1, z.number().finite().nullable()),
});

export type WeatherSampleV1 = z.infer<typeof WeatherSampleV1Schema>;
