import { z } from "zod";
import { CovariateV1 } from "./weather_sample_v1";

const Coefficient = z.number().min(-1).max(1);
const PValue = z.number().min(0).max(1);

export const CorrelationOkV1Schema = z.object({
  status: z.literal("ok"),
  pearson_r: Coefficient,
  pearson_p: PValue,
  spearman_r: Coefficient,
  spearman_p: PValue,
  pairs: z.number().int().min(2),
});

export const CorrelationInsufficientV1Schema = z.object({
  status: z.literal("insufficient_data"),
  pairs: z.number().int().nonnegative(),
  min_pairs: z.number().int().min(2),
});

export const CorrelationErrorV1Schema = z.object({
  status: z.literal("computation_error"),
  pairs: z.number().int().nonnegative(),
  reason: z.string().min(1),
});

export const CorrelationResultV1Schema = z.discriminatedUnion("status", [
  CorrelationOkV1Schema,
  CorrelationInsufficientV1Schema,
  CorrelationErrorV1Schema,
]);

export type CorrelationResultV1 = z.infer<typeof CorrelationResultV1Schema>;

export const TimeSpanV1Schema = z.object({
  startTs: z.number().int(),
  endTs: z.number().int(),
});

export type TimeSpanV1 = z.infer<typeof TimeSpanV1Schema>;

export const WeatherOverlapV1Schema = z.object({
  weather_span: TimeSpanV1Schema.nullable(),
  aethalometer_span: TimeSpanV1Schema.nullable(),
  points_in_overlap: z.number().int().nonnegative(),
});

export type WeatherOverlapV1 = z.infer<typeof WeatherOverlapV1Schema>;

export const CorrelationReportV1Schema = z.object({
  covariates: z.record(CovariateV1, CorrelationResultV1Schema),
  overlap: WeatherOverlapV1Schema,
});

export type CorrelationReportV1 = {
  covariates: Partial<Record<CovariateV1, CorrelationResultV1>>;
  overlap: WeatherOverlapV1;
};

// rawBC vs processedBC over the record sequence
export const ComparisonStatsV1Schema = z.object({
  correlation: CorrelationResultV1Schema,
  data_points: z.number().int().nonnegative(),
  null_percentage: z.number().min(0).max(100),
});

export type ComparisonStatsV1 = z.infer<typeof ComparisonStatsV1Schema>;
