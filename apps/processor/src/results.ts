import { z } from "zod";
import {
  ChannelV1,
  ComparisonStatsV1Schema,
  CorrelationReportV1Schema,
  ProcessedRecordV1Schema,
} from "@bcona/contracts";

const count = z.number().int().nonnegative();

/** Results attached to a completed job, as served by GET /api/status/:jobId. */
export const JobResultsV1Schema = z.object({
  channel: ChannelV1,
  atn_min: z.number(),
  record_count: count,
  processed_data: z.array(ProcessedRecordV1Schema),
  comparison: ComparisonStatsV1Schema,
  correlations: CorrelationReportV1Schema.nullable(),
  weather: z
    .object({
      rows: count,
      skipped: count,
      samples: count,
      covariates: z.array(z.string()),
    })
    .nullable(),
  weather_warning: z.string().nullable(),
  ingestion: z.object({
    rows: count,
    accepted: count,
    skipped: count,
    skipReasons: z.object({ malformed: count, timestamp: count, atn: count }),
    outOfOrder: count,
  }),
  download_path: z.string().min(1),
});

export type JobResultsV1 = z.infer<typeof JobResultsV1Schema>;
