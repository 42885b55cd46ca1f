import { z } from "zod";

// One closed ONA window. ts/rawBC/atn describe the last reading of the window;
// processedBC is the mean over the window's present rawBC values.
export const ProcessedRecordV1Schema = z.object({
  ts: z.number().int().finite(),
  rawBC: z.number().finite().nullable(),
  processedBC: z.number().finite().nullable(),
  atn: z.number().finite().nullable(),
  windowSize: z.number().int().positive(),
  // false only for the trailing window flushed at end of input
  thresholdReached: z.boolean(),
});

export type ProcessedRecordV1 = z.infer<typeof ProcessedRecordV1Schema>;
