import { z } from "zod";

/**
 * ReadingV1Schema
 *
 * One aethalometer row reduced to the selected channel.
 * Missing concentration is null (never NaN).
 */
export const ReadingV1Schema = z.object({
  ts: z.number().int().finite(), // unix ms
  atn: z.number().finite(),
  rawBC: z.number().finite().nullable(),
});

export type ReadingV1 = z.infer<typeof ReadingV1Schema>;
