import { z } from "zod";
import { ChannelV1 } from "./channel_v1";

const DEFAULT_ATN_MIN = 0.01;

export const OnaRunOptionsV1Schema = z
  .object({
    channel: ChannelV1.default("Blue"),
    // domain (0, 1]
    atn_min: z.number().finite().gt(0).lte(1).default(DEFAULT_ATN_MIN),
    chunk_size: z.number().int().positive().default(10_000),
    progress_every_windows: z.number().int().positive().default(1000),
    tolerance_ms: z.number().int().nonnegative().default(30 * 60_000),
    min_pairs: z.number().int().min(2).default(2),
  })
  .strict();

export type OnaRunOptionsV1 = z.infer<typeof OnaRunOptionsV1Schema>;
export type OnaRunOptionsInputV1 = z.input<typeof OnaRunOptionsV1Schema>;
