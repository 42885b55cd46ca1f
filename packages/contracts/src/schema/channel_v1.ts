// packages/contracts/src/schema/channel_v1.ts
import { z } from "zod";

/**
 * ChannelV1
 * ---------
 * Wavelength channels reported by the aethalometer. Fixed set; the reading
 * source refuses anything else before touching a data row.
 */
export const ChannelV1 = z.enum(["UV", "Blue", "Green", "Red", "IR"]);

export type ChannelV1 = z.infer<typeof ChannelV1>;
