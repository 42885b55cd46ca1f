import { z } from "zod";

const ProgressOutcomeV1 = z.enum(["succeeded", "failed"]);

/**
 * ProgressEventV1
 *
 * Emitted by the pipeline, never stored by it. `outcome` is set exactly on
 * the terminal event.
 */
export const ProgressEventV1Schema = z
  .object({
    percent: z.number().min(0).max(100),
    message: z.string(),
    terminal: z.boolean(),
    outcome: ProgressOutcomeV1.optional(),
  })
  .superRefine((v, ctx) => {
    if (v.terminal !== (v.outcome !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "outcome must be present exactly when terminal is true",
        path: ["outcome"],
      });
    }
  });

export type ProgressEventV1 = z.infer<typeof ProgressEventV1Schema>;
