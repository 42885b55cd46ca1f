import { z } from "zod";

export const JobStateV1 = z.enum(["queued", "processing", "completed", "failed"]);

export type JobStateV1 = z.infer<typeof JobStateV1>;

export const TERMINAL_JOB_STATES: ReadonlySet<JobStateV1> = new Set(["completed", "failed"]);

export const JobStatusV1Schema = z.object({
  job_id: z.string().min(1),
  status: JobStateV1,
  progress: z.number().min(0).max(100),
  message: z.string(),
  created_at_ts: z.number().int(),
  updated_at_ts: z.number().int(),
});

export type JobStatusV1 = z.infer<typeof JobStatusV1Schema>;
