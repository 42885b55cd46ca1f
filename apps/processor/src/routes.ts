import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { ChannelV1 } from "@bcona/contracts";

import type { ProcessorSettings } from "./config";
import { resolveResultFile } from "./export/processed_csv";
import type { JobRuntime } from "./runtime";

const UPLOAD_FIELDS = new Set(["aethalometer_file", "weather_file"]);

const ProcessFieldsSchema = z.object({
  atn_min: z.coerce.number().finite().gt(0).lte(1).optional(),
  wavelength: ChannelV1.optional(),
});

function discard(files: Iterable<string>): void {
  for (const fp of files) fs.rmSync(fp, { force: true });
}

export function registerProcessorRoutes(app: FastifyInstance, runtime: JobRuntime, settings: ProcessorSettings): void {
  // POST /api/process (multipart)
  // - aethalometer_file: required
  // - weather_file: optional
  // - atn_min, wavelength: optional, config run_defaults otherwise
  app.post("/api/process", async (req, reply) => {
    fs.mkdirSync(settings.uploadDir, { recursive: true });
    const fields = new Map<string, string>();
    const saved = new Map<string, string>();

    // consume every part; fields may follow the files
    try {
      for await (const part of req.parts()) {
        if (part.type === "file") {
          if (!UPLOAD_FIELDS.has(part.fieldname) || !part.filename) {
            part.file.resume();
            continue;
          }
          const ext = path.extname(part.filename) || ".csv";
          const fp = path.join(settings.uploadDir, `${Date.now()}_${randomUUID()}${ext}`);
          await pipeline(part.file, fs.createWriteStream(fp));
          const previous = saved.get(part.fieldname);
          if (previous) discard([previous]);
          saved.set(part.fieldname, fp);
        } else if (typeof part.value === "string" && part.value.trim()) {
          fields.set(part.fieldname, part.value.trim());
        }
      }
    } catch (err) {
      discard(saved.values());
      throw err;
    }

    const aethalometerPath = saved.get("aethalometer_file");
    if (!aethalometerPath || fs.statSync(aethalometerPath).size === 0) {
      discard(saved.values());
      return reply.code(400).send({ ok: false, error: "No aethalometer file provided" });
    }

    const parsed = ProcessFieldsSchema.safeParse(Object.fromEntries(fields));
    if (!parsed.success) {
      discard(saved.values());
      const error = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      return reply.code(400).send({ ok: false, error });
    }

    let weatherPath = saved.get("weather_file") ?? null;
    if (weatherPath && fs.statSync(weatherPath).size === 0) {
      discard([weatherPath]);
      weatherPath = null;
    }

    const job = runtime.submit({
      aethalometerPath,
      weatherPath,
      options: { channel: parsed.data.wavelength, atn_min: parsed.data.atn_min },
    });
    req.log.info({ jobId: job.job_id }, "job queued");
    return reply.send({
      job_id: job.job_id,
      status: job.status,
      message: `Processing has started. Poll /api/status/${job.job_id} for updates.`,
    });
  });

  app.get<{ Params: { jobId: string } }>("/api/status/:jobId", async (req, reply) => {
    const job = runtime.status(req.params.jobId);
    if (!job) return reply.code(404).send({ error: "Job not found" });
    return reply.send({
      status: job.status,
      progress: job.progress,
      message: job.message,
      ...(job.results ? { results: job.results } : {}),
    });
  });

  app.get<{ Params: { filename: string } }>("/api/download/:filename", async (req, reply) => {
    const fp = resolveResultFile(settings.resultsDir, req.params.filename);
    if (!fp || !fs.existsSync(fp)) return reply.code(404).send({ error: "File not found" });
    return reply
      .header("content-type", "text/csv; charset=utf-8")
      .header("content-disposition", `attachment; filename="${path.basename(fp)}"`)
      .send(fs.createReadStream(fp));
  });
}
