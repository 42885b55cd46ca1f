import Fastify, { type FastifyInstance } from "fastify";
import multipart from "@fastify/multipart";

import type { ProcessorSettings } from "./config";
import { registerProcessorRoutes } from "./routes";
import { JobRuntime } from "./runtime";
import { JobSqliteStore } from "./store/sqlite_store";

export type ProcessorApp = {
  app: FastifyInstance;
  runtime: JobRuntime;
  store: JobSqliteStore;
};

export async function buildProcessorApp(settings: ProcessorSettings, opts: { logger?: boolean } = {}): Promise<ProcessorApp> {
  const app = Fastify({ logger: opts.logger ?? true });

  await app.register(multipart, {
    limits: { fileSize: settings.config.processor.upload_limit_bytes },
  });

  const corsHeaders: Record<string, string> = {
    "access-control-allow-origin": settings.corsOrigin,
    "access-control-allow-headers": "content-type",
    "access-control-allow-methods": "GET,POST,OPTIONS",
  };
  if (settings.corsOrigin !== "*") corsHeaders.vary = "Origin";

  // Preflights are answered here; no route handles OPTIONS.
  app.addHook("onRequest", async (req, reply) => {
    reply.headers(corsHeaders);
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  const store = new JobSqliteStore({ filePath: settings.dbPath });
  const interrupted = store.failInterrupted("Error during processing: interrupted by a server restart", Date.now());
  if (interrupted) app.log.warn({ interrupted }, "marked unfinished jobs as failed");

  const runtime = new JobRuntime({
    store,
    log: app.log,
    config: settings.config,
    resultsDir: settings.resultsDir,
  });
  registerProcessorRoutes(app, runtime, settings);

  app.addHook("onClose", async () => {
    await runtime.drain();
    store.close();
  });

  return { app, runtime, store };
}
