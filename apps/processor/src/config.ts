// apps/processor/src/config.ts
//
// Processor configuration.
//
// Contract:
// - config/ona/<profile>.json is located under the repo root (ONA_REPO_ROOT, or found by
//   walking up from the working directory) and validated; an invalid file fails startup.
// - .env files never override variables already present in the environment.
// - Paths in the environment are resolved against the repo root.

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { OnaRunOptionsV1Schema } from "@bcona/contracts";
import { ConfigurationError } from "@bcona/ona-kernel";

import { ancestorContaining } from "./util";

export const OnaConfigV1Schema = z
  .object({
    schema_version: z.string().min(1),
    run_defaults: OnaRunOptionsV1Schema,
    processor: z
      .object({
        upload_limit_bytes: z.number().int().positive(),
        results_sample_min: z.number().int().positive(),
        results_sample_max: z.number().int().positive(),
        // Longest aethalometer CSV line read; longer lines are skipped as malformed.
        max_row_chars: z.number().int().positive().default(65536),
      })
      .strict()
      .refine((p) => p.results_sample_min <= p.results_sample_max, {
        message: "results_sample_min must not exceed results_sample_max",
      }),
  })
  .strict();

export type OnaConfigV1 = z.infer<typeof OnaConfigV1Schema>;

export type Env = Record<string, string | undefined>;

const CONFIG_DIR = path.join("config", "ona");

export function resolveRepoRoot(env: Env = process.env, cwd = process.cwd()): string {
  if (env.ONA_REPO_ROOT) return path.resolve(env.ONA_REPO_ROOT);
  const marker = path.join(CONFIG_DIR, "default.json");
  const root = ancestorContaining(cwd, marker);
  if (root === null) throw new ConfigurationError(`no ${marker} above ${cwd}; set ONA_REPO_ROOT`);
  return root;
}

export function parseOnaConfig(raw: unknown, source: string): OnaConfigV1 {
  const parsed = OnaConfigV1Schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`invalid config ${source}: ${detail}`);
  }
  return parsed.data;
}

export function loadOnaConfig(repoRoot: string, profile = "default"): OnaConfigV1 {
  if (!/^[A-Za-z0-9_-]+$/.test(profile)) throw new ConfigurationError(`invalid config profile: ${profile}`);
  const p = path.join(repoRoot, CONFIG_DIR, `${profile}.json`);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`cannot read config ${p}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseOnaConfig(raw, p);
}

const DOTENV_LINE = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

/** KEY=value pairs of a .env file. Comments, blank and unrecognised lines are ignored; one level of quotes is removed. */
export function parseDotEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const m = DOTENV_LINE.exec(line.trim());
    if (!m) continue;
    const value = m[2];
    const quoted = value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0]);
    out[m[1]] = quoted ? value.slice(1, -1) : value;
  }
  return out;
}

function readDotEnv(fp: string): Record<string, string> {
  return fs.existsSync(fp) ? parseDotEnv(fs.readFileSync(fp, "utf8")) : {};
}

/** Repo root .env first, then the app directory's; the app file only fills keys still unset. */
export function loadEnv(repoRoot: string, appDir: string, env: Env = process.env): void {
  for (const fp of [path.join(repoRoot, ".env"), path.join(appDir, ".env")]) {
    for (const [key, value] of Object.entries(readDotEnv(fp))) {
      if (env[key] === undefined) env[key] = value;
    }
  }
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3210),
  HOST: z.string().min(1).default("0.0.0.0"),
  ONA_CONFIG_PROFILE: z.string().min(1).default("default"),
  ONA_DATA_DIR: z.string().min(1).optional(),
  ONA_DB_PATH: z.string().min(1).optional(),
  ONA_CORS_ORIGIN: z.string().min(1).default("*"),
});

export type ProcessorSettings = {
  port: number;
  host: string;
  repoRoot: string;
  uploadDir: string;
  resultsDir: string;
  dbPath: string;
  // Access-Control-Allow-Origin sent on every response.
  corsOrigin: string;
  config: OnaConfigV1;
};

export function loadSettings(repoRoot: string, env: Env = process.env): ProcessorSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`invalid environment: ${detail}`);
  }
  const e = parsed.data;
  const dataDir = path.resolve(repoRoot, e.ONA_DATA_DIR ?? path.join("apps", "processor", "data"));
  return {
    port: e.PORT,
    host: e.HOST,
    repoRoot,
    uploadDir: path.join(dataDir, "uploads"),
    resultsDir: path.join(dataDir, "results"),
    dbPath: e.ONA_DB_PATH ? path.resolve(repoRoot, e.ONA_DB_PATH) : path.join(dataDir, "jobs.sqlite"),
    corsOrigin: e.ONA_CORS_ORIGIN,
    config: loadOnaConfig(repoRoot, e.ONA_CONFIG_PROFILE),
  };
}

/** Results sample size: a tenth of the records, kept within the configured bounds. */
export function resultsSampleSize(recordCount: number, config: OnaConfigV1): number {
  const { results_sample_min, results_sample_max } = config.processor;
  return Math.min(results_sample_max, Math.max(results_sample_min, Math.floor(recordCount / 10)));
}
