import path from "node:path";
import { fileURLToPath } from "node:url";

import { buildProcessorApp } from "./app";
import { loadEnv, loadSettings, resolveRepoRoot } from "./config";

async function main(): Promise<void> {
  // repo root .env, then the app's own
  const appDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
  loadEnv(path.resolve(appDir, "..", ".."), appDir);

  const settings = loadSettings(resolveRepoRoot());
  const { app } = await buildProcessorApp(settings);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "shutdown failed");
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port: settings.port, host: settings.host });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
