import { config as loadDotenv } from "dotenv";
import { runInteractiveSync } from "./interactive";
import { createSyncEngine, exitCodeFor, runSync } from "@/sync";
import { loadConfig } from "@/sync/config/env";
import { ConfigError, errorMessage } from "@/sync/errors";
import { createChildLogger, setLogLevel } from "@/sync/logger";

loadDotenv();

const log = createChildLogger("cli");

const args = process.argv.slice(2);
const isFull = args.includes("--full");
const isInteractive = args.includes("--interactive");
const restartFullScan = args.includes("--restart");

async function main(): Promise<number> {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);
  const dryRun = args.includes("--dry-run") || config.dryRun;

  const controller = new AbortController();
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      log.warn(`Received ${signal}, finishing the in-flight batch before exiting`);
      controller.abort(new Error(`Received ${signal}`));
    });
  }

  if (isInteractive) {
    return runInteractiveSync({ ...config, dryRun }, controller.signal);
  }

  const engine = createSyncEngine(config);
  try {
    const summary = await runSync(engine.deps, config, {
      mode: isFull ? "full" : "incremental",
      dryRun,
      restartFullScan,
      signal: controller.signal,
    });
    console.log(JSON.stringify(summary, null, 2));
    return exitCodeFor(summary);
  } finally {
    await engine.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err instanceof ConfigError ? err.message : `Sync failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
