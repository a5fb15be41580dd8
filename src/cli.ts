#!/usr/bin/env node
import { USAGE, UsageError, runCommand } from "./commands.js";
import { loadConfigFromEnvFile } from "./config.js";
import { CatalogError, ImportFailedError } from "./errors.js";
import { setLogLevel } from "./logger.js";
import { SqliteComponentStore } from "./sqliteStore.js";

async function main(argv: string[]): Promise<void> {
  const [command] = argv;
  if (!command || command === "help" || command === "--help") {
    console.log(USAGE);
    return;
  }

  const config = loadConfigFromEnvFile();
  setLogLevel(config.logLevel);
  const store = new SqliteComponentStore(config.dbPath);
  await runCommand(argv, store, { autoCategorize: config.autoCategorize, print: (line) => console.log(line) });
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`${err.message}\n\n${USAGE}`);
    process.exitCode = 2;
    return;
  }
  if (err instanceof ImportFailedError) {
    console.error(`Import failed: ${err.message}`);
    console.error(`Rows kept before the failure: ${err.summary.processed}`);
  } else if (err instanceof CatalogError) {
    console.error(`${err.code}: ${err.message}`);
  } else {
    console.error("Unexpected error:", err);
  }
  process.exitCode = 1;
});
