#!/usr/bin/env -S node --import tsx
import { Command } from "commander";
import { resolveSyncConfig, type SyncConfigInput } from "./config.js";
import { runSync } from "./sync.js";

const VERSION = "0.6.0";

export function createProgram(): Command {
  const program = new Command()
    .name("metric-sync")
    .description("Translate the project's semantic layer into a metric-sync document and submit it")
    .version(VERSION)
    .option("--project-dir <dir>", "project root holding the semantic model and metric YAML", ".")
    .option("--manifest-path <path>", "lineage manifest, relative to the project root (default: target/manifest.json)")
    .option("--api-key <key>", "API key for the sync endpoint (env: METRIC_SYNC_API_KEY)")
    .option("--base-url <url>", "base URL of the sync API (env: METRIC_SYNC_BASE_URL)")
    .option("--sync-tag <tag>", "tag identifying this sync (env: METRIC_SYNC_TAG, default: dbt-sync-<timestamp>)")
    .option("--dry-run", "build and validate the document, print it, submit nothing", false)
    .option("--output <file>", "also write the validated document to this file")
    .option("--max-retries <count>", "retries for transient failures (env: METRIC_SYNC_MAX_RETRIES)");

  program.action(async () => {
    const config = resolveSyncConfig(program.opts<SyncConfigInput>());
    const summary = await runSync(config);
    console.info(`[metric-sync.cli] done ${JSON.stringify(summary)}`);
  });
  return program;
}

async function main() {
  await createProgram().parseAsync(process.argv);
}

main().catch((error) => {
  console.error("[metric-sync.cli] failed", error);
  process.exitCode = 1;
});
