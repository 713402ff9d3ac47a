import path from "node:path";
import { MetricSyncError } from "@metric-sync/core";

export const DEFAULT_BASE_URL = "https://eppo.cloud";
export const DEFAULT_MAX_RETRIES = 3;

export type SyncConfig = {
  projectDir: string;
  manifestPath: string;
  apiKey: string | null;
  baseUrl: string;
  syncTag: string;
  dryRun: boolean;
  /** Where to also write the validated document, if anywhere. */
  outputPath: string | null;
  maxRetries: number;
};

/** Raw option values as they come off the command line. */
export type SyncConfigInput = {
  projectDir?: string;
  manifestPath?: string;
  apiKey?: string;
  baseUrl?: string;
  syncTag?: string;
  dryRun?: boolean;
  output?: string;
  maxRetries?: string | number;
};

export class ConfigurationError extends MetricSyncError {
  constructor(message: string) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

/**
 * Flags win over environment variables, which win over defaults. Resolved once per run.
 */
export function resolveSyncConfig(
  input: SyncConfigInput,
  env: NodeJS.ProcessEnv = process.env,
  now: () => Date = () => new Date(),
): SyncConfig {
  const projectDir = path.resolve(nonEmpty(input.projectDir) ?? ".");
  const manifestPath = path.resolve(projectDir, nonEmpty(input.manifestPath) ?? path.join("target", "manifest.json"));
  const apiKey = nonEmpty(input.apiKey) ?? nonEmpty(env.METRIC_SYNC_API_KEY) ?? nonEmpty(env.EPPO_API_KEY) ?? null;
  const dryRun = input.dryRun === true;
  if (!apiKey && !dryRun) {
    throw new ConfigurationError(
      "An API key is required: pass --api-key or set METRIC_SYNC_API_KEY (use --dry-run to skip submission)",
    );
  }
  const output = nonEmpty(input.output);
  return {
    projectDir,
    manifestPath,
    apiKey,
    baseUrl: parseBaseUrl(nonEmpty(input.baseUrl) ?? nonEmpty(env.METRIC_SYNC_BASE_URL) ?? DEFAULT_BASE_URL),
    syncTag: nonEmpty(input.syncTag) ?? nonEmpty(env.METRIC_SYNC_TAG) ?? `dbt-sync-${now().toISOString()}`,
    dryRun,
    outputPath: output ? path.resolve(output) : null,
    maxRetries: parseMaxRetries(input.maxRetries ?? nonEmpty(env.METRIC_SYNC_MAX_RETRIES) ?? DEFAULT_MAX_RETRIES),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseBaseUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigurationError(`Invalid base URL '${value}'`);
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ConfigurationError(`Base URL '${value}' must use http or https`);
  }
  return value.replace(/\/+$/, "");
}

function parseMaxRetries(value: string | number): number {
  const parsed = typeof value === "number" ? value : value.trim() === "" ? Number.NaN : Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError(`Max retries must be a non-negative integer, received '${value}'`);
  }
  return parsed;
}
