import { promises as fs } from "node:fs";
import path from "node:path";
import { buildSyncDocument, parseSemanticLayer, type SyncDocument } from "@metric-sync/core";
import { ConfigurationError, type SyncConfig } from "./config.js";
import { loadSemanticLayerSources } from "./loaders.js";
import { MetricSyncClient, type SyncResponse } from "./syncClient.js";

export type SyncLogger = Pick<Console, "info" | "warn">;

export type SyncDependencies = {
  logger?: SyncLogger;
  /** Receives the pretty-printed document on a dry run. */
  print?: (text: string) => void;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

export type SyncSummary = {
  syncTag: string;
  yamlFiles: number;
  factSources: number;
  metrics: number;
  dryRun: boolean;
  submitted: boolean;
  outputPath: string | null;
  response: SyncResponse | null;
};

export async function runSync(config: SyncConfig, deps: SyncDependencies = {}): Promise<SyncSummary> {
  const logger = deps.logger ?? console;
  const print = deps.print ?? ((text: string) => console.log(text));

  logger.info(`[metric-sync.cli] loading manifest ${config.manifestPath} and YAML under ${config.projectDir}`);
  const sources = await loadSemanticLayerSources(config);
  const layer = parseSemanticLayer(sources);
  const summary: SyncSummary = {
    syncTag: config.syncTag,
    yamlFiles: sources.files.length,
    factSources: 0,
    metrics: 0,
    dryRun: config.dryRun,
    submitted: false,
    outputPath: config.outputPath,
    response: null,
  };
  logger.info(
    `[metric-sync] parsed ${layer.semanticModels.length} semantic models and ${layer.metrics.length} metrics from ${sources.files.length} YAML files`,
  );
  // Metrics without semantic models still go through the build so their measures fail to resolve.
  if (layer.semanticModels.length === 0 && layer.metrics.length === 0) {
    logger.warn("[metric-sync] no semantic models or metrics found; nothing to sync");
    return summary;
  }

  const document = buildSyncDocument(layer, { syncTag: config.syncTag });
  summary.factSources = document.fact_sources.length;
  summary.metrics = document.metrics.length;
  logger.info(
    `[metric-sync] document '${config.syncTag}' validated with ${summary.factSources} fact sources and ${summary.metrics} metrics`,
  );

  if (config.outputPath) {
    await writeDocument(config.outputPath, document);
    logger.info(`[metric-sync.cli] wrote document to ${config.outputPath}`);
  }
  if (config.dryRun) {
    print(JSON.stringify(document, null, 2));
    logger.info("[metric-sync.cli] dry run: nothing submitted");
    return summary;
  }
  if (!config.apiKey) {
    throw new ConfigurationError("An API key is required to submit the document");
  }

  const client = new MetricSyncClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    maxRetries: config.maxRetries,
    fetchImpl: deps.fetchImpl,
    sleep: deps.sleep,
    logger,
  });
  summary.response = await client.syncDocument(document);
  summary.submitted = true;
  logger.info(`[metric-sync.cli] sync '${config.syncTag}' accepted by ${client.endpoint}`);
  return summary;
}

async function writeDocument(outputPath: string, document: SyncDocument): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
}
