import { parseLineageArtifact, parseMetricDefinitions, parseSemanticModels } from "./artifacts.js";
import { buildFactSources } from "./factSources.js";
import { LineageIndex } from "./lineageIndex.js";
import { buildMetrics, planMetrics } from "./metrics.js";
import { createSyncDocumentValidator, type SyncDocumentValidator } from "./schemaValidator.js";
import { SemanticRegistry } from "./semanticRegistry.js";
import type { LineageArtifact, MetricDefinition, SemanticModel, SyncDocument } from "./types.js";

export type SemanticLayer = {
  lineage: LineageArtifact;
  semanticModels: SemanticModel[];
  metrics: MetricDefinition[];
};

export type RawSemanticLayer = {
  manifest: unknown;
  semanticModels: unknown[];
  metrics: unknown[];
};

export type BuildOptions = {
  syncTag?: string | null;
  validator?: SyncDocumentValidator;
};

export function parseSemanticLayer(raw: RawSemanticLayer): SemanticLayer {
  return {
    lineage: parseLineageArtifact(raw.manifest),
    semanticModels: parseSemanticModels(raw.semanticModels),
    metrics: parseMetricDefinitions(raw.metrics),
  };
}

/**
 * Translates the semantic layer into a validated sync document. Every stage is
 * fail-fast: either the whole document is returned or an error is thrown.
 */
export function buildSyncDocument(layer: SemanticLayer, options: BuildOptions = {}): SyncDocument {
  const lineage = new LineageIndex(layer.lineage);
  const registry = new SemanticRegistry(layer.semanticModels);
  const plans = planMetrics(layer.metrics, registry);
  const document: SyncDocument = {
    ...(options.syncTag ? { sync_tag: options.syncTag } : {}),
    fact_sources: buildFactSources(plans, { lineage, registry }),
    metrics: buildMetrics(plans),
  };
  const validator: SyncDocumentValidator = options.validator ?? createSyncDocumentValidator();
  validator.assert(document);
  return document;
}
