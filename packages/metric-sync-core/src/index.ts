export * from "./types.js";
export * from "./errors.js";
export { AGGREGATIONS, METRIC_TYPES, TARGET_OPERATIONS, parseLineageArtifact, parseMetricDefinitions, parseSemanticModels } from "./artifacts.js";
export { LineageIndex, parseModelRef, type ParsedRef } from "./lineageIndex.js";
export { SemanticRegistry, type ResolvedMeasure } from "./semanticRegistry.js";
export {
  mergeFilterClauses,
  parseFilterExpression,
  parseFilterExpressions,
  parseFilterSyntax,
  toSyncFilters,
  type FilterClause,
  type FilterComparison,
  type FilterContext,
} from "./filterExpression.js";
export {
  DENOMINATOR_FORBIDDEN_OPERATIONS,
  isDenominatorOperation,
  mapDenominatorOperation,
  mapOperation,
  type OperationRequest,
  type OperationRole,
} from "./operationMapper.js";
export { buildFactSources, collectFactSourcePlans, selectColumn, type FactSourcePlan } from "./factSources.js";
export { buildMetrics, planMetrics, type PlannedMetric, type PlannedSide } from "./metrics.js";
export {
  SYNC_DOCUMENT_SCHEMA_URL,
  createSyncDocumentValidator,
  loadSyncDocumentSchema,
  validateSyncDocument,
  type SyncDocumentValidator,
} from "./schemaValidator.js";
export {
  buildSyncDocument,
  parseSemanticLayer,
  type BuildOptions,
  type RawSemanticLayer,
  type SemanticLayer,
} from "./translate.js";
