/* --------------------------------------------------------------------------
 * Source side: records built once from the upstream artifacts
 * -------------------------------------------------------------------------- */

export type NodeResourceType = "model" | "source";

export type ModelNode = {
  uniqueId: string;
  name: string;
  resourceType: NodeResourceType;
  packageName: string | null;
  filePath: string | null;
  compiledSql: string | null;
  relationName: string | null;
  parents: string[];
};

export type LineageArtifact = {
  projectName: string | null;
  nodes: ModelNode[];
};

export type EntityType = "primary" | "foreign" | "unique" | "natural";

export type Entity = {
  name: string;
  type: EntityType;
  expr: string;
};

export type DimensionType = "time" | "categorical";

export type Dimension = {
  name: string;
  type: DimensionType;
  expr: string;
  description: string | null;
  timeGranularity: string | null;
};

export type Aggregation =
  | "sum"
  | "count"
  | "count_distinct"
  | "sum_boolean"
  | "average"
  | "min"
  | "max"
  | "median"
  | "percentile";

export type DesiredChange = "increase" | "decrease";

export type MeasureMeta = {
  desired_change?: DesiredChange;
  [key: string]: unknown;
};

export type Measure = {
  name: string;
  agg: Aggregation;
  expr: string | null;
  description: string | null;
  aggTimeDimension: string | null;
  meta: MeasureMeta;
};

export type SemanticModelMeta = {
  reference_url?: string;
  always_full_refresh?: boolean;
  [key: string]: unknown;
};

export type SemanticModel = {
  name: string;
  description: string | null;
  /** Raw `ref('model')` string pointing at the lineage node. */
  modelRef: string;
  defaultTimeDimension: string | null;
  entities: Entity[];
  dimensions: Dimension[];
  measures: Measure[];
  meta: SemanticModelMeta;
};

export type MetricType = "simple" | "ratio" | "average" | "sum" | "count" | "count_distinct" | "sum_boolean";

export type MetricInput = {
  measure: string;
  filters: string[];
};

export type MetricMeta = {
  display_style?: MetricDisplayStyle;
  is_guardrail?: boolean;
  guardrail_cutoff?: number;
  minimum_detectable_effect?: number;
  reference_url?: string;
  entity?: string;
  aggregation_timeframe_value?: number;
  aggregation_timeframe_unit?: TimeframeUnit;
  winsorization_lower_percentile?: number;
  winsorization_upper_percentile?: number;
  numerator_operation?: TargetOperation;
  denominator_operation?: TargetOperation;
  conversion_threshold_days?: number;
  retention_threshold_days?: number;
  threshold_metric_settings?: ThresholdMetricSettings;
  [key: string]: unknown;
};

export type MetricDefinition = {
  name: string;
  label: string | null;
  description: string | null;
  type: MetricType;
  numerator: MetricInput;
  denominator: MetricInput | null;
  /** Metric-level filters; they apply to both sides of a ratio. */
  filters: string[];
  meta: MetricMeta;
};

/* --------------------------------------------------------------------------
 * Target side: the metric-sync document
 * -------------------------------------------------------------------------- */

export type TargetOperation =
  | "sum"
  | "count"
  | "distinct_entity"
  | "threshold"
  | "conversion"
  | "retention"
  | "count_distinct"
  | "last_value"
  | "first_value";

export type DenominatorOperation = Exclude<TargetOperation, "threshold" | "conversion" | "retention">;

export type FilterOperation = "equals" | "not_equals";

export type MetricDisplayStyle = "decimal" | "percent";

export type TimeframeUnit = "minutes" | "hours" | "days" | "weeks" | "calendar_days";

export type ThresholdMetricSettings = {
  /** Field name as published by the platform schema. */
  comparision_operator: "gt" | "gte";
  aggregation_type: "sum" | "count";
  breach_value: number;
  timeframe_unit: TimeframeUnit;
  timeframe_value: number;
};

export type SyncFilter = {
  fact_property: string;
  operation: FilterOperation;
  values: string[];
};

export type SyncEntity = {
  entity_name: string;
  column: string;
};

export type SyncFact = {
  name: string;
  column?: string;
  description?: string;
  desired_change?: DesiredChange;
};

export type SyncFactProperty = {
  name: string;
  column: string;
  description?: string;
};

export type SyncFactSource = {
  name: string;
  sql: string;
  timestamp_column: string;
  entities: SyncEntity[];
  facts: SyncFact[];
  properties?: SyncFactProperty[];
  reference_url?: string;
  always_full_refresh?: boolean;
};

type AggregationWindow = {
  aggregation_timeframe_value?: number;
  aggregation_timeframe_unit?: TimeframeUnit;
  winsorization_lower_percentile?: number;
  winsorization_upper_percentile?: number;
};

export type SyncNumerator = AggregationWindow & {
  fact_name: string;
  operation: TargetOperation;
  filters?: SyncFilter[];
  conversion_threshold_days?: number;
  retention_threshold_days?: number;
  threshold_metric_settings?: ThresholdMetricSettings;
};

export type SyncDenominator = AggregationWindow & {
  fact_name: string;
  operation: DenominatorOperation;
  filters?: SyncFilter[];
};

export type SyncMetric = {
  name: string;
  description?: string;
  entity: string;
  numerator: SyncNumerator;
  denominator?: SyncDenominator;
  is_guardrail?: boolean;
  guardrail_cutoff?: number;
  metric_display_style?: MetricDisplayStyle;
  minimum_detectable_effect?: number;
  reference_url?: string;
};

export type SyncDocument = {
  sync_tag?: string;
  fact_sources: SyncFactSource[];
  metrics: SyncMetric[];
};
