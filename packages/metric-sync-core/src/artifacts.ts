import { z } from "zod";
import { ArtifactParseError, type ArtifactIssue } from "./errors.js";
import type {
  Aggregation,
  Dimension,
  Entity,
  LineageArtifact,
  Measure,
  MetricDefinition,
  MetricInput,
  MetricType,
  ModelNode,
  NodeResourceType,
  SemanticModel,
  TargetOperation,
  TimeframeUnit,
} from "./types.js";

export const AGGREGATIONS = [
  "sum",
  "count",
  "count_distinct",
  "sum_boolean",
  "average",
  "min",
  "max",
  "median",
  "percentile",
] as const satisfies readonly Aggregation[];

export const METRIC_TYPES = [
  "simple",
  "ratio",
  "average",
  "sum",
  "count",
  "count_distinct",
  "sum_boolean",
] as const satisfies readonly MetricType[];

export const TARGET_OPERATIONS = [
  "sum",
  "count",
  "distinct_entity",
  "threshold",
  "conversion",
  "retention",
  "count_distinct",
  "last_value",
  "first_value",
] as const satisfies readonly TargetOperation[];

const TIMEFRAME_UNITS = [
  "minutes",
  "hours",
  "days",
  "weeks",
  "calendar_days",
] as const satisfies readonly TimeframeUnit[];

const INDEXED_RESOURCE_TYPES: NodeResourceType[] = ["model", "source"];

const lowercased = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" ? value.trim().toLowerCase() : value), schema);

const optionalText = z.string().nullish();

// `expr: 1` is common for row counts and arrives from YAML as a number.
const expression = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value).trim() || null));

/* --------------------------------------------------------------------------
 * Lineage manifest
 * -------------------------------------------------------------------------- */

const manifestSchema = z.object({
  metadata: z.object({ project_name: z.string().nullish() }).passthrough().nullish(),
  nodes: z.record(z.unknown()).default({}),
  sources: z.record(z.unknown()).default({}),
  parent_map: z.record(z.array(z.string())).nullish(),
});

const manifestNodeSchema = z.object({
  unique_id: z.string().min(1).optional(),
  resource_type: z.enum(["model", "source"]),
  name: z.string().min(1),
  package_name: optionalText,
  original_file_path: optionalText,
  path: optionalText,
  compiled_code: optionalText,
  compiled_sql: optionalText,
  relation_name: optionalText,
  depends_on: z.object({ nodes: z.array(z.string()).nullish() }).passthrough().nullish(),
});

export function parseLineageArtifact(raw: unknown, origin = "lineage manifest"): LineageArtifact {
  const manifest = manifestSchema.safeParse(raw);
  if (!manifest.success) {
    throw new ArtifactParseError(origin, toIssues(manifest.error, []));
  }
  const { nodes, sources, parent_map: parentMap, metadata } = manifest.data;
  const issues: ArtifactIssue[] = [];
  const parsed: ModelNode[] = [];

  const collect = (section: "nodes" | "sources", entries: Record<string, unknown>) => {
    for (const [id, value] of Object.entries(entries)) {
      if (!isIndexedNode(value)) {
        continue;
      }
      const node = manifestNodeSchema.safeParse(value);
      if (!node.success) {
        issues.push(...toIssues(node.error, [section, id]));
        continue;
      }
      const uniqueId = node.data.unique_id ?? id;
      parsed.push({
        uniqueId,
        name: node.data.name,
        resourceType: node.data.resource_type,
        packageName: node.data.package_name ?? null,
        filePath: node.data.original_file_path ?? node.data.path ?? null,
        compiledSql: node.data.compiled_code ?? node.data.compiled_sql ?? null,
        relationName: node.data.relation_name ?? null,
        parents: parentMap?.[uniqueId] ?? node.data.depends_on?.nodes ?? [],
      });
    }
  };
  collect("nodes", nodes);
  collect("sources", sources);

  if (issues.length > 0) {
    throw new ArtifactParseError(origin, issues);
  }
  return { projectName: metadata?.project_name ?? null, nodes: parsed };
}

function isIndexedNode(value: unknown): boolean {
  if (!isRecord(value)) {
    return false;
  }
  const resourceType = value.resource_type;
  return typeof resourceType === "string" && INDEXED_RESOURCE_TYPES.some((type) => type === resourceType);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/* --------------------------------------------------------------------------
 * Semantic models
 * -------------------------------------------------------------------------- */

const entitySchema = z.object({
  name: z.string().min(1),
  type: lowercased(z.enum(["primary", "foreign", "unique", "natural"])),
  expr: expression,
});

const dimensionSchema = z.object({
  name: z.string().min(1),
  type: lowercased(z.enum(["time", "categorical"])),
  expr: expression,
  description: optionalText,
  time_granularity: optionalText,
  type_params: z.object({ time_granularity: optionalText }).passthrough().nullish(),
});

const measureMetaSchema = z
  .object({ desired_change: lowercased(z.enum(["increase", "decrease"])).optional() })
  .passthrough();

const measureSchema = z.object({
  name: z.string().min(1),
  agg: lowercased(z.enum(AGGREGATIONS)),
  expr: expression,
  description: optionalText,
  agg_time_dimension: optionalText,
  meta: measureMetaSchema.nullish(),
  config: z.object({ meta: measureMetaSchema.nullish() }).passthrough().nullish(),
});

const semanticModelMetaSchema = z
  .object({
    reference_url: z.string().url().optional(),
    always_full_refresh: z.boolean().optional(),
  })
  .passthrough();

const semanticModelSchema = z.object({
  name: z.string().min(1),
  description: optionalText,
  model: z.string().min(1),
  defaults: z.object({ agg_time_dimension: optionalText }).passthrough().nullish(),
  entities: z.array(entitySchema).default([]),
  dimensions: z.array(dimensionSchema).default([]),
  measures: z.array(measureSchema).default([]),
  meta: semanticModelMetaSchema.nullish(),
  config: z.object({ meta: semanticModelMetaSchema.nullish() }).passthrough().nullish(),
});

type RawSemanticModel = z.infer<typeof semanticModelSchema>;

export function parseSemanticModels(raw: unknown[], origin = "semantic models"): SemanticModel[] {
  const issues: ArtifactIssue[] = [];
  const models: SemanticModel[] = [];
  raw.forEach((item, index) => {
    const result = semanticModelSchema.safeParse(item);
    if (!result.success) {
      issues.push(...toIssues(result.error, ["semantic_models", index]));
      return;
    }
    models.push(toSemanticModel(result.data));
  });
  if (issues.length > 0) {
    throw new ArtifactParseError(origin, issues);
  }
  return models;
}

function toSemanticModel(raw: RawSemanticModel): SemanticModel {
  const entities: Entity[] = raw.entities.map((entity) => ({
    name: entity.name,
    type: entity.type,
    expr: entity.expr ?? entity.name,
  }));
  const dimensions: Dimension[] = raw.dimensions.map((dimension) => ({
    name: dimension.name,
    type: dimension.type,
    expr: dimension.expr ?? dimension.name,
    description: dimension.description ?? null,
    timeGranularity: dimension.type_params?.time_granularity ?? dimension.time_granularity ?? null,
  }));
  const measures: Measure[] = raw.measures.map((measure) => ({
    name: measure.name,
    agg: measure.agg,
    expr: measure.expr,
    description: measure.description ?? null,
    aggTimeDimension: measure.agg_time_dimension ?? null,
    meta: { ...measure.config?.meta, ...measure.meta },
  }));
  return {
    name: raw.name,
    description: raw.description ?? null,
    modelRef: raw.model,
    defaultTimeDimension: raw.defaults?.agg_time_dimension ?? null,
    entities,
    dimensions,
    measures,
    meta: { ...raw.config?.meta, ...raw.meta },
  };
}

/* --------------------------------------------------------------------------
 * Metrics
 * -------------------------------------------------------------------------- */

const filterSchema = z.union([z.string(), z.array(z.string())]).nullish();

const measureRefSchema = z.union([
  z
    .string()
    .min(1)
    .transform((measure): MetricInput => ({ measure, filters: [] })),
  z
    .object({ name: z.string().min(1), filter: filterSchema })
    .transform((ref): MetricInput => ({ measure: ref.name, filters: toFilterList(ref.filter) })),
]);

const metricInputSchema = z.union([
  measureRefSchema,
  z.object({ measure: measureRefSchema, filter: filterSchema }).transform(
    (ref): MetricInput => ({
      measure: ref.measure.measure,
      filters: [...toFilterList(ref.filter), ...ref.measure.filters],
    }),
  ),
]);

const thresholdSettingsSchema = z
  .object({
    comparision_operator: z.enum(["gt", "gte"]),
    aggregation_type: z.enum(["sum", "count"]),
    breach_value: z.number(),
    timeframe_unit: z.enum(TIMEFRAME_UNITS),
    timeframe_value: z.number().int().positive(),
  })
  .strict();

const percentile = z.number().min(0).max(1);

const metricMetaSchema = z
  .object({
    display_style: lowercased(z.enum(["decimal", "percent"])).optional(),
    is_guardrail: z.boolean().optional(),
    guardrail_cutoff: z.number().optional(),
    minimum_detectable_effect: z.number().positive().optional(),
    reference_url: z.string().url().optional(),
    entity: z.string().min(1).optional(),
    aggregation_timeframe_value: z.number().int().positive().optional(),
    aggregation_timeframe_unit: lowercased(z.enum(TIMEFRAME_UNITS)).optional(),
    winsorization_lower_percentile: percentile.optional(),
    winsorization_upper_percentile: percentile.optional(),
    numerator_operation: lowercased(z.enum(TARGET_OPERATIONS)).optional(),
    denominator_operation: lowercased(z.enum(TARGET_OPERATIONS)).optional(),
    conversion_threshold_days: z.number().positive().optional(),
    retention_threshold_days: z.number().positive().optional(),
    threshold_metric_settings: thresholdSettingsSchema.optional(),
  })
  .passthrough();

const metricInputsSchema = z
  .object({
    measure: metricInputSchema.nullish(),
    numerator: metricInputSchema.nullish(),
    denominator: metricInputSchema.nullish(),
  })
  .passthrough();

const metricSchema = z.object({
  name: z.string().min(1),
  label: optionalText,
  description: optionalText,
  type: lowercased(z.enum(METRIC_TYPES)).optional(),
  measure: metricInputSchema.nullish(),
  numerator: metricInputSchema.nullish(),
  denominator: metricInputSchema.nullish(),
  type_params: metricInputsSchema.nullish(),
  filter: filterSchema,
  meta: metricMetaSchema.nullish(),
  config: z.object({ meta: metricMetaSchema.nullish() }).passthrough().nullish(),
});

export function parseMetricDefinitions(raw: unknown[], origin = "metrics"): MetricDefinition[] {
  const issues: ArtifactIssue[] = [];
  const metrics: MetricDefinition[] = [];
  raw.forEach((item, index) => {
    const result = metricSchema.safeParse(item);
    if (!result.success) {
      issues.push(...toIssues(result.error, ["metrics", index]));
      return;
    }
    const metric = result.data;
    const numerator =
      metric.measure ?? metric.type_params?.measure ?? metric.numerator ?? metric.type_params?.numerator ?? null;
    if (!numerator) {
      issues.push({
        path: formatPath(["metrics", index]),
        message: `metric '${metric.name}' must reference a measure (measure, type_params.measure or numerator)`,
      });
      return;
    }
    metrics.push({
      name: metric.name,
      label: metric.label?.trim() || null,
      description: metric.description ?? null,
      type: metric.type ?? "simple",
      numerator,
      denominator: metric.denominator ?? metric.type_params?.denominator ?? null,
      filters: toFilterList(metric.filter),
      meta: { ...metric.config?.meta, ...metric.meta },
    });
  });
  if (issues.length > 0) {
    throw new ArtifactParseError(origin, issues);
  }
  return metrics;
}

function toFilterList(filter: string | string[] | null | undefined): string[] {
  if (filter === null || filter === undefined) {
    return [];
  }
  const list = Array.isArray(filter) ? filter : [filter];
  return list.map((value) => value.trim()).filter((value) => value.length > 0);
}

/* --------------------------------------------------------------------------
 * Issue formatting
 * -------------------------------------------------------------------------- */

function toIssues(error: z.ZodError, prefix: (string | number)[]): ArtifactIssue[] {
  return error.issues.map((issue) => ({
    path: formatPath([...prefix, ...issue.path]),
    message: issue.message,
  }));
}

export function formatPath(segments: (string | number)[]): string {
  return segments.reduce<string>((path, segment) => {
    if (typeof segment === "number") {
      return `${path}[${segment}]`;
    }
    return path ? `${path}.${segment}` : segment;
  }, "");
}
