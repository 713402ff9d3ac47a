import { DuplicateMetricNameError, InvalidRatioMetricError, InvalidSemanticModelError } from "./errors.js";
import { parseFilterExpressions, toSyncFilters, type FilterClause } from "./filterExpression.js";
import { mapDenominatorOperation, mapOperation } from "./operationMapper.js";
import type { SemanticRegistry } from "./semanticRegistry.js";
import type {
  DenominatorOperation,
  Measure,
  MetricDefinition,
  SemanticModel,
  SyncDenominator,
  SyncMetric,
  SyncNumerator,
  TargetOperation,
} from "./types.js";

export type PlannedSide<TOperation extends TargetOperation = TargetOperation> = {
  model: SemanticModel;
  measure: Measure;
  operation: TOperation;
  filters: FilterClause[];
};

/** A metric with every reference resolved, ready for emission. */
export type PlannedMetric = {
  definition: MetricDefinition;
  name: string;
  entity: string;
  numerator: PlannedSide;
  denominator: PlannedSide<DenominatorOperation> | null;
};

export function planMetrics(definitions: MetricDefinition[], registry: SemanticRegistry): PlannedMetric[] {
  const owners = new Map<string, string>();
  return definitions.map((definition) => {
    const plan = planMetric(definition, registry);
    const owner = owners.get(plan.name);
    if (owner !== undefined) {
      throw new DuplicateMetricNameError(plan.name, [owner, definition.name]);
    }
    owners.set(plan.name, definition.name);
    return plan;
  });
}

function planMetric(definition: MetricDefinition, registry: SemanticRegistry): PlannedMetric {
  const numerator = registry.resolveMeasure(definition.numerator.measure, definition.name);
  const declaredDenominator = definition.denominator
    ? registry.resolveMeasure(definition.denominator.measure, definition.name)
    : null;

  if (definition.type === "ratio") {
    if (!declaredDenominator) {
      throw new InvalidRatioMetricError(definition.name, "no denominator measure is declared");
    }
    if (declaredDenominator.measure.name === numerator.measure.name) {
      throw new InvalidRatioMetricError(
        definition.name,
        `numerator and denominator both reference measure '${numerator.measure.name}'`,
      );
    }
  }

  const entity = definition.meta.entity ?? registry.primaryEntity(numerator.model).name;
  if (!registry.keyEntity(numerator.model, entity)) {
    throw new InvalidSemanticModelError(
      numerator.model.name,
      `metric '${definition.name}' is keyed by entity '${entity}', which is not a primary or foreign entity of the model`,
    );
  }
  if (declaredDenominator && !registry.keyEntity(declaredDenominator.model, entity)) {
    throw new InvalidRatioMetricError(
      definition.name,
      `denominator semantic model '${declaredDenominator.model.name}' has no entity '${entity}'`,
    );
  }

  const hasDenominator = declaredDenominator !== null;
  const numeratorFilters = parseFilterExpressions([...definition.filters, ...definition.numerator.filters], {
    registry,
    model: numerator.model,
  });
  const numeratorSide: PlannedSide = {
    ...numerator,
    operation: mapOperation({
      aggregation: numerator.measure.agg,
      metricType: definition.type,
      hasDenominator,
      role: "numerator",
      override: definition.meta.numerator_operation,
      metric: definition.name,
    }),
    filters: numeratorFilters,
  };

  let denominatorSide: PlannedSide<DenominatorOperation> | null = null;
  if (declaredDenominator && definition.denominator) {
    denominatorSide = {
      ...declaredDenominator,
      operation: mapDenominatorOperation({
        aggregation: declaredDenominator.measure.agg,
        metricType: definition.type,
        hasDenominator,
        override: definition.meta.denominator_operation,
        metric: definition.name,
      }),
      filters: parseFilterExpressions([...definition.filters, ...definition.denominator.filters], {
        registry,
        model: declaredDenominator.model,
      }),
    };
  } else if (definition.type === "average") {
    // Same fact, same population: only the operation differs.
    denominatorSide = {
      ...numerator,
      operation: mapDenominatorOperation({
        aggregation: numerator.measure.agg,
        metricType: definition.type,
        hasDenominator,
        override: definition.meta.denominator_operation,
        metric: definition.name,
      }),
      filters: numeratorFilters,
    };
  }

  return {
    definition,
    name: definition.label ?? definition.name,
    entity,
    numerator: numeratorSide,
    denominator: denominatorSide,
  };
}

export function buildMetrics(plans: PlannedMetric[]): SyncMetric[] {
  return plans.map(buildMetric);
}

function buildMetric(plan: PlannedMetric): SyncMetric {
  const { meta, description } = plan.definition;
  // Insertion order decides key order in the serialized document.
  const metric: SyncMetric = {
    name: plan.name,
    ...(description ? { description } : {}),
    entity: plan.entity,
    numerator: buildNumerator(plan),
    ...(plan.denominator ? { denominator: buildDenominator(plan, plan.denominator) } : {}),
  };
  if (meta.is_guardrail !== undefined) {
    metric.is_guardrail = meta.is_guardrail;
  }
  if (meta.guardrail_cutoff !== undefined) {
    metric.guardrail_cutoff = meta.guardrail_cutoff;
  }
  if (meta.display_style !== undefined) {
    metric.metric_display_style = meta.display_style;
  }
  if (meta.minimum_detectable_effect !== undefined) {
    metric.minimum_detectable_effect = meta.minimum_detectable_effect;
  }
  if (meta.reference_url !== undefined) {
    metric.reference_url = meta.reference_url;
  }
  return metric;
}

function buildNumerator(plan: PlannedMetric): SyncNumerator {
  const { meta } = plan.definition;
  const side = plan.numerator;
  const numerator: SyncNumerator = { fact_name: side.measure.name, operation: side.operation };
  if (side.filters.length > 0) {
    numerator.filters = toSyncFilters(side.filters);
  }
  if (meta.aggregation_timeframe_value !== undefined) {
    numerator.aggregation_timeframe_value = meta.aggregation_timeframe_value;
  }
  if (meta.aggregation_timeframe_unit !== undefined) {
    numerator.aggregation_timeframe_unit = meta.aggregation_timeframe_unit;
  }
  if (meta.winsorization_lower_percentile !== undefined) {
    numerator.winsorization_lower_percentile = meta.winsorization_lower_percentile;
  }
  if (meta.winsorization_upper_percentile !== undefined) {
    numerator.winsorization_upper_percentile = meta.winsorization_upper_percentile;
  }
  if (meta.conversion_threshold_days !== undefined) {
    numerator.conversion_threshold_days = meta.conversion_threshold_days;
  }
  if (meta.retention_threshold_days !== undefined) {
    numerator.retention_threshold_days = meta.retention_threshold_days;
  }
  if (meta.threshold_metric_settings !== undefined) {
    numerator.threshold_metric_settings = { ...meta.threshold_metric_settings };
  }
  return numerator;
}

function buildDenominator(plan: PlannedMetric, side: PlannedSide<DenominatorOperation>): SyncDenominator {
  const { meta } = plan.definition;
  const denominator: SyncDenominator = { fact_name: side.measure.name, operation: side.operation };
  if (side.filters.length > 0) {
    denominator.filters = toSyncFilters(side.filters);
  }
  if (meta.aggregation_timeframe_value !== undefined) {
    denominator.aggregation_timeframe_value = meta.aggregation_timeframe_value;
  }
  if (meta.aggregation_timeframe_unit !== undefined) {
    denominator.aggregation_timeframe_unit = meta.aggregation_timeframe_unit;
  }
  return denominator;
}
