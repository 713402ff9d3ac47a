import { InvalidSemanticModelError } from "./errors.js";
import type { LineageIndex } from "./lineageIndex.js";
import type { PlannedMetric, PlannedSide } from "./metrics.js";
import { KEY_ENTITY_TYPES, type SemanticRegistry } from "./semanticRegistry.js";
import type {
  Dimension,
  Measure,
  SemanticModel,
  SyncEntity,
  SyncFact,
  SyncFactProperty,
  SyncFactSource,
} from "./types.js";

/** What the metric set needs from one semantic model, in first-reference order. */
export type FactSourcePlan = {
  model: SemanticModel;
  measures: Measure[];
  properties: Dimension[];
};

const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function collectFactSourcePlans(metrics: PlannedMetric[]): FactSourcePlan[] {
  const plans = new Map<string, FactSourcePlan>();
  const visit = (side: PlannedSide) => {
    let plan = plans.get(side.model.name);
    if (!plan) {
      plan = { model: side.model, measures: [], properties: [] };
      plans.set(side.model.name, plan);
    }
    if (!plan.measures.some((measure) => measure.name === side.measure.name)) {
      plan.measures.push(side.measure);
    }
    for (const filter of side.filters) {
      if (!plan.properties.some((dimension) => dimension.name === filter.dimension.name)) {
        plan.properties.push(filter.dimension);
      }
    }
  };
  for (const metric of metrics) {
    visit(metric.numerator);
    if (metric.denominator) {
      visit(metric.denominator);
    }
  }
  return Array.from(plans.values());
}

export function buildFactSources(
  metrics: PlannedMetric[],
  context: { lineage: LineageIndex; registry: SemanticRegistry },
): SyncFactSource[] {
  return collectFactSourcePlans(metrics).map((plan) => buildFactSource(plan, context));
}

type SelectedColumn = {
  /** Name the column carries in the fact-source query output. */
  column: string;
  select: string;
};

// Plain identifiers are selected as they are; anything else is aliased.
export function selectColumn(expression: string, alias: string): SelectedColumn {
  const trimmed = expression.trim();
  if (PLAIN_IDENTIFIER.test(trimmed)) {
    return { column: trimmed, select: trimmed };
  }
  return { column: alias, select: `${trimmed} as ${alias}` };
}

function buildFactSource(
  plan: FactSourcePlan,
  context: { lineage: LineageIndex; registry: SemanticRegistry },
): SyncFactSource {
  const { model } = plan;
  // every fact source must be keyed by a primary entity
  context.registry.primaryEntity(model);

  const selects: string[] = [];
  // output column (case-insensitive) -> the select line that produces it
  const owners = new Map<string, string>();
  const select = (expression: string, alias: string): string => {
    let selected = selectColumn(expression, alias);
    const owner = owners.get(selected.column.toLowerCase());
    if (owner === selected.select) {
      return selected.column;
    }
    if (owner !== undefined && selected.column !== alias) {
      selected = { column: alias, select: `${expression.trim()} as ${alias}` };
    }
    const aliasOwner = owners.get(selected.column.toLowerCase());
    if (aliasOwner === selected.select) {
      return selected.column;
    }
    if (aliasOwner !== undefined) {
      throw new InvalidSemanticModelError(
        model.name,
        `output column '${selected.column}' is produced by both '${aliasOwner}' and '${selected.select}'`,
      );
    }
    owners.set(selected.column.toLowerCase(), selected.select);
    selects.push(selected.select);
    return selected.column;
  };

  const entities: SyncEntity[] = model.entities
    .filter((entity) => KEY_ENTITY_TYPES.has(entity.type))
    .map((entity) => ({ entity_name: entity.name, column: select(entity.expr, entity.name) }));

  const timestamp = resolveTimestampDimension(plan, context.registry);
  const timestampColumn = select(timestamp.expr, timestamp.name);

  const facts: SyncFact[] = plan.measures.map((measure) => {
    const fact: SyncFact = { name: measure.name };
    if (!countsRows(measure)) {
      fact.column = select(measure.expr ?? measure.name, measure.name);
    }
    if (measure.description) {
      fact.description = measure.description;
    }
    fact.desired_change = measure.meta.desired_change ?? "increase";
    return fact;
  });

  const properties: SyncFactProperty[] = plan.properties.map((dimension) => ({
    name: dimension.name,
    column: select(dimension.expr, dimension.name),
    ...(dimension.description ? { description: dimension.description } : {}),
  }));

  const source: SyncFactSource = {
    name: model.name,
    sql: `select\n${selects.map((line) => `  ${line}`).join(",\n")}\nfrom ${fromClause(model, context.lineage)}`,
    timestamp_column: timestampColumn,
    entities,
    facts,
  };
  if (properties.length > 0) {
    source.properties = properties;
  }
  if (model.meta.reference_url !== undefined) {
    source.reference_url = model.meta.reference_url;
  }
  if (model.meta.always_full_refresh !== undefined) {
    source.always_full_refresh = model.meta.always_full_refresh;
  }
  return source;
}

// The platform counts rows itself when a count fact has no column.
function countsRows(measure: Measure): boolean {
  return measure.agg === "count" && (measure.expr === null || measure.expr === "1");
}

function resolveTimestampDimension(plan: FactSourcePlan, registry: SemanticRegistry): Dimension {
  const { model } = plan;
  const name =
    model.defaultTimeDimension ??
    plan.measures.find((measure) => measure.aggTimeDimension !== null)?.aggTimeDimension ??
    model.dimensions.find((dimension) => dimension.type === "time")?.name ??
    null;
  if (name === null) {
    throw new InvalidSemanticModelError(model.name, "no time dimension is available for the timestamp column");
  }
  const dimension = registry.resolveDimension(model, name);
  if (dimension.type !== "time") {
    throw new InvalidSemanticModelError(model.name, `timestamp dimension '${name}' is not a time dimension`);
  }
  return dimension;
}

function fromClause(model: SemanticModel, lineage: LineageIndex): string {
  const node = lineage.resolveRef(model.modelRef);
  if (node.relationName) {
    return node.relationName;
  }
  if (node.compiledSql) {
    return `(\n${node.compiledSql.trim()}\n) as ${node.name}`;
  }
  throw new InvalidSemanticModelError(
    model.name,
    `lineage node '${node.uniqueId}' has neither a relation name nor compiled SQL`,
  );
}
