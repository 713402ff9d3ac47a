import { InvalidDenominatorOperationError, UnsupportedOperationError } from "./errors.js";
import type { Aggregation, DenominatorOperation, MetricType, TargetOperation } from "./types.js";

export type OperationRole = "numerator" | "denominator";

export type OperationRequest = {
  aggregation: Aggregation;
  metricType: MetricType;
  hasDenominator: boolean;
  role: OperationRole;
  /** Explicit operation from metric meta; applied once the pair is known to be mappable. */
  override?: TargetOperation | null;
  /** Metric name, only used in error messages. */
  metric?: string;
};

type OperationTable = Partial<Record<Aggregation, TargetOperation>>;

const CANONICAL: OperationTable = {
  count_distinct: "distinct_entity",
  sum: "sum",
  count: "count",
  // a 0/1 flag summed counts the true rows
  sum_boolean: "sum",
};

const NUMERATOR_TABLE: Record<MetricType, OperationTable> = {
  simple: CANONICAL,
  ratio: CANONICAL,
  sum: { sum: "sum", sum_boolean: "sum" },
  sum_boolean: { sum: "sum", sum_boolean: "sum" },
  count: { count: "count" },
  count_distinct: { count_distinct: "distinct_entity" },
  average: { sum: "sum", average: "sum" },
};

// Average metrics divide the summed fact by its row count.
const AVERAGE_DENOMINATOR: OperationTable = { sum: "count", average: "count" };

const SINGLE_MEASURE_TYPES: ReadonlySet<MetricType> = new Set(["simple", "sum", "sum_boolean", "count", "count_distinct"]);

export const DENOMINATOR_FORBIDDEN_OPERATIONS: ReadonlySet<TargetOperation> = new Set([
  "threshold",
  "conversion",
  "retention",
]);

export function isDenominatorOperation(operation: TargetOperation): operation is DenominatorOperation {
  return !DENOMINATOR_FORBIDDEN_OPERATIONS.has(operation);
}

export function mapOperation(request: OperationRequest): TargetOperation {
  const { aggregation, metricType, hasDenominator, role } = request;
  if (metricType === "ratio" && !hasDenominator) {
    throw new UnsupportedOperationError(aggregation, metricType, "a ratio metric needs a denominator measure");
  }
  if (hasDenominator && SINGLE_MEASURE_TYPES.has(metricType)) {
    throw new UnsupportedOperationError(aggregation, metricType, `'${metricType}' metrics take a single measure`);
  }
  if (hasDenominator && metricType === "average") {
    throw new UnsupportedOperationError(aggregation, metricType, "average metrics divide by the row count of their own measure");
  }
  if (role === "denominator" && !hasDenominator && metricType !== "average") {
    throw new UnsupportedOperationError(aggregation, metricType, "the metric has no denominator");
  }

  const table = role === "denominator" && metricType === "average" ? AVERAGE_DENOMINATOR : NUMERATOR_TABLE[metricType];
  const mapped = table[aggregation];
  if (!mapped) {
    throw new UnsupportedOperationError(aggregation, metricType);
  }

  const operation = request.override ?? mapped;
  if (role === "denominator" && !isDenominatorOperation(operation)) {
    throw new InvalidDenominatorOperationError(operation, request.metric);
  }
  return operation;
}

export function mapDenominatorOperation(request: Omit<OperationRequest, "role">): DenominatorOperation {
  const operation = mapOperation({ ...request, role: "denominator" });
  if (!isDenominatorOperation(operation)) {
    throw new InvalidDenominatorOperationError(operation, request.metric);
  }
  return operation;
}
