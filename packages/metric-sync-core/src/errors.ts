export type MetricSyncErrorCode =
  | "ARTIFACT_PARSE"
  | "UNKNOWN_MODEL"
  | "UNKNOWN_MEASURE"
  | "UNKNOWN_DIMENSION"
  | "DUPLICATE_MEASURE_NAME"
  | "DUPLICATE_SEMANTIC_MODEL"
  | "DUPLICATE_METRIC_NAME"
  | "INVALID_SEMANTIC_MODEL"
  | "UNSUPPORTED_FILTER_SYNTAX"
  | "UNSUPPORTED_OPERATION"
  | "INVALID_DENOMINATOR_OPERATION"
  | "INVALID_RATIO_METRIC"
  | "SCHEMA_VALIDATION"
  | "CONFIGURATION"
  | "REMOTE_SYNC";

/**
 * Base class for every failure of a sync run. Everything raised before submission is
 * fatal: a run that raises one must not submit anything.
 */
export class MetricSyncError extends Error {
  constructor(public readonly code: MetricSyncErrorCode, message: string, public readonly details?: unknown) {
    super(message);
    this.name = "MetricSyncError";
  }
}

export type ArtifactIssue = {
  path: string;
  message: string;
};

export class ArtifactParseError extends MetricSyncError {
  constructor(
    public readonly artifact: string,
    public readonly issues: ArtifactIssue[],
  ) {
    super(
      "ARTIFACT_PARSE",
      `Malformed ${artifact}: ${issues.map((issue) => `${issue.path || "<root>"}: ${issue.message}`).join("; ")}`,
      issues,
    );
    this.name = "ArtifactParseError";
  }
}

export type ModelScope = "lineage" | "semantic";

export class UnknownModelError extends MetricSyncError {
  constructor(
    public readonly identifier: string,
    public readonly scope: ModelScope = "lineage",
    reason?: string,
  ) {
    const what = scope === "lineage" ? "lineage node" : "semantic model";
    super("UNKNOWN_MODEL", reason ? `Unknown ${what} '${identifier}': ${reason}` : `Unknown ${what} '${identifier}'`);
    this.name = "UnknownModelError";
  }
}

export class UnknownMeasureError extends MetricSyncError {
  constructor(
    public readonly measure: string,
    public readonly metric?: string,
  ) {
    super(
      "UNKNOWN_MEASURE",
      metric
        ? `Metric '${metric}' references unknown measure '${measure}'`
        : `Unknown measure '${measure}'`,
    );
    this.name = "UnknownMeasureError";
  }
}

export class UnknownDimensionError extends MetricSyncError {
  constructor(
    public readonly semanticModel: string,
    public readonly dimension: string,
    reason?: string,
  ) {
    super(
      "UNKNOWN_DIMENSION",
      `Unknown dimension '${dimension}' in semantic model '${semanticModel}'${reason ? `: ${reason}` : ""}`,
    );
    this.name = "UnknownDimensionError";
  }
}

export class DuplicateMeasureNameError extends MetricSyncError {
  constructor(
    public readonly measure: string,
    public readonly semanticModels: [string, string],
  ) {
    const [first, second] = semanticModels;
    super(
      "DUPLICATE_MEASURE_NAME",
      first === second
        ? `Measure '${measure}' is declared twice in semantic model '${first}'`
        : `Measure '${measure}' is declared by both semantic models '${first}' and '${second}'`,
    );
    this.name = "DuplicateMeasureNameError";
  }
}

export class DuplicateSemanticModelError extends MetricSyncError {
  constructor(public readonly semanticModel: string) {
    super("DUPLICATE_SEMANTIC_MODEL", `Semantic model '${semanticModel}' is declared more than once`);
    this.name = "DuplicateSemanticModelError";
  }
}

export class DuplicateMetricNameError extends MetricSyncError {
  constructor(
    public readonly metricName: string,
    public readonly definitions: [string, string],
  ) {
    super(
      "DUPLICATE_METRIC_NAME",
      `Metrics '${definitions[0]}' and '${definitions[1]}' both produce the metric name '${metricName}'`,
    );
    this.name = "DuplicateMetricNameError";
  }
}

export class InvalidSemanticModelError extends MetricSyncError {
  constructor(
    public readonly semanticModel: string,
    reason: string,
  ) {
    super("INVALID_SEMANTIC_MODEL", `Semantic model '${semanticModel}' cannot be synced: ${reason}`);
    this.name = "InvalidSemanticModelError";
  }
}

export class UnsupportedFilterSyntaxError extends MetricSyncError {
  constructor(
    public readonly expression: string,
    reason: string,
    public readonly position?: number,
  ) {
    super(
      "UNSUPPORTED_FILTER_SYNTAX",
      `Unsupported filter ${JSON.stringify(expression)}${position === undefined ? "" : ` at offset ${position}`}: ${reason}`,
    );
    this.name = "UnsupportedFilterSyntaxError";
  }
}

export class UnsupportedOperationError extends MetricSyncError {
  constructor(
    public readonly aggregation: string,
    public readonly metricType: string,
    reason?: string,
  ) {
    super(
      "UNSUPPORTED_OPERATION",
      `No operation for aggregation '${aggregation}' in a '${metricType}' metric${reason ? `: ${reason}` : ""}`,
    );
    this.name = "UnsupportedOperationError";
  }
}

export class InvalidDenominatorOperationError extends MetricSyncError {
  constructor(
    public readonly operation: string,
    public readonly metric?: string,
  ) {
    super(
      "INVALID_DENOMINATOR_OPERATION",
      `Operation '${operation}' is not allowed in a denominator${metric ? ` (metric '${metric}')` : ""}`,
    );
    this.name = "InvalidDenominatorOperationError";
  }
}

export class InvalidRatioMetricError extends MetricSyncError {
  constructor(
    public readonly metric: string,
    reason: string,
  ) {
    super("INVALID_RATIO_METRIC", `Ratio metric '${metric}' is invalid: ${reason}`);
    this.name = "InvalidRatioMetricError";
  }
}

export type SchemaViolation = {
  /** JSON pointer into the document, `/` for the root. */
  path: string;
  /** The schema keyword that failed, e.g. `required` or `additionalProperties`. */
  constraint: string;
  message: string;
};

export class SchemaValidationError extends MetricSyncError {
  constructor(public readonly violations: SchemaViolation[]) {
    super(
      "SCHEMA_VALIDATION",
      `Sync document failed schema validation with ${violations.length} violation${violations.length === 1 ? "" : "s"}:\n` +
        violations.map((violation) => `  - ${violation.path}: ${violation.message} (${violation.constraint})`).join("\n"),
      violations,
    );
    this.name = "SchemaValidationError";
  }
}
