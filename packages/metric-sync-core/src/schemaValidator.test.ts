import { strict as assert } from "node:assert";
import test from "node:test";
import { SchemaValidationError } from "./errors.js";
import { createSyncDocumentValidator, loadSyncDocumentSchema, validateSyncDocument } from "./schemaValidator.js";
import type { SyncDocument } from "./types.js";

function sampleDocument(): SyncDocument {
  return {
    sync_tag: "nightly",
    fact_sources: [
      {
        name: "users",
        sql: "select user_id, created_at, lifetime_revenue from analytics.dim_users",
        timestamp_column: "created_at",
        entities: [{ entity_name: "user", column: "user_id" }],
        facts: [{ name: "total_lifetime_revenue", column: "lifetime_revenue", desired_change: "increase" }],
      },
    ],
    metrics: [
      {
        name: "sum_total_lifetime_revenue",
        entity: "user",
        numerator: {
          fact_name: "total_lifetime_revenue",
          operation: "threshold",
          threshold_metric_settings: {
            comparision_operator: "gt",
            aggregation_type: "sum",
            breach_value: 100,
            timeframe_unit: "days",
            timeframe_value: 7,
          },
        },
      },
    ],
  };
}

const validator = createSyncDocumentValidator();

test("the shipped schema keeps the published field names", () => {
  const schema = loadSyncDocumentSchema();
  assert.equal(schema.$schema, "http://json-schema.org/draft-07/schema#");
  assert.equal("$id" in schema, false);
  assert.match(JSON.stringify(schema), /"comparision_operator"/);
  assert.match(JSON.stringify(schema), /"breach_value":\{"types":"number"\}/);
});

test("a conforming document has no violations", () => {
  assert.deepEqual(validator.check(sampleDocument()), []);
  const document = sampleDocument();
  assert.equal(validateSyncDocument(document, validator), document);
});

test("an injected unknown field is rejected with its pointer", () => {
  const document = { ...sampleDocument(), fact_sources: [{ ...sampleDocument().fact_sources[0], owner: "growth" }] };
  assert.deepEqual(validator.check(document), [
    {
      path: "/fact_sources/0/owner",
      constraint: "additionalProperties",
      message: "must NOT have additional properties ('owner')",
    },
  ]);
});

test("every violation is collected, not just the first", () => {
  const document = {
    metrics: [
      {
        name: "ratio",
        entity: "user",
        numerator: { fact_name: "a", operation: "median" },
        denominator: { fact_name: "b", operation: "retention" },
      },
    ],
  };
  assert.throws(
    () => validator.assert(document),
    (error: unknown) => {
      assert.ok(error instanceof SchemaValidationError);
      assert.equal(error.code, "SCHEMA_VALIDATION");
      assert.deepEqual(
        error.violations.map((violation) => [violation.path, violation.constraint]),
        [
          ["/", "required"],
          ["/metrics/0/numerator/operation", "enum"],
          ["/metrics/0/denominator/operation", "enum"],
        ],
      );
      assert.equal(error.violations[0].message, "must have required property 'fact_sources'");
      return true;
    },
  );
});

test("the denominator operation set excludes threshold, conversion and retention", () => {
  for (const operation of ["threshold", "conversion", "retention"]) {
    const document = sampleDocument();
    const violations = validator.check({
      ...document,
      metrics: [{ ...document.metrics[0], denominator: { fact_name: "total_lifetime_revenue", operation } }],
    });
    assert.deepEqual(
      violations.map((violation) => violation.path),
      ["/metrics/0/denominator/operation"],
    );
  }
});
