import { strict as assert } from "node:assert";
import test from "node:test";
import { UnknownDimensionError, UnsupportedFilterSyntaxError } from "./errors.js";
import {
  mergeFilterClauses,
  parseFilterExpression,
  parseFilterExpressions,
  parseFilterSyntax,
  toSyncFilters,
} from "./filterExpression.js";
import { SemanticRegistry } from "./semanticRegistry.js";
import { COUNTRY_CA_FILTER, ordersModel, usersModel } from "./testFixtures.js";

function usersContext() {
  const registry = new SemanticRegistry([usersModel(), ordersModel()]);
  return { registry, model: registry.getModel("users") };
}

test("parseFilterSyntax reads a single equality comparison", () => {
  assert.deepEqual(parseFilterSyntax(COUNTRY_CA_FILTER), [
    { reference: "users__user__country_code", operator: "equals", values: ["CA"] },
  ]);
});

test("parseFilterSyntax reads AND chains, IN lists and alternative operators", () => {
  const comparisons = parseFilterSyntax(
    `{{Dimension("users__user__country_code")}} IN ('CA', 'US') and {{ Dimension('users__user__account_status') }} <> 'churned' ` +
      "AND {{ Dimension('account_status') }} NOT IN ('banned', 42) AND {{ Dimension('user__country_code') }} == 'O''Hare'",
  );
  assert.deepEqual(comparisons, [
    { reference: "users__user__country_code", operator: "equals", values: ["CA", "US"] },
    { reference: "users__user__account_status", operator: "not_equals", values: ["churned"] },
    { reference: "account_status", operator: "not_equals", values: ["banned", "42"] },
    { reference: "user__country_code", operator: "equals", values: ["O'Hare"] },
  ]);
});

test("parseFilterSyntax rejects constructs it cannot express", () => {
  const rejected = [
    `${COUNTRY_CA_FILTER} OR {{ Dimension('users__user__account_status') }} = 'active'`,
    `(${COUNTRY_CA_FILTER})`,
    "{{ Dimension('users__user__country_code') }} > 'CA'",
    "{{ TimeDimension('users__user_signup_ts', 'day') }} = '2024-01-01'",
    "{{ Dimension('users__user__country_code') }} = 'CA' 'US'",
    "{{ Dimension('users__user__country_code') }} = country",
    "{{ Dimension('users__user__country_code') }} = 'CA",
    "NOT {{ Dimension('users__user__country_code') }} = 'CA'",
    "",
    "country_code = 'CA'",
  ];
  for (const expression of rejected) {
    assert.throws(() => parseFilterSyntax(expression), UnsupportedFilterSyntaxError, expression);
  }
});

test("parse errors carry the offending position", () => {
  assert.throws(
    () => parseFilterSyntax(`${COUNTRY_CA_FILTER} OR x`),
    (error: unknown) =>
      error instanceof UnsupportedFilterSyntaxError &&
      error.position === undefined &&
      error.message.endsWith("OR is not supported; only AND-combined comparisons can become property filters"),
  );
  assert.throws(() => parseFilterSyntax("{{ Dimension('users__user__country_code') }} >= 3"), {
    message:
      `Unsupported filter "{{ Dimension('users__user__country_code') }} >= 3" at offset 45: ` +
      "operator '>=' cannot be expressed as a property filter",
  });
});

test("parseFilterExpression resolves dimensions through the registry", () => {
  const [clause] = parseFilterExpression(COUNTRY_CA_FILTER, usersContext());
  assert.equal(clause.property, "country_code");
  assert.equal(clause.dimension.expr, "country_iso_code");
  assert.equal(clause.operator, "equals");
  assert.deepEqual(clause.values, ["CA"]);
});

test("references to another semantic model or unknown dimensions fail", () => {
  const context = usersContext();
  assert.throws(
    () => parseFilterExpression("{{ Dimension('orders__order__order_status') }} = 'completed'", context),
    (error: unknown) =>
      error instanceof UnknownDimensionError &&
      error.semanticModel === "users" &&
      error.dimension === "order_status" &&
      error.message.endsWith("reference 'orders__order__order_status' points at semantic model 'orders'"),
  );
  assert.throws(
    () => parseFilterExpression("{{ Dimension('users__user__region') }} = 'emea'", context),
    UnknownDimensionError,
  );
});

test("time dimensions cannot become property filters", () => {
  assert.throws(
    () => parseFilterExpression("{{ Dimension('users__user__user_signup_ts') }} = '2024-01-01'", usersContext()),
    UnsupportedFilterSyntaxError,
  );
});

test("comparisons on the same dimension and operator merge in first-seen order", () => {
  const clauses = parseFilterExpressions(
    [
      "{{ Dimension('users__user__country_code') }} = 'CA' AND {{ Dimension('users__user__country_code') }} = 'US'",
      "{{ Dimension('users__user__account_status') }} != 'churned'",
      "{{ Dimension('users__user__country_code') }} IN ('MX', 'CA')",
      "{{ Dimension('users__user__country_code') }} != 'FR'",
    ],
    usersContext(),
  );
  assert.deepEqual(toSyncFilters(clauses), [
    { fact_property: "country_code", operation: "equals", values: ["CA", "US", "MX"] },
    { fact_property: "account_status", operation: "not_equals", values: ["churned"] },
    { fact_property: "country_code", operation: "not_equals", values: ["FR"] },
  ]);
});

test("mergeFilterClauses leaves its input untouched", () => {
  const clauses = parseFilterExpression(COUNTRY_CA_FILTER, usersContext());
  const merged = mergeFilterClauses([...clauses, { ...clauses[0], values: ["US"] }]);
  assert.deepEqual(merged[0].values, ["CA", "US"]);
  assert.deepEqual(clauses[0].values, ["CA"]);
});
