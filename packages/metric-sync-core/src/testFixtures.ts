import type { LineageArtifact, MetricDefinition, SemanticModel } from "./types.js";

// Shared by the core tests. Every call returns fresh objects so tests can mutate them.

export function lineageArtifact(): LineageArtifact {
  return {
    projectName: "shop_analytics",
    nodes: [
      {
        uniqueId: "model.shop_analytics.dim_users",
        name: "dim_users",
        resourceType: "model",
        packageName: "shop_analytics",
        filePath: "models/marts/dim_users.sql",
        compiledSql: "select * from raw.users",
        relationName: "analytics.prod.dim_users",
        parents: ["source.shop_analytics.raw.users"],
      },
      {
        uniqueId: "model.shop_analytics.fct_orders",
        name: "fct_orders",
        resourceType: "model",
        packageName: "shop_analytics",
        filePath: "models/marts/fct_orders.sql",
        compiledSql: "select * from raw.orders",
        relationName: "analytics.prod.fct_orders",
        parents: ["source.shop_analytics.raw.orders"],
      },
      {
        uniqueId: "source.shop_analytics.raw.users",
        name: "users",
        resourceType: "source",
        packageName: "shop_analytics",
        filePath: "models/sources.yml",
        compiledSql: null,
        relationName: "raw.users",
        parents: [],
      },
    ],
  };
}

export function usersModel(): SemanticModel {
  return {
    name: "users",
    description: "One row per registered user",
    modelRef: "ref('dim_users')",
    defaultTimeDimension: "user_signup_ts",
    entities: [{ name: "user", type: "primary", expr: "user_id" }],
    dimensions: [
      { name: "user_signup_ts", type: "time", expr: "created_at", description: null, timeGranularity: "day" },
      { name: "country_code", type: "categorical", expr: "country_iso_code", description: "ISO country", timeGranularity: null },
      { name: "account_status", type: "categorical", expr: "status", description: null, timeGranularity: null },
    ],
    measures: [
      { name: "count_of_users", agg: "count_distinct", expr: "user_id", description: null, aggTimeDimension: null, meta: {} },
      {
        name: "total_lifetime_revenue",
        agg: "sum",
        expr: "lifetime_revenue",
        description: "Lifetime revenue per user",
        aggTimeDimension: null,
        meta: {},
      },
      { name: "count_active_users", agg: "sum", expr: "active_status_flag", description: null, aggTimeDimension: null, meta: {} },
    ],
    meta: {},
  };
}

export function ordersModel(): SemanticModel {
  return {
    name: "orders",
    description: null,
    modelRef: "ref('fct_orders')",
    defaultTimeDimension: null,
    entities: [
      { name: "order", type: "primary", expr: "order_id" },
      { name: "user", type: "foreign", expr: "user_id" },
    ],
    dimensions: [
      { name: "order_ts", type: "time", expr: "ordered_at", description: null, timeGranularity: "day" },
      { name: "order_status", type: "categorical", expr: "status", description: null, timeGranularity: null },
    ],
    measures: [
      {
        name: "total_order_revenue",
        agg: "sum",
        expr: "order_total",
        description: null,
        aggTimeDimension: "order_ts",
        meta: {},
      },
      { name: "count_of_orders", agg: "count_distinct", expr: "order_id", description: null, aggTimeDimension: null, meta: {} },
      { name: "order_rows", agg: "count", expr: "1", description: null, aggTimeDimension: null, meta: {} },
    ],
    meta: {},
  };
}

export function metricDefinition(
  name: string,
  measure: string,
  overrides: Partial<Omit<MetricDefinition, "name">> = {},
): MetricDefinition {
  return {
    name,
    label: null,
    description: null,
    type: "simple",
    numerator: { measure, filters: [] },
    denominator: null,
    filters: [],
    meta: {},
    ...overrides,
  };
}

export const COUNTRY_CA_FILTER = "{{ Dimension('users__user__country_code') }} = 'CA'";
