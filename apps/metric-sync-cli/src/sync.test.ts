import { strict as assert } from "node:assert";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { fileURLToPath } from "node:url";
import type { SyncConfig } from "./config.js";
import { runSync } from "./sync.js";

const EXAMPLE_PROJECT = fileURLToPath(new URL("../../../examples/shop_analytics/", import.meta.url));

const silentLogger = { info: () => undefined, warn: () => undefined };

function exampleConfig(overrides: Partial<SyncConfig> = {}): SyncConfig {
  return {
    projectDir: EXAMPLE_PROJECT,
    manifestPath: path.join(EXAMPLE_PROJECT, "target", "manifest.json"),
    apiKey: null,
    baseUrl: "https://metrics.example.com",
    syncTag: "release-42",
    dryRun: true,
    outputPath: null,
    maxRetries: 0,
    ...overrides,
  };
}

const EXPECTED_DOCUMENT = {
  sync_tag: "release-42",
  fact_sources: [
    {
      name: "users",
      sql: "select\n  user_id,\n  created_at,\n  lifetime_revenue,\n  active_status_flag,\n  country_iso_code\nfrom analytics.marts.dim_users",
      timestamp_column: "created_at",
      entities: [{ entity_name: "user", column: "user_id" }],
      facts: [
        {
          name: "total_lifetime_revenue",
          column: "lifetime_revenue",
          description: "Revenue collected from the user since signup.",
          desired_change: "increase",
        },
        { name: "count_active_users", column: "active_status_flag", desired_change: "increase" },
      ],
      properties: [
        { name: "country_code", column: "country_iso_code", description: "ISO 3166 country of the billing address." },
      ],
      reference_url: "https://example.com/docs/models/dim_users",
    },
    {
      name: "orders",
      sql: "select\n  order_id,\n  user_id,\n  ordered_at,\n  status\nfrom analytics.marts.fct_orders",
      timestamp_column: "ordered_at",
      entities: [
        { entity_name: "order", column: "order_id" },
        { entity_name: "user", column: "user_id" },
      ],
      facts: [{ name: "count_of_orders", column: "order_id", desired_change: "increase" }],
      properties: [{ name: "order_status", column: "status" }],
    },
  ],
  metrics: [
    {
      name: "Total lifetime revenue",
      description: "Sum of lifetime revenue across users.",
      entity: "user",
      numerator: { fact_name: "total_lifetime_revenue", operation: "sum" },
      metric_display_style: "decimal",
    },
    {
      name: "Active users (Canada)",
      entity: "user",
      numerator: {
        fact_name: "count_active_users",
        operation: "sum",
        filters: [{ fact_property: "country_code", operation: "equals", values: ["CA"] }],
      },
    },
    {
      name: "count_of_orders",
      entity: "order",
      numerator: { fact_name: "count_of_orders", operation: "distinct_entity" },
    },
    {
      name: "completed_orders",
      entity: "order",
      numerator: {
        fact_name: "count_of_orders",
        operation: "distinct_entity",
        filters: [{ fact_property: "order_status", operation: "equals", values: ["completed"] }],
      },
      is_guardrail: true,
    },
  ],
};

test("a dry run prints the validated document and writes the output file", async () => {
  const outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "metric-sync-output-"));
  const outputPath = path.join(outputDir, "nested", "document.json");
  const printed: string[] = [];
  try {
    const summary = await runSync(exampleConfig({ outputPath }), {
      logger: silentLogger,
      print: (text) => void printed.push(text),
      fetchImpl: async () => {
        throw new Error("a dry run must not submit");
      },
    });

    assert.deepEqual(summary, {
      syncTag: "release-42",
      yamlFiles: 3,
      factSources: 2,
      metrics: 4,
      dryRun: true,
      submitted: false,
      outputPath,
      response: null,
    });
    assert.equal(printed.length, 1);
    const document: unknown = JSON.parse(printed[0] ?? "");
    assert.deepEqual(document, EXPECTED_DOCUMENT);
    assert.equal(await fs.readFile(outputPath, "utf8"), `${printed[0]}\n`);
  } finally {
    await fs.rm(outputDir, { recursive: true, force: true });
  }
});

test("a submitting run posts the document once and reports the response", async () => {
  const requests: Array<{ url: string; body: string }> = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), body: typeof init?.body === "string" ? init.body : "" });
    return new Response('{"created": 4}', { status: 201 });
  };

  const summary = await runSync(exampleConfig({ dryRun: false, apiKey: "test-secret" }), {
    logger: silentLogger,
    print: () => assert.fail("a submitting run prints nothing"),
    fetchImpl,
  });

  assert.equal(summary.submitted, true);
  assert.deepEqual(summary.response, { created: 4 });
  assert.equal(requests.length, 1);
  assert.equal(requests[0]?.url, "https://metrics.example.com/api/v1/metrics/sync");
  const body: unknown = JSON.parse(requests[0]?.body ?? "");
  assert.deepEqual(body, EXPECTED_DOCUMENT);
});

test("a submitting run without an API key fails before any request", async () => {
  let calls = 0;
  await assert.rejects(
    runSync(exampleConfig({ dryRun: false }), {
      logger: silentLogger,
      fetchImpl: async () => {
        calls += 1;
        return new Response("{}", { status: 200 });
      },
    }),
    { name: "ConfigurationError", message: "An API key is required to submit the document" },
  );
  assert.equal(calls, 0);
});

test("a project without semantic models or metrics warns and syncs nothing", async () => {
  const projectDir = await fs.mkdtemp(path.join(os.tmpdir(), "metric-sync-empty-"));
  const warnings: string[] = [];
  try {
    await fs.mkdir(path.join(projectDir, "target"));
    await fs.writeFile(path.join(projectDir, "target", "manifest.json"), '{"nodes": {}}', "utf8");
    await fs.writeFile(path.join(projectDir, "dbt_project.yml"), "name: empty\n", "utf8");

    const summary = await runSync(
      exampleConfig({
        projectDir,
        manifestPath: path.join(projectDir, "target", "manifest.json"),
        dryRun: false,
        apiKey: "test-secret",
      }),
      {
        logger: { info: () => undefined, warn: (message: string) => void warnings.push(message) },
        fetchImpl: async () => assert.fail("nothing to submit"),
      },
    );

    assert.deepEqual(warnings, ["[metric-sync] no semantic models or metrics found; nothing to sync"]);
    assert.equal(summary.yamlFiles, 1);
    assert.equal(summary.factSources, 0);
    assert.equal(summary.submitted, false);
  } finally {
    await fs.rm(projectDir, { recursive: true, force: true });
  }
});

test("metrics without any semantic model fail the run", async () => {
  const projectDir = await fs.mkdtemp(path.join(os.tmpdir(), "metric-sync-orphans-"));
  const warnings: string[] = [];
  try {
    await fs.mkdir(path.join(projectDir, "target"));
    await fs.writeFile(path.join(projectDir, "target", "manifest.json"), '{"nodes": {}}', "utf8");
    // semantic models under target/ are never read
    await fs.writeFile(
      path.join(projectDir, "target", "semantic_models.yml"),
      "semantic_models:\n  - name: orders\n    model: ref('fct_orders')\n",
      "utf8",
    );
    await fs.writeFile(
      path.join(projectDir, "metrics.yml"),
      "metrics:\n  - name: revenue\n    measure: total_revenue\n",
      "utf8",
    );

    await assert.rejects(
      runSync(
        exampleConfig({
          projectDir,
          manifestPath: path.join(projectDir, "target", "manifest.json"),
          dryRun: false,
          apiKey: "test-secret",
        }),
        {
          logger: { info: () => undefined, warn: (message: string) => void warnings.push(message) },
          fetchImpl: async () => assert.fail("nothing may be submitted"),
        },
      ),
      { name: "UnknownMeasureError", message: "Metric 'revenue' references unknown measure 'total_revenue'" },
    );
    assert.deepEqual(warnings, []);
  } finally {
    await fs.rm(projectDir, { recursive: true, force: true });
  }
});
