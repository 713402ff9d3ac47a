import { strict as assert } from "node:assert";
import test from "node:test";
import { UnknownModelError } from "./errors.js";
import { LineageIndex, parseModelRef } from "./lineageIndex.js";
import { lineageArtifact } from "./testFixtures.js";

test("parseModelRef accepts single and package-qualified refs in either quote style", () => {
  assert.deepEqual(parseModelRef("ref('dim_users')"), { packageName: null, modelName: "dim_users" });
  assert.deepEqual(parseModelRef(`ref("shop_analytics", "fct_orders")`), {
    packageName: "shop_analytics",
    modelName: "fct_orders",
  });
  assert.equal(parseModelRef("dim_users"), null);
  assert.equal(parseModelRef("source('raw', 'users')"), null);
});

test("LineageIndex resolves nodes by identifier and exposes their attributes", () => {
  const index = new LineageIndex(lineageArtifact());
  assert.equal(index.size, 3);
  assert.equal(index.projectName, "shop_analytics");
  assert.ok(index.has("model.shop_analytics.dim_users"));
  assert.equal(index.resolve("model.shop_analytics.fct_orders").name, "fct_orders");
  assert.equal(index.filePath("model.shop_analytics.dim_users"), "models/marts/dim_users.sql");
  assert.equal(index.compiledSql("model.shop_analytics.fct_orders"), "select * from raw.orders");
  assert.equal(index.relationName("source.shop_analytics.raw.users"), "raw.users");
});

test("LineageIndex.resolve fails with UnknownModelError for an absent identifier", () => {
  const index = new LineageIndex(lineageArtifact());
  assert.throws(
    () => index.resolve("model.shop_analytics.missing"),
    (error: unknown) =>
      error instanceof UnknownModelError &&
      error.identifier === "model.shop_analytics.missing" &&
      error.code === "UNKNOWN_MODEL",
  );
});

test("resolveRef prefers the project's own package over dependencies", () => {
  const artifact = lineageArtifact();
  artifact.nodes.unshift({
    uniqueId: "model.vendor_pkg.dim_users",
    name: "dim_users",
    resourceType: "model",
    packageName: "vendor_pkg",
    filePath: null,
    compiledSql: null,
    relationName: "vendor.dim_users",
    parents: [],
  });
  const index = new LineageIndex(artifact);
  assert.equal(index.resolveRef("ref('dim_users')").uniqueId, "model.shop_analytics.dim_users");
  assert.equal(index.resolveRef("ref('vendor_pkg', 'dim_users')").uniqueId, "model.vendor_pkg.dim_users");
});

test("resolveRef ignores sources that share a model name", () => {
  const index = new LineageIndex(lineageArtifact());
  assert.throws(() => index.resolveRef("ref('users')"), {
    name: "UnknownModelError",
    message: "Unknown lineage node 'ref('users')': no model named 'users' in the manifest",
  });
});

test("resolveRef rejects unparseable refs and unknown packages", () => {
  const index = new LineageIndex(lineageArtifact());
  assert.throws(() => index.resolveRef("dim_users"), UnknownModelError);
  assert.throws(() => index.resolveRef("ref('other_pkg', 'dim_users')"), {
    message: "Unknown lineage node 'ref('other_pkg', 'dim_users')': no model 'dim_users' in package 'other_pkg'",
  });
});
