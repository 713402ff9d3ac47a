import { readFileSync } from "node:fs";
import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import { SchemaValidationError, type SchemaViolation } from "./errors.js";
import type { SyncDocument } from "./types.js";

export const SYNC_DOCUMENT_SCHEMA_URL = new URL("../schema/metric-sync.schema.json", import.meta.url);

export function loadSyncDocumentSchema(): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(SYNC_DOCUMENT_SCHEMA_URL, "utf8"));
  if (!isRecord(parsed)) {
    throw new Error(`Schema at ${SYNC_DOCUMENT_SCHEMA_URL.pathname} is not a JSON object`);
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export type SyncDocumentValidator = {
  /** Every violation found; empty when the document conforms. */
  check(document: unknown): SchemaViolation[];
  /** Throws SchemaValidationError carrying every violation. */
  assert(document: unknown): asserts document is SyncDocument;
};

/**
 * Compiles the published schema once. The schema keeps the platform's own field
 * names (including a non-standard `types` keyword), so unknown keywords are allowed.
 */
export function createSyncDocumentValidator(schema: Record<string, unknown> = loadSyncDocumentSchema()): SyncDocumentValidator {
  const ajv = new Ajv({ allErrors: true, strict: false });
  const validate: ValidateFunction = ajv.compile(schema);

  const check = (document: unknown): SchemaViolation[] => {
    if (validate(document)) {
      return [];
    }
    return (validate.errors ?? []).map(toViolation);
  };

  return {
    check,
    assert(document: unknown): asserts document is SyncDocument {
      const violations = check(document);
      if (violations.length > 0) {
        throw new SchemaValidationError(violations);
      }
    },
  };
}

export function validateSyncDocument(
  document: SyncDocument,
  validator: SyncDocumentValidator = createSyncDocumentValidator(),
): SyncDocument {
  validator.assert(document);
  return document;
}

function toViolation(error: ErrorObject): SchemaViolation {
  const message = error.message ?? "is invalid";
  const extra = error.params.additionalProperty;
  if (error.keyword === "additionalProperties" && typeof extra === "string") {
    return {
      path: `${error.instancePath}/${escapePointer(extra)}`,
      constraint: error.keyword,
      message: `${message} ('${extra}')`,
    };
  }
  return { path: error.instancePath || "/", constraint: error.keyword, message };
}

function escapePointer(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}
