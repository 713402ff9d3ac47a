import { UnknownModelError } from "./errors.js";
import type { LineageArtifact, ModelNode } from "./types.js";

// ref('model') or ref('package', 'model'), either quote style.
const REF_PATTERN = /^\s*ref\(\s*(?:(['"])([\w.-]+)\1\s*,\s*)?(['"])([\w.-]+)\3\s*\)\s*$/;

export type ParsedRef = {
  packageName: string | null;
  modelName: string;
};

export function parseModelRef(ref: string): ParsedRef | null {
  const match = REF_PATTERN.exec(ref);
  if (!match) {
    return null;
  }
  return { packageName: match[2] ?? null, modelName: match[4] };
}

/**
 * Read-only view over the lineage manifest, keyed by node identifier.
 * Built once per run; nothing mutates it after construction.
 */
export class LineageIndex {
  private readonly byId = new Map<string, ModelNode>();
  private readonly modelsByName = new Map<string, ModelNode[]>();

  constructor(private readonly artifact: LineageArtifact) {
    for (const node of artifact.nodes) {
      this.byId.set(node.uniqueId, node);
      if (node.resourceType !== "model") {
        continue;
      }
      const sameName = this.modelsByName.get(node.name) ?? [];
      sameName.push(node);
      this.modelsByName.set(node.name, sameName);
    }
  }

  get projectName(): string | null {
    return this.artifact.projectName;
  }

  get size(): number {
    return this.byId.size;
  }

  has(identifier: string): boolean {
    return this.byId.has(identifier);
  }

  resolve(identifier: string): ModelNode {
    const node = this.byId.get(identifier);
    if (!node) {
      throw new UnknownModelError(identifier);
    }
    return node;
  }

  filePath(identifier: string): string | null {
    return this.resolve(identifier).filePath;
  }

  compiledSql(identifier: string): string | null {
    return this.resolve(identifier).compiledSql;
  }

  relationName(identifier: string): string | null {
    return this.resolve(identifier).relationName;
  }

  /**
   * Resolves a semantic model's `ref(...)` to its model node. When several packages
   * define a model with that name, the manifest's own project wins, then the first
   * node in manifest order.
   */
  resolveRef(ref: string): ModelNode {
    const parsed = parseModelRef(ref);
    if (!parsed) {
      throw new UnknownModelError(ref, "lineage", "expected ref('model') or ref('package', 'model')");
    }
    const candidates = this.modelsByName.get(parsed.modelName) ?? [];
    if (parsed.packageName) {
      const exact = candidates.find((node) => node.packageName === parsed.packageName);
      if (!exact) {
        throw new UnknownModelError(ref, "lineage", `no model '${parsed.modelName}' in package '${parsed.packageName}'`);
      }
      return exact;
    }
    if (candidates.length === 0) {
      throw new UnknownModelError(ref, "lineage", `no model named '${parsed.modelName}' in the manifest`);
    }
    const local = this.projectName ? candidates.find((node) => node.packageName === this.projectName) : undefined;
    return local ?? candidates[0];
  }
}
