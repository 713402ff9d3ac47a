import { promises as fs } from "node:fs";
import path from "node:path";
import { ArtifactParseError, type RawSemanticLayer } from "@metric-sync/core";
import { parse as parseYaml } from "yaml";

// Build output, installed packages and logs never hold project declarations.
export const IGNORED_DIRECTORIES: ReadonlySet<string> = new Set(["target", "dbt_packages", "node_modules", "logs"]);

const YAML_EXTENSIONS = new Set([".yml", ".yaml"]);

export type SemanticDeclarations = {
  semanticModels: unknown[];
  metrics: unknown[];
  /** Project-relative paths of every YAML file read, in read order. */
  files: string[];
};

/** Every YAML file under the project, as project-relative POSIX paths sorted by path. */
export async function discoverYamlFiles(projectDir: string): Promise<string[]> {
  const found: string[] = [];
  const walk = async (directory: string) => {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    for (const entry of entries) {
      const absolute = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith(".") || IGNORED_DIRECTORIES.has(entry.name)) {
          continue;
        }
        await walk(absolute);
      } else if (entry.isFile() && YAML_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
        found.push(path.relative(projectDir, absolute).split(path.sep).join("/"));
      }
    }
  };
  await walk(projectDir);
  return found.sort();
}

export async function loadSemanticDeclarations(projectDir: string): Promise<SemanticDeclarations> {
  const files = await discoverYamlFiles(projectDir);
  const declarations: SemanticDeclarations = { semanticModels: [], metrics: [], files };
  for (const file of files) {
    const contents = await fs.readFile(path.join(projectDir, file), "utf8");
    const document = parseYamlDocument(file, contents);
    declarations.semanticModels.push(...readList(file, document, "semantic_models"));
    declarations.metrics.push(...readList(file, document, "metrics"));
  }
  return declarations;
}

export async function loadManifest(manifestPath: string): Promise<unknown> {
  let contents: string;
  try {
    contents = await fs.readFile(manifestPath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ArtifactParseError(manifestPath, [
      { path: "", message: `cannot read the manifest (${reason}); run the project's compile step first` },
    ]);
  }
  try {
    return JSON.parse(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ArtifactParseError(manifestPath, [{ path: "", message: `invalid JSON: ${reason}` }]);
  }
}

export async function loadSemanticLayerSources(options: {
  projectDir: string;
  manifestPath: string;
}): Promise<RawSemanticLayer & { files: string[] }> {
  const [manifest, declarations] = await Promise.all([
    loadManifest(options.manifestPath),
    loadSemanticDeclarations(options.projectDir),
  ]);
  return { manifest, ...declarations };
}

function parseYamlDocument(file: string, contents: string): unknown {
  try {
    return parseYaml(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ArtifactParseError(file, [{ path: "", message: reason }]);
  }
}

function readList(file: string, document: unknown, key: "semantic_models" | "metrics"): unknown[] {
  if (!isRecord(document)) {
    return [];
  }
  const value = document[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ArtifactParseError(file, [{ path: key, message: `expected a list, received ${typeof value}` }]);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
