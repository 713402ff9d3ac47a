import {
  DuplicateMeasureNameError,
  DuplicateSemanticModelError,
  InvalidSemanticModelError,
  UnknownDimensionError,
  UnknownMeasureError,
  UnknownModelError,
} from "./errors.js";
import type { Dimension, Entity, Measure, SemanticModel } from "./types.js";

// Only these entity types key a fact source, so only they can key a metric.
export const KEY_ENTITY_TYPES: ReadonlySet<Entity["type"]> = new Set<Entity["type"]>(["primary", "foreign"]);

export type ResolvedMeasure = {
  model: SemanticModel;
  measure: Measure;
};

/**
 * Per-run registry of semantic models and their measures. Measure names are global:
 * a metric names a measure without saying which model declares it, so two models
 * declaring the same measure name would make that lookup ambiguous.
 */
export class SemanticRegistry {
  private readonly models = new Map<string, SemanticModel>();
  private readonly measures = new Map<string, ResolvedMeasure>();

  constructor(semanticModels: SemanticModel[]) {
    for (const model of semanticModels) {
      if (this.models.has(model.name)) {
        throw new DuplicateSemanticModelError(model.name);
      }
      this.models.set(model.name, model);
      for (const measure of model.measures) {
        const existing = this.measures.get(measure.name);
        if (existing) {
          throw new DuplicateMeasureNameError(measure.name, [existing.model.name, model.name]);
        }
        this.measures.set(measure.name, { model, measure });
      }
    }
  }

  listModels(): SemanticModel[] {
    return Array.from(this.models.values());
  }

  getModel(name: string): SemanticModel {
    const model = this.models.get(name);
    if (!model) {
      throw new UnknownModelError(name, "semantic");
    }
    return model;
  }

  resolveMeasure(name: string, metric?: string): ResolvedMeasure {
    const resolved = this.measures.get(name);
    if (!resolved) {
      throw new UnknownMeasureError(name, metric);
    }
    return resolved;
  }

  resolveDimension(model: SemanticModel, name: string): Dimension {
    const dimension = model.dimensions.find((candidate) => candidate.name === name);
    if (!dimension) {
      throw new UnknownDimensionError(model.name, name);
    }
    return dimension;
  }

  primaryEntity(model: SemanticModel): Entity {
    const primary = model.entities.find((entity) => entity.type === "primary");
    if (!primary) {
      throw new InvalidSemanticModelError(model.name, "no primary entity is declared");
    }
    return primary;
  }

  keyEntity(model: SemanticModel, name: string): Entity | null {
    return model.entities.find((entity) => entity.name === name && KEY_ENTITY_TYPES.has(entity.type)) ?? null;
  }
}
