/**
 * Step Catalog
 *
 * @module @pipewright/engine/catalog/catalog
 */

import { PipelineDefinitionError } from '@pipewright/core';
import type { StepFactory } from './types.js';

export class StepCatalog {
  private readonly factories = new Map<string, StepFactory>();

  constructor(factories: readonly StepFactory[] = []) {
    factories.forEach((factory) => this.register(factory));
  }

  /**
   * @throws {PipelineDefinitionError} If the id is already registered
   */
  register(factory: StepFactory): this {
    if (this.factories.has(factory.id)) {
      throw new PipelineDefinitionError(`Step type "${factory.id}" is already registered`);
    }
    this.factories.set(factory.id, factory);
    return this;
  }

  get(id: string): StepFactory | undefined {
    return this.factories.get(id);
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  /**
   * Registered factories sorted by id
   */
  list(): StepFactory[] {
    return [...this.factories.values()].sort((a, b) => a.id.localeCompare(b.id));
  }
}
