import { UnknownStepImplementerError } from "../core/errors.js";
import type { StepImplementer, StepImplementerOptions } from "./step-implementer.js";

export type StepImplementerFactory = (options: StepImplementerOptions) => StepImplementer;

/**
 * Closed name → factory map used to turn the `implementer` string of a pipeline
 * definition into a step implementer. The set is fixed at construction.
 */
export class StepImplementerRegistry {
  private readonly factories: ReadonlyMap<string, StepImplementerFactory>;

  constructor(factories: Readonly<Record<string, StepImplementerFactory>>) {
    this.factories = new Map(Object.entries(factories));
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  create(name: string, options: StepImplementerOptions): StepImplementer {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new UnknownStepImplementerError(name, this.names());
    }
    return factory(options);
  }
}
