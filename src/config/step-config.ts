import type { ConfigMapping } from "./config-value.js";
import { SubStepConfig } from "./sub-step-config.js";

/**
 * A pipeline step and its ordered sub-steps. Runtime overrides set here apply to
 * every sub-step of the step.
 */
export class StepConfig {
  readonly stepName: string;
  private readonly subStepConfigs: SubStepConfig[] = [];

  constructor(stepName: string) {
    this.stepName = stepName;
  }

  addSubStep(subStep: SubStepConfig): void {
    this.subStepConfigs.push(subStep);
  }

  get subSteps(): readonly SubStepConfig[] {
    return this.subStepConfigs;
  }

  getSubStep(subStepName: string): SubStepConfig | undefined {
    return this.subStepConfigs.find((s) => s.subStepName === subStepName);
  }

  setStepConfigOverrides(overrides: ConfigMapping | null | undefined): void {
    for (const subStep of this.subStepConfigs) {
      subStep.setStepConfigOverrides(overrides);
    }
  }
}
