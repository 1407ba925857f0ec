import type { ConfigMapping } from "../config/config-value.js";
import type { StepResultMapping } from "../results/step-result.js";
import type { WorkflowResult } from "../results/workflow-result.js";

/**
 * What an implementer's execution logic gets to work with: the ledger of earlier
 * results and its own resolved runtime configuration.
 */
export class StepContext {
  readonly workflowResult: WorkflowResult;
  /** Deep copy of the runtime step configuration, leaves wrapped in ConfigValues. */
  readonly runtimeStepConfig: ConfigMapping;
  private readonly stepName: string;

  constructor(workflowResult: WorkflowResult, runtimeStepConfig: ConfigMapping, stepName: string) {
    this.workflowResult = workflowResult;
    this.runtimeStepConfig = runtimeStepConfig;
    this.stepName = stepName;
  }

  /**
   * Value of a named artifact from an earlier result. Searches every step unless
   * `stepName` (and optionally `subStepName`) narrows it; first match wins.
   */
  getResultValue(artifactName: string, stepName?: string, subStepName?: string): unknown {
    return this.workflowResult.getArtifactValue(artifactName, stepName, subStepName);
  }

  /** Results recorded for a step, defaulting to the step being run. */
  getStepResult(stepName: string = this.stepName): StepResultMapping {
    return this.workflowResult.getStepResult(stepName);
  }
}
