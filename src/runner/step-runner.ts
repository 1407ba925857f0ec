import type { Config } from "../config/config.js";
import type { ConfigMapping } from "../config/config-value.js";
import type { RunnerSettings } from "../config/settings.js";
import { UnknownStepError } from "../core/errors.js";
import { silentReporter, type Reporter } from "../logging/reporter.js";
import type { StepImplementerRegistry } from "../step-implementer/registry.js";
import { createDefaultRegistry } from "../step-implementers/index.js";

export type StepRunnerOptions = {
  config: Config;
  settings: RunnerSettings;
  registry?: StepImplementerRegistry;
  reporter?: Reporter;
};

/**
 * Runs one pipeline step: every sub-step defined for it, in order.
 *
 * Each sub-step reloads the ledger from the snapshot, as a separate process would.
 * The first failed sub-step ends the step. Fatal errors propagate.
 */
export class StepRunner {
  private readonly config: Config;
  private readonly settings: RunnerSettings;
  private readonly registry: StepImplementerRegistry;
  private readonly reporter: Reporter;

  constructor(opts: StepRunnerOptions) {
    this.config = opts.config;
    this.settings = opts.settings;
    this.registry = opts.registry ?? createDefaultRegistry();
    this.reporter = opts.reporter ?? silentReporter;
  }

  async runStep(stepName: string, stepConfigOverrides?: ConfigMapping): Promise<boolean> {
    const stepConfig = this.config.getStepConfig(stepName);
    if (!stepConfig) {
      throw new UnknownStepError(stepName, this.config.stepNames);
    }
    // overrides apply to this invocation only
    stepConfig.setStepConfigOverrides(stepConfigOverrides ?? {});

    for (const subStep of stepConfig.subSteps) {
      const implementer = this.registry.create(subStep.subStepImplementerName, {
        resultsDirPath: this.settings.resultsDirPath,
        resultsFileName: this.settings.resultsFileName,
        workDirPath: this.settings.workDirPath,
        config: subStep,
        environment: this.settings.environment,
        reporter: this.reporter,
      });

      const success = await implementer.runStep();
      if (!success) {
        this.reporter.emit({
          level: "warn",
          code: "STEP_FAILED",
          message: `Sub-step ${subStep.subStepName} failed; remaining sub-steps skipped`,
          step: stepName,
        });
        return false;
      }
    }

    return true;
  }
}
