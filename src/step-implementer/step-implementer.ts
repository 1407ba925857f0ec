import fs from "node:fs";
import path from "node:path";
import { ConfigValue, isConfigMapping, type ConfigMapping } from "../config/config-value.js";
import type { SubStepConfig } from "../config/sub-step-config.js";
import {
  StepConfigurationError,
  StepExecutionError,
  SupplyctlError,
  errorMessage,
} from "../core/errors.js";
import { nextLifecycleState, type LifecycleEvent, type LifecycleState } from "../core/lifecycle.js";
import { silentReporter, type DiagnosticLevel, type Reporter } from "../logging/reporter.js";
import type { StepIdentity, StepResult } from "../results/step-result.js";
import { WorkflowResult } from "../results/workflow-result.js";
import { StepContext } from "./context.js";

/** File name of the ledger snapshot inside the work directory. */
export const WORKFLOW_RESULT_SNAPSHOT_FILE_NAME = "tssc-results.pkl";

export type StepImplementerOptions = {
  /** Directory the YAML results file is written to. */
  resultsDirPath: string;
  /** Name of the YAML results file inside `resultsDirPath`. */
  resultsFileName: string;
  /** Root of the scratch area; the ledger snapshot lives here too. */
  workDirPath: string;
  config: SubStepConfig;
  environment?: string | null;
  reporter?: Reporter;
};

/** The three operations every pluggable step provides. */
export interface StepImplementerContract {
  /** Lowest-precedence configuration values. Pure. */
  stepImplementerConfigDefaults(): ConfigMapping;
  /** Keys that must resolve to a non-empty value before the step may run, in report order. */
  requiredRuntimeStepConfigKeys(): readonly string[];
  /**
   * The step itself. Expected negative outcomes are returned as a failed StepResult;
   * anything thrown is treated as fatal.
   */
  executeStep(context: StepContext): Promise<StepResult>;
}

/** `false` is a value. `null`, `undefined`, `""`, `0`, `NaN`, `[]` and `{}` are not. */
function isMissingValue(value: unknown): boolean {
  const plain = ConfigValue.convertLeavesToValues(value);
  if (typeof plain === "boolean") return false;
  if (plain === null || plain === undefined || plain === "") return true;
  if (typeof plain === "number") return plain === 0 || Number.isNaN(plain);
  if (Array.isArray(plain)) return plain.length === 0;
  if (isConfigMapping(plain)) return Object.keys(plain).length === 0;
  return false;
}

/**
 * Base class for pipeline step implementers.
 *
 * `runStep()` drives the lifecycle: resolve the runtime configuration, validate the
 * required keys, execute, then append the result to the ledger and persist both the
 * snapshot and the YAML results file. Configuration and execution errors are fatal and
 * propagate; nothing is appended for them.
 */
export abstract class StepImplementer implements StepImplementerContract, StepIdentity {
  private readonly options: StepImplementerOptions;
  private readonly reporter: Reporter;
  private lifecycle: LifecycleState = "constructed";

  constructor(options: StepImplementerOptions) {
    this.options = options;
    this.reporter = options.reporter ?? silentReporter;
  }

  abstract stepImplementerConfigDefaults(): ConfigMapping;

  abstract requiredRuntimeStepConfigKeys(): readonly string[];

  abstract executeStep(context: StepContext): Promise<StepResult>;

  get state(): LifecycleState {
    return this.lifecycle;
  }

  get config(): SubStepConfig {
    return this.options.config;
  }

  get environment(): string | null {
    return this.options.environment ?? null;
  }

  get stepName(): string {
    return this.config.stepName;
  }

  get subStepName(): string {
    return this.config.subStepName;
  }

  get subStepImplementerName(): string {
    return this.config.subStepImplementerName;
  }

  get stepConfig(): ConfigMapping {
    return this.config.subStepConfig;
  }

  get stepConfigOverrides(): ConfigMapping {
    return this.config.stepConfigOverrides;
  }

  get stepEnvironmentConfig(): ConfigMapping {
    return this.config.getSubStepEnvConfig(this.environment);
  }

  get globalConfigDefaults(): ConfigMapping {
    return this.config.globalDefaults;
  }

  get globalEnvironmentConfigDefaults(): ConfigMapping {
    return this.config.getGlobalEnvironmentDefaults(this.environment);
  }

  get resultsDirPath(): string {
    fs.mkdirSync(this.options.resultsDirPath, { recursive: true });
    return this.options.resultsDirPath;
  }

  get resultsFilePath(): string {
    return path.join(this.resultsDirPath, this.options.resultsFileName);
  }

  get workDirPath(): string {
    fs.mkdirSync(this.options.workDirPath, { recursive: true });
    return this.options.workDirPath;
  }

  /** Scratch directory namespaced to this step, created on access. */
  get workDirPathStep(): string {
    const dir = path.join(this.workDirPath, this.stepName);
    fs.mkdirSync(dir, { recursive: true });
    return dir;
  }

  get workflowResultSnapshotFilePath(): string {
    return path.join(this.workDirPath, WORKFLOW_RESULT_SNAPSHOT_FILE_NAME);
  }

  /** Resolve one configuration key across all layers; `null` when undefined everywhere. */
  getConfigValue(key: string): unknown {
    return this.config.getConfigValue(key, this.environment, this.stepImplementerConfigDefaults());
  }

  getCopyOfRuntimeStepConfig(): ConfigMapping {
    return this.config.getCopyOfRuntimeStepConfig(this.environment, this.stepImplementerConfigDefaults());
  }

  /**
   * Whether the step has values for the given key(s): all of them by default, any of
   * them with `matchAny`.
   */
  hasConfigValue(keys: string | readonly string[], matchAny = false): boolean {
    const list = typeof keys === "string" ? [keys] : keys;
    const present = (key: string) => this.getConfigValue(key) !== null;
    return matchAny ? list.some(present) : list.every(present);
  }

  /**
   * Throws StepConfigurationError naming every required key that is absent or empty,
   * in the order `requiredRuntimeStepConfigKeys()` lists them.
   */
  validateRuntimeStepConfig(runtimeStepConfig: ConfigMapping): void {
    const missing = this.requiredRuntimeStepConfigKeys().filter(
      (key) => !Object.hasOwn(runtimeStepConfig, key) || isMissingValue(runtimeStepConfig[key]),
    );
    if (missing.length > 0) {
      throw new StepConfigurationError(missing);
    }
  }

  /** Load the ledger from this run's snapshot (empty on the first step). */
  loadWorkflowResult(): WorkflowResult {
    return WorkflowResult.loadFromSnapshotFile(this.workflowResultSnapshotFilePath);
  }

  /**
   * Run the step. `workflowResult` is loaded from the snapshot when not given.
   * Returns the step's success flag.
   */
  async runStep(workflowResult?: WorkflowResult): Promise<boolean> {
    this.transition("configure");
    this.report("info", "STEP_START", `Step start (${this.subStepName} via ${this.subStepImplementerName})`);

    const runtimeStepConfig = this.getCopyOfRuntimeStepConfig();
    this.report("debug", "STEP_CONFIG", "Resolved step configuration", {
      "step-implementer-config-defaults": ConfigValue.convertLeavesToValues(this.stepImplementerConfigDefaults()),
      "global-defaults": ConfigValue.convertLeavesToValues(this.globalConfigDefaults),
      "global-environment-defaults": ConfigValue.convertLeavesToValues(this.globalEnvironmentConfigDefaults),
      "step-config": ConfigValue.convertLeavesToValues(this.stepConfig),
      "step-environment-config": ConfigValue.convertLeavesToValues(this.stepEnvironmentConfig),
      "step-config-overrides": ConfigValue.convertLeavesToValues(this.stepConfigOverrides),
      "runtime-step-config": ConfigValue.convertLeavesToValues(runtimeStepConfig),
    });

    let ledger: WorkflowResult;
    try {
      this.validateRuntimeStepConfig(runtimeStepConfig);
      this.transition("validate");
      ledger = workflowResult ?? this.loadWorkflowResult();
    } catch (e) {
      this.abort(e);
      throw e;
    }
    this.transition("execute");

    let stepResult: StepResult;
    try {
      stepResult = await this.executeStep(new StepContext(ledger, runtimeStepConfig, this.stepName));
      this.persist(ledger, stepResult);
    } catch (e) {
      const err = e instanceof SupplyctlError ? e : new StepExecutionError(this.stepName, this.subStepName, e);
      this.abort(err);
      throw err;
    }
    this.transition("complete");

    this.report(stepResult.success ? "info" : "warn", "STEP_RESULT", stepResult.success ? "Step succeeded" : stepResult.message, {
      "results-file-path": this.resultsFilePath,
      results: stepResult.getStepResult(),
    });
    this.report("info", "STEP_END", "Step end");

    return stepResult.success;
  }

  /** Create (if needed) a sub-directory of this step's scratch directory. */
  createWorkingDirSubDir(subDirRelativePath: string): string {
    const dir = path.join(this.workDirPathStep, subDirRelativePath);
    fs.mkdirSync(dir, { recursive: true });
    return dir;
  }

  /**
   * Write a file into this step's scratch directory, or create it empty when no
   * contents are given. `filename` may include sub-directories.
   */
  writeWorkingFile(filename: string, contents?: string | Uint8Array): string {
    const filePath = path.join(this.workDirPathStep, filename);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    if (contents === undefined) {
      fs.closeSync(fs.openSync(filePath, "a"));
    } else {
      fs.writeFileSync(filePath, contents);
    }
    return filePath;
  }

  /**
   * Write the ledger with `stepResult` appended to both files, then append it to
   * `ledger`. A failed write leaves `ledger` as it was.
   */
  private persist(ledger: WorkflowResult, stepResult: StepResult): void {
    const next = new WorkflowResult([...ledger.getStepResults(), stepResult]);
    next.writeToSnapshotFile(this.workflowResultSnapshotFilePath);
    next.writeResultsToYmlFile(this.resultsFilePath);
    ledger.addStepResult(stepResult);
  }

  private transition(event: LifecycleEvent): void {
    this.lifecycle = nextLifecycleState(this.lifecycle, event);
  }

  private abort(err: unknown): void {
    this.transition("fail");
    const details: Record<string, unknown> = { code: err instanceof SupplyctlError ? err.code : "UNKNOWN" };
    if (err instanceof Error && err.cause !== undefined) details.cause = errorMessage(err.cause);
    this.report("error", "STEP_FATAL", errorMessage(err), details);
  }

  private report(level: DiagnosticLevel, code: string, message: string, details?: Record<string, unknown>): void {
    this.reporter.emit({ level, code, message, step: this.stepName, ...(details ? { details } : {}) });
  }
}
