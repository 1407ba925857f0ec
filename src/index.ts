export {
  ConfigDefinitionError,
  StepConfigurationError,
  StepExecutionError,
  SupplyctlError,
  UnknownStepError,
  UnknownStepImplementerError,
  WorkflowResultSnapshotError,
  errorMessage,
} from "./core/errors.js";
export type { ErrorCode } from "./core/errors.js";
export { LIFECYCLE_STATES, isTerminal, nextLifecycleState } from "./core/lifecycle.js";
export type { LifecycleEvent, LifecycleState } from "./core/lifecycle.js";

export { ConfigValue, cloneConfig, isConfigMapping } from "./config/config-value.js";
export type { ConfigMapping } from "./config/config-value.js";
export { deepMerge } from "./config/deep-merge.js";
export type { DeepMergeOptions } from "./config/deep-merge.js";
export { CONFIG_LAYERS, SubStepConfig } from "./config/sub-step-config.js";
export type { ConfigLayer, ConfigLayerName, EnvironmentConfig, SubStepConfigOptions } from "./config/sub-step-config.js";
export { StepConfig } from "./config/step-config.js";
export { CONFIG_KEYS, Config } from "./config/config.js";
export type { ConfigDocument } from "./config/config.js";
export { loadConfig, loadConfigDocuments } from "./config/loader.js";
export { DEFAULT_SETTINGS, resolveSettings } from "./config/settings.js";
export type { RunnerSettings } from "./config/settings.js";
export { validatePipelineConfig } from "./config/validator.js";

export { MemoryReporter, createReporter, formatHuman, silentReporter } from "./logging/reporter.js";
export type { Diagnostic, DiagnosticLevel, OutputFormat, Reporter, ReporterOptions } from "./logging/reporter.js";

export { StepResult } from "./results/step-result.js";
export type {
  StepIdentity,
  StepResultArtifact,
  StepResultData,
  StepResultMapping,
  SubStepResultMapping,
} from "./results/step-result.js";
export { WorkflowResult } from "./results/workflow-result.js";

export { StepContext } from "./step-implementer/context.js";
export { DefaultSteps } from "./step-implementer/default-steps.js";
export type { DefaultStep } from "./step-implementer/default-steps.js";
export { StepImplementerRegistry } from "./step-implementer/registry.js";
export type { StepImplementerFactory } from "./step-implementer/registry.js";
export { StepImplementer, WORKFLOW_RESULT_SNAPSHOT_FILE_NAME } from "./step-implementer/step-implementer.js";
export type { StepImplementerContract, StepImplementerOptions } from "./step-implementer/step-implementer.js";
export { BUILTIN_STEP_IMPLEMENTERS, ConfiglintFromArgocd, createDefaultRegistry } from "./step-implementers/index.js";

export { StepRunner } from "./runner/step-runner.js";
export type { StepRunnerOptions } from "./runner/step-runner.js";

export { EXIT, exitCodeForError } from "./commands/exit-codes.js";
export { parseStepConfigOverrides, runStep } from "./commands/run-step.js";
export type { RunStepOptions, RunStepResult } from "./commands/run-step.js";
export { validateConfig } from "./commands/validate.js";
export { readResults } from "./commands/results.js";
