/**
 * Error taxonomy. Every error thrown by the engine carries a stable `code`
 * that the CLI maps to an exit code and that `jsonl` diagnostics report verbatim.
 */
export type ErrorCode =
  | "CONFIG_DEFINITION_INVALID"
  | "STEP_CONFIG_MISSING_KEYS"
  | "STEP_EXECUTION_FAILED"
  | "UNKNOWN_STEP_IMPLEMENTER"
  | "UNKNOWN_STEP"
  | "SNAPSHOT_UNREADABLE"
  | "LIFECYCLE_INVALID_TRANSITION";

export class SupplyctlError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The pipeline definition is malformed or two sources define the same key. */
export class ConfigDefinitionError extends SupplyctlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_DEFINITION_INVALID", message, options);
  }
}

/** Required runtime configuration keys are absent or empty. Fatal: raised before execution. */
export class StepConfigurationError extends SupplyctlError {
  readonly missingKeys: readonly string[];

  constructor(missingKeys: readonly string[]) {
    super(
      "STEP_CONFIG_MISSING_KEYS",
      `The runtime step configuration is missing the required configuration keys (${missingKeys.join(", ")})`,
    );
    this.missingKeys = [...missingKeys];
  }
}

/** Unexpected failure inside an implementer's execution logic. */
export class StepExecutionError extends SupplyctlError {
  readonly stepName: string;
  readonly subStepName: string;

  constructor(stepName: string, subStepName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("STEP_EXECUTION_FAILED", `Unexpected error running step ${stepName} (${subStepName}): ${reason}`, {
      cause,
    });
    this.stepName = stepName;
    this.subStepName = subStepName;
  }
}

export class UnknownStepImplementerError extends SupplyctlError {
  constructor(name: string, known: readonly string[]) {
    super(
      "UNKNOWN_STEP_IMPLEMENTER",
      `Unknown step implementer: ${name} (known: ${known.length > 0 ? known.join(", ") : "none"})`,
    );
  }
}

export class UnknownStepError extends SupplyctlError {
  constructor(stepName: string, known: readonly string[]) {
    super(
      "UNKNOWN_STEP",
      `Step not defined in pipeline configuration: ${stepName} (defined: ${known.length > 0 ? known.join(", ") : "none"})`,
    );
  }
}

/** The durable ledger snapshot exists but cannot be decoded. */
export class WorkflowResultSnapshotError extends SupplyctlError {
  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super("SNAPSHOT_UNREADABLE", `Workflow result snapshot unreadable (${filePath}): ${reason}`, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
