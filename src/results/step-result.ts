/** The three names that identify a step result. */
export type StepIdentity = {
  readonly stepName: string;
  readonly subStepName: string;
  readonly subStepImplementerName: string;
};

export type StepResultArtifact = {
  value: unknown;
  valueType: string;
};

/** Serialized sub-step entry. Key names are part of the results file format. */
export type SubStepResultMapping = {
  "sub-step-implementer-name": string;
  success: boolean;
  message: string;
  artifacts: Record<string, { value: unknown; type: string }>;
};

/** `{stepName: {subStepName: SubStepResultMapping}}` */
export type StepResultMapping = Record<string, Record<string, SubStepResultMapping>>;

/** Persisted form of a step result inside the ledger snapshot. */
export type StepResultData = {
  step_name: string;
  sub_step_name: string;
  sub_step_implementer_name: string;
  success: boolean;
  message: string;
  artifacts: Array<{ name: string; value?: unknown; value_type: string }>;
};

/**
 * Outcome of one sub-step execution.
 *
 * A result starts successful. `fail()` is the only way to mark it failed and requires a
 * message, so a failed result always says why. Artifacts may still be attached after
 * failing (partial results).
 */
export class StepResult implements StepIdentity {
  readonly stepName: string;
  readonly subStepName: string;
  readonly subStepImplementerName: string;

  private messageValue = "";
  private successValue = true;
  private readonly artifacts = new Map<string, StepResultArtifact>();

  constructor(stepName: string, subStepName: string, subStepImplementerName: string) {
    this.stepName = stepName;
    this.subStepName = subStepName;
    this.subStepImplementerName = subStepImplementerName;
  }

  static fromStepImplementer(step: StepIdentity): StepResult {
    return new StepResult(step.stepName, step.subStepName, step.subStepImplementerName);
  }

  static fromData(data: StepResultData): StepResult {
    const result = new StepResult(data.step_name, data.sub_step_name, data.sub_step_implementer_name);
    if (data.success) {
      result.message = data.message;
    } else {
      result.fail(data.message);
    }
    for (const artifact of data.artifacts) {
      result.addArtifact(artifact.name, artifact.value, artifact.value_type);
    }
    return result;
  }

  get success(): boolean {
    return this.successValue;
  }

  get message(): string {
    return this.messageValue;
  }

  /** A failed result's message may be replaced but never blanked. */
  set message(message: string) {
    if (!this.successValue) this.assertMessage(message);
    this.messageValue = message;
  }

  /** Mark the result failed. Returns the result for chaining. */
  fail(message: string): this {
    this.assertMessage(message);
    this.successValue = false;
    this.messageValue = message;
    return this;
  }

  private assertMessage(message: string): void {
    if (message.trim() === "") {
      throw new Error(`A failed step result needs a message (${this.stepName}/${this.subStepName})`);
    }
  }

  /** Insert or replace an artifact. Last write wins. */
  addArtifact(name: string, value: unknown, valueType = "str"): void {
    this.artifacts.set(name, { value, valueType });
  }

  getArtifact(name: string): StepResultArtifact | undefined {
    return this.artifacts.get(name);
  }

  get artifactNames(): string[] {
    return [...this.artifacts.keys()];
  }

  /** The canonical nested mapping consumed by later steps and the results file. */
  getStepResult(): StepResultMapping {
    const artifacts: SubStepResultMapping["artifacts"] = {};
    for (const [name, artifact] of this.artifacts) {
      artifacts[name] = { value: artifact.value, type: artifact.valueType };
    }

    return {
      [this.stepName]: {
        [this.subStepName]: {
          "sub-step-implementer-name": this.subStepImplementerName,
          success: this.successValue,
          message: this.message,
          artifacts,
        },
      },
    };
  }

  toData(): StepResultData {
    return {
      step_name: this.stepName,
      sub_step_name: this.subStepName,
      sub_step_implementer_name: this.subStepImplementerName,
      success: this.successValue,
      message: this.message,
      artifacts: [...this.artifacts].map(([name, a]) => ({ name, value: a.value, value_type: a.valueType })),
    };
  }
}
