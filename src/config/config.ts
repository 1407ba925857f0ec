import { ConfigDefinitionError, UnknownStepError } from "../core/errors.js";
import { ConfigValue, asConfigMapping, cloneConfig, isConfigMapping, type ConfigMapping } from "./config-value.js";
import { deepMerge } from "./deep-merge.js";
import { StepConfig } from "./step-config.js";
import { SubStepConfig, type EnvironmentConfig } from "./sub-step-config.js";
import { validatePipelineConfig } from "./validator.js";

/** Keys of the pipeline definition document. */
export const CONFIG_KEYS = {
  ROOT: "tssc-config",
  GLOBAL_DEFAULTS: "global-defaults",
  GLOBAL_ENVIRONMENT_DEFAULTS: "global-environment-defaults",
  IMPLEMENTER: "implementer",
  NAME: "name",
  CONFIG: "config",
  ENVIRONMENT_CONFIG: "environment-config",
} as const;

const RESERVED_KEYS = new Set<string>([CONFIG_KEYS.GLOBAL_DEFAULTS, CONFIG_KEYS.GLOBAL_ENVIRONMENT_DEFAULTS]);

/** One parsed pipeline definition document and where it came from. */
export type ConfigDocument = {
  source: string;
  document: unknown;
};

type StepDefinition = {
  source: string;
  subSteps: ConfigMapping[];
};

/**
 * Parsed pipeline definition.
 *
 * Several documents may contribute: global defaults are merged, but a key defined by
 * two documents, or a step defined by two documents, is a ConfigDefinitionError.
 * Every leaf is wrapped in a ConfigValue naming the document it came from.
 */
export class Config {
  private readonly globalDefaultsValue: ConfigMapping;
  private readonly globalEnvironmentDefaultsValue: EnvironmentConfig;
  private readonly steps = new Map<string, StepConfig>();

  private constructor(globalDefaults: ConfigMapping, globalEnvironmentDefaults: EnvironmentConfig, steps: StepConfig[]) {
    this.globalDefaultsValue = globalDefaults;
    this.globalEnvironmentDefaultsValue = globalEnvironmentDefaults;
    for (const step of steps) this.steps.set(step.stepName, step);
  }

  static fromDocument(document: unknown, source = "dict"): Config {
    return Config.fromDocuments([{ source, document }]);
  }

  static fromDocuments(documents: readonly ConfigDocument[]): Config {
    let globalDefaults: ConfigMapping = {};
    let globalEnvironmentDefaults: ConfigMapping = {};
    const stepDefinitions = new Map<string, StepDefinition>();

    for (const { source, document } of documents) {
      const plain = ConfigValue.convertLeavesToValues(document);
      const { valid, errors } = validatePipelineConfig(plain);
      if (!valid) {
        throw new ConfigDefinitionError(`Pipeline configuration invalid (${source}): ${errors}`);
      }

      const root = asConfigMapping(asConfigMapping(plain)[CONFIG_KEYS.ROOT]);

      const globalDefaultsPath = [CONFIG_KEYS.ROOT, CONFIG_KEYS.GLOBAL_DEFAULTS];
      globalDefaults = deepMerge(
        globalDefaults,
        ConfigValue.convertLeavesToConfigValues(asConfigMapping(root[CONFIG_KEYS.GLOBAL_DEFAULTS]), source, globalDefaultsPath),
        { onConflict: "error", pathParts: globalDefaultsPath },
      );

      const globalEnvPath = [CONFIG_KEYS.ROOT, CONFIG_KEYS.GLOBAL_ENVIRONMENT_DEFAULTS];
      globalEnvironmentDefaults = deepMerge(
        globalEnvironmentDefaults,
        ConfigValue.convertLeavesToConfigValues(
          asConfigMapping(root[CONFIG_KEYS.GLOBAL_ENVIRONMENT_DEFAULTS]),
          source,
          globalEnvPath,
        ),
        { onConflict: "error", pathParts: globalEnvPath },
      );

      for (const [stepName, definition] of Object.entries(root)) {
        if (RESERVED_KEYS.has(stepName)) continue;
        const previous = stepDefinitions.get(stepName);
        if (previous) {
          throw new ConfigDefinitionError(`Step ${stepName} is defined in both ${previous.source} and ${source}`);
        }
        const subSteps = Array.isArray(definition) ? definition.filter(isConfigMapping) : [asConfigMapping(definition)];
        stepDefinitions.set(stepName, { source, subSteps });
      }
    }

    const environmentDefaults = toEnvironmentConfig(globalEnvironmentDefaults);
    const steps: StepConfig[] = [];
    for (const [stepName, definition] of stepDefinitions) {
      steps.push(buildStepConfig(stepName, definition, globalDefaults, environmentDefaults));
    }

    return new Config(globalDefaults, environmentDefaults, steps);
  }

  get globalDefaults(): ConfigMapping {
    return cloneConfig(this.globalDefaultsValue);
  }

  get globalEnvironmentDefaults(): EnvironmentConfig {
    return cloneConfig(this.globalEnvironmentDefaultsValue);
  }

  get stepNames(): string[] {
    return [...this.steps.keys()];
  }

  getStepConfig(stepName: string): StepConfig | undefined {
    return this.steps.get(stepName);
  }

  getSubStepConfigs(stepName: string): readonly SubStepConfig[] {
    return this.steps.get(stepName)?.subSteps ?? [];
  }

  setStepConfigOverrides(stepName: string, overrides: ConfigMapping | null | undefined): void {
    const step = this.steps.get(stepName);
    if (!step) throw new UnknownStepError(stepName, this.stepNames);
    step.setStepConfigOverrides(overrides);
  }
}

function buildStepConfig(
  stepName: string,
  definition: StepDefinition,
  globalDefaults: ConfigMapping,
  globalEnvironmentDefaults: EnvironmentConfig,
): StepConfig {
  const step = new StepConfig(stepName);

  for (const entry of definition.subSteps) {
    const implementer = String(entry[CONFIG_KEYS.IMPLEMENTER]);
    const nameValue = entry[CONFIG_KEYS.NAME];
    const subStepName = typeof nameValue === "string" ? nameValue : implementer;

    if (step.getSubStep(subStepName)) {
      throw new ConfigDefinitionError(`Sub-step ${subStepName} is defined twice for step ${stepName} (${definition.source})`);
    }

    const basePath = [CONFIG_KEYS.ROOT, stepName, subStepName];
    step.addSubStep(
      new SubStepConfig({
        stepName,
        subStepName,
        subStepImplementerName: implementer,
        subStepConfig: ConfigValue.convertLeavesToConfigValues(
          asConfigMapping(entry[CONFIG_KEYS.CONFIG]),
          definition.source,
          [...basePath, CONFIG_KEYS.CONFIG],
        ),
        subStepEnvConfig: toEnvironmentConfig(
          ConfigValue.convertLeavesToConfigValues(
            asConfigMapping(entry[CONFIG_KEYS.ENVIRONMENT_CONFIG]),
            definition.source,
            [...basePath, CONFIG_KEYS.ENVIRONMENT_CONFIG],
          ),
        ),
        globalDefaults,
        globalEnvironmentDefaults,
      }),
    );
  }

  return step;
}

function toEnvironmentConfig(mapping: ConfigMapping): EnvironmentConfig {
  const result: EnvironmentConfig = {};
  for (const [environment, values] of Object.entries(mapping)) {
    result[environment] = asConfigMapping(values);
  }
  return result;
}
