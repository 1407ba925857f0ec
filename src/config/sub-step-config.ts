import {
  ConfigValue,
  cloneConfig,
  isAbsentConfigValue,
  isConfigMapping,
  type ConfigMapping,
} from "./config-value.js";
import { deepMerge } from "./deep-merge.js";

/**
 * Configuration layers, lowest precedence first. The layer name doubles as the
 * provenance of values that arrive without one (implementer defaults, runtime overrides).
 */
export const CONFIG_LAYERS = [
  "step-implementer-config-defaults",
  "global-defaults",
  "global-environment-defaults",
  "step-config",
  "step-environment-config",
  "step-config-overrides",
] as const;

export type ConfigLayerName = (typeof CONFIG_LAYERS)[number];

export type ConfigLayer = {
  name: ConfigLayerName;
  values: ConfigMapping;
};

/** Per-environment mappings, keyed by environment name. */
export type EnvironmentConfig = Record<string, ConfigMapping>;

export type SubStepConfigOptions = {
  stepName: string;
  subStepName: string;
  subStepImplementerName: string;
  subStepConfig?: ConfigMapping;
  subStepEnvConfig?: EnvironmentConfig;
  globalDefaults?: ConfigMapping;
  globalEnvironmentDefaults?: EnvironmentConfig;
  stepConfigOverrides?: ConfigMapping;
};

/**
 * Configuration for one sub-step of a pipeline step.
 *
 * Resolves values across six layers, from least to highest precedence:
 *
 *   1. step implementer config defaults
 *   2. global defaults
 *   3. global environment defaults
 *   4. step config
 *   5. step environment config
 *   6. step config runtime overrides
 *
 * Presence decides which layer wins, not truthiness: `""`, `0` and `false` are defined,
 * `null` is not. Mappings that meet mappings are deep-merged; anything else is replaced.
 */
export class SubStepConfig {
  readonly stepName: string;
  readonly subStepName: string;
  readonly subStepImplementerName: string;

  private readonly subStepConfigValue: ConfigMapping;
  private readonly subStepEnvConfig: EnvironmentConfig;
  private readonly globalDefaultsValue: ConfigMapping;
  private readonly globalEnvironmentDefaults: EnvironmentConfig;
  private stepConfigOverridesValue: ConfigMapping;

  constructor(opts: SubStepConfigOptions) {
    this.stepName = opts.stepName;
    this.subStepName = opts.subStepName;
    this.subStepImplementerName = opts.subStepImplementerName;
    this.subStepConfigValue = cloneConfig(opts.subStepConfig ?? {});
    this.subStepEnvConfig = cloneConfig(opts.subStepEnvConfig ?? {});
    this.globalDefaultsValue = cloneConfig(opts.globalDefaults ?? {});
    this.globalEnvironmentDefaults = cloneConfig(opts.globalEnvironmentDefaults ?? {});
    this.stepConfigOverridesValue = cloneConfig(opts.stepConfigOverrides ?? {});
  }

  /** Static step configuration. Accessors return copies; the layers never change in place. */
  get subStepConfig(): ConfigMapping {
    return cloneConfig(this.subStepConfigValue);
  }

  get globalDefaults(): ConfigMapping {
    return cloneConfig(this.globalDefaultsValue);
  }

  get stepConfigOverrides(): ConfigMapping {
    return cloneConfig(this.stepConfigOverridesValue);
  }

  /** Replace the runtime overrides. The only mutation allowed on a sub-step config. */
  setStepConfigOverrides(overrides: ConfigMapping | null | undefined): void {
    this.stepConfigOverridesValue = cloneConfig(overrides ?? {});
  }

  getSubStepEnvConfig(environment?: string | null): ConfigMapping {
    return cloneConfig(lookupEnvironment(this.subStepEnvConfig, environment));
  }

  getGlobalEnvironmentDefaults(environment?: string | null): ConfigMapping {
    return cloneConfig(lookupEnvironment(this.globalEnvironmentDefaults, environment));
  }

  /** All six layers, lowest precedence first, as copies. */
  getConfigLayers(environment?: string | null, defaults: ConfigMapping = {}): ConfigLayer[] {
    return this.layers(environment, defaults).map((layer) => ({ name: layer.name, values: cloneConfig(layer.values) }));
  }

  /**
   * Resolve one key. Returns plain data (provenance stripped), or `null` when no layer
   * defines the key.
   */
  getConfigValue(key: string, environment?: string | null, defaults: ConfigMapping = {}): unknown {
    let resolved: unknown = undefined;
    for (const layer of this.layers(environment, defaults)) {
      if (!Object.hasOwn(layer.values, key)) continue;
      resolved = resolveLayerValue(resolved, layer.values[key], layer.name, key);
    }
    return resolved === undefined ? null : ConfigValue.convertLeavesToValues(resolved);
  }

  /**
   * Materialize the runtime step configuration: the union of keys across all layers,
   * each resolved by precedence, leaves wrapped in ConfigValues that name their source.
   * The result is a deep copy.
   */
  getCopyOfRuntimeStepConfig(environment?: string | null, defaults: ConfigMapping = {}): ConfigMapping {
    const runtime: ConfigMapping = {};
    for (const layer of this.layers(environment, defaults)) {
      for (const [key, value] of Object.entries(layer.values)) {
        const resolved = resolveLayerValue(runtime[key], value, layer.name, key);
        if (resolved !== undefined) runtime[key] = resolved;
      }
    }
    return runtime;
  }

  private layers(environment: string | null | undefined, defaults: ConfigMapping): ConfigLayer[] {
    return [
      { name: "step-implementer-config-defaults", values: defaults },
      { name: "global-defaults", values: this.globalDefaultsValue },
      { name: "global-environment-defaults", values: lookupEnvironment(this.globalEnvironmentDefaults, environment) },
      { name: "step-config", values: this.subStepConfigValue },
      { name: "step-environment-config", values: lookupEnvironment(this.subStepEnvConfig, environment) },
      { name: "step-config-overrides", values: this.stepConfigOverridesValue },
    ];
  }
}

function lookupEnvironment(envConfig: EnvironmentConfig, environment?: string | null): ConfigMapping {
  if (environment === null || environment === undefined) return {};
  if (!Object.hasOwn(envConfig, environment)) return {};
  const values = envConfig[environment];
  return isConfigMapping(values) ? values : {};
}

/** Fold one layer's value for `key` over what lower layers resolved so far. */
function resolveLayerValue(current: unknown, candidate: unknown, layer: ConfigLayerName, key: string): unknown {
  if (isAbsentConfigValue(candidate)) return current;
  const wrapped = ConfigValue.wrap(candidate, layer, [key]);
  if (isConfigMapping(current) && isConfigMapping(wrapped)) {
    return deepMerge(current, wrapped, { nullIsAbsent: true, pathParts: [key] });
  }
  return wrapped;
}
