/** A configuration mapping whose leaves may or may not be wrapped in ConfigValue. */
export type ConfigMapping = Record<string, unknown>;

/**
 * A configuration leaf plus where it came from.
 *
 * Mappings are never wrapped: they recurse into plain objects whose leaves are
 * ConfigValues. Scalars and sequences are leaves.
 */
export class ConfigValue {
  readonly value: unknown;
  /** Identifier of the source that supplied the value (a file path or a layer name). */
  readonly source: string | null;
  /** Key path at which the value was found in its source. */
  readonly pathParts: readonly string[];

  constructor(value: unknown, source: string | null = null, pathParts: readonly string[] = []) {
    this.value = value;
    this.source = source;
    this.pathParts = [...pathParts];
  }

  get path(): string {
    return this.pathParts.join(".");
  }

  toString(): string {
    return `${this.path || "<root>"}=${JSON.stringify(this.value)} (from ${this.source ?? "unknown"})`;
  }

  /**
   * Wrap every leaf of `tree` in a ConfigValue carrying `source`.
   * Leaves that are already ConfigValues keep their own provenance.
   * Always returns a fresh structure.
   */
  static convertLeavesToConfigValues(
    tree: ConfigMapping,
    source: string | null,
    pathParts: readonly string[] = [],
  ): ConfigMapping {
    const result: ConfigMapping = {};
    for (const [key, value] of Object.entries(tree)) {
      result[key] = ConfigValue.wrap(value, source, [...pathParts, key]);
    }
    return result;
  }

  /** Wrap a single value: mappings recurse, leaves become ConfigValues. */
  static wrap(value: unknown, source: string | null, pathParts: readonly string[]): unknown {
    if (value instanceof ConfigValue) {
      return new ConfigValue(cloneConfig(value.value), value.source, value.pathParts);
    }
    if (isConfigMapping(value)) {
      return ConfigValue.convertLeavesToConfigValues(value, source, pathParts);
    }
    return new ConfigValue(cloneConfig(value), source, pathParts);
  }

  /** Recursively strip provenance. Plain data passes through (as a copy). */
  static convertLeavesToValues(tree: unknown): unknown {
    if (tree instanceof ConfigValue) return ConfigValue.convertLeavesToValues(tree.value);
    if (Array.isArray(tree)) return tree.map((item) => ConfigValue.convertLeavesToValues(item));
    if (isConfigMapping(tree)) {
      const result: ConfigMapping = {};
      for (const [key, value] of Object.entries(tree)) {
        result[key] = ConfigValue.convertLeavesToValues(value);
      }
      return result;
    }
    return tree;
  }

  /** The wrapped value, or the argument itself when it is not wrapped. */
  static unwrapForValue(value: unknown): unknown {
    return value instanceof ConfigValue ? value.value : value;
  }
}

/** True for plain objects (not arrays, not ConfigValues, not class instances like Date). */
export function isConfigMapping(value: unknown): value is ConfigMapping {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** `null`/`undefined`, bare or wrapped, means "not defined" for precedence purposes. */
export function isAbsentConfigValue(value: unknown): boolean {
  const unwrapped = ConfigValue.unwrapForValue(value);
  return unwrapped === null || unwrapped === undefined;
}

/** Deep copy of configuration data, ConfigValues included. */
export function cloneConfig<T>(value: T): T;
export function cloneConfig(value: unknown): unknown {
  if (value instanceof ConfigValue) {
    return new ConfigValue(cloneConfig(value.value), value.source, value.pathParts);
  }
  if (Array.isArray(value)) return value.map((item) => cloneConfig(item));
  if (isConfigMapping(value)) {
    const result: ConfigMapping = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = cloneConfig(item);
    }
    return result;
  }
  return value;
}

/** Narrow to a mapping, treating anything else as empty. */
export function asConfigMapping(value: unknown): ConfigMapping {
  return isConfigMapping(value) ? value : {};
}
