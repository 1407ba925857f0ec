import { ConfigDefinitionError } from "../core/errors.js";
import { cloneConfig, isAbsentConfigValue, isConfigMapping, type ConfigMapping } from "./config-value.js";

export type DeepMergeOptions = {
  /**
   * What to do when both sides define a non-mapping value for the same key.
   * `overwrite` lets `override` win; `error` throws a ConfigDefinitionError.
   */
  onConflict?: "overwrite" | "error";
  /** Treat null/undefined in `override` as "not defined" instead of as a replacement. */
  nullIsAbsent?: boolean;
  /** Key path of `base` within a larger document, for error messages. */
  pathParts?: readonly string[];
};

/**
 * Deep merge two mappings. `override` values take precedence.
 * Mappings are merged key by key; anything else (scalars, arrays, ConfigValues) is replaced.
 * Neither input is mutated: the result is a fresh copy.
 */
export function deepMerge(base: ConfigMapping, override: ConfigMapping, opts: DeepMergeOptions = {}): ConfigMapping {
  const onConflict = opts.onConflict ?? "overwrite";
  const pathParts = opts.pathParts ?? [];
  const result = cloneConfig(base);

  for (const [key, val] of Object.entries(override)) {
    if (val === undefined) continue;
    if (opts.nullIsAbsent && isAbsentConfigValue(val)) continue;

    const existing = result[key];
    if (isConfigMapping(val) && isConfigMapping(existing)) {
      result[key] = deepMerge(existing, val, { ...opts, pathParts: [...pathParts, key] });
      continue;
    }

    if (onConflict === "error" && Object.hasOwn(result, key)) {
      throw new ConfigDefinitionError(`Conflicting configuration value for key: ${[...pathParts, key].join(".")}`);
    }
    result[key] = cloneConfig(val);
  }

  return result;
}
