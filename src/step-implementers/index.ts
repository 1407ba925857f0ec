import { StepImplementerRegistry, type StepImplementerFactory } from "../step-implementer/registry.js";
import { ConfiglintFromArgocd } from "./configlint-from-argocd.js";

export { ConfiglintFromArgocd };

export const BUILTIN_STEP_IMPLEMENTERS: Readonly<Record<string, StepImplementerFactory>> = {
  ConfiglintFromArgocd: (options) => new ConfiglintFromArgocd(options),
};

/**
 * Registry of the built-in implementers plus any `extra` ones (plugins shipped with the
 * embedding application). An extra name may not shadow a built-in.
 */
export function createDefaultRegistry(extra: Readonly<Record<string, StepImplementerFactory>> = {}): StepImplementerRegistry {
  for (const name of Object.keys(extra)) {
    if (Object.hasOwn(BUILTIN_STEP_IMPLEMENTERS, name)) {
      throw new Error(`Step implementer ${name} is already built in`);
    }
  }
  return new StepImplementerRegistry({ ...BUILTIN_STEP_IMPLEMENTERS, ...extra });
}
