import type { Config } from "../config/config.js";
import { loadConfig } from "../config/loader.js";
import { SupplyctlError } from "../core/errors.js";
import type { Diagnostic } from "../logging/reporter.js";
import type { StepImplementerRegistry } from "../step-implementer/registry.js";
import { createDefaultRegistry } from "../step-implementers/index.js";

export type ValidatedStep = {
  step: string;
  subSteps: Array<{ name: string; implementer: string }>;
};

export type ValidateResult = { ok: true; steps: ValidatedStep[] } | { ok: false; errors: Diagnostic[] };

function diag(code: string, message: string, step?: string): Diagnostic {
  return { level: "error", code, message, ...(step ? { step } : {}) };
}

/**
 * Validate a pipeline definition: schema, cross-file conflicts, and that every
 * implementer name is registered.
 */
export function validateConfig(opts: {
  configPaths: readonly string[];
  registry?: StepImplementerRegistry;
}): ValidateResult {
  const registry = opts.registry ?? createDefaultRegistry();

  let config: Config;
  try {
    config = loadConfig(opts.configPaths);
  } catch (e) {
    if (e instanceof SupplyctlError) return { ok: false, errors: [diag(e.code, e.message)] };
    throw e;
  }

  const errors: Diagnostic[] = [];
  const steps: ValidatedStep[] = [];

  for (const stepName of config.stepNames) {
    const subSteps = config.getSubStepConfigs(stepName).map((s) => ({
      name: s.subStepName,
      implementer: s.subStepImplementerName,
    }));
    for (const subStep of subSteps) {
      if (!registry.has(subStep.implementer)) {
        errors.push(
          diag(
            "UNKNOWN_STEP_IMPLEMENTER",
            `Unknown step implementer ${subStep.implementer} for sub-step ${subStep.name} (known: ${registry.names().join(", ")})`,
            stepName,
          ),
        );
      }
    }
    steps.push({ step: stepName, subSteps });
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, steps };
}
