import path from "node:path";
import type { ConfigMapping } from "../config/config-value.js";
import { loadConfig } from "../config/loader.js";
import { resolveSettings } from "../config/settings.js";
import { SupplyctlError } from "../core/errors.js";
import { createReporter, type OutputFormat, type Reporter } from "../logging/reporter.js";
import { StepRunner } from "../runner/step-runner.js";
import type { StepImplementerRegistry } from "../step-implementer/registry.js";

export type RunStepOptions = {
  step: string;
  configPaths: readonly string[];
  environment?: string;
  /** `key=value` runtime overrides. */
  stepConfig?: readonly string[];
  resultsDir?: string;
  workDir?: string;
  format?: OutputFormat;
  reporter?: Reporter;
  registry?: StepImplementerRegistry;
  env?: NodeJS.ProcessEnv;
};

export type RunStepResult =
  | { ok: true; success: boolean; resultsFilePath: string }
  | { ok: false; error: { code: string; message: string } };

export type ParsedOverrides = { ok: true; overrides: ConfigMapping } | { ok: false; error: string };

/** Parse `key=value` pairs. The value is everything after the first `=`, kept as a string. */
export function parseStepConfigOverrides(pairs: readonly string[]): ParsedOverrides {
  const overrides: ConfigMapping = {};
  for (const pair of pairs) {
    const idx = pair.indexOf("=");
    if (idx <= 0) {
      return { ok: false, error: `Invalid step config override (expected key=value): ${pair}` };
    }
    overrides[pair.slice(0, idx)] = pair.slice(idx + 1);
  }
  return { ok: true, overrides };
}

/**
 * Run one step of the pipeline defined by `configPaths`. Engine errors come back as
 * `{ ok: false }`; a failed step comes back as `{ ok: true, success: false }`.
 */
export async function runStep(opts: RunStepOptions): Promise<RunStepResult> {
  const parsed = parseStepConfigOverrides(opts.stepConfig ?? []);
  if (!parsed.ok) {
    return { ok: false, error: { code: "INVALID_ARGS", message: parsed.error } };
  }

  const settings = resolveSettings(
    {
      resultsDirPath: opts.resultsDir,
      workDirPath: opts.workDir,
      environment: opts.environment,
      format: opts.format,
    },
    opts.env,
  );
  const reporter = opts.reporter ?? createReporter({ format: settings.format });

  try {
    const config = loadConfig(opts.configPaths);
    const runner = new StepRunner({ config, settings, reporter, registry: opts.registry });
    const success = await runner.runStep(opts.step, parsed.overrides);
    return {
      ok: true,
      success,
      resultsFilePath: path.join(settings.resultsDirPath, settings.resultsFileName),
    };
  } catch (e) {
    if (e instanceof SupplyctlError) {
      return { ok: false, error: { code: e.code, message: e.message } };
    }
    throw e;
  }
}
