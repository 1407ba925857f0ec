import type { OutputFormat } from "../logging/reporter.js";

/** Where a runner keeps its state, and how it reports. */
export type RunnerSettings = {
  resultsDirPath: string;
  resultsFileName: string;
  workDirPath: string;
  environment: string | null;
  format: OutputFormat;
};

export const DEFAULT_SETTINGS: RunnerSettings = {
  resultsDirPath: "tssc-results",
  resultsFileName: "tssc-results.yml",
  workDirPath: "tssc-working",
  environment: null,
  format: "human",
};

const ENV_PREFIX = "SUPPLYCTL_";

const ENV_KEYS: Record<string, keyof RunnerSettings> = {
  RESULTS_DIR: "resultsDirPath",
  RESULTS_FILE_NAME: "resultsFileName",
  WORK_DIR: "workDirPath",
  ENVIRONMENT: "environment",
  FORMAT: "format",
};

function isOutputFormat(value: string): value is OutputFormat {
  return value === "human" || value === "jsonl";
}

/** Read SUPPLYCTL_ prefixed environment variable overrides. */
function settingsFromEnv(env: NodeJS.ProcessEnv): Partial<RunnerSettings> {
  const result: Partial<RunnerSettings> = {};
  for (const [suffix, key] of Object.entries(ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}${suffix}`];
    if (value === undefined || value === "") continue;
    if (key === "format") {
      if (!isOutputFormat(value)) throw new Error(`Invalid ${ENV_PREFIX}${suffix}: ${value} (expected human|jsonl)`);
      result.format = value;
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Layered runner settings: defaults ← SUPPLYCTL_* environment variables ← explicit overrides.
 * Undefined overrides do not mask lower layers.
 */
export function resolveSettings(overrides: Partial<RunnerSettings> = {}, env: NodeJS.ProcessEnv = process.env): RunnerSettings {
  const explicit: Partial<RunnerSettings> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(explicit, { [key]: value });
  }
  return { ...DEFAULT_SETTINGS, ...settingsFromEnv(env), ...explicit };
}
