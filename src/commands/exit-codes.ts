/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  STEP_FAILED: 1,
  INVALID_ARGS: 2,
  CONFIG_INVALID: 3,
  FATAL: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const CONFIG_ERROR_CODES = new Set([
  "CONFIG_DEFINITION_INVALID",
  "STEP_CONFIG_MISSING_KEYS",
  "UNKNOWN_STEP",
  "UNKNOWN_STEP_IMPLEMENTER",
]);

/** Map an error code from a command result to the process exit code. */
export function exitCodeForError(code: string): ExitCode {
  if (code === "INVALID_ARGS") return EXIT.INVALID_ARGS;
  if (CONFIG_ERROR_CODES.has(code)) return EXIT.CONFIG_INVALID;
  return EXIT.FATAL;
}
