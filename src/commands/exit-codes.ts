/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  BUILD_FAILED: 1,
  INVALID_CONFIG: 2,
  INVALID_ARGS: 3,
  VERIFY_FAILED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Diagnostics that blame a command-line argument rather than the recipe. */
const ARGUMENT_CODES: ReadonlySet<string> = new Set(["PLATFORM_INVALID", "COMMIT_INVALID"]);

export function exitCodeForErrors(errors: ReadonlyArray<{ code: string }>): ExitCode {
  return errors.some((e) => ARGUMENT_CODES.has(e.code)) ? EXIT.INVALID_ARGS : EXIT.INVALID_CONFIG;
}
