/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
