/**
 * Exit codes and the CLI error type.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

// ============================================================================
// Error class with severity for exit code distinction
// ============================================================================

export class HotmicCliError extends Error {
  public readonly severity: 'user' | 'system';

  constructor(message: string, severity: 'user' | 'system') {
    super(message);
    this.name = 'HotmicCliError';
    this.severity = severity;
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof HotmicCliError && error.severity === 'user' ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
}
