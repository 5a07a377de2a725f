/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Structured error context for log lines: message plus stack when available.
 */
export function describeError(error: unknown): { error: string; stack?: string } {
  return {
    error: getErrorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
