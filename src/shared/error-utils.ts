/**
 * Error helpers shared by the services and the command-line entry point.
 */

/**
 * Extract a message string from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow an unknown thrown value to an Error, wrapping anything else.
 * Loggers and error constructors take `Error`, but `catch` gives `unknown`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
