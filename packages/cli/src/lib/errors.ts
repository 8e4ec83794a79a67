/**
 * Error utilities
 */

/**
 * Safely extract an error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

type NodeError = Error & { code?: string };

export function isNodeError(error: unknown): error is NodeError {
  return error instanceof Error && "code" in error;
}

/** Node error code (ENOENT, EEXIST, ...) or undefined. */
export function errorCode(error: unknown): string | undefined {
  if (!isNodeError(error)) return;
  return typeof error.code === "string" ? error.code : undefined;
}
