/**
 * Type guard utilities for safer error handling
 */

/**
 * Type guard to check if a value is an Error instance
 * Handles both native Error instances and Error-like objects
 */
export function isError(value: unknown): value is Error {
  if (value instanceof Error) return true;
  if (typeof value !== 'object' || value === null) return false;
  return 'message' in value &&
    'name' in value &&
    typeof value.message === 'string' &&
    typeof value.name === 'string';
}

/**
 * Type guard to safely extract error message from unknown value
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  // Handle objects with toString method
  if (error && typeof error === 'object' && 'toString' in error) {
    const str = String(error);
    if (str !== '[object Object]') {
      return str;
    }
  }

  return 'An unknown error occurred';
}

/**
 * Type guard to check if a value is a NodeJS.ErrnoException
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return isError(error) && ('code' in error || 'errno' in error);
}
