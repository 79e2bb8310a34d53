/**
 * Error Handling Utilities
 *
 * Small helpers for turning `unknown` catch values into something that can be
 * logged or put on the wire.
 */

/**
 * Serialize an error (or anything thrown) into a plain object for log metadata.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    // Include any additional properties that might have been added (e.g., code, errno)
    for (const key of Object.getOwnPropertyNames(error)) {
      if (key !== 'name' && key !== 'message' && key !== 'stack') {
        serialized[key] = Reflect.get(error, key);
      }
    }
    return serialized;
  }
  if (error && typeof error === 'object') {
    return Object.fromEntries(Object.entries(error));
  }
  return { value: String(error) };
}

/**
 * Safely extract error message from any error type.
 *
 * @example
 * ```typescript
 * try { ... } catch (error) {
 *   logger.error('Operation failed', { error: getErrorMessage(error) });
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Coerce a thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
