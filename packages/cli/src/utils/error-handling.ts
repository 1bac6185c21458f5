/**
 * CLI-specific error handling wrapper for Commander.js actions.
 *
 * Lives in the CLI package because it calls process.exit() and writes to
 * stderr; core does neither.
 */

import { handleError } from '@package-graph/core';

/**
 * Wraps an async action. Any failure is printed and the process exits with 1.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
