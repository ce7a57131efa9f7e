import chalk from 'chalk';
import { describeError } from '../core/errors.js';

/**
 * Wraps a command action: fatal errors print one line and exit 1.
 */
export function guarded<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      console.error(chalk.red('Error:'), describeError(err));
      process.exit(1);
    }
  };
}

export function exitOnFailures(failed: number): void {
  if (failed > 0) process.exitCode = 1;
}
