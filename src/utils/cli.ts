import chalk from 'chalk';
import { ValidationError, formatIssue } from './errors.js';

/** Print a command failure in red and exit non-zero. */
export function fail(err: unknown): never {
  if (err instanceof ValidationError) {
    const [headline] = err.message.split(': ');
    console.error(chalk.red(`\n  ${headline}`));
    for (const issue of err.issues) {
      console.error(chalk.red(`    - ${formatIssue(issue)}`));
    }
  } else {
    console.error(chalk.red(`\n  Error: ${err instanceof Error ? err.message : String(err)}`));
  }
  console.error('');
  process.exit(1);
}

export function parseIntOption(value: string, name: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n)) {
    throw new ValidationError('Invalid option', [{ path: name, message: `Expected an integer, got "${value}"` }]);
  }
  return n;
}

/** The part of an ora spinner that reports failure. */
export interface FailableSpinner {
  fail(text?: string): unknown;
}

/** Run `task`; if it throws, mark the spinner failed before the error propagates. */
export function withSpinner<T>(spinner: FailableSpinner | null, failText: string, task: () => T): T {
  try {
    return task();
  } catch (err) {
    spinner?.fail(failText);
    throw err;
  }
}
