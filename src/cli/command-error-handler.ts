import chalk from 'chalk';
import {
  RuntimeInterruptedError,
  StateCorruptError,
  RunNotFoundError,
  RunAlreadyExistsError,
  RunLockedError,
} from '../errors.js';

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof RuntimeInterruptedError) {
    process.exit(err.exitCode);
  } else if (err instanceof StateCorruptError) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.yellow(`The run state is not repaired automatically. Inspect or move ${err.statePath}.`));
    process.exit(1);
  } else if (err instanceof RunNotFoundError) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.yellow(`Start a run with 'stageline run'.`));
    process.exit(1);
  } else if (err instanceof RunAlreadyExistsError) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.yellow(`Use 'stageline resume' to continue it, or 'stageline run --force' to start over.`));
    process.exit(1);
  } else if (err instanceof RunLockedError) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.yellow(`Another stageline process (pid ${err.pid}) is working on this run.`));
    process.exit(1);
  } else {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${msg}`));
    process.exit(1);
  }
}

/**
 * Wrap an async commander action handler with standardized error handling.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      handleCommandError(err);
    }
  };
}
