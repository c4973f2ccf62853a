import chalk from 'chalk';
import { isLanguageError } from '@lingolayer/core';
import { EXIT_CODES } from './exit-codes.js';

export class CliError extends Error {
  constructor(message: string, public exitCode: number = EXIT_CODES.ERROR) {
    super(message);
    this.name = 'CliError';
  }
}

type MaybePromise<T> = T | Promise<T>;

export function withErrorHandling<A extends unknown[], R>(
  action: (...args: A) => MaybePromise<R>
): (...args: A) => Promise<R | undefined> {
  return async (...args: A): Promise<R | undefined> => {
    try {
      return await action(...args);
    } catch (error) {
      if (error instanceof CliError) {
        console.error(chalk.red(error.message));
        process.exitCode = error.exitCode;
        return undefined;
      }

      if (isLanguageError(error)) {
        console.error(chalk.red(error.message));
        process.exitCode = error.kind === 'configuration' ? EXIT_CODES.CONFIGURATION : EXIT_CODES.ERROR;
        return undefined;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Unexpected error: ${message}`));
      if (error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      process.exitCode = EXIT_CODES.ERROR;
      return undefined;
    }
  };
}
