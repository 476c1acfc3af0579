import chalk from 'chalk';
import { ConfigError, errorMessage, OcrSiftError } from '../../core/errors.js';

/** Print a failure diagnostic and mark the process as failed without exiting mid-flight. */
export function reportError(err: unknown): void {
  const code = err instanceof OcrSiftError ? chalk.dim(` [${err.code}]`) : '';
  console.error(chalk.red('✗ ') + errorMessage(err) + code);
  process.exitCode = 1;
}

export function parsePositiveInt(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`--${name} must be a positive integer, got "${value}"`);
  }
  return n;
}
