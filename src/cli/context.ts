/**
 * Dependencies shared by the CLI commands
 */
import chalk from 'chalk';
import { getConfig } from '../config/ConfigManager.js';
import { ValidationError, toRegistrarError } from '../core/errors.js';
import type { RetryOptions } from '../core/retry.js';
import { createProviderFromConfig, type ProviderOverrides } from '../providers/ProviderFactory.js';
import type { RegistrarClient } from '../providers/base/RegistrarClient.js';

export const EXIT_OK = 0;
export const EXIT_VALIDATION_ERROR = 1;
export const EXIT_REGISTRAR_ERROR = 2;

export interface CommandContext {
  createClient(overrides: ProviderOverrides): RegistrarClient;
  retryOptions(): RetryOptions;
  /** Command output (stdout) */
  print(line: string): void;
  /** A line of plan output, colored by its prefix on a terminal */
  printPlan(line: string): void;
  printError(line: string): void;
}

/**
 * Color a plan line by its prefix
 */
export function colorizeLine(line: string): string {
  if (line.startsWith('- ')) return chalk.red(line);
  if (line.startsWith('+ ')) return chalk.green(line);
  if (line.startsWith('~ ')) return chalk.yellow(line);
  if (line.startsWith('Failed')) return chalk.red.bold(line);
  return chalk.bold(line);
}

/**
 * Context backed by environment configuration. Configuration is read on
 * first use so that `validate` works without any provider settings.
 */
export function createDefaultContext(): CommandContext {
  return {
    createClient: (overrides) => createProviderFromConfig(getConfig(), overrides),
    retryOptions: () => getConfig().retry,
    print: (line) => console.log(line),
    printPlan: (line) => console.log(colorizeLine(line)),
    printError: (line) => console.error(chalk.red(line)),
  };
}

export function exitCodeFor(error: unknown): number {
  return error instanceof ValidationError ? EXIT_VALIDATION_ERROR : EXIT_REGISTRAR_ERROR;
}

/**
 * Print an error and return its exit code
 */
export function reportError(error: unknown, context: CommandContext): number {
  const registrarError = toRegistrarError(error);
  context.printError(`Error: ${registrarError.message}`);
  return exitCodeFor(registrarError);
}
