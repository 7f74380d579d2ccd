#!/usr/bin/env node
/**
 * dns-reconciler - Entry Point
 */

import chalk from 'chalk';
import { createCLI } from './index.js';
import { EXIT_REGISTRAR_ERROR } from './context.js';

async function main(): Promise<void> {
  await createCLI().parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error(chalk.red('Fatal:'), err instanceof Error ? err.message : String(err));
  process.exitCode = EXIT_REGISTRAR_ERROR;
});
