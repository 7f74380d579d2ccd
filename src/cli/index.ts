/**
 * dns-reconciler - Commander Program Definition
 *
 * Commands:
 * 1. reconcile - plan or apply changes to a zone
 * 2. validate  - check a desired-state file offline
 * 3. export    - dump a zone as a desired-state file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createReconcileCommand } from './commands/reconcile.cmd.js';
import { createValidateCommand } from './commands/validate.cmd.js';
import { createExportCommand } from './commands/export.cmd.js';
import { createDefaultContext, type CommandContext } from './context.js';

export const VERSION = '1.0.0';

// ============================================================================
// Program Factory
// ============================================================================

export function createCLI(context: CommandContext = createDefaultContext()): Command {
  const program = new Command();

  program
    .name('dns-reconciler')
    .description('Reconcile a DNS zone with a desired record set')
    .version(VERSION);

  program.addCommand(createReconcileCommand(context));
  program.addCommand(createValidateCommand(context));
  program.addCommand(createExportCommand(context));

  program.on('--help', () => {
    console.log('');
    console.log(chalk.yellow('Examples:'));
    console.log(chalk.gray('  dns-reconciler validate --desired zone.yaml'));
    console.log(chalk.gray('  dns-reconciler reconcile --desired zone.yaml --dry-run'));
    console.log(chalk.gray('  dns-reconciler reconcile --desired zone.yaml --apply'));
    console.log(chalk.gray('  dns-reconciler export --zone example.com --provider cloudflare > zone.yaml'));
    console.log('');
    console.log(chalk.yellow('Exit codes:'));
    console.log(chalk.gray('  0  success, no changes, or dry run'));
    console.log(chalk.gray('  1  invalid input or configuration'));
    console.log(chalk.gray('  2  registrar error after retries'));
  });

  program.configureOutput({
    outputError: (str, write) => {
      write(chalk.red(str));
    },
  });

  return program;
}

export {
  runReconcile,
  type ReconcileCommandOptions,
} from './commands/reconcile.cmd.js';
export { runValidate, type ValidateCommandOptions } from './commands/validate.cmd.js';
export { runExport, type ExportCommandOptions } from './commands/export.cmd.js';
export { EXIT_OK, EXIT_VALIDATION_ERROR, EXIT_REGISTRAR_ERROR, type CommandContext } from './context.js';
