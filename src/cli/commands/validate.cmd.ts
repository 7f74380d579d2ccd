/**
 * Validate Command
 *
 * Loads and checks a desired-state file without contacting a provider.
 */

import { Command } from 'commander';
import { describeRecord } from '../../records/RecordModel.js';
import { loadDesiredState } from '../../records/DesiredStateLoader.js';
import { EXIT_OK, createDefaultContext, reportError, type CommandContext } from '../context.js';

export interface ValidateCommandOptions {
  desired: string;
}

export function createValidateCommand(context: CommandContext = createDefaultContext()): Command {
  return new Command('validate')
    .description('Check a desired-state file without contacting the provider')
    .requiredOption('-d, --desired <file>', 'Desired-state file (JSON or YAML)')
    .action(async (options: ValidateCommandOptions) => {
      process.exitCode = await runValidate(options, context);
    });
}

export async function runValidate(options: ValidateCommandOptions, context: CommandContext): Promise<number> {
  try {
    const desired = await loadDesiredState(options.desired);

    for (const record of desired.records) {
      context.print(`  ${describeRecord(record)}`);
    }
    const zone = desired.zone ? ` for ${desired.zone}` : '';
    context.print(`${desired.source}: ${desired.records.length} records valid${zone}`);

    return EXIT_OK;
  } catch (error) {
    return reportError(error, context);
  }
}
