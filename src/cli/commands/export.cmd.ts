/**
 * Export Command
 *
 * Prints a provider's current records as a desired-state file, e.g. to
 * snapshot the old provider before a migration.
 */

import { Command } from 'commander';
import { ValidationError } from '../../core/errors.js';
import { withRetry } from '../../core/retry.js';
import { serializeDesiredState, type DesiredStateFormat } from '../../records/DesiredStateLoader.js';
import { EXIT_OK, createDefaultContext, reportError, type CommandContext } from '../context.js';
import { parseProviderOption } from './options.js';

export interface ExportCommandOptions {
  zone?: string;
  provider?: string;
  format: string;
}

export function createExportCommand(context: CommandContext = createDefaultContext()): Command {
  return new Command('export')
    .description('Print the current records as a desired-state file')
    .option('-z, --zone <zone>', 'Zone to export')
    .option('-p, --provider <type>', 'DNS provider (cloudflare, digitalocean)')
    .option('-f, --format <format>', 'Output format (yaml, json)', 'yaml')
    .action(async (options: ExportCommandOptions) => {
      process.exitCode = await runExport(options, context);
    });
}

function parseFormat(value: string): DesiredStateFormat {
  if (value === 'yaml' || value === 'json') return value;
  throw new ValidationError(`Unsupported format: ${value} (expected yaml or json)`);
}

export async function runExport(options: ExportCommandOptions, context: CommandContext): Promise<number> {
  try {
    const format = parseFormat(options.format);
    const client = context.createClient({
      type: parseProviderOption(options.provider),
      zone: options.zone,
    });

    const records = await withRetry(() => client.list(), context.retryOptions());
    context.print(serializeDesiredState(records, client.getZoneName(), format).trimEnd());

    return EXIT_OK;
  } catch (error) {
    return reportError(error, context);
  }
}
