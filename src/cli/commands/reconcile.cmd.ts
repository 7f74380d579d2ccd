/**
 * Reconcile Command
 *
 * Plans, and with --apply applies, the changes that bring a zone to the
 * desired state. Dry run is the default.
 */

import { Command } from 'commander';
import { ValidationError } from '../../core/errors.js';
import { loadDesiredState } from '../../records/DesiredStateLoader.js';
import { Reconciler } from '../../services/Reconciler.js';
import { formatResult, resultToJson } from '../../services/PlanFormatter.js';
import { EXIT_OK, createDefaultContext, exitCodeFor, reportError, type CommandContext } from '../context.js';
import { parseProviderOption } from './options.js';

export interface ReconcileCommandOptions {
  desired: string;
  dryRun?: boolean;
  apply?: boolean;
  provider?: string;
  zone?: string;
  json?: boolean;
}

// ============================================================================
// Command Factory
// ============================================================================

export function createReconcileCommand(context: CommandContext = createDefaultContext()): Command {
  return new Command('reconcile')
    .description('Bring a zone to the desired record set')
    .requiredOption('-d, --desired <file>', 'Desired-state file (JSON or YAML)')
    .option('--dry-run', 'Print the plan without applying it (default)')
    .option('--apply', 'Apply the plan')
    .option('-p, --provider <type>', 'DNS provider (cloudflare, digitalocean)')
    .option('-z, --zone <zone>', 'Zone to reconcile')
    .option('-j, --json', 'Output in JSON format')
    .action(async (options: ReconcileCommandOptions) => {
      process.exitCode = await runReconcile(options, context);
    });
}

// ============================================================================
// Reconcile
// ============================================================================

export async function runReconcile(options: ReconcileCommandOptions, context: CommandContext): Promise<number> {
  try {
    if (options.dryRun && options.apply) {
      throw new ValidationError('--dry-run and --apply cannot be used together');
    }

    const desired = await loadDesiredState(options.desired);
    const client = context.createClient({
      type: parseProviderOption(options.provider),
      zone: options.zone ?? desired.zone,
    });

    const reconciler = new Reconciler(client, context.retryOptions());
    const result = await reconciler.run(desired, { dryRun: !options.apply });

    if (options.json) {
      context.print(JSON.stringify(resultToJson(result), null, 2));
    } else {
      for (const line of formatResult(result)) {
        context.printPlan(line);
      }
    }

    return result.failure ? exitCodeFor(result.failure.error) : EXIT_OK;
  } catch (error) {
    return reportError(error, context);
  }
}
