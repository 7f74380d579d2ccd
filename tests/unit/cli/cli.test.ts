/**
 * CLI command tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'url';
import { createCLI } from '../../../src/cli/index.js';
import { runReconcile } from '../../../src/cli/commands/reconcile.cmd.js';
import { runValidate } from '../../../src/cli/commands/validate.cmd.js';
import { runExport } from '../../../src/cli/commands/export.cmd.js';
import { EXIT_OK, EXIT_REGISTRAR_ERROR, EXIT_VALIDATION_ERROR, type CommandContext } from '../../../src/cli/context.js';
import { AuthError } from '../../../src/core/errors.js';
import type { ProviderOverrides } from '../../../src/providers/ProviderFactory.js';
import { InMemoryRegistrar } from '../../helpers/InMemoryRegistrar.js';

function fixture(name: string): string {
  return fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));
}

interface TestContext extends CommandContext {
  out: string[];
  errors: string[];
  overrides: ProviderOverrides[];
}

function createTestContext(registrar: InMemoryRegistrar): TestContext {
  const context: TestContext = {
    out: [],
    errors: [],
    overrides: [],
    createClient: (overrides) => {
      context.overrides.push(overrides);
      return registrar;
    },
    retryOptions: () => ({ attempts: 3, baseDelayMs: 0, maxDelayMs: 0, sleep: async () => {} }),
    print: (line) => context.out.push(line),
    printPlan: (line) => context.out.push(line),
    printError: (line) => context.errors.push(line),
  };
  return context;
}

describe('CLI', () => {
  let registrar: InMemoryRegistrar;
  let context: TestContext;

  beforeEach(() => {
    registrar = new InMemoryRegistrar('example.com', [
      { type: 'A', host: '@', value: '198.51.100.1', ttl: 'auto' },
      { type: 'TXT', host: 'old', value: 'stale', ttl: 'auto' },
      { type: 'NS', host: '@', value: 'ns1.old-host.net', ttl: 'auto' },
    ]);
    context = createTestContext(registrar);
  });

  describe('reconcile', () => {
    it('should print the plan on a dry run', async () => {
      const code = await runReconcile({ desired: fixture('desired.yaml') }, context);

      expect(code).toBe(EXIT_OK);
      expect(context.out).toEqual([
        '- TXT old -> stale (ttl auto)',
        '+ CNAME www -> example.com (ttl auto)',
        '+ MX @ -> mx1.example.net (priority 10, ttl auto)',
        '~ A @ -> 203.0.113.10 (ttl auto) (was 198.51.100.1, ttl auto)',
        'Dry run for example.com: -1 delete, +2 create, ~1 update; nothing applied (1 ignored)',
      ]);
      expect(registrar.calls.map((call) => call.kind)).toEqual(['list']);
    });

    it('should use the file zone unless --zone is given', async () => {
      await runReconcile({ desired: fixture('desired.yaml'), provider: 'Cloudflare' }, context);
      await runReconcile({ desired: fixture('desired.yaml'), zone: 'example.net' }, context);

      expect(context.overrides).toEqual([
        { type: 'cloudflare', zone: 'example.com' },
        { type: undefined, zone: 'example.net' },
      ]);
    });

    it('should apply the plan and then report the zone in sync', async () => {
      const applied = await runReconcile({ desired: fixture('desired.yaml'), apply: true }, context);

      expect(applied).toBe(EXIT_OK);
      expect(context.out.at(-1)).toBe('Applied 4 operations to example.com: -1 delete, +2 create, ~1 update (1 ignored)');

      context.out = [];
      const rerun = await runReconcile({ desired: fixture('desired.yaml'), apply: true }, context);

      expect(rerun).toBe(EXIT_OK);
      expect(context.out).toEqual(['No changes: example.com is in sync (1 ignored)']);
    });

    it('should print the result as JSON', async () => {
      await runReconcile({ desired: fixture('desired.yaml'), json: true }, context);

      const [output] = context.out;
      const json: unknown = JSON.parse(output ?? '');
      expect(json).toMatchObject({ zone: 'example.com', provider: 'Memory', dryRun: true, applied: 0, failure: null });
    });

    it('should reject --dry-run with --apply', async () => {
      const code = await runReconcile({ desired: fixture('desired.yaml'), dryRun: true, apply: true }, context);

      expect(code).toBe(EXIT_VALIDATION_ERROR);
      expect(context.errors).toEqual(['Error: --dry-run and --apply cannot be used together']);
      expect(registrar.calls).toEqual([]);
    });

    it('should exit 1 on an invalid desired-state file', async () => {
      const path = fixture('invalid.yaml');

      const code = await runReconcile({ desired: path }, context);

      expect(code).toBe(EXIT_VALIDATION_ERROR);
      expect(context.errors).toEqual([`Error: Invalid desired-state file ${path}: Invalid IPv4 address`]);
    });

    it('should exit 1 on an unknown provider', async () => {
      const code = await runReconcile({ desired: fixture('desired.yaml'), provider: 'route53' }, context);

      expect(code).toBe(EXIT_VALIDATION_ERROR);
      expect(context.errors).toEqual(['Error: Unsupported provider: route53 (expected cloudflare or digitalocean)']);
    });

    it('should exit 2 when the registrar rejects the credentials', async () => {
      registrar.failWith('list', [new AuthError('invalid token', 401)]);

      const code = await runReconcile({ desired: fixture('desired.yaml'), apply: true }, context);

      expect(code).toBe(EXIT_REGISTRAR_ERROR);
      expect(context.out).toEqual([
        'Could not plan changes for example.com',
        'Failed to plan changes: invalid token',
      ]);
    });
  });

  describe('validate', () => {
    it('should list the records of a valid file', async () => {
      const path = fixture('desired.json');

      const code = await runValidate({ desired: path }, context);

      expect(code).toBe(EXIT_OK);
      expect(context.out).toEqual([
        '  A www -> 192.0.2.7 (ttl 600)',
        '  TXT @ -> v=spf1 -all (ttl auto)',
        `${path}: 2 records valid`,
      ]);
    });
  });

  describe('export', () => {
    it('should print the zone as a desired-state file', async () => {
      const code = await runExport({ format: 'json', zone: 'example.com' }, context);

      expect(code).toBe(EXIT_OK);
      expect(JSON.parse(context.out.join('\n'))).toEqual({
        zone: 'example.com',
        records: [
          { type: 'A', host: '@', value: '198.51.100.1', ttl: 'Automatic' },
          { type: 'TXT', host: 'old', value: 'stale', ttl: 'Automatic' },
        ],
      });
    });

    it('should reject unknown formats', async () => {
      const code = await runExport({ format: 'xml' }, context);

      expect(code).toBe(EXIT_VALIDATION_ERROR);
      expect(context.errors).toEqual(['Error: Unsupported format: xml (expected yaml or json)']);
    });
  });

  describe('createCLI', () => {
    afterEach(() => {
      process.exitCode = undefined;
    });

    it('should route subcommands and set the exit code', async () => {
      const path = fixture('invalid.yaml');

      await createCLI(context).parseAsync(['node', 'dns-reconciler', 'validate', '--desired', path]);

      expect(process.exitCode).toBe(EXIT_VALIDATION_ERROR);
      expect(context.errors).toEqual([`Error: Invalid desired-state file ${path}: Invalid IPv4 address`]);
    });
  });
});
