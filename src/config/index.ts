import { parseArgs } from 'util';
import { z } from 'zod';
import { DEFAULT_PER_PAGE, DEFAULT_TIMESPAN } from '../cloud/client.js';
import type { ExportOptions } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_OUTPUT = 'migration_clients.csv';

export const ExportOptionsSchema = z.object({
  apiKey: z.string().min(1),
  orgId: z.string().min(1),
  networkId: z.string().min(1),
  output: z.string().min(1).default(DEFAULT_OUTPUT),
  timespan: z.coerce.number().int().positive().default(DEFAULT_TIMESPAN),
  perPage: z.coerce.number().int().positive().default(DEFAULT_PER_PAGE),
});

const FLAG_NAMES: Record<keyof ExportOptions, string> = {
  apiKey: '--api-key',
  orgId: '--org-id',
  networkId: '--network-id',
  output: '--output',
  timespan: '--timespan',
  perPage: '--per-page',
};

function isOptionKey(key: unknown): key is keyof ExportOptions {
  return typeof key === 'string' && Object.prototype.hasOwnProperty.call(FLAG_NAMES, key);
}

function flagFor(path: ReadonlyArray<string | number>): string {
  const key = path[0];
  return isOptionKey(key) ? FLAG_NAMES[key] : String(key);
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        'api-key': { type: 'string' },
        'org-id': { type: 'string' },
        'network-id': { type: 'string' },
        output: { type: 'string' },
        timespan: { type: 'string' },
        'per-page': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (err) {
    const cause = err instanceof Error ? err : undefined;
    throw new ConfigurationError(cause?.message ?? 'Invalid arguments', cause ? { cause } : undefined);
  }
}

export function wantsHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

/**
 * Builds exporter options from command-line flags, falling back to
 * MERAKI_API_KEY, MERAKI_ORG_ID and MERAKI_NETWORK_ID for the required ones.
 */
export function loadOptions(argv: string[], env: NodeJS.ProcessEnv = process.env): ExportOptions {
  const flags = parseFlags(argv);

  const result = ExportOptionsSchema.safeParse({
    apiKey: flags['api-key'] ?? env['MERAKI_API_KEY'],
    orgId: flags['org-id'] ?? env['MERAKI_ORG_ID'],
    networkId: flags['network-id'] ?? env['MERAKI_NETWORK_ID'],
    output: flags.output,
    timespan: flags.timespan,
    perPage: flags['per-page'],
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${flagFor(issue.path)}: ${issue.message}`);
    throw new ConfigurationError(`Invalid options\n  ${issues.join('\n  ')}`, { issues });
  }

  return result.data;
}
