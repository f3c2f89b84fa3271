import { MigrationExporter } from './index.js';
import { loadOptions, wantsHelp } from './config/index.js';
import type { Fetcher } from './cloud/client.js';
import { createLinePrompt, type LinePrompt } from './migration/segments.js';
import type { SegmentPrompt } from './types/index.js';
import { exitCodeFor, getErrorCode } from './utils/errors.js';
import { logger } from './utils/logger.js';

export function printUsage(): void {
  console.log(`
Usage: meraki-nile-export --api-key <key> --org-id <id> --network-id <id> [options]

Exports the wired clients of a Meraki network as a Nile MAC import CSV,
asking for a segment name for each VLAN found.

Options:
  --api-key <key>       Meraki Dashboard API key           (env: MERAKI_API_KEY)
  --org-id <id>         Meraki organization ID             (env: MERAKI_ORG_ID)
  --network-id <id>     Meraki network ID                  (env: MERAKI_NETWORK_ID)
  --output <file>       Output CSV file (default: migration_clients.csv)
  --timespan <seconds>  History window in seconds (default: 86400)
  --per-page <n>        Clients per API page (default: 1000)
  -h, --help            Show this help

Environment:
  LOG_LEVEL             Diagnostic log level on stderr (default: warn)
`);
}

export interface CommandDeps {
  fetch?: Fetcher;
  ask?: SegmentPrompt;
  env?: NodeJS.ProcessEnv;
}

/** Runs one export and resolves to the process exit code. */
export async function runExportCommand(argv: string[], deps: CommandDeps = {}): Promise<number> {
  if (wantsHelp(argv)) {
    printUsage();
    return 0;
  }

  let prompt: LinePrompt | undefined;

  try {
    const options = loadOptions(argv, deps.env);

    let ask = deps.ask;
    if (!ask) {
      prompt = createLinePrompt();
      ask = prompt.ask;
    }

    const exporter = new MigrationExporter({ apiKey: options.apiKey, fetch: deps.fetch });
    const result = await exporter.run(options, ask);

    console.log(`Done. Migration CSV exported to ${result.output} (${result.rowsWritten} rows)`);
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.debug({ err, code: getErrorCode(err) }, 'export failed');
    console.error(`❌ Error: ${message}`);
    return exitCodeFor(err);
  } finally {
    prompt?.close();
  }
}
