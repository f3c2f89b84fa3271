import { MerakiDashboardAPI, type Fetcher } from './cloud/client.js';
import { writeMigrationCsv } from './migration/csv.js';
import { collectWiredVlans, promptForSegments } from './migration/segments.js';
import type { ExportOptions, ExportResult, SegmentPrompt } from './types/index.js';
import { createChildLogger } from './utils/logger.js';

const log = createChildLogger('exporter');

export interface MigrationExporterConfig {
  apiKey: string;
  baseUrl?: string;
  fetch?: Fetcher;
}

/**
 * Validate network, fetch clients, map VLANs to segments, write the CSV.
 * Each step finishes before the next begins and any failure ends the run
 * before the output file is opened.
 */
export class MigrationExporter {
  private api: MerakiDashboardAPI;

  constructor(config: MigrationExporterConfig) {
    this.api = new MerakiDashboardAPI(config);
  }

  async run(
    options: Omit<ExportOptions, 'apiKey'>,
    ask: SegmentPrompt
  ): Promise<ExportResult> {
    const network = await this.api.assertNetworkInOrganization(options.orgId, options.networkId);
    log.info({ networkId: network.id, name: network.name }, 'network verified');

    console.log('Fetching all clients...');
    const clients = await this.api.getAllNetworkClients(options.networkId, {
      timespan: options.timespan,
      perPage: options.perPage,
    });
    console.log(`Total clients retrieved: ${clients.length}`);

    const segments = await promptForSegments(collectWiredVlans(clients), ask);

    console.log('Writing migration CSV...');
    const rowsWritten = writeMigrationCsv(clients, segments, options.output);
    log.info({ output: options.output, rowsWritten }, 'migration CSV written');

    return {
      network,
      totalClients: clients.length,
      segments,
      rowsWritten,
      output: options.output,
    };
  }
}

export * from './types/index.js';
export * from './utils/errors.js';
export { MerakiDashboardAPI, DEFAULT_BASE_URL, DEFAULT_PER_PAGE, DEFAULT_TIMESPAN } from './cloud/client.js';
export type { Fetcher, DashboardAPIConfig } from './cloud/client.js';
export { buildMigrationRows, formatMigrationCsv, writeMigrationCsv, MIGRATION_CSV } from './migration/csv.js';
export { collectWiredVlans, createLinePrompt, isWiredClient, promptForSegments } from './migration/segments.js';
export type { LinePrompt } from './migration/segments.js';
export { loadOptions } from './config/index.js';
