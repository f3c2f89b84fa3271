import { writeFileSync } from 'fs';
import { stringify } from 'csv-stringify/sync';
import { MerakiClient, MigrationRow, SegmentMap } from '../types/index.js';
import { isWiredClient } from './segments.js';

/**
 * Column layout and fixed values of the Nile MAC import file. Only the MAC
 * and the segment come from Meraki; every other column is a constant.
 */
export const MIGRATION_CSV = Object.freeze({
  header: Object.freeze([
    'MAC Address (Required)',
    'Segment (Required for allow state)',
    'Lock to Port (Optional)',
    'Site (Optional)',
    'Building (Optional)',
    'Floor (Optional)',
    'Allow or Deny (Required)',
    'Description (Optional)',
    'Static IP (Optional)',
    'IP Address (Optional)',
    'Passive IP (Optional)',
  ] as const),
  defaults: Object.freeze({
    lockToPort: '',
    site: '',
    building: '',
    floor: '',
    allowOrDeny: 'Allow',
    description: 'Imported from migration CSV',
    staticIp: 'No',
    ipAddress: '',
    passiveIp: 'No',
  } as const),
});

function dedupKey(client: MerakiClient): string {
  return JSON.stringify([client.mac, client.vlan ?? null]);
}

/**
 * One row per distinct (MAC, VLAN) among wired clients, in input order.
 * The first client seen for a pair wins.
 */
export function buildMigrationRows(
  clients: readonly MerakiClient[],
  segments: SegmentMap
): MigrationRow[] {
  const { defaults } = MIGRATION_CSV;
  const seen = new Set<string>();
  const rows: MigrationRow[] = [];

  for (const client of clients) {
    if (!isWiredClient(client)) continue;

    const key = dedupKey(client);
    if (seen.has(key)) continue;
    seen.add(key);

    const segment = client.vlan === undefined ? '' : segments.get(client.vlan) ?? '';
    rows.push([
      client.mac,
      segment,
      defaults.lockToPort,
      defaults.site,
      defaults.building,
      defaults.floor,
      defaults.allowOrDeny,
      defaults.description,
      defaults.staticIp,
      defaults.ipAddress,
      defaults.passiveIp,
    ]);
  }

  return rows;
}

export function formatMigrationCsv(rows: readonly MigrationRow[]): string {
  return stringify([MIGRATION_CSV.header, ...rows], { record_delimiter: 'windows' });
}

/**
 * Overwrites `outputPath` with the import file and returns the number of
 * data rows. The file is written in one call but not atomically.
 */
export function writeMigrationCsv(
  clients: readonly MerakiClient[],
  segments: SegmentMap,
  outputPath: string
): number {
  const rows = buildMigrationRows(clients, segments);
  writeFileSync(outputPath, formatMigrationCsv(rows));
  return rows.length;
}
