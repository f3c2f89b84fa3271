import { z } from 'zod';

// ============================================================================
// Dashboard API Types (api.meraki.com/api/v1)
// ============================================================================

// Only the fields the export reads are checked; the rest pass through as sent
export const MerakiNetworkSchema = z
  .object({
    id: z.string(),
    name: z.string().nullish(),
  })
  .passthrough();

export type MerakiNetwork = z.infer<typeof MerakiNetworkSchema>;

// Older API versions report the VLAN as a numeric string
const VlanSchema = z
  .union([z.number().int(), z.string()])
  .nullish()
  .transform((value, ctx): number | undefined => {
    if (value === null || value === undefined || value === '') return undefined;
    if (typeof value === 'number') return value;
    if (/^\d+$/.test(value)) return Number(value);
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid VLAN "${value}"` });
    return z.NEVER;
  });

export const MerakiClientSchema = z
  .object({
    mac: z.string(),
    // Set for wired clients only
    switchport: z.string().nullish(),
    vlan: VlanSchema,
  })
  .passthrough();

export type MerakiClient = z.infer<typeof MerakiClientSchema>;

export interface ClientsQuery {
  timespan: number;
  perPage: number;
  startingAfter?: string;
}

// ============================================================================
// Migration Types (Nile import CSV)
// ============================================================================

export type SegmentMap = ReadonlyMap<number, string>;

/**
 * Asks the operator for the segment name of one VLAN. The production
 * implementation reads a line from stdin; tests pass canned answers.
 */
export type SegmentPrompt = (vlan: number) => Promise<string>;

export type MigrationRow = readonly [
  mac: string,
  segment: string,
  lockToPort: string,
  site: string,
  building: string,
  floor: string,
  allowOrDeny: 'Allow' | 'Deny',
  description: string,
  staticIp: 'Yes' | 'No',
  ipAddress: string,
  passiveIp: 'Yes' | 'No',
];

export interface ExportOptions {
  apiKey: string;
  orgId: string;
  networkId: string;
  output: string;
  timespan: number;
  perPage: number;
}

export interface ExportResult {
  network: MerakiNetwork;
  totalClients: number;
  segments: SegmentMap;
  rowsWritten: number;
  output: string;
}
