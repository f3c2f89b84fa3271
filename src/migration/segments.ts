import { createInterface } from 'readline';
import { MerakiClient, SegmentMap, SegmentPrompt } from '../types/index.js';
import { ErrorCode, MigrationError } from '../utils/errors.js';

export function isWiredClient(client: MerakiClient): boolean {
  return typeof client.switchport === 'string' && client.switchport !== '';
}

/** Distinct VLANs of wired clients, ascending. Clients without a VLAN are left out. */
export function collectWiredVlans(clients: readonly MerakiClient[]): number[] {
  const vlans = new Set<number>();
  for (const client of clients) {
    if (isWiredClient(client) && client.vlan !== undefined) {
      vlans.add(client.vlan);
    }
  }
  return sortVlans(vlans);
}

function sortVlans(vlans: Iterable<number>): number[] {
  return Array.from(new Set(vlans)).sort((a, b) => a - b);
}

/**
 * Asks for one segment name per VLAN, lowest VLAN first. Answers are
 * trimmed; an empty answer maps the VLAN to a blank segment.
 */
export async function promptForSegments(
  vlans: Iterable<number>,
  ask: SegmentPrompt
): Promise<SegmentMap> {
  console.log('Discovered VLANs:');
  const mapping = new Map<number, string>();
  for (const vlan of sortVlans(vlans)) {
    const answer = await ask(vlan);
    mapping.set(vlan, answer.trim());
  }
  return mapping;
}

export interface LinePrompt {
  ask: SegmentPrompt;
  close(): void;
}

/**
 * Reads segment names line by line from a terminal (stdin by default).
 * Lines that arrive before their question is asked are queued, so answers
 * can be piped in. A question fails once the input has ended and no queued
 * line is left.
 */
export function createLinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): LinePrompt {
  const rl = createInterface({ input, output });
  const lines: string[] = [];
  let closed = false;
  let waiting: { resolve: (line: string) => void; reject: (error: Error) => void } | undefined;

  const inputClosed = () =>
    new MigrationError(ErrorCode.OPERATION_CANCELLED, 'Input closed before all VLANs were mapped');

  rl.on('line', (line) => {
    if (waiting) {
      const { resolve } = waiting;
      waiting = undefined;
      resolve(line);
    } else {
      lines.push(line);
    }
  });

  rl.on('close', () => {
    closed = true;
    waiting?.reject(inputClosed());
    waiting = undefined;
  });

  const ask: SegmentPrompt = (vlan) =>
    new Promise((resolve, reject) => {
      output.write(`  VLAN ${vlan}: Enter segment name: `);
      const next = lines.shift();
      if (next !== undefined) {
        resolve(next);
      } else if (closed) {
        reject(inputClosed());
      } else {
        waiting = { resolve, reject };
      }
    });

  return {
    ask,
    close: () => {
      if (!closed) rl.close();
    },
  };
}
