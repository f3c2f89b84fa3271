import { PassThrough } from 'stream';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  collectWiredVlans,
  createLinePrompt,
  isWiredClient,
  promptForSegments,
} from '../../src/migration/segments.js';
import { ErrorCode, MigrationError } from '../../src/utils/errors.js';

describe('isWiredClient', () => {
  it('should treat a switchport as wired', () => {
    expect(isWiredClient({ mac: 'a', switchport: '1' })).toBe(true);
  });

  it('should treat missing or blank switchports as wireless', () => {
    expect(isWiredClient({ mac: 'a' })).toBe(false);
    expect(isWiredClient({ mac: 'a', switchport: null })).toBe(false);
    expect(isWiredClient({ mac: 'a', switchport: '' })).toBe(false);
  });
});

describe('collectWiredVlans', () => {
  it('should return distinct wired VLANs in ascending order', () => {
    const vlans = collectWiredVlans([
      { mac: 'a', vlan: 30, switchport: '1' },
      { mac: 'b', vlan: 5, switchport: '2' },
      { mac: 'c', vlan: 30, switchport: '3' },
      { mac: 'd', vlan: 100, switchport: '4' },
    ]);

    expect(vlans).toEqual([5, 30, 100]);
  });

  it('should ignore wireless clients and clients without a VLAN', () => {
    const vlans = collectWiredVlans([
      { mac: 'a', vlan: 20, ssid: 'Corp' },
      { mac: 'b', switchport: '7' },
      { mac: 'c', vlan: 10, switchport: '8' },
    ]);

    expect(vlans).toEqual([10]);
  });
});

describe('promptForSegments', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should ask once per VLAN in ascending order', async () => {
    const ask = vi.fn(async (vlan: number) => `segment-${vlan}`);

    const mapping = await promptForSegments([30, 5, 10, 5], ask);

    expect(ask.mock.calls.map(([vlan]) => vlan)).toEqual([5, 10, 30]);
    expect([...mapping.entries()]).toEqual([
      [5, 'segment-5'],
      [10, 'segment-10'],
      [30, 'segment-30'],
    ]);
  });

  it('should trim answers and keep empty ones', async () => {
    const answers: Record<number, string> = { 10: '  Engineering \t', 20: '   ' };

    const mapping = await promptForSegments([10, 20], async (vlan) => answers[vlan] ?? '');

    expect(mapping.get(10)).toBe('Engineering');
    expect(mapping.get(20)).toBe('');
  });

  it('should announce the discovered VLANs', async () => {
    await promptForSegments([1], async () => 'x');

    expect(console.log).toHaveBeenCalledWith('Discovered VLANs:');
  });
});

describe('createLinePrompt', () => {
  it('should show the VLAN prompt and return the typed line', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompt = createLinePrompt(input, output);

    const answer = prompt.ask(10);
    input.write('Engineering\n');

    await expect(answer).resolves.toBe('Engineering');
    expect(String(output.read())).toBe('  VLAN 10: Enter segment name: ');
    prompt.close();
  });

  it('should reject a pending question when input ends', async () => {
    const input = new PassThrough();
    const prompt = createLinePrompt(input, new PassThrough());

    const answer = prompt.ask(5);
    input.end();

    const error = await answer.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(MigrationError);
    if (!(error instanceof MigrationError)) return;
    expect(error.code).toBe(ErrorCode.OPERATION_CANCELLED);

    await expect(prompt.ask(6)).rejects.toThrow('Input closed before all VLANs were mapped');
  });

  it('should answer from lines piped in before the questions', async () => {
    const input = new PassThrough();
    const prompt = createLinePrompt(input, new PassThrough());

    input.end('Engineering\nSales\n');

    await expect(prompt.ask(10)).resolves.toBe('Engineering');
    await expect(prompt.ask(20)).resolves.toBe('Sales');
    await expect(prompt.ask(30)).rejects.toThrow('Input closed before all VLANs were mapped');
  });

  it('should keep the second answer when two arrive in one chunk', async () => {
    const input = new PassThrough();
    const prompt = createLinePrompt(input, new PassThrough());

    const first = prompt.ask(10);
    input.write('Engineering\nSales\n');

    await expect(first).resolves.toBe('Engineering');
    await expect(prompt.ask(20)).resolves.toBe('Sales');
    prompt.close();
  });
});
