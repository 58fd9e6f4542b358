import { ProbeError } from '../main/errors';
import type { DeviceProber } from '../main/probers/base';
import type { DeviceSnapshot, Logger, PersistedConfig, ScanEvent, ScanFilter, ScanGroup } from '../main/types';
import type { Settings } from '../main/settings';

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function makeDevice(ip: string, overrides: Partial<DeviceSnapshot> = {}): DeviceSnapshot {
  return {
    ip,
    make: 'AntMiner',
    model: 'Antminer S19',
    firmware: 'Stock',
    hashrateThs: 95,
    expectedHashrateThs: 95,
    temperatureC: 65,
    fans: [5400, 5400],
    isMining: true,
    messages: [],
    ...overrides,
  };
}

export function makeGroup(name: string, ranges: string[], overrides: Partial<ScanGroup> = {}): ScanGroup {
  return { name, ranges, filter: {}, enabled: true, ...overrides };
}

export function makeConfig(groups: ScanGroup[], results: PersistedConfig['results'] = {}): PersistedConfig {
  return { version: 1, groups, results };
}

export const testSettings: Settings = {
  configPath: 'unused.json',
  concurrency: 4,
  probeTimeoutMs: 50,
  channelCapacity: 8,
  cancelledTimestamp: 'clear',
};

/** What the fake answers for one address. Addresses not in the script have no miner. */
export type Behaviour = DeviceSnapshot | 'hang' | Error;

export class FakeProber implements DeviceProber {
  calls: string[] = [];
  filters: ScanFilter[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private script: Record<string, Behaviour> = {}, private delayMs = 2) {}

  async probe(ip: string, filter: ScanFilter, signal: AbortSignal): Promise<DeviceSnapshot> {
    this.calls.push(ip);
    this.filters.push(filter);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const behaviour = this.script[ip];
      if (behaviour === 'hang') {
        await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
        throw new ProbeError('timeout', ip, 'aborted');
      }
      await delay(this.delayMs);
      if (behaviour === undefined) throw new ProbeError('no-device', ip, 'No miner API answered');
      if (behaviour instanceof Error) throw behaviour;
      return behaviour;
    } finally {
      this.inFlight--;
    }
  }
}

export async function collect(events: AsyncIterable<ScanEvent>): Promise<ScanEvent[]> {
  const seen: ScanEvent[] = [];
  for await (const event of events) seen.push(event);
  return seen;
}
