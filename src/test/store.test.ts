import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import type { NetworkInterfaceInfo } from 'os';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigValidationError, StoreError } from '../main/errors';
import { localSubnets } from '../main/network/topology';
import { ConfigDraft } from '../main/services/draft';
import { JsonFileStore, defaultConfig, parseConfig } from '../main/services/store';
import { DEFAULT_SETTINGS, loadSettings } from '../main/settings';
import type { Logger } from '../main/types';
import { makeConfig, makeDevice, makeGroup } from './helpers';

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

const emptyDefaults = () => defaultConfig([]);

describe('JsonFileStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'asic-scout-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts from defaults when the file does not exist', async () => {
    const logger = spyLogger();
    const path = join(dir, 'config.json');
    const store = new JsonFileStore(path, logger, emptyDefaults);

    expect(await store.load()).toEqual({
      version: 1,
      groups: [{ name: 'Default', ranges: ['192.168.1.0/24'], filter: {}, enabled: true }],
      results: {},
    });
    expect(logger.info).toHaveBeenCalledWith(`[Store] ${path} not found, starting from defaults`);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('starts from defaults when the file is corrupt', async () => {
    const logger = spyLogger();
    const path = join(dir, 'config.json');
    await writeFile(path, '{"groups": [', 'utf8');

    const config = await new JsonFileStore(path, logger, emptyDefaults).load();

    expect(config.groups.map((g) => g.name)).toEqual(['Default']);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('starts from defaults when the file has the wrong shape', async () => {
    const logger = spyLogger();
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ groups: [{ name: 'X', ranges: 'not-a-list' }] }), 'utf8');

    const config = await new JsonFileStore(path, logger, emptyDefaults).load();

    expect(config.groups.map((g) => g.name)).toEqual(['Default']);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('saves and loads back the same configuration', async () => {
    const path = join(dir, 'config.json');
    const store = new JsonFileStore(path, spyLogger(), emptyDefaults);
    const config = makeConfig([makeGroup('Rack1', ['10.0.0.0/30'], { filter: { makes: ['AntMiner'] } })], {
      Rack1: {
        devices: [{ ...makeDevice('10.0.0.1', { firmwareVersion: '2024.01' }), group: 'Rack1', discoveredAt: 1700000000000 }],
        lastScanAt: 1700000000500,
        partial: false,
      },
    });

    await store.save(config);

    expect(await store.load()).toEqual(config);
    expect(await readdir(dir)).toEqual(['config.json']);
    expect((await readFile(path, 'utf8')).endsWith('}\n')).toBe(true);
  });

  it('wraps write failures in StoreError', async () => {
    const path = join(dir, 'missing', 'config.json');
    const store = new JsonFileStore(path, spyLogger(), emptyDefaults);

    await expect(store.save(defaultConfig([]))).rejects.toBeInstanceOf(StoreError);
  });
});

describe('parseConfig', () => {
  it('fills in optional fields', () => {
    expect(parseConfig({ groups: [{ name: 'X', ranges: ['10.0.0.0/30'] }] })).toEqual({
      version: 1,
      groups: [{ name: 'X', ranges: ['10.0.0.0/30'], filter: {}, enabled: true }],
      results: {},
    });
  });

  it('rejects an unknown make in a filter', () => {
    expect(() => parseConfig({ groups: [{ name: 'X', ranges: [], filter: { makes: ['Toaster'] } }] })).toThrow();
  });
});

describe('defaultConfig', () => {
  it('creates one group per local subnet', () => {
    const config = defaultConfig([
      { cidr: '192.168.50.0/24', networkAddress: '192.168.50.0', prefix: 24, interface: 'eth0', localIp: '192.168.50.7' },
    ]);
    expect(config.groups).toEqual([{ name: 'Local eth0', ranges: ['192.168.50.0/24'], filter: {}, enabled: true }]);
  });
});

describe('localSubnets', () => {
  function ipv4(address: string, cidr: string, internal = false): NetworkInterfaceInfo {
    return { address, netmask: '255.255.255.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal, cidr };
  }

  it('lists attached IPv4 subnets, narrowed to /24 at most', () => {
    const subnets = localSubnets({
      lo: [ipv4('127.0.0.1', '127.0.0.1/8', true)],
      eth0: [
        ipv4('192.168.50.7', '192.168.50.7/24'),
        { address: 'fe80::1', netmask: 'ffff:ffff:ffff:ffff::', family: 'IPv6', mac: '00:00:00:00:00:00', internal: false, cidr: 'fe80::1/64', scopeid: 2 },
      ],
      wlan0: [ipv4('10.1.2.3', '10.1.2.3/8')],
      eth1: [ipv4('192.168.50.9', '192.168.50.9/24')],
      zt0: [ipv4('169.254.3.3', '169.254.3.3/16')],
      ppp0: [ipv4('10.9.9.1', '10.9.9.1/31')],
    });

    expect(subnets).toEqual([
      { cidr: '192.168.50.0/24', networkAddress: '192.168.50.0', prefix: 24, interface: 'eth0', localIp: '192.168.50.7' },
      { cidr: '10.1.2.0/24', networkAddress: '10.1.2.0', prefix: 24, interface: 'wlan0', localIp: '10.1.2.3' },
    ]);
  });
});

describe('ConfigDraft', () => {
  const base = () => makeConfig(
    [makeGroup('A', ['10.0.0.0/30']), makeGroup('B', ['10.0.1.0/30'])],
    { A: { devices: [{ ...makeDevice('10.0.0.1'), group: 'A', discoveredAt: 1 }], lastScanAt: 10, partial: false } },
  );

  it('leaves the base configuration untouched', () => {
    const original = base();
    const draft = new ConfigDraft(original);
    draft.addGroup('C', ['10.0.2.1']).setEnabled('A', false).clearResults();

    expect(original).toEqual(base());
    const next = draft.commit();
    expect(next.groups.map((g) => [g.name, g.enabled])).toEqual([['A', false], ['B', true], ['C', true]]);
    expect(next.results).toEqual({});
  });

  it('carries results over when a group is renamed', () => {
    const draft = new ConfigDraft(base());
    const group = draft.getGroup('A');
    expect(group).toBeDefined();
    if (group) draft.updateGroup('A', { ...group, name: 'Rack A' });

    const next = draft.commit();
    expect(next.groups.map((g) => g.name)).toEqual(['Rack A', 'B']);
    expect(Object.keys(next.results)).toEqual(['Rack A']);
  });

  it('drops results with a removed group', () => {
    const next = new ConfigDraft(base()).removeGroup('A').commit();
    expect(next.groups.map((g) => g.name)).toEqual(['B']);
    expect(next.results).toEqual({});
  });

  it('sets a group filter', () => {
    const next = new ConfigDraft(base()).setFilter('B', { firmwares: ['BraiinsOS'] }).commit();
    expect(next.groups[1].filter).toEqual({ firmwares: ['BraiinsOS'] });
  });

  it.each([
    ['a duplicate name', (d: ConfigDraft) => d.addGroup('B', ['10.0.3.0/30']), 'Duplicate group name "B"'],
    ['an empty name', (d: ConfigDraft) => d.addGroup('   ', ['10.0.3.0/30']), 'Group name is required'],
    ['no ranges', (d: ConfigDraft) => d.addGroup('C', []), 'Group "C" has no address ranges'],
    ['an inverted range', (d: ConfigDraft) => d.addGroup('C', ['10.0.0.9-3']), 'Group "C": Inverted address range "10.0.0.9-3"'],
  ])('refuses to commit %s', (_label, edit, message) => {
    const draft = new ConfigDraft(base());
    edit(draft);
    expect(() => draft.commit()).toThrow(new ConfigValidationError(message));
  });

  it('refuses edits to a group that does not exist', () => {
    expect(() => new ConfigDraft(base()).setEnabled('Z', true)).toThrow('No group named "Z"');
  });
});

describe('loadSettings', () => {
  it('uses defaults without environment overrides', () => {
    expect(loadSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it('reads overrides from the environment', () => {
    expect(loadSettings({
      ASIC_SCOUT_CONFIG: '/etc/asic-scout.json',
      ASIC_SCOUT_CONCURRENCY: '16',
      ASIC_SCOUT_PROBE_TIMEOUT_MS: '500',
      ASIC_SCOUT_CANCELLED_TIMESTAMP: 'retain',
    })).toEqual({
      configPath: '/etc/asic-scout.json',
      concurrency: 16,
      probeTimeoutMs: 500,
      channelCapacity: 256,
      cancelledTimestamp: 'retain',
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadSettings({ ASIC_SCOUT_CONCURRENCY: '0' })).toThrow(/^Invalid settings: ASIC_SCOUT_CONCURRENCY: /);
    expect(() => loadSettings({ ASIC_SCOUT_CANCELLED_TIMESTAMP: 'sometimes' })).toThrow(/ASIC_SCOUT_CANCELLED_TIMESTAMP/);
  });
});
