import { readFile, rename, writeFile } from 'fs/promises';
import { z } from 'zod';
import { StoreError, errorMessage } from '../errors';
import { localSubnets, type SubnetInfo } from '../network/topology';
import { MINER_FIRMWARES, MINER_MAKES, type Logger, type PersistedConfig } from '../types';

export const CONFIG_VERSION = 1;

export interface ConfigStore {
  /** Never throws: a missing or unreadable file yields the default configuration. */
  load(): Promise<PersistedConfig>;
  save(config: PersistedConfig): Promise<void>;
}

const makeSchema = z.enum(MINER_MAKES);
const firmwareSchema = z.enum(MINER_FIRMWARES);

const filterSchema = z.object({
  makes: z.array(makeSchema).optional(),
  firmwares: z.array(firmwareSchema).optional(),
});

const groupSchema = z.object({
  name: z.string().min(1),
  ranges: z.array(z.string()),
  filter: filterSchema.default({}),
  enabled: z.boolean().default(true),
});

const deviceSchema = z.object({
  ip: z.string(),
  deviceId: z.string().optional(),
  make: makeSchema,
  model: z.string(),
  firmware: firmwareSchema,
  firmwareVersion: z.string().optional(),
  hostname: z.string().optional(),
  hashrateThs: z.number().optional(),
  expectedHashrateThs: z.number().optional(),
  temperatureC: z.number().optional(),
  fans: z.array(z.number()).optional(),
  isMining: z.boolean(),
  messages: z.array(z.string()).default([]),
  group: z.string(),
  discoveredAt: z.number(),
});

const resultsSchema = z.object({
  devices: z.array(deviceSchema),
  lastScanAt: z.number().nullable(),
  partial: z.boolean().default(false),
});

export const configSchema = z.object({
  version: z.number().int().default(CONFIG_VERSION),
  groups: z.array(groupSchema),
  results: z.record(resultsSchema).default({}),
});

export function parseConfig(input: unknown): PersistedConfig {
  return configSchema.parse(input);
}

/** One group per attached subnet, or the classic home-LAN /24 when none is found. */
export function defaultConfig(subnets: SubnetInfo[] = localSubnets()): PersistedConfig {
  const groups = subnets.length > 0
    ? subnets.map((s) => ({ name: `Local ${s.interface}`, ranges: [s.cidr], filter: {}, enabled: true }))
    : [{ name: 'Default', ranges: ['192.168.1.0/24'], filter: {}, enabled: true }];
  return { version: CONFIG_VERSION, groups, results: {} };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * JSON file on disk. Saves go to a sibling temp file and are renamed into
 * place.
 */
export class JsonFileStore implements ConfigStore {
  constructor(
    readonly path: string,
    private logger: Logger = console,
    private fallback: () => PersistedConfig = () => defaultConfig(),
  ) {}

  async load(): Promise<PersistedConfig> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.info(`[Store] ${this.path} not found, starting from defaults`);
      } else {
        this.logger.warn(`[Store] Failed to read ${this.path}: ${errorMessage(err)}`);
      }
      return this.fallback();
    }

    try {
      return parseConfig(JSON.parse(text));
    } catch (err) {
      this.logger.warn(`[Store] ${this.path} is corrupt, starting from defaults: ${errorMessage(err)}`);
      return this.fallback();
    }
  }

  async save(config: PersistedConfig): Promise<void> {
    const tmp = `${this.path}.${process.pid}.tmp`;
    try {
      await writeFile(tmp, `${JSON.stringify(config, null, 2)}\n`, 'utf8');
      await rename(tmp, this.path);
    } catch (err) {
      throw new StoreError(this.path, errorMessage(err), { cause: err });
    }
  }
}

/** Keeps the configuration in memory. Used by tests and dry runs. */
export class MemoryStore implements ConfigStore {
  saves = 0;

  constructor(private config: PersistedConfig = defaultConfig([])) {}

  async load(): Promise<PersistedConfig> {
    return structuredClone(this.config);
  }

  async save(config: PersistedConfig): Promise<void> {
    this.config = structuredClone(config);
    this.saves++;
  }

  get current(): PersistedConfig {
    return this.config;
  }
}
