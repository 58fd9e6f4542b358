export * from './types';
export * from './errors';
export {
  parseRange,
  validateRange,
  estimateCount,
  iterate,
  contains,
  uniqueAddresses,
  countUnique,
  parseIpv4,
  intToIp,
  compareIp,
  type AddressRange,
  type RangeValidation,
} from './network/range';
export { localSubnets, type SubnetInfo } from './network/topology';
export { EventChannel } from './services/channel';
export { ConcurrencyGate } from './services/gate';
export { startScanPool, type ScanPoolHandle, type ScanPoolOptions } from './services/pool';
export { ScanSession } from './services/session';
export { mergeSession, type CancelledTimestampPolicy, type MergeOptions } from './services/merger';
export { ConfigDraft } from './services/draft';
export { JsonFileStore, MemoryStore, defaultConfig, parseConfig, type ConfigStore } from './services/store';
export { ScanCoordinator, type ActiveScan, type RunScanOptions, type ScanReport } from './services/orchestrator';
export { MinerProber, CgminerProber, AxeOsProber, BaseProber, matchesFilter, type DeviceProber } from './probers';
export { assessHealth, type HealthReport, type HealthStatus } from './analysis/health';
export { sortDevices, toggleDirection, type SortColumn, type SortDirection } from './analysis/sorting';
export { loadSettings, DEFAULT_SETTINGS, type Settings } from './settings';
