import type { DeviceSnapshot, ScanFilter } from '../types';

/**
 * What the scan pool probes through: identify the miner at one address or
 * throw a ProbeError. The signal aborts when the per-probe timeout fires,
 * and the promise must settle promptly after that: the pool frees the
 * probe's concurrency slot at the timeout, so a probe that ignores the
 * signal keeps running beyond the concurrency limit.
 */
export interface DeviceProber {
  probe(ip: string, filter: ScanFilter, signal: AbortSignal): Promise<DeviceSnapshot>;
}

export abstract class BaseProber {
  abstract name: string;

  /** Resolve null when nothing speaking this protocol answers at `ip`. */
  abstract identify(ip: string, signal: AbortSignal): Promise<DeviceSnapshot | null>;

  /** Override to skip the protocol when no device it finds could pass `filter` */
  canMatch?(filter: ScanFilter): boolean;
}
