import { compareIp } from '../network/range';
import type { DiscoveredDevice, GroupResults, PersistedConfig, SessionResult } from '../types';

/**
 * What a group that did not finish (session cancelled) records as its
 * last-scan time: `clear` forgets it so the next full scan is never skipped,
 * `retain` keeps the previous full scan's time. Both flag the group partial.
 */
export type CancelledTimestampPolicy = 'clear' | 'retain';

export interface MergeOptions {
  cancelledTimestamp: CancelledTimestampPolicy;
}

const DEFAULT_MERGE_OPTIONS: MergeOptions = { cancelledTimestamp: 'clear' };

const EMPTY_RESULTS: GroupResults = { devices: [], lastScanAt: null, partial: false };

/**
 * Reconcile a finished session with the persisted configuration.
 *
 * A completed group's device list is replaced outright by what the session
 * found, so devices outside its current ranges are dropped too. A group that
 * did not finish is authoritative only for the addresses it probed; devices
 * at addresses it never reached are kept. Groups outside the session, and
 * groups deleted from the configuration while the scan ran, pass through.
 *
 * Returns a new value; `old` is left untouched.
 */
export function mergeSession(
  old: PersistedConfig,
  session: SessionResult,
  options: MergeOptions = DEFAULT_MERGE_OPTIONS,
): PersistedConfig {
  const known = new Set(old.groups.map((g) => g.name));
  const results: Record<string, GroupResults> = { ...old.results };

  for (const scanned of session.groups) {
    if (!known.has(scanned.group)) continue;

    const previous = old.results[scanned.group] ?? EMPTY_RESULTS;

    let devices: DiscoveredDevice[];
    let lastScanAt: number | null;
    let partial: boolean;
    if (scanned.completed) {
      devices = mergeDevices([], scanned.devices);
      lastScanAt = session.finishedAt;
      partial = false;
    } else {
      const probed = new Set(scanned.probedAddresses);
      devices = mergeDevices(previous.devices.filter((d) => !probed.has(d.ip)), scanned.devices);
      lastScanAt = options.cancelledTimestamp === 'retain' ? previous.lastScanAt : null;
      partial = true;
    }

    results[scanned.group] = { devices, lastScanAt, partial };
  }

  return {
    version: old.version,
    groups: old.groups.map((g) => structuredClone(g)),
    results,
  };
}

function mergeDevices(kept: DiscoveredDevice[], found: DiscoveredDevice[]): DiscoveredDevice[] {
  const byIp = new Map<string, DiscoveredDevice>();
  for (const device of kept) byIp.set(device.ip, device);
  for (const device of found) byIp.set(device.ip, device);
  return [...byIp.values()].sort((a, b) => compareIp(a.ip, b.ip));
}
