import { compareIp } from '../network/range';
import type { DeviceSnapshot } from '../types';
import { HEALTH_PRIORITY, assessHealth } from './health';

export type SortColumn = 'ip' | 'model' | 'make' | 'firmware' | 'firmwareVersion' | 'health';
export type SortDirection = 'asc' | 'desc';

export function toggleDirection(direction: SortDirection): SortDirection {
  return direction === 'asc' ? 'desc' : 'asc';
}

function compareBy(column: SortColumn): (a: DeviceSnapshot, b: DeviceSnapshot) => number {
  switch (column) {
    case 'ip':
      return (a, b) => compareIp(a.ip, b.ip);
    case 'model':
      return (a, b) => a.model.localeCompare(b.model);
    case 'make':
      return (a, b) => a.make.localeCompare(b.make);
    case 'firmware':
      return (a, b) => a.firmware.localeCompare(b.firmware);
    case 'firmwareVersion':
      return (a, b) => (a.firmwareVersion ?? '').localeCompare(b.firmwareVersion ?? '');
    case 'health':
      return (a, b) => HEALTH_PRIORITY[assessHealth(a).status] - HEALTH_PRIORITY[assessHealth(b).status];
  }
}

/** Stable sort into a new array; ties fall back to IP order. */
export function sortDevices<T extends DeviceSnapshot>(devices: readonly T[], column: SortColumn, direction: SortDirection = 'asc'): T[] {
  const primary = compareBy(column);
  const sign = direction === 'asc' ? 1 : -1;
  return [...devices].sort((a, b) => sign * primary(a, b) || compareIp(a.ip, b.ip));
}
