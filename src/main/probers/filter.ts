import type { DeviceSnapshot, ScanFilter } from '../types';

export function isFilterEmpty(filter: ScanFilter | undefined): boolean {
  return !filter || ((filter.makes?.length ?? 0) === 0 && (filter.firmwares?.length ?? 0) === 0);
}

/** True when the device passes both allow-lists. Empty lists allow everything. */
export function matchesFilter(device: Pick<DeviceSnapshot, 'make' | 'firmware'>, filter: ScanFilter | undefined): boolean {
  if (!filter) return true;
  const { makes, firmwares } = filter;
  if (makes && makes.length > 0 && !makes.includes(device.make)) return false;
  if (firmwares && firmwares.length > 0 && !firmwares.includes(device.firmware)) return false;
  return true;
}

export function describeFilter(filter: ScanFilter | undefined): string {
  if (isFilterEmpty(filter)) return 'all miners';
  const parts: string[] = [];
  if (filter?.makes?.length) parts.push(filter.makes.join('/'));
  if (filter?.firmwares?.length) parts.push(`firmware ${filter.firmwares.join('/')}`);
  return parts.join(', ');
}
