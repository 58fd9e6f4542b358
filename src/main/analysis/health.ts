import type { DeviceSnapshot } from '../types';

export type HealthStatus = 'healthy' | 'warning' | 'critical' | 'unknown';
export type IssueCategory = 'hashrate' | 'temperature' | 'fans' | 'mining' | 'other';

export interface HealthIssue {
  severity: Exclude<HealthStatus, 'healthy' | 'unknown'>;
  category: IssueCategory;
  description: string;
}

export interface HealthReport {
  status: HealthStatus;
  issues: HealthIssue[];
}

const THRESHOLDS = {
  hashrateCriticalRatio: 0.5,
  hashrateWarningRatio: 0.8,
  tempCriticalC: 85,
  tempWarningC: 75,
};

/** Sort rank, worst first. */
export const HEALTH_PRIORITY: Record<HealthStatus, number> = {
  critical: 0,
  warning: 1,
  healthy: 2,
  unknown: 3,
};

/**
 * Classify a device snapshot. A device that reports nothing measurable
 * (no hashrate, temperature or fans) is `unknown` rather than healthy.
 */
export function assessHealth(device: DeviceSnapshot): HealthReport {
  const issues: HealthIssue[] = [];

  if (!device.isMining) {
    issues.push({ severity: 'critical', category: 'mining', description: 'Miner is not actively mining' });
  }

  const { hashrateThs, expectedHashrateThs } = device;
  if (hashrateThs !== undefined && expectedHashrateThs !== undefined && expectedHashrateThs > 0) {
    const ratio = hashrateThs / expectedHashrateThs;
    if (ratio < THRESHOLDS.hashrateWarningRatio) {
      issues.push({
        severity: ratio < THRESHOLDS.hashrateCriticalRatio ? 'critical' : 'warning',
        category: 'hashrate',
        description: `Low hashrate (${Math.floor(ratio * 100)}% of expected)`,
      });
    }
  }

  if (device.temperatureC !== undefined && device.temperatureC > THRESHOLDS.tempWarningC) {
    issues.push({
      severity: device.temperatureC > THRESHOLDS.tempCriticalC ? 'critical' : 'warning',
      category: 'temperature',
      description: `High temperature (${device.temperatureC.toFixed(1)}°C)`,
    });
  }

  const deadFans = (device.fans ?? []).filter((rpm) => rpm === 0).length;
  if (deadFans > 0) {
    issues.push({ severity: 'critical', category: 'fans', description: `${deadFans} fan(s) not spinning` });
  }

  for (const message of device.messages) {
    if (message) issues.push({ severity: 'warning', category: 'other', description: message });
  }

  const measured = device.hashrateThs !== undefined || device.temperatureC !== undefined || device.fans !== undefined;
  let status: HealthStatus = 'healthy';
  if (issues.some((i) => i.severity === 'critical')) status = 'critical';
  else if (issues.length > 0) status = 'warning';
  else if (!measured) status = 'unknown';

  return { status, issues };
}
