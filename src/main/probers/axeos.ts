import { ProbeError, errorMessage } from '../errors';
import type { DeviceSnapshot, ScanFilter } from '../types';
import { BaseProber } from './base';
import { asRecord, pickField, pickNumber, pickString, type JsonRecord } from './fields';

const INFO_PATHS = ['/api/system/info', '/api/info'];

export function parseAxeOsInfo(ip: string, info: JsonRecord): DeviceSnapshot | null {
  const asicModel = pickString(info.ASICModel);
  const hashRateGhs = pickNumber(info.hashRate);
  if (asicModel === undefined && hashRateGhs === undefined) return null;

  const boardModel = pickString(pickField(info, ['deviceModel', 'boardVersion']));
  const fanRpm = pickNumber(info.fanrpm);
  const expectedGhs = pickNumber(info.expectedHashrate);

  return {
    ip,
    deviceId: pickString(info.macAddr),
    make: 'Bitaxe',
    model: ['Bitaxe', boardModel, asicModel].filter(Boolean).join(' '),
    firmware: 'AxeOS',
    firmwareVersion: pickString(info.version),
    hostname: pickString(info.hostname),
    hashrateThs: hashRateGhs === undefined ? undefined : hashRateGhs / 1000,
    expectedHashrateThs: expectedGhs === undefined ? undefined : expectedGhs / 1000,
    temperatureC: pickNumber(info.temp),
    fans: fanRpm === undefined ? undefined : [fanRpm],
    isMining: (hashRateGhs ?? 0) > 0,
    messages: pickNumber(info.overheat_mode) === 1 ? ['Overheat mode active'] : [],
  };
}

/** HTTP JSON API served by AxeOS on Bitaxe-family boards. */
export class AxeOsProber extends BaseProber {
  name = 'axeos';

  constructor(private port = 80) {
    super();
  }

  canMatch(filter: ScanFilter): boolean {
    const makes = filter.makes ?? [];
    const firmwares = filter.firmwares ?? [];
    return (makes.length === 0 || makes.includes('Bitaxe'))
      && (firmwares.length === 0 || firmwares.includes('AxeOS'));
  }

  async identify(ip: string, signal: AbortSignal): Promise<DeviceSnapshot | null> {
    for (const path of INFO_PATHS) {
      let response: Response;
      try {
        response = await fetch(`http://${ip}:${this.port}${path}`, {
          signal,
          headers: { Accept: 'application/json' },
        });
      } catch (err) {
        if (signal.aborted) throw new ProbeError('timeout', ip, `GET ${path} aborted`, { cause: err });
        // Nothing listening on HTTP here
        return null;
      }
      if (!response.ok) continue;

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        throw new ProbeError('protocol', ip, `GET ${path}: ${errorMessage(err)}`, { cause: err });
      }
      const info = asRecord(body);
      const snapshot = info ? parseAxeOsInfo(ip, info) : null;
      if (snapshot) return snapshot;
    }
    return null;
  }
}
