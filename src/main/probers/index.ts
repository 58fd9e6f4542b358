import { ProbeError, errorMessage } from '../errors';
import type { DeviceSnapshot, Logger, ScanFilter } from '../types';
import type { BaseProber, DeviceProber } from './base';
import { AxeOsProber } from './axeos';
import { CgminerProber } from './cgminer';
import { describeFilter, matchesFilter } from './filter';

export type { DeviceProber } from './base';
export { BaseProber } from './base';
export { CgminerProber } from './cgminer';
export { AxeOsProber } from './axeos';
export { matchesFilter, isFilterEmpty, describeFilter } from './filter';

/**
 * Tries each protocol in turn and returns the first miner that answers.
 * Timeouts and filter rejections end the probe at once; other failures fall
 * through to the next protocol.
 */
export class MinerProber implements DeviceProber {
  constructor(
    private probers: BaseProber[] = [new CgminerProber(), new AxeOsProber()],
    private logger: Logger = console,
  ) {}

  async probe(ip: string, filter: ScanFilter, signal: AbortSignal): Promise<DeviceSnapshot> {
    const candidates = this.probers.filter((p) => !p.canMatch || p.canMatch(filter));
    let lastError: ProbeError | null = null;

    for (const prober of candidates) {
      if (signal.aborted) throw new ProbeError('timeout', ip, 'Probe aborted');

      let device: DeviceSnapshot | null;
      try {
        device = await prober.identify(ip, signal);
      } catch (err) {
        if (err instanceof ProbeError && err.code === 'timeout') throw err;
        lastError = err instanceof ProbeError
          ? err
          : new ProbeError('protocol', ip, errorMessage(err), { cause: err });
        this.logger.debug(`[Probe] ${prober.name} ${ip}: ${lastError.message}`);
        continue;
      }

      if (!device) continue;
      if (!matchesFilter(device, filter)) {
        throw new ProbeError('filtered', ip, `${device.make}/${device.firmware} outside ${describeFilter(filter)}`);
      }
      return device;
    }

    throw lastError ?? new ProbeError('no-device', ip, 'No miner API answered');
  }
}
