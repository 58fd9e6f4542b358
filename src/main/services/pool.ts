import { EngineFaultError, ProbeError, RangeParseError, errorMessage } from '../errors';
import { countUnique, intToIp, parseRange, uniqueAddresses, type AddressRange } from '../network/range';
import type { DeviceProber } from '../probers/base';
import { matchesFilter } from '../probers/filter';
import type { Logger, ProbeOutcome, ScanEvent, ScanFilter, ScanGroup } from '../types';
import { EventChannel } from './channel';
import { ConcurrencyGate } from './gate';

export interface ScanPoolOptions {
  prober: DeviceProber;
  /** Scan-wide filter, applied on top of each group's own filter */
  filter?: ScanFilter;
  concurrency: number;
  probeTimeoutMs: number;
  channelCapacity: number;
  logger?: Logger;
}

export interface ScanPoolHandle {
  events: EventChannel<ScanEvent>;
  /** Address count per group after de-duplication */
  totals: ReadonlyMap<string, number>;
  /** Stop scheduling. In-flight probes finish and are discarded. */
  cancel(): void;
  /** Settles once the pool has sent its terminal event and holds no probes */
  done: Promise<void>;
}

interface GroupPlan {
  name: string;
  filter: ScanFilter;
  ranges: AddressRange[];
  total: number;
  probed: number;
}

function planGroup(group: ScanGroup): GroupPlan {
  const ranges = group.ranges.map((spec) => {
    try {
      return parseRange(spec);
    } catch (err) {
      if (err instanceof RangeParseError) err.group = group.name;
      throw err;
    }
  });
  return { name: group.name, filter: group.filter, ranges, total: countUnique(ranges), probed: 0 };
}

/**
 * Fan out one probe per address across every group under a single
 * concurrency gate. Groups take turns so a large range cannot starve a
 * small one. Throws RangeParseError before anything starts.
 */
export function startScanPool(groups: ScanGroup[], options: ScanPoolOptions): ScanPoolHandle {
  const { prober, filter, probeTimeoutMs, logger = console } = options;
  const plans = groups.map(planGroup);
  const events = new EventChannel<ScanEvent>(options.channelCapacity);
  const gate = new ConcurrencyGate(options.concurrency);
  const inFlight = new Set<Promise<void>>();
  let cancelled = false;

  const cancel = () => {
    if (cancelled) return;
    cancelled = true;
    logger.info(`[Pool] Cancel requested, ${inFlight.size} probe(s) still in flight`);
  };

  async function runProbe(ip: string, groupFilter: ScanFilter): Promise<ProbeOutcome> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ProbeError('timeout', ip, `No answer within ${probeTimeoutMs}ms`));
      }, probeTimeoutMs);
    });

    try {
      const device = await Promise.race([prober.probe(ip, groupFilter, controller.signal), timeout]);
      if (!matchesFilter(device, filter)) {
        return { ok: false, error: 'filtered', message: `${device.make}/${device.firmware} excluded by scan filter` };
      }
      return { ok: true, device };
    } catch (err) {
      if (err instanceof ProbeError) return { ok: false, error: err.code, message: err.message };
      return { ok: false, error: 'protocol', message: errorMessage(err) };
    } finally {
      clearTimeout(timer);
    }
  }

  async function probeOne(plan: GroupPlan, address: number): Promise<void> {
    const ip = intToIp(address);
    const outcome = await runProbe(ip, plan.filter);
    if (cancelled) return;

    try {
      await events.send({ type: 'address_probed', group: plan.name, address: ip, outcome });
      plan.probed++;
      await events.send({ type: 'group_progress', group: plan.name, probed: plan.probed, total: plan.total });
      if (plan.probed === plan.total) {
        await events.send({ type: 'group_completed', group: plan.name });
      }
    } catch (err) {
      // Consumer went away or the channel faulted; nothing left to report to
      logger.debug(`[Pool] Dropping result for ${ip}: ${errorMessage(err)}`);
      cancelled = true;
    }
  }

  async function run(): Promise<void> {
    try {
      for (const plan of plans) {
        if (plan.total === 0) await events.send({ type: 'group_completed', group: plan.name });
      }

      const cursors = plans
        .filter((plan) => plan.total > 0)
        .map((plan) => ({ plan, addresses: uniqueAddresses(plan.ranges)[Symbol.iterator]() }));

      let turn = 0;
      while (cursors.length > 0 && !cancelled) {
        await gate.acquire();
        if (cancelled) {
          gate.release();
          break;
        }

        const index = turn % cursors.length;
        const cursor = cursors[index];
        const next = cursor.addresses.next();
        if (next.done) {
          cursors.splice(index, 1);
          gate.release();
          continue;
        }
        turn = index + 1;

        const task: Promise<void> = probeOne(cursor.plan, next.value).finally(() => {
          inFlight.delete(task);
          gate.release();
        });
        inFlight.add(task);
      }

      await Promise.all(inFlight);

      if (cancelled) {
        await events.send({ type: 'session_cancelled' });
        logger.info('[Pool] Scan cancelled');
      } else {
        await events.send({ type: 'session_completed' });
        logger.info(`[Pool] Scan finished: ${plans.map((p) => `${p.name} ${p.probed}/${p.total}`).join(', ')}`);
      }
      events.close();
    } catch (err) {
      if (events.isClosed) return;
      logger.error('[Pool] Scan machinery failed:', err);
      events.fail(err instanceof EngineFaultError ? err : new EngineFaultError(errorMessage(err), { cause: err }));
    }
  }

  const totals = new Map(plans.map((plan) => [plan.name, plan.total]));
  const total = [...totals.values()].reduce((sum, n) => sum + n, 0);
  logger.info(`[Pool] Scanning ${total} address(es) in ${plans.length} group(s), ${options.concurrency} at a time`);

  return { events, totals, cancel, done: run() };
}
