import { AlreadyScanningError, ConfigValidationError, EngineFaultError, StoreError, errorMessage } from '../errors';
import type { DeviceProber } from '../probers/base';
import type { Settings } from '../settings';
import type { Logger, PersistedConfig, ScanEvent, ScanFilter, ScanGroup, SessionResult, SessionStatus } from '../types';
import type { EventChannel } from './channel';
import { ConfigDraft } from './draft';
import { mergeSession } from './merger';
import { startScanPool } from './pool';
import { ScanSession } from './session';
import type { ConfigStore } from './store';

export interface ActiveScan {
  session: ScanSession;
  events: EventChannel<ScanEvent>;
  cancel(): void;
  /** Settles when the pool has released every probe */
  done: Promise<void>;
}

export interface RunScanOptions {
  /** Group names; defaults to every enabled group */
  groups?: string[];
  filter?: ScanFilter;
  onEvent?: (event: ScanEvent, session: ScanSession) => void;
  signal?: AbortSignal;
}

export interface ScanReport {
  sessionId: string;
  status: SessionStatus;
  result: SessionResult | null;
  /** Configuration after the merge (unchanged when the scan failed) */
  config: PersistedConfig;
  saved: boolean;
  saveError?: StoreError;
  error?: Error;
}

/**
 * Owns the committed configuration and the set of running sessions. At most
 * one running session per group; finished sessions are merged and saved in
 * the order they finish.
 */
export class ScanCoordinator {
  private config: PersistedConfig | null = null;
  private running = new Map<string, ScanSession>(); // group name → session
  private saveChain: Promise<void> = Promise.resolve();

  constructor(
    private store: ConfigStore,
    private prober: DeviceProber,
    private settings: Settings,
    private logger: Logger = console,
  ) {}

  async getConfig(): Promise<PersistedConfig> {
    if (!this.config) this.config = await this.store.load();
    return this.config;
  }

  async edit(): Promise<ConfigDraft> {
    return new ConfigDraft(await this.getConfig());
  }

  /** Replace the committed configuration with a validated draft and save it. */
  async commit(draft: ConfigDraft): Promise<PersistedConfig> {
    const next = draft.commit();
    this.config = next;
    await this.persist(next);
    return next;
  }

  isScanning(group: string): boolean {
    return this.running.has(group);
  }

  activeSessions(): ScanSession[] {
    return [...new Set(this.running.values())];
  }

  cancel(sessionId: string): boolean {
    const session = this.activeSessions().find((s) => s.id === sessionId);
    if (!session) return false;
    session.cancel();
    return true;
  }

  /**
   * Start scanning `groups`. Throws AlreadyScanningError when any of them is
   * in a running session and RangeParseError on a bad range; in both cases
   * nothing has started. The caller drives the returned session.
   */
  startScan(groups: ScanGroup[], filter?: ScanFilter): ActiveScan {
    const busy = groups.map((g) => g.name).filter((name) => this.running.has(name));
    if (busy.length > 0) throw new AlreadyScanningError(busy);

    const names = new Set<string>();
    for (const group of groups) {
      if (names.has(group.name)) throw new ConfigValidationError(`Group "${group.name}" listed twice`, group.name);
      names.add(group.name);
    }

    const session = new ScanSession(groups);
    const pool = startScanPool([...session.groups], {
      prober: this.prober,
      filter,
      concurrency: this.settings.concurrency,
      probeTimeoutMs: this.settings.probeTimeoutMs,
      channelCapacity: this.settings.channelCapacity,
      logger: this.logger,
    });
    session.start(pool);
    for (const name of names) this.running.set(name, session);

    const done = pool.done.finally(() => {
      for (const name of names) {
        if (this.running.get(name) === session) this.running.delete(name);
      }
    });

    this.logger.info(`[Coordinator] Session ${session.id} started: ${[...names].join(', ')}`);
    return { session, events: pool.events, cancel: () => session.cancel(), done };
  }

  /** Scan, consume to the end, merge and save. */
  async runScan(options: RunScanOptions = {}): Promise<ScanReport> {
    const config = await this.getConfig();
    const groups = this.selectGroups(config, options.groups);
    const scan = this.startScan(groups, options.filter);
    const { session } = scan;

    const onAbort = () => scan.cancel();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) scan.cancel();

    try {
      await this.consume(scan, options.onEvent);
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }

    if (session.status === 'failed') {
      this.logger.error(`[Coordinator] Session ${session.id} failed: ${session.error?.message ?? 'unknown'}`);
      return {
        sessionId: session.id,
        status: session.status,
        result: null,
        config: await this.getConfig(),
        saved: false,
        error: session.error ?? undefined,
      };
    }

    const result = session.result();
    // Merge into whatever is committed now; it may have changed mid-scan
    const merged = mergeSession(await this.getConfig(), result, {
      cancelledTimestamp: this.settings.cancelledTimestamp,
    });
    this.config = merged;

    const report: ScanReport = { sessionId: session.id, status: session.status, result, config: merged, saved: false };
    try {
      await this.persist(merged);
      report.saved = true;
    } catch (err) {
      if (!(err instanceof StoreError)) throw err;
      this.logger.error(`[Coordinator] Results merged but not saved: ${err.message}`);
      report.saveError = err;
    }
    return report;
  }

  /** Feed every event to the session until the channel ends, then wait for the pool. */
  async consume(scan: ActiveScan, onEvent?: RunScanOptions['onEvent']): Promise<void> {
    const { session } = scan;
    try {
      for await (const event of scan.events) {
        session.apply(event);
        onEvent?.(event, session);
      }
    } catch (err) {
      session.fail(err instanceof EngineFaultError ? err : new EngineFaultError(errorMessage(err), { cause: err }));
    }

    if (!session.isTerminal) {
      session.fail(new EngineFaultError('Event channel closed before the scan finished'));
    }
    await scan.done;
  }

  private selectGroups(config: PersistedConfig, names?: string[]): ScanGroup[] {
    if (!names || names.length === 0) return config.groups.filter((g) => g.enabled);
    return names.map((name) => {
      const group = config.groups.find((g) => g.name === name);
      if (!group) throw new ConfigValidationError(`No group named "${name}"`, name);
      return group;
    });
  }

  private persist(config: PersistedConfig): Promise<void> {
    const write = this.saveChain.then(() => this.store.save(config));
    // The caller sees the failure through `write`; the chain only orders saves
    this.saveChain = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }
}
