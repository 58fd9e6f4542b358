import { nanoid } from 'nanoid';
import { EngineFaultError } from '../errors';
import { compareIp } from '../network/range';
import {
  assertNever,
  type DiscoveredDevice,
  type GroupProgress,
  type ScanEvent,
  type ScanGroup,
  type SessionResult,
  type SessionStatus,
} from '../types';

interface GroupState {
  probed: number;
  total: number;
  completed: boolean;
  probedAddresses: Set<string>;
  devices: Map<string, DiscoveredDevice>; // keyed by IP
}

export interface SessionOptions {
  id?: string;
  now?: () => number;
}

export interface SessionStart {
  totals: ReadonlyMap<string, number>;
  cancel(): void;
}

/**
 * State owned by the single consumer of a scan. Every ScanEvent passes
 * through `apply`; nothing else mutates it. Status moves
 * idle → running → completed | cancelled | failed and never leaves a
 * terminal state.
 *
 * `cancel` only asks the pool to stop. Events it sent before that keep
 * arriving and are folded in until its terminal event closes the session.
 */
export class ScanSession {
  readonly id: string;
  readonly groups: readonly ScanGroup[];
  private _status: SessionStatus = 'idle';
  private _error: Error | null = null;
  private state = new Map<string, GroupState>();
  private cancelHandle: (() => void) | null = null;
  private _cancelRequested = false;
  private now: () => number;
  startedAt: number | null = null;
  finishedAt: number | null = null;

  constructor(groups: ScanGroup[], options: SessionOptions = {}) {
    this.id = options.id ?? nanoid(10);
    this.now = options.now ?? Date.now;
    // Edits to the live configuration never reach a running scan
    this.groups = Object.freeze(groups.map((g) => structuredClone(g)));
    for (const group of this.groups) {
      this.state.set(group.name, {
        probed: 0,
        total: 0,
        completed: false,
        probedAddresses: new Set(),
        devices: new Map(),
      });
    }
  }

  get status(): SessionStatus {
    return this._status;
  }

  get error(): Error | null {
    return this._error;
  }

  get isTerminal(): boolean {
    return this._status === 'completed' || this._status === 'cancelled' || this._status === 'failed';
  }

  get cancelRequested(): boolean {
    return this._cancelRequested;
  }

  get groupNames(): string[] {
    return this.groups.map((g) => g.name);
  }

  start(pool: SessionStart): void {
    if (this._status !== 'idle') throw new Error(`Session ${this.id} already ${this._status}`);
    for (const [name, total] of pool.totals) {
      const group = this.state.get(name);
      if (group) group.total = total;
    }
    this.cancelHandle = () => pool.cancel();
    this._status = 'running';
    this.startedAt = this.now();
  }

  /** Fold one event into the session. Events after a terminal state are ignored. */
  apply(event: ScanEvent): void {
    if (this._status !== 'running') return;

    switch (event.type) {
      case 'address_probed': {
        const group = this.groupState(event.group);
        if (!group) return;
        group.probedAddresses.add(event.address);
        if (event.outcome.ok) {
          group.devices.set(event.address, {
            ...event.outcome.device,
            group: event.group,
            discoveredAt: this.now(),
          });
        } else {
          // Re-probed address that no longer answers
          group.devices.delete(event.address);
        }
        break;
      }
      case 'group_progress': {
        const group = this.groupState(event.group);
        if (!group) return;
        group.probed = event.probed;
        group.total = event.total;
        break;
      }
      case 'group_completed': {
        const group = this.groupState(event.group);
        if (!group) return;
        group.completed = true;
        break;
      }
      case 'session_completed': {
        const pending = [...this.state].filter(([, g]) => !g.completed).map(([name]) => name);
        if (pending.length > 0) {
          this.fail(new EngineFaultError(`Scan ended before groups finished: ${pending.join(', ')}`));
          return;
        }
        this.finish('completed');
        break;
      }
      case 'session_cancelled':
        this.finish('cancelled');
        break;
      default:
        assertNever(event);
    }
  }

  cancel(): void {
    if (this.isTerminal || this._cancelRequested) return;
    if (this._status === 'idle') {
      this.finish('cancelled');
      return;
    }
    this._cancelRequested = true;
    this.cancelHandle?.();
  }

  /** Engine fault. Stops the pool scheduling further probes. */
  fail(error: Error): void {
    if (this.isTerminal) return;
    const handle = this.cancelHandle;
    this._error = error;
    this.finish('failed');
    handle?.();
  }

  progress(): GroupProgress[] {
    return [...this.state].map(([group, s]) => ({
      group,
      probed: s.probed,
      total: s.total,
      found: s.devices.size,
      completed: s.completed,
    }));
  }

  overall(): { probed: number; total: number; found: number } {
    return this.progress().reduce(
      (acc, p) => ({ probed: acc.probed + p.probed, total: acc.total + p.total, found: acc.found + p.found }),
      { probed: 0, total: 0, found: 0 },
    );
  }

  devices(group?: string): DiscoveredDevice[] {
    const states = group === undefined ? [...this.state.values()] : [this.state.get(group)];
    return states
      .flatMap((s) => (s ? [...s.devices.values()] : []))
      .sort((a, b) => compareIp(a.ip, b.ip));
  }

  /** Frozen outcome for the merger. Only completed or cancelled sessions have one. */
  result(): SessionResult {
    const status = this._status;
    if (status !== 'completed' && status !== 'cancelled') {
      throw new Error(`Session ${this.id} is ${status}; nothing to merge`);
    }
    return {
      id: this.id,
      status,
      finishedAt: this.finishedAt ?? this.now(),
      groups: [...this.state].map(([group, s]) => ({
        group,
        completed: s.completed,
        probedAddresses: [...s.probedAddresses].sort(compareIp),
        devices: this.devices(group),
      })),
    };
  }

  private groupState(name: string): GroupState | null {
    const group = this.state.get(name);
    if (!group) {
      this.fail(new EngineFaultError(`Event for group "${name}" outside session ${this.id}`));
      return null;
    }
    return group;
  }

  private finish(status: 'completed' | 'cancelled' | 'failed'): void {
    this._status = status;
    this.finishedAt = this.now();
    this.cancelHandle = null;
  }
}
