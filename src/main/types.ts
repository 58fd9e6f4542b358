// === Device Identity ===
export const MINER_MAKES = ['AntMiner', 'WhatsMiner', 'AvalonMiner', 'Bitaxe', 'Unknown'] as const;
export const MINER_FIRMWARES = ['Stock', 'BraiinsOS', 'LuxOS', 'VNish', 'ePIC', 'AxeOS', 'Unknown'] as const;

export type MinerMake = (typeof MINER_MAKES)[number];
export type MinerFirmware = (typeof MINER_FIRMWARES)[number];

/** Allow-lists applied to a probed device. Absent or empty list = allow all. */
export interface ScanFilter {
  makes?: MinerMake[];
  firmwares?: MinerFirmware[];
}

// === Probe Results ===
export interface DeviceSnapshot {
  ip: string;
  deviceId?: string; // MAC or serial once the device reports one
  make: MinerMake;
  model: string;
  firmware: MinerFirmware;
  firmwareVersion?: string;
  hostname?: string;
  hashrateThs?: number;
  expectedHashrateThs?: number;
  temperatureC?: number;
  fans?: number[]; // RPM per fan
  isMining: boolean;
  messages: string[];
}

export interface DiscoveredDevice extends DeviceSnapshot {
  group: string;
  discoveredAt: number;
}

export type ProbeErrorCode = 'timeout' | 'unreachable' | 'no-device' | 'filtered' | 'protocol';

export type ProbeOutcome =
  | { ok: true; device: DeviceSnapshot }
  | { ok: false; error: ProbeErrorCode; message: string };

// === Configuration ===
export interface ScanGroup {
  name: string;
  ranges: string[]; // CIDR, start-end or nmap octet notation
  filter: ScanFilter;
  enabled: boolean;
}

export interface GroupResults {
  devices: DiscoveredDevice[];
  lastScanAt: number | null;
  partial: boolean;
}

export interface PersistedConfig {
  version: number;
  groups: ScanGroup[];
  results: Record<string, GroupResults>;
}

// === Scan Events (pool → session) ===
export interface AddressProbedEvent {
  type: 'address_probed';
  group: string;
  address: string;
  outcome: ProbeOutcome;
}

export interface GroupProgressEvent {
  type: 'group_progress';
  group: string;
  probed: number;
  total: number;
}

export interface GroupCompletedEvent {
  type: 'group_completed';
  group: string;
}

export interface SessionCompletedEvent {
  type: 'session_completed';
}

export interface SessionCancelledEvent {
  type: 'session_cancelled';
}

// Engine faults are not events: the pool fails the channel instead.
export type ScanEvent =
  | AddressProbedEvent
  | GroupProgressEvent
  | GroupCompletedEvent
  | SessionCompletedEvent
  | SessionCancelledEvent;

export type TerminalScanEvent = SessionCompletedEvent | SessionCancelledEvent;

// === Session State ===
export type SessionStatus = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export interface GroupProgress {
  group: string;
  probed: number;
  total: number;
  found: number;
  completed: boolean;
}

/** Immutable view of a finished session, consumed by the merger. */
export interface SessionResult {
  id: string;
  status: 'completed' | 'cancelled';
  finishedAt: number;
  groups: SessionGroupResult[];
}

export interface SessionGroupResult {
  group: string;
  completed: boolean;
  probedAddresses: string[];
  devices: DiscoveredDevice[];
}

// === Logging ===
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
