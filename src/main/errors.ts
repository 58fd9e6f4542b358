import type { ProbeErrorCode } from './types';

export type RangeParseErrorKind = 'malformed' | 'inverted';

/** Address range text that could not be expanded. A scan never starts on one. */
export class RangeParseError extends Error {
  readonly kind: RangeParseErrorKind;
  readonly input: string;
  group?: string;

  constructor(kind: RangeParseErrorKind, input: string, detail?: string) {
    const what = kind === 'inverted' ? 'Inverted address range' : 'Malformed address range';
    super(`${what} "${input}"${detail ? `: ${detail}` : ''}`);
    this.name = 'RangeParseError';
    this.kind = kind;
    this.input = input;
  }
}

/** A single address failed to answer as a miner. Recorded, never fatal. */
export class ProbeError extends Error {
  readonly code: ProbeErrorCode;
  readonly address: string;

  constructor(code: ProbeErrorCode, address: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProbeError';
    this.code = code;
    this.address = address;
  }
}

export class AlreadyScanningError extends Error {
  readonly groups: string[];

  constructor(groups: string[]) {
    super(`Already scanning: ${groups.join(', ')}`);
    this.name = 'AlreadyScanningError';
    this.groups = groups;
  }
}

/** Fault in the scan machinery itself (channel, pool). Fails the session. */
export class EngineFaultError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineFaultError';
  }
}

export class ChannelClosedError extends EngineFaultError {
  constructor() {
    super('Event channel closed');
    this.name = 'ChannelClosedError';
  }
}

export class StoreError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.name = 'StoreError';
    this.path = path;
  }
}

export class ConfigValidationError extends Error {
  readonly group?: string;

  constructor(message: string, group?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigValidationError';
    this.group = group;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
