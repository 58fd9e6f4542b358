import { RangeParseError } from '../errors';

/** A parsed IPv4 address range. Addresses are unsigned 32-bit integers. */
export type AddressRange =
  | { readonly kind: 'cidr'; readonly source: string; readonly base: number; readonly prefix: number }
  | { readonly kind: 'span'; readonly source: string; readonly start: number; readonly end: number }
  | { readonly kind: 'octets'; readonly source: string; readonly octets: readonly (readonly number[])[] };

export type RangeValidation =
  | { valid: true; range: AddressRange }
  | { valid: false; error: RangeParseError };

const IPV4_RE = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
const OCTET_PART_RE = /^(\d{1,3})(?:-(\d{1,3}))?$/;

export function parseIpv4(text: string): number | null {
  const match = text.trim().match(IPV4_RE);
  if (!match) return null;
  let value = 0;
  for (let i = 1; i <= 4; i++) {
    const octet = Number(match[i]);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function intToIp(value: number): string {
  return [value >>> 24, (value >>> 16) & 255, (value >>> 8) & 255, value & 255].join('.');
}

/** Numeric comparison of dotted-quad strings; unparsable addresses sort last. */
export function compareIp(a: string, b: string): number {
  const x = parseIpv4(a) ?? Number.MAX_SAFE_INTEGER;
  const y = parseIpv4(b) ?? Number.MAX_SAFE_INTEGER;
  return x - y;
}

function maskFor(prefix: number): number {
  return prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
}

/**
 * Parse a range specification:
 *   192.168.1.0/24             CIDR block (host bits are cleared)
 *   10.0.0.5-10.0.0.40         explicit start-end
 *   10.0.0.5-40                last-octet short form
 *   10.0.1-3.1,5,10-20         per-octet lists (nmap style)
 *   10.0.0.7                   single address
 */
export function parseRange(spec: string): AddressRange {
  const source = spec.trim();
  if (!source) throw new RangeParseError('malformed', spec, 'empty');

  if (source.includes('/')) return parseCidr(source);

  const halves = source.split('-');
  if (halves.length === 2) {
    const start = parseIpv4(halves[0]);
    if (start !== null) return parseSpan(source, start, halves[1].trim());
  }

  const single = parseIpv4(source);
  if (single !== null) return Object.freeze({ kind: 'span', source, start: single, end: single });

  return parseOctets(source);
}

export function validateRange(spec: string): RangeValidation {
  try {
    return { valid: true, range: parseRange(spec) };
  } catch (err) {
    if (err instanceof RangeParseError) return { valid: false, error: err };
    throw err;
  }
}

function parseCidr(source: string): AddressRange {
  const [addr, prefixText, ...rest] = source.split('/');
  const address = parseIpv4(addr);
  if (address === null || rest.length > 0 || !/^\d{1,2}$/.test(prefixText)) {
    throw new RangeParseError('malformed', source);
  }
  const prefix = Number(prefixText);
  if (prefix > 32) throw new RangeParseError('malformed', source, `prefix /${prefix} out of range`);
  const base = (address & maskFor(prefix)) >>> 0;
  return Object.freeze({ kind: 'cidr', source, base, prefix });
}

function parseSpan(source: string, start: number, right: string): AddressRange {
  let end = parseIpv4(right);
  if (end === null && /^\d{1,3}$/.test(right) && Number(right) <= 255) {
    end = start - (start % 256) + Number(right);
  }
  if (end === null) throw new RangeParseError('malformed', source);
  if (end < start) throw new RangeParseError('inverted', source);
  return Object.freeze({ kind: 'span', source, start, end });
}

function parseOctets(source: string): AddressRange {
  const fields = source.split('.');
  if (fields.length !== 4) throw new RangeParseError('malformed', source);

  const octets = fields.map((field) => {
    const values = new Set<number>();
    for (const part of field.split(',')) {
      const match = part.trim().match(OCTET_PART_RE);
      if (!match) throw new RangeParseError('malformed', source);
      const lo = Number(match[1]);
      const hi = match[2] === undefined ? lo : Number(match[2]);
      if (lo > 255 || hi > 255) throw new RangeParseError('malformed', source, `octet ${part} out of range`);
      if (hi < lo) throw new RangeParseError('inverted', source);
      for (let v = lo; v <= hi; v++) values.add(v);
    }
    return Object.freeze([...values].sort((a, b) => a - b));
  });

  return Object.freeze({ kind: 'octets', source, octets: Object.freeze(octets) });
}

/** Exact number of addresses in the range, without enumerating it. */
export function estimateCount(range: AddressRange): number {
  switch (range.kind) {
    case 'cidr':
      return 2 ** (32 - range.prefix);
    case 'span':
      return range.end - range.start + 1;
    case 'octets':
      return range.octets.reduce((n, list) => n * list.length, 1);
  }
}

export function contains(range: AddressRange, address: number): boolean {
  switch (range.kind) {
    case 'cidr':
      return ((address & maskFor(range.prefix)) >>> 0) === range.base;
    case 'span':
      return address >= range.start && address <= range.end;
    case 'octets': {
      const parts = [address >>> 24, (address >>> 16) & 255, (address >>> 8) & 255, address & 255];
      return parts.every((part, i) => range.octets[i].includes(part));
    }
  }
}

function* generate(range: AddressRange): Generator<number> {
  switch (range.kind) {
    case 'cidr': {
      const last = range.base + estimateCount(range) - 1;
      for (let a = range.base; a <= last; a++) yield a;
      return;
    }
    case 'span':
      for (let a = range.start; a <= range.end; a++) yield a;
      return;
    case 'octets': {
      const [o1, o2, o3, o4] = range.octets;
      for (const a of o1) for (const b of o2) for (const c of o3) for (const d of o4) {
        yield ((a * 256 + b) * 256 + c) * 256 + d;
      }
      return;
    }
  }
}

/** Lazy, strictly increasing and re-iterable address sequence. */
export function iterate(range: AddressRange): Iterable<number> {
  return { [Symbol.iterator]: () => generate(range) };
}

/**
 * Ordered union of several ranges: ranges in declared order, skipping any
 * address an earlier range already produced.
 */
export function uniqueAddresses(ranges: readonly AddressRange[]): Iterable<number> {
  return {
    *[Symbol.iterator]() {
      for (let i = 0; i < ranges.length; i++) {
        const earlier = ranges.slice(0, i);
        for (const address of iterate(ranges[i])) {
          if (earlier.some((r) => contains(r, address))) continue;
          yield address;
        }
      }
    },
  };
}

export function countUnique(ranges: readonly AddressRange[]): number {
  if (ranges.length === 0) return 0;
  if (ranges.length === 1) return estimateCount(ranges[0]);
  let count = 0;
  for (const _ of uniqueAddresses(ranges)) count++;
  return count;
}
