import { describe, it, expect } from 'vitest';
import { RangeParseError } from '../main/errors';
import {
  compareIp,
  contains,
  countUnique,
  estimateCount,
  intToIp,
  iterate,
  parseIpv4,
  parseRange,
  uniqueAddresses,
  validateRange,
} from '../main/network/range';

function expand(spec: string): string[] {
  return [...iterate(parseRange(spec))].map(intToIp);
}

describe('parseRange', () => {
  it('expands a CIDR block including network and broadcast addresses', () => {
    expect(expand('10.0.0.0/30')).toEqual(['10.0.0.0', '10.0.0.1', '10.0.0.2', '10.0.0.3']);
  });

  it('clears host bits of a CIDR base', () => {
    const range = parseRange('10.0.0.5/30');
    expect(range).toMatchObject({ kind: 'cidr', prefix: 30, base: parseIpv4('10.0.0.4') });
    expect(expand('10.0.0.5/30')[0]).toBe('10.0.0.4');
  });

  it('counts large blocks without enumerating them', () => {
    expect(estimateCount(parseRange('0.0.0.0/0'))).toBe(4294967296);
    expect(estimateCount(parseRange('10.0.0.0/8'))).toBe(16777216);
    expect(estimateCount(parseRange('192.168.1.7/32'))).toBe(1);
  });

  it('accepts an explicit start-end range across an octet boundary', () => {
    expect(expand('10.0.0.254-10.0.1.1')).toEqual(['10.0.0.254', '10.0.0.255', '10.0.1.0', '10.0.1.1']);
  });

  it('accepts the last-octet short form', () => {
    expect(expand('192.168.1.250-253')).toEqual(['192.168.1.250', '192.168.1.251', '192.168.1.252', '192.168.1.253']);
  });

  it('accepts nmap-style octet lists and orders them', () => {
    expect(expand('10.0.1-2.5,1')).toEqual(['10.0.1.1', '10.0.1.5', '10.0.2.1', '10.0.2.5']);
    expect(estimateCount(parseRange('10.0.1-2.5,1'))).toBe(4);
  });

  it('accepts a single address and ignores surrounding whitespace', () => {
    expect(expand('  10.1.1.1 ')).toEqual(['10.1.1.1']);
  });

  it.each(['', 'nope', '10.0.0.0/33', '10.0.0.256', '10.0.0.1-x', '10.0.0.0/24/8', '1.2.3'])(
    'rejects malformed input %j',
    (spec) => {
      expect(() => parseRange(spec)).toThrow(RangeParseError);
      try {
        parseRange(spec);
      } catch (err) {
        expect(err).toBeInstanceOf(RangeParseError);
        expect(err instanceof RangeParseError && err.kind).toBe('malformed');
      }
    },
  );

  it.each(['10.0.0.9-10.0.0.1', '10.0.0.9-3', '10.0.5-1.1'])('rejects inverted range %j', (spec) => {
    const check = validateRange(spec);
    expect(check.valid).toBe(false);
    if (!check.valid) {
      expect(check.error.kind).toBe('inverted');
      expect(check.error.input).toBe(spec);
    }
  });

  it('returns the parsed range from validateRange on success', () => {
    const check = validateRange('10.0.0.0/29');
    expect(check.valid).toBe(true);
    if (check.valid) expect(estimateCount(check.range)).toBe(8);
  });

  it('freezes parsed ranges', () => {
    expect(Object.isFrozen(parseRange('10.0.0.0/24'))).toBe(true);
  });
});

describe('iterate', () => {
  const specs = ['10.0.0.0/28', '172.16.5.9-172.16.6.2', '10.9.1,3.0-2', '192.168.0.1', '10.0.0.0/23'];

  it.each(specs)('yields exactly estimateCount strictly increasing addresses for %s', (spec) => {
    const range = parseRange(spec);
    const addresses = [...iterate(range)];
    expect(addresses).toHaveLength(estimateCount(range));
    for (let i = 1; i < addresses.length; i++) {
      expect(addresses[i]).toBeGreaterThan(addresses[i - 1]);
    }
    for (const address of addresses) expect(contains(range, address)).toBe(true);
  });

  it('restarts from the beginning on every iteration', () => {
    const sequence = iterate(parseRange('10.0.0.0/29'));
    const first = [...sequence];
    const second = [...sequence];
    expect(second).toEqual(first);
    expect(first).toHaveLength(8);
  });
});

describe('uniqueAddresses', () => {
  it('skips addresses an earlier range already produced', () => {
    const ranges = [parseRange('10.0.0.0/30'), parseRange('10.0.0.2-10.0.0.5')];
    expect([...uniqueAddresses(ranges)].map(intToIp)).toEqual([
      '10.0.0.0', '10.0.0.1', '10.0.0.2', '10.0.0.3', '10.0.0.4', '10.0.0.5',
    ]);
    expect(countUnique(ranges)).toBe(6);
  });

  it('counts a fully covered range as nothing extra', () => {
    const ranges = [parseRange('10.0.0.0/24'), parseRange('10.0.0.10-20')];
    expect(countUnique(ranges)).toBe(256);
  });

  it('is zero for no ranges', () => {
    expect(countUnique([])).toBe(0);
    expect([...uniqueAddresses([])]).toEqual([]);
  });
});

describe('address helpers', () => {
  it('round-trips the top of the address space', () => {
    expect(intToIp(parseIpv4('255.255.255.255') ?? -1)).toBe('255.255.255.255');
  });

  it('compares addresses numerically', () => {
    expect(['10.0.0.10', '10.0.0.9', '9.255.0.1'].sort(compareIp)).toEqual(['9.255.0.1', '10.0.0.9', '10.0.0.10']);
  });
});
