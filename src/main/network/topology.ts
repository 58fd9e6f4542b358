import { networkInterfaces } from 'os';
import { intToIp, parseIpv4 } from './range';

export interface SubnetInfo {
  cidr: string;           // e.g., "192.168.1.0/24"
  networkAddress: string; // e.g., "192.168.1.0"
  prefix: number;         // e.g., 24
  interface: string;      // e.g., "eth0"
  localIp: string;        // this host's IP on this interface
}

type InterfaceMap = ReturnType<typeof networkInterfaces>;

// Anything wider gets narrowed to the /24 around the local address
const WIDEST_PREFIX = 24;

/**
 * IPv4 subnets this host is directly attached to, one per CIDR. Used to
 * seed scan groups when no configuration exists yet.
 */
export function localSubnets(ifaces: InterfaceMap = networkInterfaces()): SubnetInfo[] {
  const seen = new Set<string>();
  const subnets: SubnetInfo[] = [];

  for (const [name, addrs] of Object.entries(ifaces)) {
    if (!addrs) continue;
    for (const addr of addrs) {
      if (addr.family !== 'IPv4' || addr.internal) continue;
      // Skip link-local
      if (addr.address.startsWith('169.254.')) continue;

      const local = parseIpv4(addr.address);
      const declared = Number(addr.cidr?.split('/')[1] ?? WIDEST_PREFIX);
      if (local === null || !Number.isInteger(declared)) continue;

      const prefix = Math.max(declared, WIDEST_PREFIX);
      if (prefix >= 31) continue; // point-to-point, nothing to scan

      const mask = (0xffffffff << (32 - prefix)) >>> 0;
      const networkAddress = intToIp((local & mask) >>> 0);
      const cidr = `${networkAddress}/${prefix}`;
      if (seen.has(cidr)) continue;
      seen.add(cidr);

      subnets.push({ cidr, networkAddress, prefix, interface: name, localIp: addr.address });
    }
  }

  return subnets;
}
