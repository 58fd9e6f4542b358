import { Socket } from 'net';
import { ProbeError } from '../errors';
import type { DeviceSnapshot, Logger, MinerFirmware, MinerMake, ScanFilter } from '../types';
import { BaseProber } from './base';
import { asRecord, firstEntry, pickField, pickNumber, pickString, type JsonRecord } from './fields';

export const CGMINER_PORT = 4028;

const CGMINER_MAKES: MinerMake[] = ['AntMiner', 'WhatsMiner', 'AvalonMiner', 'Unknown'];
const CGMINER_FIRMWARES: MinerFirmware[] = ['Stock', 'BraiinsOS', 'LuxOS', 'VNish', 'Unknown'];

/**
 * Parse a cgminer-family API reply. Several firmwares terminate the payload
 * with a NUL byte and some glue multi-command replies as `}{`.
 */
export function parseCgminerReply(raw: string): JsonRecord {
  const cleaned = raw.replace(/\0/g, '').trim().replace(/\}\s*\{/g, '},{');
  const parsed: unknown = JSON.parse(cleaned);
  const record = asRecord(parsed);
  if (!record) throw new Error('reply is not a JSON object');
  return record;
}

export function cgminerCommand(
  ip: string,
  command: string,
  options: { port?: number; signal: AbortSignal },
): Promise<JsonRecord> {
  const { port = CGMINER_PORT, signal } = options;

  return new Promise((resolve, reject) => {
    const socket = new Socket();
    const chunks: Buffer[] = [];
    let done = false;

    const finish = (err: Error | null) => {
      if (done) return;
      done = true;
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      if (err) {
        reject(err);
        return;
      }
      const raw = Buffer.concat(chunks).toString('utf8');
      try {
        resolve(parseCgminerReply(raw));
      } catch (parseErr) {
        reject(new ProbeError('protocol', ip, `Unreadable "${command}" reply on port ${port}`, { cause: parseErr }));
      }
    };

    const onAbort = () => finish(new ProbeError('timeout', ip, `"${command}" aborted`));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });

    socket.on('data', (chunk: Buffer) => { chunks.push(chunk); });
    socket.on('end', () => finish(null));
    socket.on('error', (err) => finish(new ProbeError('unreachable', ip, err.message, { cause: err })));
    socket.connect(port, ip, () => {
      socket.write(JSON.stringify({ command }));
    });
  });
}

export function identifyMake(model: string): MinerMake {
  if (/antminer|bitmain/i.test(model)) return 'AntMiner';
  if (/whatsminer|^m\d{2}/i.test(model)) return 'WhatsMiner';
  if (/avalon|canaan/i.test(model)) return 'AvalonMiner';
  if (/bitaxe/i.test(model)) return 'Bitaxe';
  return 'Unknown';
}

export function identifyFirmware(version: JsonRecord, description: string): MinerFirmware {
  const text = `${description} ${Object.keys(version).join(' ')}`.toLowerCase();
  if (text.includes('bosminer') || text.includes('braiins')) return 'BraiinsOS';
  if (text.includes('luxminer')) return 'LuxOS';
  if (text.includes('vnish')) return 'VNish';
  return 'Stock';
}

/** Hashrate in TH/s from a SUMMARY entry that may report GH/s or MH/s. */
export function summaryHashrateThs(summary: JsonRecord): number | undefined {
  const ghs = pickNumber(pickField(summary, ['GHS 5s', 'GHS av']));
  if (ghs !== undefined) return ghs / 1000;
  const mhs = pickNumber(pickField(summary, ['MHS 5s', 'MHS 1m', 'MHS av']));
  return mhs === undefined ? undefined : mhs / 1_000_000;
}

/**
 * Speaks the JSON API on TCP 4028 exposed by cgminer, bmminer, btminer,
 * BOSminer and LUXminer.
 */
export class CgminerProber extends BaseProber {
  name = 'cgminer';

  constructor(private port = CGMINER_PORT, private logger: Logger = console) {
    super();
  }

  canMatch(filter: ScanFilter): boolean {
    const makes = filter.makes ?? [];
    const firmwares = filter.firmwares ?? [];
    return (makes.length === 0 || makes.some((m) => CGMINER_MAKES.includes(m)))
      && (firmwares.length === 0 || firmwares.some((f) => CGMINER_FIRMWARES.includes(f)));
  }

  async identify(ip: string, signal: AbortSignal): Promise<DeviceSnapshot | null> {
    let reply: JsonRecord;
    try {
      reply = await cgminerCommand(ip, 'version', { port: this.port, signal });
    } catch (err) {
      // Connection refused or host down: no miner API on this address
      if (err instanceof ProbeError && err.code === 'unreachable') return null;
      throw err;
    }

    const version = firstEntry(reply, 'VERSION') ?? {};
    const status = firstEntry(reply, 'STATUS') ?? {};
    const description = pickString(pickField(status, ['Description', 'Msg'])) ?? '';
    const model = pickString(pickField(version, ['Type', 'Model', 'Miner'])) ?? 'Unknown';

    const snapshot: DeviceSnapshot = {
      ip,
      make: identifyMake(model),
      model,
      firmware: identifyFirmware(version, description),
      firmwareVersion: pickString(pickField(version, ['BOSminer', 'LUXminer', 'BMMiner', 'CGMiner', 'Firmware'])),
      isMining: false,
      messages: [],
    };

    const summary = await cgminerCommand(ip, 'summary', { port: this.port, signal })
      .then((r) => firstEntry(r, 'SUMMARY'))
      .catch((err: unknown) => {
        if (signal.aborted) throw err;
        this.logger.debug(`[cgminer] ${ip}: summary unavailable`, err);
        return null;
      });

    if (summary) {
      snapshot.hashrateThs = summaryHashrateThs(summary);
      snapshot.temperatureC = pickNumber(pickField(summary, ['Temperature', 'Chip Temp Avg']));
      const fanIn = pickNumber(summary['Fan Speed In']);
      const fanOut = pickNumber(summary['Fan Speed Out']);
      const fans = [fanIn, fanOut].filter((rpm): rpm is number => rpm !== undefined);
      if (fans.length > 0) snapshot.fans = fans;
      snapshot.isMining = (snapshot.hashrateThs ?? 0) > 0;
    }

    if (pickString(status.STATUS) === 'E') snapshot.messages.push(description);

    return snapshot;
  }
}
