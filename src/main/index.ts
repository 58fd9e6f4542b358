import { assessHealth } from './analysis/health';
import { sortDevices } from './analysis/sorting';
import { errorMessage } from './errors';
import { MinerProber } from './probers';
import { ScanCoordinator } from './services/orchestrator';
import type { ScanSession } from './services/session';
import { JsonFileStore, MemoryStore } from './services/store';
import { loadSettings } from './settings';
import type { ScanEvent } from './types';

const PROGRESS_INTERVAL_MS = 2000;

function usage(): string {
  return [
    'Usage: asic-scout [--dry-run] [group ...]',
    '',
    'Scans every enabled group (or the named ones) for mining devices and',
    'stores the results in the configuration file ($ASIC_SCOUT_CONFIG).',
    'Ctrl-C stops scheduling new probes and keeps what was found so far.',
  ].join('\n');
}

async function main(argv: string[]): Promise<number> {
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(usage());
    return 0;
  }

  const settings = loadSettings();
  const dryRun = argv.includes('--dry-run');
  const groupNames = argv.filter((arg) => !arg.startsWith('-'));

  const fileStore = new JsonFileStore(settings.configPath);
  const store = dryRun ? new MemoryStore(await fileStore.load()) : fileStore;
  const coordinator = new ScanCoordinator(store, new MinerProber(), settings);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\n[Scan] Stopping, waiting for in-flight probes');
    controller.abort();
  });

  let lastProgress = 0;
  const onEvent = (event: ScanEvent, session: ScanSession) => {
    if (event.type === 'address_probed' && event.outcome.ok) {
      const { device } = event.outcome;
      console.log(`[Scan] ${event.group}: ${device.ip} ${device.model} (${device.firmware})`);
    } else if (event.type === 'group_completed') {
      console.log(`[Scan] ${event.group}: done`);
    } else if (event.type === 'group_progress' && Date.now() - lastProgress > PROGRESS_INTERVAL_MS) {
      lastProgress = Date.now();
      const { probed, total, found } = session.overall();
      console.log(`[Scan] ${probed}/${total} probed, ${found} miner(s) found`);
    }
  };

  const report = await coordinator.runScan({ groups: groupNames, signal: controller.signal, onEvent });

  console.log(`\n[Scan] Session ${report.sessionId} ${report.status}`);
  for (const group of report.config.groups) {
    const results = report.config.results[group.name];
    if (!results) continue;
    const stamp = results.lastScanAt ? new Date(results.lastScanAt).toISOString() : 'partial scan';
    console.log(`\n${group.name}: ${results.devices.length} device(s), ${stamp}`);
    for (const device of sortDevices(results.devices, 'health')) {
      const health = assessHealth(device);
      const hashrate = device.hashrateThs === undefined ? '-' : `${device.hashrateThs.toFixed(2)} TH/s`;
      console.log(`  ${device.ip.padEnd(15)} ${device.model.padEnd(28)} ${hashrate.padStart(12)}  ${health.status}`);
    }
  }

  if (report.error) console.error(`[Scan] ${report.error.message}`);
  if (report.saveError) console.error(`[Scan] Results not saved: ${report.saveError.message}`);
  if (dryRun) console.log('\n[Scan] Dry run, configuration file left untouched');
  return report.status === 'failed' || report.saveError ? 1 : 0;
}

main(process.argv.slice(2)).then(
  (code) => { process.exitCode = code; },
  (err: unknown) => {
    console.error(`[asic-scout] ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
