import { z } from 'zod';
import type { CancelledTimestampPolicy } from './services/merger';

export interface Settings {
  configPath: string;
  concurrency: number;
  probeTimeoutMs: number;
  channelCapacity: number;
  cancelledTimestamp: CancelledTimestampPolicy;
}

export const DEFAULT_SETTINGS: Settings = {
  configPath: 'asic-scout.config.json',
  concurrency: 64,
  probeTimeoutMs: 3000,
  channelCapacity: 256,
  cancelledTimestamp: 'clear',
};

const envSchema = z.object({
  ASIC_SCOUT_CONFIG: z.string().min(1).optional(),
  ASIC_SCOUT_CONCURRENCY: z.coerce.number().int().min(1).max(4096).optional(),
  ASIC_SCOUT_PROBE_TIMEOUT_MS: z.coerce.number().int().min(50).max(120_000).optional(),
  ASIC_SCOUT_CHANNEL_CAPACITY: z.coerce.number().int().min(1).max(65_536).optional(),
  ASIC_SCOUT_CANCELLED_TIMESTAMP: z.enum(['clear', 'retain']).optional(),
});

/** Defaults overridden by `ASIC_SCOUT_*` environment variables. Throws on invalid values. */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid settings: ${issues}`);
  }
  const vars = parsed.data;
  return {
    configPath: vars.ASIC_SCOUT_CONFIG ?? DEFAULT_SETTINGS.configPath,
    concurrency: vars.ASIC_SCOUT_CONCURRENCY ?? DEFAULT_SETTINGS.concurrency,
    probeTimeoutMs: vars.ASIC_SCOUT_PROBE_TIMEOUT_MS ?? DEFAULT_SETTINGS.probeTimeoutMs,
    channelCapacity: vars.ASIC_SCOUT_CHANNEL_CAPACITY ?? DEFAULT_SETTINGS.channelCapacity,
    cancelledTimestamp: vars.ASIC_SCOUT_CANCELLED_TIMESTAMP ?? DEFAULT_SETTINGS.cancelledTimestamp,
  };
}
