import { z } from 'zod';
import { ConfigurationError } from '@location-bridge/domain';
import type { DeviceRef, LogLevel } from '@location-bridge/domain';
import { loadDevices } from './devices.js';

/** Unset and empty variables both fall back to the default. */
function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema);
}

const csvList = env(
  z
    .string()
    .optional()
    .transform((v) =>
      (v ?? '')
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
    ),
);

const envSchema = z.object({
  DATABASE_URL: env(z.string({ required_error: 'is required' })),
  BRIDGE_POLL_INTERVAL: env(z.coerce.number().int().positive().default(60 * 60)),
  BRIDGE_DEVICE_KEYS: csvList,
  BRIDGE_PRIVATE_KEYS: csvList,
  BRIDGE_ENDPOINTS: csvList,
  BRIDGE_TRACCAR_SERVER: env(z.string().trim().optional()),
  BRIDGE_PUSH_TIMEOUT_MS: env(z.coerce.number().int().positive().default(10_000)),
  BRIDGE_REPLAY_FILE: env(z.string().default('./data/replay.json')),
  BRIDGE_RECORD_FILE: env(z.string().optional()),
  BRIDGE_LOGGING_LEVEL: env(
    z
      .string()
      .transform((s) => s.toLowerCase())
      .pipe(z.enum(['debug', 'info', 'warn', 'error']))
      .default('info'),
  ),
});

export interface BridgeConfig {
  databaseUrl: string;
  /** Seconds between upstream polls, shared by all devices. */
  pollingIntervalSec: number;
  devices: DeviceRef[];
  /** Endpoint addresses, deduplicated, in configured order. */
  endpoints: string[];
  pushTimeoutMs: number;
  replayFile: string;
  recordFile?: string;
  logLevel: LogLevel;
}

/**
 * Reads and validates the bridge configuration from environment variables.
 * Built once at startup and handed to every collaborator.
 *
 * @throws ConfigurationError on invalid values, no devices or no endpoints.
 */
export function loadBridgeConfig(source: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid bridge configuration',
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }
  const vars = parsed.data;

  const devices = loadDevices(
    vars.BRIDGE_DEVICE_KEYS.length > 0 ? vars.BRIDGE_DEVICE_KEYS : vars.BRIDGE_PRIVATE_KEYS,
  );
  if (devices.length === 0) {
    throw new ConfigurationError(
      'No tracking devices configured. Set BRIDGE_DEVICE_KEYS to a comma-separated list of device identities',
    );
  }

  const configured = vars.BRIDGE_ENDPOINTS.length > 0
    ? vars.BRIDGE_ENDPOINTS
    : vars.BRIDGE_TRACCAR_SERVER ? [vars.BRIDGE_TRACCAR_SERVER] : [];
  const endpoints = [...new Set(configured)];
  if (endpoints.length === 0) {
    throw new ConfigurationError('No endpoints configured. Set BRIDGE_ENDPOINTS or BRIDGE_TRACCAR_SERVER');
  }

  return {
    databaseUrl: vars.DATABASE_URL,
    pollingIntervalSec: vars.BRIDGE_POLL_INTERVAL,
    devices,
    endpoints,
    pushTimeoutMs: vars.BRIDGE_PUSH_TIMEOUT_MS,
    replayFile: vars.BRIDGE_REPLAY_FILE,
    recordFile: vars.BRIDGE_RECORD_FILE,
    logLevel: vars.BRIDGE_LOGGING_LEVEL,
  };
}
