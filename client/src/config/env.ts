/**
 * Robot Link Configuration
 * Load from environment variables with defaults
 */
import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from project root
config({ path: resolve(__dirname, '../../../.env') });

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const ENV = {
  // Connection
  ROBOT_HOST: process.env.ROBOT_HOST || '192.168.4.1', // AP mode address
  ROBOT_SCHEME: process.env.ROBOT_SCHEME || 'ws',
  CONNECT_TIMEOUT_MS: intFromEnv('CONNECT_TIMEOUT_MS', 4000),

  // Channel loops
  STATUS_POLL_MS: intFromEnv('STATUS_POLL_MS', 50),
  STATUS_LOSS_LIMIT: intFromEnv('STATUS_LOSS_LIMIT', 5),
  IMAGE_IDLE_MS: intFromEnv('IMAGE_IDLE_MS', 50),
  IMAGE_WAIT_MS: intFromEnv('IMAGE_WAIT_MS', 500),
  CHANNEL_IDLE_MS: intFromEnv('CHANNEL_IDLE_MS', 200),
  COMMAND_TIMEOUT_MS: intFromEnv('COMMAND_TIMEOUT_MS', 5000),

  // Motion
  BLOCK_TIMEOUT_MS: intFromEnv('BLOCK_TIMEOUT_MS', 10000),
  SHADOW_MAX_SNAPSHOTS: intFromEnv('SHADOW_MAX_SNAPSHOTS', 20),

  // Raise instead of log when the robot rejects a command
  STRICT_COMMANDS: process.env.STRICT_COMMANDS === 'true',

  // Monitor (0 = disabled)
  MONITOR_PORT: intFromEnv('MONITOR_PORT', 0),
  MONITOR_BROADCAST_MS: intFromEnv('MONITOR_BROADCAST_MS', 200),

  // Logging
  LOG_DIR: process.env.LOG_DIR || resolve(__dirname, '../../../logs'),
  LOG_TO_FILE: process.env.LOG_TO_FILE !== 'false',
  DEBUG: process.env.DEBUG === 'true',
};

export function validateConfig(): void {
  if (!ENV.ROBOT_HOST.trim()) {
    console.warn('[Config] WARNING: ROBOT_HOST is empty; pass a host explicitly.');
  }
  const intervals: Array<[string, number]> = [
    ['STATUS_POLL_MS', ENV.STATUS_POLL_MS],
    ['CHANNEL_IDLE_MS', ENV.CHANNEL_IDLE_MS],
    ['IMAGE_IDLE_MS', ENV.IMAGE_IDLE_MS],
    ['COMMAND_TIMEOUT_MS', ENV.COMMAND_TIMEOUT_MS],
  ];
  for (const [name, value] of intervals) {
    if (value <= 0) {
      console.warn(`[Config] WARNING: ${name} should be positive, got ${value}.`);
    }
  }
}
