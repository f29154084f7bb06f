/**
 * grpc-record-store - Configuration
 *
 * Environment-driven settings, parsed and validated with zod.
 */

import { z } from 'zod';
import type { LogLevel } from '../logging/logger';
import type { NewRecord } from '../store/types';

export interface RecordServerConfig {
  host: string;
  port: number;
  /** Pause between ListRecordsStream emissions */
  streamDelayMs: number;
  /** Per-call budget enforced by the timeout interceptor, if set */
  callTimeoutMs?: number;
  logLevel: LogLevel;
  /** Seed the store with DEFAULT_SEED_RECORDS at start-up */
  seedRecords: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_SEED_RECORDS: readonly NewRecord[] = [
  { name: 'John Doe', contact: 'john@example.com', numericAttribute: 30 },
  { name: 'Jane Smith', contact: 'jane@example.com', numericAttribute: 25 },
];

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  GRPC_HOST: z.string().min(1).default('0.0.0.0'),
  GRPC_PORT: z.coerce.number().int().min(0).max(65535).default(50051),
  STREAM_DELAY_MS: z.coerce.number().int().min(0).default(100),
  CALL_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  SEED_RECORDS: booleanFlag.default('true'),
});

/**
 * Read configuration from environment variables. Empty values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RecordServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    host: parsed.GRPC_HOST,
    port: parsed.GRPC_PORT,
    streamDelayMs: parsed.STREAM_DELAY_MS,
    callTimeoutMs: parsed.CALL_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
    seedRecords: parsed.SEED_RECORDS,
  };
}
