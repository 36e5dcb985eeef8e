import { registerAs } from '@nestjs/config';
import { ConfigurationError } from '../common/errors';

export const CONFIG_NAMESPACE = 'geyser';

export interface EnvConfig {
  GEYSER_ENDPOINT: string;
  GEYSER_ACCESS_TOKEN: string;
  PORT: number;
  CONNECT_TIMEOUT_MS: number;
  BACKOFF_INITIAL_MS: number;
  BACKOFF_MULTIPLIER: number;
  BACKOFF_MAX_MS: number;
  STREAM_END_DELAY_MS: number;
}

/** Shape of the `ConfigService` store: validated settings under one namespace. */
export interface AppConfig {
  geyser: EnvConfig;
}

/**
 * Validate the raw environment (process env merged with `.env`) and return
 * the typed settings. Throws {@link ConfigurationError} on the first bad
 * value so startup aborts before any connection attempt.
 */
export function validateEnv(env: Record<string, unknown>): EnvConfig {
  const endpoint = readString(env, 'GEYSER_ENDPOINT', '').trim();
  if (!endpoint) {
    throw new ConfigurationError('GEYSER_ENDPOINT is required');
  }

  const config: EnvConfig = {
    GEYSER_ENDPOINT: endpoint,
    GEYSER_ACCESS_TOKEN: readString(env, 'GEYSER_ACCESS_TOKEN', '').trim(),
    PORT: readInt(env, 'PORT', 3000),
    CONNECT_TIMEOUT_MS: readInt(env, 'CONNECT_TIMEOUT_MS', 10_000),
    BACKOFF_INITIAL_MS: readInt(env, 'BACKOFF_INITIAL_MS', 1_000),
    BACKOFF_MULTIPLIER: readNumber(env, 'BACKOFF_MULTIPLIER', 2),
    BACKOFF_MAX_MS: readInt(env, 'BACKOFF_MAX_MS', 60_000),
    STREAM_END_DELAY_MS: readInt(env, 'STREAM_END_DELAY_MS', 1_000),
  };

  if (config.BACKOFF_MULTIPLIER < 1) {
    throw new ConfigurationError('BACKOFF_MULTIPLIER must be >= 1');
  }
  if (config.BACKOFF_MAX_MS < config.BACKOFF_INITIAL_MS) {
    throw new ConfigurationError('BACKOFF_MAX_MS must not be below BACKOFF_INITIAL_MS');
  }
  return config;
}

/** Largest delay `setTimeout` honours; longer ones fire after 1 ms. */
const MAX_TIMER_MS = 2_147_483_647;

function readString(env: Record<string, unknown>, key: string, fallback: string): string {
  const value = env[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${key} must be a string`);
  }
  return value;
}

function readInt(env: Record<string, unknown>, key: string, fallback: number): number {
  const raw = readString(env, key, '').trim();
  if (raw === '') return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value > MAX_TIMER_MS) {
    throw new ConfigurationError(`${key} must not exceed ${MAX_TIMER_MS}, got "${raw}"`);
  }
  return value;
}

function readNumber(env: Record<string, unknown>, key: string, fallback: number): number {
  const raw = readString(env, key, '').trim();
  if (raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Config factory for `ConfigModule.forRoot({ load })`. Runs while the
 * application context is created, after `.env` has been merged into
 * `process.env`, so a bad value rejects `NestFactory.create`.
 */
export default registerAs(CONFIG_NAMESPACE, (): EnvConfig => validateEnv(process.env));
